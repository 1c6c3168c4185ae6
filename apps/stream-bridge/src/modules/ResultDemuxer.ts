/**
 * Result Demuxer Module
 * Matches asynchronous results to chunk sequence numbers and emits them
 * downstream strictly in sequence order
 */
import { EventEmitter } from 'events';
import type { BridgeOutput, Chunk, OutputKind, TaggedResult, TimeoutMarker } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

let logger: ReturnType<typeof getLogger> | null = null;

/**
 * ResultDemuxer configuration
 */
export interface ResultDemuxerConfig {
  /** Forward partial results as they arrive */
  emitPartials: boolean;
  /** Marker used when a chunk's result timed out */
  timeoutMarker: TimeoutMarker;
}

/**
 * ResultDemuxer events
 */
export interface ResultDemuxerEvents {
  'output': (output: BridgeOutput) => void;
  'watermark': (watermark: number) => void;
}

export type ExpiryReason = 'timeout' | 'truncated';

interface Resolution {
  kind: OutputKind;
  payload: unknown;
}

interface ChunkSpan {
  startMs: number;
  endMs: number;
}

/**
 * ResultDemuxer module
 * The watermark is the lowest sequence not yet emitted; finals above it wait
 * in `buffered` until the gap closes or the missing chunk expires.
 */
export class ResultDemuxer extends EventEmitter {
  private config: ResultDemuxerConfig;
  private watermark: number = 0;
  private spans: Map<number, ChunkSpan> = new Map();
  private buffered: Map<number, Resolution> = new Map();
  private activeSessionId: string | null = null;
  private stats = {
    resultsEmitted: 0,
    partialsEmitted: 0,
    markersEmitted: 0,
    staleDiscarded: 0,
    duplicatesDiscarded: 0,
    maxBuffered: 0,
  };

  constructor(config: ResultDemuxerConfig) {
    super();
    this.config = config;

    if (!logger) {
      try {
        logger = getLogger().child({ context: 'ResultDemuxer' });
      } catch {
        logger = null;
      }
    }

    this.log('info', `ResultDemuxer initialized (partials=${config.emitPartials}, timeout marker=${config.timeoutMarker})`);
  }

  private log(level: 'debug' | 'info' | 'warn' | 'error', message: string, ...args: unknown[]): void {
    if (logger) {
      logger[level](message, ...args);
    }
  }

  /**
   * Record the time range of a produced chunk
   */
  register(chunk: Chunk): void {
    this.spans.set(chunk.sequence, { startMs: chunk.startMs, endMs: chunk.endMs });
  }

  /**
   * Results tagged with any other session are stale and dropped
   */
  setActiveSession(sessionId: string): void {
    this.activeSessionId = sessionId;
    this.log('debug', `Active session ${sessionId.slice(0, 8)}`);
  }

  /**
   * Inbound result from the session
   */
  deliver(result: TaggedResult): void {
    if (result.sessionId !== this.activeSessionId) {
      this.stats.staleDiscarded++;
      this.log('debug', `Discarding stale result for chunk ${result.sequence} from session ${result.sessionId.slice(0, 8)}`);
      return;
    }

    if (this.isSettled(result.sequence)) {
      // At-least-once resend can produce the same result twice
      this.stats.duplicatesDiscarded++;
      return;
    }

    if (result.partial) {
      if (this.config.emitPartials) {
        this.stats.partialsEmitted++;
        this.emitOutput(result.sequence, 'partial', result.payload);
      }
      return;
    }

    this.resolve(result.sequence, { kind: 'result', payload: result.payload });
  }

  /**
   * Resolve a sequence whose result will never arrive
   */
  expire(sequence: number, reason: ExpiryReason): void {
    if (this.isSettled(sequence)) {
      return;
    }

    const kind: OutputKind = reason === 'truncated' ? 'truncated' : this.config.timeoutMarker;
    this.log('warn', `Chunk ${sequence} resolved with ${kind} marker (${reason})`);
    this.resolve(sequence, { kind, payload: null });
  }

  private isSettled(sequence: number): boolean {
    return sequence < this.watermark || this.buffered.has(sequence);
  }

  private resolve(sequence: number, resolution: Resolution): void {
    if (sequence !== this.watermark) {
      this.buffered.set(sequence, resolution);
      this.stats.maxBuffered = Math.max(this.stats.maxBuffered, this.buffered.size);
      this.log('debug', `Buffered chunk ${sequence} waiting for ${this.watermark}`);
      return;
    }

    this.emitResolution(sequence, resolution);
    this.watermark++;

    // Advance past results that are now contiguous
    let next = this.buffered.get(this.watermark);
    while (next) {
      this.buffered.delete(this.watermark);
      this.emitResolution(this.watermark, next);
      this.watermark++;
      next = this.buffered.get(this.watermark);
    }

    this.emit('watermark', this.watermark);
  }

  private emitResolution(sequence: number, resolution: Resolution): void {
    if (resolution.kind === 'result') {
      this.stats.resultsEmitted++;
    } else {
      this.stats.markersEmitted++;
    }
    this.emitOutput(sequence, resolution.kind, resolution.payload);
    this.spans.delete(sequence);
  }

  private emitOutput(sequence: number, kind: OutputKind, payload: unknown): void {
    const span = this.spans.get(sequence);
    this.emit('output', {
      sequence,
      startMs: span ? span.startMs : 0,
      endMs: span ? span.endMs : 0,
      kind,
      payload,
    });
  }

  get currentWatermark(): number {
    return this.watermark;
  }

  /**
   * Get demuxer status
   */
  getStatus(): {
    watermark: number;
    buffered: number[];
    resultsEmitted: number;
    partialsEmitted: number;
    markersEmitted: number;
    staleDiscarded: number;
    duplicatesDiscarded: number;
    maxBuffered: number;
  } {
    return {
      watermark: this.watermark,
      buffered: [...this.buffered.keys()].sort((a, b) => a - b),
      ...this.stats,
    };
  }

  // Typed event emitter methods
  on<K extends keyof ResultDemuxerEvents>(
    event: K,
    listener: ResultDemuxerEvents[K]
  ): this {
    return super.on(event, listener);
  }

  emit<K extends keyof ResultDemuxerEvents>(
    event: K,
    ...args: Parameters<ResultDemuxerEvents[K]>
  ): boolean {
    return super.emit(event, ...args);
  }
}
