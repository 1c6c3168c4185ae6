/**
 * Stream Bridge
 * Host-facing block that connects the real-time sample callback to the
 * asynchronous speech service session
 */
import { EventEmitter } from 'events';
import type {
  BridgeConfig,
  BridgeOutput,
  BridgePhase,
  BridgeStats,
  BridgeStatus,
  Chunk,
  HostBlock,
  SessionState,
} from '../types/index.js';
import type { Transport } from '../types/transport.js';
import { SampleRingBuffer } from '../services/sample-ring-buffer.service.js';
import { BoundedQueue } from '../services/bounded-queue.service.js';
import { BackpressureController, type BackpressureSnapshot } from '../services/backpressure-controller.service.js';
import { ChunkScheduler } from './ChunkScheduler.js';
import { SessionStateMachine } from './SessionStateMachine.js';
import { ResultDemuxer } from './ResultDemuxer.js';
import { FatalBridgeError } from '../utils/errors.js';
import type { Clock } from '../utils/retry.js';
import { getLogger } from '../utils/logger.js';

let logger: ReturnType<typeof getLogger> | null = null;

/**
 * Returned by process() once the block has finished, after an aborting failure
 */
export const BRIDGE_DONE = -1;

/**
 * StreamBridge construction options
 */
export interface StreamBridgeOptions {
  config: BridgeConfig;
  transport: Transport;
  clock?: Clock;
}

/**
 * StreamBridge events
 */
export interface StreamBridgeEvents {
  'output': (output: BridgeOutput) => void;
  'backpressure': (snapshot: BackpressureSnapshot) => void;
  'session:state': (from: SessionState, to: SessionState) => void;
  'fatal': (error: FatalBridgeError) => void;
  'end': () => void;
}

/**
 * StreamBridge
 * process() and flush() run on the real-time path and only touch the ring
 * buffer and counters; everything else runs on the event loop via pump().
 */
export class StreamBridge extends EventEmitter implements HostBlock {
  private config: BridgeConfig;
  private ringBuffer: SampleRingBuffer;
  private handoff: BoundedQueue<Chunk>;
  private backpressure: BackpressureController;
  private scheduler: ChunkScheduler;
  private session: SessionStateMachine;
  private demuxer: ResultDemuxer;

  private phase: BridgePhase = 'running';
  private pumpHandle: NodeJS.Immediate | null = null;
  private ended: boolean = false;
  private lastError: string | null = null;
  private stats = {
    samplesOffered: 0,
    samplesAccepted: 0,
    samplesDropped: 0,
    samplesStalled: 0,
  };

  constructor(options: StreamBridgeOptions) {
    super();
    const { config, transport } = options;
    this.config = config;

    const ringCapacity = Math.round(config.ringBufferSeconds * config.sampleRate) * config.channels;
    this.ringBuffer = new SampleRingBuffer({
      capacity: ringCapacity,
      channels: config.channels,
      overrunMode: config.backpressurePolicy === 'stall' ? 'reject' : 'overwrite',
    });

    this.handoff = new BoundedQueue<Chunk>(config.handoffQueueCapacity);

    this.backpressure = new BackpressureController({
      handoffHighWater: config.handoffQueueCapacity,
      handoffLowWater: config.handoffLowWater,
      inFlightHighWater: config.maxInFlightChunks,
      inFlightLowWater: config.inFlightLowWater,
      policy: config.backpressurePolicy,
    });

    this.scheduler = new ChunkScheduler({
      ringBuffer: this.ringBuffer,
      handoff: this.handoff,
      backpressure: this.backpressure,
      sampleRate: config.sampleRate,
      channels: config.channels,
      chunkDurationMs: config.chunkDurationMs,
    });

    this.session = new SessionStateMachine({
      transport,
      credentials: config.credentials,
      retryPolicy: config.retryPolicy,
      handoff: this.handoff,
      backpressure: this.backpressure,
      resultTimeoutMs: config.resultTimeoutMs,
      maxConsecutiveTimeouts: config.maxConsecutiveTimeouts,
      clock: options.clock,
    });

    this.demuxer = new ResultDemuxer({
      emitPartials: config.emitPartials,
      timeoutMarker: config.timeoutMarker,
    });

    if (!logger) {
      try {
        logger = getLogger().child({ context: 'StreamBridge' });
      } catch {
        logger = null;
      }
    }

    this.setupEventHandlers();

    this.log(
      'info',
      `StreamBridge initialized: ${config.sampleRate}Hz x${config.channels}, ${config.chunkDurationMs}ms chunks, ` +
      `max in-flight ${config.maxInFlightChunks}, policy=${config.backpressurePolicy}, on fatal=${config.onFatal}`
    );
  }

  private log(level: 'debug' | 'info' | 'warn' | 'error', message: string, ...args: unknown[]): void {
    if (logger) {
      logger[level](message, ...args);
    }
  }

  /**
   * Wire the modules together
   */
  private setupEventHandlers(): void {
    // ChunkScheduler → ResultDemuxer (time ranges)
    this.scheduler.on('chunk:ready', (chunk) => {
      this.demuxer.register(chunk);
    });

    // SessionStateMachine → ResultDemuxer
    this.session.on('session:opened', (sessionId) => {
      this.demuxer.setActiveSession(sessionId);
    });

    this.session.on('result', (result) => {
      this.demuxer.deliver(result);
    });

    this.session.on('chunk:timeout', (sequence) => {
      this.demuxer.expire(sequence, 'timeout');
    });

    this.session.on('chunk:truncated', (sequence) => {
      this.demuxer.expire(sequence, 'truncated');
    });

    this.session.on('chunk:released', () => {
      this.schedulePump();
    });

    this.session.on('state', (from, to) => {
      if (to === 'draining' && this.phase !== 'failed') {
        this.phase = 'draining';
      }
      this.emit('session:state', from, to);
    });

    this.session.on('drained', () => {
      if (this.scheduler.isComplete) {
        this.finish();
      }
    });

    this.session.on('fatal', (error) => {
      this.handleFatal(error);
    });

    // Backpressure → host observers, and restart admission on release
    this.backpressure.on('pause', (snapshot) => {
      this.emit('backpressure', snapshot);
    });

    this.backpressure.on('resume', (snapshot) => {
      this.emit('backpressure', snapshot);
      this.schedulePump();
    });

    // ResultDemuxer → output port
    this.demuxer.on('output', (output) => {
      this.emit('output', output);
    });
  }

  /**
   * Real-time callback. Buffers the input and returns the number of samples
   * consumed; never waits on the network.
   */
  process(input: Float32Array): number {
    if (this.phase === 'failed' && this.config.onFatal === 'abort') {
      return BRIDGE_DONE;
    }

    this.stats.samplesOffered += input.length;
    if (this.phase !== 'running' && this.phase !== 'failed') {
      return 0;
    }

    const droppedBefore = this.ringBuffer.droppedSamples;
    const accepted = this.ringBuffer.push(input);
    this.stats.samplesAccepted += accepted;

    if (this.backpressure.policy === 'stall') {
      const stalled = input.length - (input.length % this.config.channels) - accepted;
      if (stalled > 0) {
        this.stats.samplesStalled += stalled;
        this.backpressure.recordOverrun('stalled', stalled);
      }
    } else {
      const dropped = this.ringBuffer.droppedSamples - droppedBefore;
      if (dropped > 0) {
        this.stats.samplesDropped += dropped;
        this.backpressure.recordOverrun('dropped', dropped);
      }
    }

    if (this.ringBuffer.size >= this.scheduler.samplesPerChunk) {
      this.schedulePump();
    }
    return accepted;
  }

  /**
   * Signal end-of-stream; the trailing samples go out as the final chunk
   */
  flush(): void {
    if (this.phase !== 'running') {
      return;
    }
    this.phase = 'flushing';
    this.scheduler.flush();
    this.log('info', 'End of stream requested');
    this.schedulePump();
  }

  private schedulePump(): void {
    if (this.pumpHandle || this.ended) {
      return;
    }
    this.pumpHandle = setImmediate(() => {
      this.pumpHandle = null;
      this.pump();
    });
  }

  /**
   * I/O side: move chunks into the handoff queue and on to the session until
   * neither side makes progress
   */
  private pump(): void {
    if (this.ended) {
      return;
    }

    for (;;) {
      this.scheduler.schedule();
      const depth = this.handoff.size;
      this.session.notifyWork();
      if (this.handoff.size >= depth) {
        break;
      }
    }
  }

  private handleFatal(error: FatalBridgeError): void {
    this.lastError = error.message;
    this.phase = 'failed';
    this.log('error', `Bridge failed: ${error.message} (on fatal: ${this.config.onFatal})`);
    this.emit('fatal', error);

    if (this.config.onFatal === 'abort') {
      this.session
        .shutdown(0)
        .then(() => this.finish())
        .catch((shutdownError: unknown) => this.log('error', 'Abort after fatal failure failed', shutdownError));
    }
  }

  private finish(): void {
    if (this.ended) {
      return;
    }
    this.ended = true;
    if (this.phase !== 'failed') {
      this.phase = 'ended';
    }
    if (this.pumpHandle) {
      clearImmediate(this.pumpHandle);
      this.pumpHandle = null;
    }

    const status = this.demuxer.getStatus();
    this.log(
      'info',
      `Stream ended at watermark ${status.watermark}: ${status.resultsEmitted} results, ${status.markersEmitted} markers`
    );
    this.emit('end');
  }

  /**
   * Flush and wait up to graceMs for every chunk to resolve, then shut down
   */
  async stop(graceMs: number = this.config.shutdownGraceMs): Promise<void> {
    if (this.ended) {
      return;
    }

    this.flush();

    if (this.phase !== 'failed') {
      await new Promise<void>((resolve) => {
        const onEnd = (): void => {
          clearTimeout(timer);
          resolve();
        };
        const timer = setTimeout(() => {
          this.off('end', onEnd);
          resolve();
        }, graceMs);
        this.once('end', onEnd);
      });
    }

    await this.shutdown(0);
  }

  /**
   * Cancel the stream: drain in-flight chunks for up to graceMs, then force
   * the session down and emit truncation markers for anything unresolved
   */
  async shutdown(graceMs: number = this.config.shutdownGraceMs): Promise<void> {
    if (this.ended) {
      return;
    }

    if (this.phase === 'running' || this.phase === 'flushing') {
      this.phase = 'draining';
    }
    const unchunked = this.ringBuffer.size;
    if (unchunked > 0) {
      this.log('warn', `Shutdown discards ${unchunked} buffered samples not yet chunked`);
    }

    if (this.pumpHandle) {
      clearImmediate(this.pumpHandle);
      this.pumpHandle = null;
    }

    await this.session.shutdown(graceMs);
    this.finish();
  }

  getStats(): BridgeStats {
    const sessionStats = this.session.getStatus().stats;
    const demuxerStatus = this.demuxer.getStatus();
    return {
      ...this.stats,
      chunksProduced: this.scheduler.getStatus().chunksProduced,
      chunksSubmitted: sessionStats.chunksSubmitted,
      chunksResent: sessionStats.chunksResent,
      resultsEmitted: demuxerStatus.resultsEmitted,
      partialsEmitted: demuxerStatus.partialsEmitted,
      markersEmitted: demuxerStatus.markersEmitted,
      staleResultsDiscarded: demuxerStatus.staleDiscarded,
      duplicateResultsDiscarded: demuxerStatus.duplicatesDiscarded,
      reconnects: sessionStats.reconnects,
    };
  }

  /**
   * Get current bridge status
   */
  getStatus(): BridgeStatus {
    const snapshot = this.backpressure.getSnapshot();
    return {
      phase: this.phase,
      session: this.session.getSession(),
      watermark: this.demuxer.currentWatermark,
      bufferedSamples: this.ringBuffer.size,
      handoffDepth: this.handoff.size,
      inFlight: this.session.inFlightCount,
      backpressure: {
        paused: snapshot.paused,
        handoffThrottled: snapshot.handoffThrottled,
        inFlightThrottled: snapshot.inFlightThrottled,
      },
      stats: this.getStats(),
      lastError: this.lastError,
    };
  }

  // Typed event emitter methods
  on<K extends keyof StreamBridgeEvents>(
    event: K,
    listener: StreamBridgeEvents[K]
  ): this {
    return super.on(event, listener);
  }

  emit<K extends keyof StreamBridgeEvents>(
    event: K,
    ...args: Parameters<StreamBridgeEvents[K]>
  ): boolean {
    return super.emit(event, ...args);
  }
}
