/**
 * Chunk Scheduler Module
 * Slices buffered samples into fixed-duration, sequence-numbered chunks and
 * hands them to the session through the bounded handoff queue
 */
import { EventEmitter } from 'events';
import type { Chunk } from '../types/index.js';
import { SampleRingBuffer } from '../services/sample-ring-buffer.service.js';
import { BoundedQueue } from '../services/bounded-queue.service.js';
import { BackpressureController } from '../services/backpressure-controller.service.js';
import { getLogger } from '../utils/logger.js';

let logger: ReturnType<typeof getLogger> | null = null;

/**
 * ChunkScheduler configuration
 */
export interface ChunkSchedulerConfig {
  ringBuffer: SampleRingBuffer;
  handoff: BoundedQueue<Chunk>;
  backpressure: BackpressureController;
  sampleRate: number;
  channels: number;
  chunkDurationMs: number;
}

/**
 * ChunkScheduler events
 */
export interface ChunkSchedulerEvents {
  'chunk:ready': (chunk: Chunk) => void;
}

/**
 * ChunkScheduler module
 */
export class ChunkScheduler extends EventEmitter {
  readonly framesPerChunk: number;
  readonly samplesPerChunk: number;
  private ringBuffer: SampleRingBuffer;
  private handoff: BoundedQueue<Chunk>;
  private backpressure: BackpressureController;
  private sampleRate: number;
  private channels: number;
  private nextSequence: number = 0;
  private framesEmitted: number = 0;
  private samplesConsumed: number = 0;
  private endOfStream: boolean = false;
  private finalEmitted: boolean = false;

  constructor(config: ChunkSchedulerConfig) {
    super();
    this.ringBuffer = config.ringBuffer;
    this.handoff = config.handoff;
    this.backpressure = config.backpressure;
    this.sampleRate = config.sampleRate;
    this.channels = config.channels;
    this.framesPerChunk = Math.max(1, Math.round((config.sampleRate * config.chunkDurationMs) / 1000));
    this.samplesPerChunk = this.framesPerChunk * config.channels;

    if (this.samplesPerChunk > this.ringBuffer.capacity) {
      throw new Error(
        `Ring buffer (${this.ringBuffer.capacity} samples) cannot hold one chunk (${this.samplesPerChunk} samples)`
      );
    }

    if (!logger) {
      try {
        logger = getLogger().child({ context: 'ChunkScheduler' });
      } catch {
        logger = null;
      }
    }

    this.log('info', `ChunkScheduler initialized (${config.chunkDurationMs}ms = ${this.framesPerChunk} frames per chunk)`);
  }

  private log(level: 'debug' | 'info' | 'warn' | 'error', message: string, ...args: unknown[]): void {
    if (logger) {
      logger[level](message, ...args);
    }
  }

  /**
   * Move as many chunks as admission allows from the ring buffer to the handoff queue
   * @returns number of chunks produced
   */
  schedule(): number {
    let produced = 0;

    while (!this.finalEmitted && !this.backpressure.isPaused) {
      const buffered = this.ringBuffer.size;
      const fullChunkReady = buffered >= this.samplesPerChunk;
      if (!fullChunkReady && !this.endOfStream) {
        break;
      }

      if (this.handoff.isFull) {
        // Never drain samples that cannot be handed off
        this.backpressure.update({ handoffDepth: this.handoff.size });
        break;
      }

      const final = !fullChunkReady || (this.endOfStream && buffered === this.samplesPerChunk);
      const samples = this.ringBuffer.drain(this.samplesPerChunk);
      const chunk = this.createChunk(samples, final);
      this.handoff.offer(chunk);
      this.backpressure.update({ handoffDepth: this.handoff.size });
      produced++;

      this.emit('chunk:ready', chunk);
    }

    return produced;
  }

  /**
   * Signal end-of-stream. Trailing samples shorter than one chunk go out as a
   * final short chunk on the next schedule() rather than being dropped.
   */
  flush(): void {
    if (this.endOfStream) {
      return;
    }
    this.endOfStream = true;
    this.log('info', `End of stream signaled with ${this.ringBuffer.size} samples buffered`);
  }

  private createChunk(samples: Float32Array, final: boolean): Chunk {
    const frameCount = samples.length / this.channels;
    const startMs = (this.framesEmitted * 1000) / this.sampleRate;
    this.framesEmitted += frameCount;
    const endMs = (this.framesEmitted * 1000) / this.sampleRate;

    const chunk: Chunk = {
      sequence: this.nextSequence++,
      startMs,
      endMs,
      samples,
      frameCount,
      final,
    };

    this.samplesConsumed += samples.length;

    if (final) {
      this.finalEmitted = true;
      this.log('info', `Final chunk ${chunk.sequence}: ${frameCount} frames, ${this.samplesConsumed} samples total`);
    } else {
      this.log('debug', `Chunk ${chunk.sequence}: ${startMs.toFixed(1)}-${endMs.toFixed(1)}ms`);
    }

    return chunk;
  }

  get isComplete(): boolean {
    return this.finalEmitted;
  }

  /**
   * Get scheduler status
   */
  getStatus(): {
    nextSequence: number;
    chunksProduced: number;
    samplesConsumed: number;
    endOfStream: boolean;
    finalEmitted: boolean;
  } {
    return {
      nextSequence: this.nextSequence,
      chunksProduced: this.nextSequence,
      samplesConsumed: this.samplesConsumed,
      endOfStream: this.endOfStream,
      finalEmitted: this.finalEmitted,
    };
  }

  // Typed event emitter methods
  on<K extends keyof ChunkSchedulerEvents>(
    event: K,
    listener: ChunkSchedulerEvents[K]
  ): this {
    return super.on(event, listener);
  }

  emit<K extends keyof ChunkSchedulerEvents>(
    event: K,
    ...args: Parameters<ChunkSchedulerEvents[K]>
  ): boolean {
    return super.emit(event, ...args);
  }
}
