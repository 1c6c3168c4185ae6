/**
 * Fixed-capacity ring buffer between the real-time callback and the chunk scheduler
 */
import type { OverrunMode } from '../types/index.js';
import { getLogger, type FlowTransition } from '../utils/logger.js';

let logger: ReturnType<typeof getLogger> | null = null;

/**
 * SampleRingBuffer configuration
 */
export interface SampleRingBufferConfig {
  /** Capacity in samples (rounded down to whole frames) */
  capacity: number;
  /** Samples per frame; frames are never split */
  channels?: number;
  /** Behaviour when a push does not fit */
  overrunMode: OverrunMode;
}

/**
 * Overrun counters, read by the backpressure controller and the status API
 */
export interface RingBufferStats {
  pushedSamples: number;
  drainedSamples: number;
  droppedSamples: number;
  rejectedSamples: number;
  overrunEvents: number;
}

/**
 * Sample ring buffer.
 * push() is called only from the real-time path and never allocates; drain()
 * only from the chunk-producing side.
 */
export class SampleRingBuffer {
  private readonly storage: Float32Array;
  private readonly channels: number;
  private readonly overrunMode: OverrunMode;
  private head: number = 0;
  private length: number = 0;
  private stats: RingBufferStats;
  private overrunActive: boolean = false;

  constructor(config: SampleRingBufferConfig) {
    this.channels = config.channels ?? 1;
    const capacity = config.capacity - (config.capacity % this.channels);
    if (capacity <= 0) {
      throw new Error(`Ring buffer capacity must hold at least one frame (got ${config.capacity})`);
    }

    this.storage = new Float32Array(capacity);
    this.overrunMode = config.overrunMode;
    this.stats = {
      pushedSamples: 0,
      drainedSamples: 0,
      droppedSamples: 0,
      rejectedSamples: 0,
      overrunEvents: 0,
    };

    if (!logger) {
      try {
        logger = getLogger().child({ context: 'SampleRingBuffer' });
      } catch {
        logger = null;
      }
    }

    this.log('info', `SampleRingBuffer initialized: ${capacity} samples, ${this.channels} ch, mode=${this.overrunMode}`);
  }

  private log(level: 'debug' | 'info' | 'warn' | 'error', message: string, ...args: unknown[]): void {
    if (logger) {
      logger[level](message, ...args);
    }
  }

  /**
   * Append samples.
   * @returns number of samples accepted (always all of them in overwrite mode)
   */
  push(samples: Float32Array): number {
    const incoming = samples.length - (samples.length % this.channels);
    if (incoming === 0) {
      return 0;
    }

    const free = this.storage.length - this.length;

    if (incoming <= free) {
      this.write(samples, 0, incoming);
      this.stats.pushedSamples += incoming;
      if (this.overrunActive) {
        this.overrunActive = false;
        const recovered: FlowTransition = { flow: 'recovered', offered: incoming, free };
        this.log('info', 'Ring buffer overrun cleared', recovered);
      }
      return incoming;
    }

    this.stats.overrunEvents++;
    if (!this.overrunActive) {
      // Logged once per overrun episode, not per callback
      this.overrunActive = true;
      const overrun: FlowTransition = { flow: 'overrun', offered: incoming, free };
      this.log('warn', `Ring buffer overrun (${this.overrunMode})`, overrun);
    }

    if (this.overrunMode === 'reject') {
      this.write(samples, 0, free);
      this.stats.pushedSamples += free;
      this.stats.rejectedSamples += incoming - free;
      return free;
    }

    // Overwrite: keep the newest `capacity` samples
    const capacity = this.storage.length;
    let offset = 0;
    let toWrite = incoming;
    if (incoming > capacity) {
      offset = incoming - capacity;
      toWrite = capacity;
      this.stats.droppedSamples += offset;
    }

    const overflow = this.length + toWrite - capacity;
    if (overflow > 0) {
      this.discard(overflow);
      this.stats.droppedSamples += overflow;
    }

    this.write(samples, offset, toWrite);
    this.stats.pushedSamples += incoming;
    return incoming;
  }

  /**
   * Remove and return up to maxSamples (whole frames) in arrival order
   */
  drain(maxSamples: number): Float32Array {
    const wanted = Math.min(maxSamples - (maxSamples % this.channels), this.length);
    const out = new Float32Array(Math.max(wanted, 0));
    if (wanted <= 0) {
      return out;
    }

    const capacity = this.storage.length;
    const firstPart = Math.min(wanted, capacity - this.head);
    out.set(this.storage.subarray(this.head, this.head + firstPart), 0);
    if (firstPart < wanted) {
      out.set(this.storage.subarray(0, wanted - firstPart), firstPart);
    }

    this.head = (this.head + wanted) % capacity;
    this.length -= wanted;
    this.stats.drainedSamples += wanted;
    return out;
  }

  private write(samples: Float32Array, offset: number, count: number): void {
    const capacity = this.storage.length;
    const tail = (this.head + this.length) % capacity;
    const firstPart = Math.min(count, capacity - tail);
    this.storage.set(samples.subarray(offset, offset + firstPart), tail);
    if (firstPart < count) {
      this.storage.set(samples.subarray(offset + firstPart, offset + count), 0);
    }
    this.length += count;
  }

  private discard(count: number): void {
    this.head = (this.head + count) % this.storage.length;
    this.length -= count;
  }

  get size(): number {
    return this.length;
  }

  get droppedSamples(): number {
    return this.stats.droppedSamples;
  }

  get capacity(): number {
    return this.storage.length;
  }

  get free(): number {
    return this.storage.length - this.length;
  }

  /**
   * Get current buffer status
   */
  getStatus(): RingBufferStats & { size: number; capacity: number; fillRatio: number } {
    return {
      ...this.stats,
      size: this.length,
      capacity: this.storage.length,
      fillRatio: this.length / this.storage.length,
    };
  }

  /**
   * Reset the buffer (counters included)
   */
  reset(): void {
    this.log('info', 'Resetting ring buffer');
    this.head = 0;
    this.length = 0;
    this.overrunActive = false;
    this.stats = {
      pushedSamples: 0,
      drainedSamples: 0,
      droppedSamples: 0,
      rejectedSamples: 0,
      overrunEvents: 0,
    };
  }
}
