/**
 * Signal Source Module
 * Stands in for the host pipeline scheduler: calls a block's process() at a
 * fixed cadence with a generated tone and re-offers whatever it did not consume
 */
import { EventEmitter } from 'events';
import type { HostBlock } from '../types/index.js';
import { BRIDGE_DONE } from './StreamBridge.js';
import { getLogger } from '../utils/logger.js';

let logger: ReturnType<typeof getLogger> | null = null;

/**
 * SignalSource configuration
 */
export interface SignalSourceConfig {
  block: HostBlock;
  sampleRate: number;
  channels: number;
  /** Callback cadence in milliseconds (default: 20) */
  periodMs?: number;
  /** Tone frequency (default: 440) */
  frequencyHz?: number;
  /** Peak amplitude in [0, 1] (default: 0.25) */
  amplitude?: number;
  /** Stop after this many seconds of audio and flush (default: unlimited) */
  durationSeconds?: number;
}

/**
 * SignalSource events
 */
export interface SignalSourceEvents {
  'tick': (offered: number, consumed: number, latencyMs: number) => void;
  'done': (reason: 'duration' | 'block' | 'stopped') => void;
}

/**
 * SignalSource module
 */
export class SignalSource extends EventEmitter {
  private block: HostBlock;
  private sampleRate: number;
  private channels: number;
  private periodMs: number;
  private frequencyHz: number;
  private amplitude: number;
  private maxFrames: number;
  private timer: NodeJS.Timeout | null = null;
  private isRunning: boolean = false;
  private framesGenerated: number = 0;
  private pending: Float32Array = new Float32Array(0);
  private stats = {
    ticks: 0,
    stalledTicks: 0,
    samplesConsumed: 0,
    maxLatencyMs: 0,
  };

  constructor(config: SignalSourceConfig) {
    super();
    this.block = config.block;
    this.sampleRate = config.sampleRate;
    this.channels = config.channels;
    this.periodMs = config.periodMs ?? 20;
    this.frequencyHz = config.frequencyHz ?? 440;
    this.amplitude = config.amplitude ?? 0.25;
    this.maxFrames = config.durationSeconds !== undefined
      ? Math.round(config.durationSeconds * config.sampleRate)
      : Number.POSITIVE_INFINITY;

    if (!logger) {
      try {
        logger = getLogger().child({ context: 'SignalSource' });
      } catch {
        logger = null;
      }
    }

    this.log('info', `SignalSource initialized (${this.frequencyHz}Hz tone, ${this.periodMs}ms cadence)`);
  }

  private log(level: 'debug' | 'info' | 'warn' | 'error', message: string, ...args: unknown[]): void {
    if (logger) {
      logger[level](message, ...args);
    }
  }

  /**
   * Start calling the block
   */
  start(): void {
    if (this.isRunning) {
      this.log('warn', 'SignalSource already running');
      return;
    }

    this.isRunning = true;
    this.timer = setInterval(() => this.tick(), this.periodMs);
    this.log('info', 'Signal source started');
  }

  /**
   * Stop calling the block (does not flush it)
   */
  stop(): void {
    this.halt('stopped');
  }

  private halt(reason: 'duration' | 'block' | 'stopped'): void {
    if (!this.isRunning) {
      return;
    }

    this.isRunning = false;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }

    this.log('info', `Signal source stopped (${reason}) after ${this.framesGenerated} frames`);
    this.emit('done', reason);
  }

  /**
   * One host callback. Public so tests can drive it without timers.
   */
  tick(): void {
    // Upstream is blocked while the previous window is not fully consumed
    const input = this.pending.length > 0 ? this.pending : this.generate();
    if (input.length === 0) {
      this.block.flush();
      this.halt('duration');
      return;
    }

    const started = performance.now();
    const consumed = this.block.process(input);
    const latencyMs = performance.now() - started;

    this.stats.ticks++;
    this.stats.maxLatencyMs = Math.max(this.stats.maxLatencyMs, latencyMs);

    if (consumed === BRIDGE_DONE) {
      this.pending = new Float32Array(0);
      this.halt('block');
      return;
    }

    this.stats.samplesConsumed += consumed;
    this.pending = input.subarray(consumed);
    if (this.pending.length > 0) {
      this.stats.stalledTicks++;
    }

    this.emit('tick', input.length, consumed, latencyMs);
  }

  private generate(): Float32Array {
    const frames = Math.min(
      Math.round((this.sampleRate * this.periodMs) / 1000),
      this.maxFrames - this.framesGenerated
    );
    const out = new Float32Array(Math.max(frames, 0) * this.channels);
    const step = (2 * Math.PI * this.frequencyHz) / this.sampleRate;

    for (let frame = 0; frame < frames; frame++) {
      const value = this.amplitude * Math.sin(step * (this.framesGenerated + frame));
      for (let ch = 0; ch < this.channels; ch++) {
        out[frame * this.channels + ch] = value;
      }
    }

    this.framesGenerated += Math.max(frames, 0);
    return out;
  }

  /**
   * Get source status
   */
  getStatus(): {
    isRunning: boolean;
    framesGenerated: number;
    pendingSamples: number;
    ticks: number;
    stalledTicks: number;
    samplesConsumed: number;
    maxLatencyMs: number;
  } {
    return {
      isRunning: this.isRunning,
      framesGenerated: this.framesGenerated,
      pendingSamples: this.pending.length,
      ...this.stats,
    };
  }

  // Typed event emitter methods
  on<K extends keyof SignalSourceEvents>(
    event: K,
    listener: SignalSourceEvents[K]
  ): this {
    return super.on(event, listener);
  }

  emit<K extends keyof SignalSourceEvents>(
    event: K,
    ...args: Parameters<SignalSourceEvents[K]>
  ): boolean {
    return super.emit(event, ...args);
  }
}
