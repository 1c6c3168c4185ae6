/**
 * Backpressure controller
 * Watches handoff queue occupancy and chunks in flight, and throttles admission
 * with high/low-water hysteresis
 */
import { EventEmitter } from 'events';
import type { BackpressurePolicy } from '../types/index.js';
import { getLogger, type FlowTransition } from '../utils/logger.js';

let logger: ReturnType<typeof getLogger> | null = null;

/**
 * BackpressureController configuration
 */
export interface BackpressureConfig {
  /** Handoff depth that engages throttling (usually the queue capacity) */
  handoffHighWater: number;
  /** Handoff depth at or below which throttling may release */
  handoffLowWater: number;
  /** In-flight count that engages throttling; also the hard in-flight bound */
  inFlightHighWater: number;
  /** In-flight count at or below which throttling may release */
  inFlightLowWater: number;
  /** Real-time flow control applied while the ring buffer cannot take more */
  policy: BackpressurePolicy;
}

/**
 * Snapshot passed with pause/resume events
 */
export interface BackpressureSnapshot {
  paused: boolean;
  handoffDepth: number;
  inFlight: number;
  handoffThrottled: boolean;
  inFlightThrottled: boolean;
}

/**
 * BackpressureController events
 */
export interface BackpressureControllerEvents {
  'pause': (snapshot: BackpressureSnapshot) => void;
  'resume': (snapshot: BackpressureSnapshot) => void;
}

export class BackpressureController extends EventEmitter {
  readonly policy: BackpressurePolicy;
  private config: BackpressureConfig;
  private handoffDepth: number = 0;
  private inFlight: number = 0;
  private handoffThrottled: boolean = false;
  private inFlightThrottled: boolean = false;
  private stalledSamples: number = 0;
  private droppedSamples: number = 0;
  private pauseCount: number = 0;

  constructor(config: BackpressureConfig) {
    super();
    if (config.handoffLowWater >= config.handoffHighWater) {
      throw new Error('handoffLowWater must be below handoffHighWater');
    }
    if (config.inFlightLowWater >= config.inFlightHighWater) {
      throw new Error('inFlightLowWater must be below inFlightHighWater');
    }
    this.config = config;
    this.policy = config.policy;

    if (!logger) {
      try {
        logger = getLogger().child({ context: 'BackpressureController' });
      } catch {
        logger = null;
      }
    }

    this.log(
      'info',
      `BackpressureController initialized (handoff ${config.handoffLowWater}/${config.handoffHighWater}, ` +
      `in-flight ${config.inFlightLowWater}/${config.inFlightHighWater}, policy=${config.policy})`
    );
  }

  private log(level: 'debug' | 'info' | 'warn' | 'error', message: string, ...args: unknown[]): void {
    if (logger) {
      logger[level](message, ...args);
    }
  }

  /**
   * Report new queue depths and re-evaluate the latches
   */
  update(depths: { handoffDepth?: number; inFlight?: number }): void {
    if (depths.handoffDepth !== undefined) {
      this.handoffDepth = depths.handoffDepth;
    }
    if (depths.inFlight !== undefined) {
      this.inFlight = depths.inFlight;
    }

    const wasPaused = this.isPaused;

    if (this.handoffDepth >= this.config.handoffHighWater) {
      this.handoffThrottled = true;
    } else if (this.handoffDepth <= this.config.handoffLowWater) {
      this.handoffThrottled = false;
    }

    if (this.inFlight >= this.config.inFlightHighWater) {
      this.inFlightThrottled = true;
    } else if (this.inFlight <= this.config.inFlightLowWater) {
      this.inFlightThrottled = false;
    }

    const paused = this.isPaused;
    if (paused && !wasPaused) {
      this.pauseCount++;
      this.log('warn', 'Admission paused', this.flowTransition('pause'));
      this.emit('pause', this.getSnapshot());
    } else if (!paused && wasPaused) {
      this.log('info', 'Admission resumed', this.flowTransition('resume'));
      this.emit('resume', this.getSnapshot());
    }
  }

  private flowTransition(flow: 'pause' | 'resume'): FlowTransition {
    return { flow, handoff: this.handoffDepth, inFlight: this.inFlight };
  }

  /**
   * Whether the chunk scheduler may move samples into the handoff queue
   */
  get isPaused(): boolean {
    return this.handoffThrottled || this.inFlightThrottled;
  }

  /**
   * Whether the session may put one more chunk in flight
   */
  canSubmit(inFlight: number): boolean {
    if (inFlight >= this.config.inFlightHighWater) {
      return false;
    }
    return !this.inFlightThrottled;
  }

  /**
   * Count samples the real-time path could not buffer normally
   */
  recordOverrun(kind: 'stalled' | 'dropped', samples: number): void {
    if (samples <= 0) {
      return;
    }
    if (kind === 'stalled') {
      this.stalledSamples += samples;
    } else {
      this.droppedSamples += samples;
    }
  }

  getSnapshot(): BackpressureSnapshot {
    return {
      paused: this.isPaused,
      handoffDepth: this.handoffDepth,
      inFlight: this.inFlight,
      handoffThrottled: this.handoffThrottled,
      inFlightThrottled: this.inFlightThrottled,
    };
  }

  getStats(): { stalledSamples: number; droppedSamples: number; pauseCount: number } {
    return {
      stalledSamples: this.stalledSamples,
      droppedSamples: this.droppedSamples,
      pauseCount: this.pauseCount,
    };
  }

  // Typed event emitter methods
  on<K extends keyof BackpressureControllerEvents>(
    event: K,
    listener: BackpressureControllerEvents[K]
  ): this {
    return super.on(event, listener);
  }

  emit<K extends keyof BackpressureControllerEvents>(
    event: K,
    ...args: Parameters<BackpressureControllerEvents[K]>
  ): boolean {
    return super.emit(event, ...args);
  }
}
