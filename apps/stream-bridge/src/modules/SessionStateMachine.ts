/**
 * Session State Machine
 * Owns the single logical connection to the speech service: connect, stream,
 * drain, fail and reconnect with backoff, resending unresolved chunks
 */
import { EventEmitter } from 'events';
import { randomUUID } from 'crypto';
import type {
  Chunk,
  Credentials,
  PendingResult,
  RetryPolicy,
  Session,
  SessionState,
  TaggedResult,
} from '../types/index.js';
import type { SessionHandle, Transport } from '../types/transport.js';
import { BoundedQueue } from '../services/bounded-queue.service.js';
import { BackpressureController } from '../services/backpressure-controller.service.js';
import {
  FatalBridgeError,
  IllegalTransitionError,
  TransientTransportError,
  classifyError,
  toError,
} from '../utils/errors.js';
import { computeBackoffDelay, canRetry, type Clock, systemClock } from '../utils/retry.js';
import { getLogger } from '../utils/logger.js';

let logger: ReturnType<typeof getLogger> | null = null;

/**
 * Allowed transitions. Any live state may be forced to disconnected on shutdown.
 */
export const SESSION_TRANSITIONS: Readonly<Record<SessionState, readonly SessionState[]>> = {
  disconnected: ['connecting'],
  connecting: ['authenticated', 'failed', 'disconnected'],
  authenticated: ['streaming', 'failed', 'disconnected'],
  streaming: ['streaming', 'draining', 'failed', 'disconnected'],
  draining: ['disconnected', 'failed'],
  failed: ['connecting', 'disconnected'],
};

/**
 * SessionStateMachine configuration
 */
export interface SessionStateMachineConfig {
  transport: Transport;
  credentials: Credentials;
  retryPolicy: RetryPolicy;
  /** Handoff queue filled by the chunk scheduler */
  handoff: BoundedQueue<Chunk>;
  backpressure: BackpressureController;
  /** Time a chunk may stay in flight without a final result */
  resultTimeoutMs: number;
  /** Consecutive result timeouts treated as a broken session */
  maxConsecutiveTimeouts: number;
  clock?: Clock;
}

export type ReleaseReason = 'resolved' | 'timeout';

/**
 * SessionStateMachine events
 */
export interface SessionStateMachineEvents {
  'state': (from: SessionState, to: SessionState, session: Session) => void;
  'session:opened': (sessionId: string) => void;
  'chunk:sent': (chunk: Chunk, resend: boolean) => void;
  'chunk:released': (sequence: number, reason: ReleaseReason) => void;
  'chunk:timeout': (sequence: number) => void;
  'chunk:truncated': (sequence: number) => void;
  'result': (result: TaggedResult) => void;
  'reconnecting': (attempt: number, delayMs: number) => void;
  'drained': () => void;
  'fatal': (error: FatalBridgeError) => void;
}

/**
 * Session counters across reconnects
 */
export interface SessionStats {
  sessionsOpened: number;
  chunksSubmitted: number;
  chunksResent: number;
  chunksTimedOut: number;
  reconnects: number;
}

interface InFlightEntry {
  chunk: Chunk;
  sentAt: number;
  timer: NodeJS.Timeout;
}

/**
 * SessionStateMachine module
 * Single writer of session state; every transition goes through transition()
 */
export class SessionStateMachine extends EventEmitter {
  private transport: Transport;
  private credentials: Credentials;
  private retryPolicy: RetryPolicy;
  private handoff: BoundedQueue<Chunk>;
  private backpressure: BackpressureController;
  private resultTimeoutMs: number;
  private maxConsecutiveTimeouts: number;
  private clock: Clock;

  private session: Session;
  private handle: SessionHandle | null = null;
  private inFlight: Map<number, InFlightEntry> = new Map();
  /** Chunks sent on a failed session and not yet resolved, in sequence order */
  private carryOver: Chunk[] = [];
  private retryCount: number = 0;
  private consecutiveTimeouts: number = 0;
  private retryTimer: NodeJS.Timeout | null = null;
  private finalSeen: boolean = false;
  private terminal: boolean = false;
  private fatalEmitted: boolean = false;
  private shuttingDown: boolean = false;
  private pumping: boolean = false;
  private drainWaiter: (() => void) | null = null;
  private lastError: Error | null = null;
  private stats: SessionStats = {
    sessionsOpened: 0,
    chunksSubmitted: 0,
    chunksResent: 0,
    chunksTimedOut: 0,
    reconnects: 0,
  };

  constructor(config: SessionStateMachineConfig) {
    super();
    this.transport = config.transport;
    this.credentials = config.credentials;
    this.retryPolicy = config.retryPolicy;
    this.handoff = config.handoff;
    this.backpressure = config.backpressure;
    this.resultTimeoutMs = config.resultTimeoutMs;
    this.maxConsecutiveTimeouts = config.maxConsecutiveTimeouts;
    this.clock = config.clock ?? systemClock;
    this.session = this.createSession('disconnected');

    if (!logger) {
      try {
        logger = getLogger().child({ context: 'SessionStateMachine' });
      } catch {
        logger = null;
      }
    }

    this.log('info', `SessionStateMachine initialized (auth=${config.credentials.method}, max attempts=${config.retryPolicy.maxAttempts})`);
  }

  private log(level: 'debug' | 'info' | 'warn' | 'error', message: string, ...args: unknown[]): void {
    if (logger) {
      logger[level](message, ...args);
    }
  }

  private createSession(state: SessionState): Session {
    return {
      id: randomUUID(),
      state,
      retryCount: this.retryCount,
      lastActivityAt: this.clock.now(),
      openedAt: null,
    };
  }

  /**
   * Apply a transition from the table
   * @throws IllegalTransitionError for a transition the table does not list
   */
  private transition(to: SessionState): void {
    const from = this.session.state;
    if (!SESSION_TRANSITIONS[from].includes(to)) {
      throw new IllegalTransitionError(from, to);
    }
    this.session.state = to;
    this.log('debug', `Session ${this.session.id.slice(0, 8)}: ${from} -> ${to}`);
    this.emit('state', from, to, this.getSession());
  }

  /**
   * Called whenever chunks may be waiting. Opens a session on first need and
   * keeps the submit loop moving.
   */
  notifyWork(): void {
    if (this.terminal || this.shuttingDown) {
      return;
    }

    const state = this.session.state;
    if (state === 'disconnected') {
      if (!this.handoff.isEmpty || this.carryOver.length > 0) {
        this.connect().catch((error: unknown) => this.handleFailure(error));
      }
      return;
    }

    if (state === 'streaming') {
      this.pump();
    }
  }

  private async connect(): Promise<void> {
    const previous = this.session.state;
    if (previous !== 'disconnected' && previous !== 'failed') {
      return;
    }

    // A new session only starts once the prior one is disconnected or failed
    this.session = this.createSession(previous);
    const sessionId = this.session.id;
    this.transition('connecting');
    this.log('info', `Connecting session ${sessionId.slice(0, 8)} (attempt ${this.retryCount + 1})`);

    let handle: SessionHandle;
    try {
      handle = await this.transport.open(this.credentials);
    } catch (error) {
      if (this.isCurrent(sessionId, 'connecting')) {
        this.handleFailure(error);
      }
      return;
    }

    if (!this.isCurrent(sessionId, 'connecting')) {
      // Shut down while the handshake was in progress
      await this.closeHandle(handle);
      return;
    }

    this.handle = handle;
    this.session.openedAt = this.clock.now();
    this.session.lastActivityAt = this.session.openedAt;
    this.stats.sessionsOpened++;
    this.transition('authenticated');
    this.emit('session:opened', sessionId);

    this.startReader(sessionId, handle);
    this.transition('streaming');

    if (this.retryCount > 0) {
      this.stats.reconnects++;
      this.log('info', `Reconnected after ${this.retryCount} failed attempt(s), resending ${this.carryOver.length} chunk(s)`);
    }
    // The attempt counter only resets once this session resolves a chunk
    this.consecutiveTimeouts = 0;

    this.pump();
  }

  private isCurrent(sessionId: string, state?: SessionState): boolean {
    return this.session.id === sessionId && (state === undefined || this.session.state === state);
  }

  private startReader(sessionId: string, handle: SessionHandle): void {
    const read = async (): Promise<void> => {
      for await (const result of this.transport.results(handle)) {
        this.onResult(sessionId, result);
        if (!this.isCurrent(sessionId)) {
          return;
        }
      }
      this.onResultsEnded(sessionId);
    };

    read().catch((error: unknown) => {
      if (this.isCurrent(sessionId)) {
        this.handleFailure(error);
      } else {
        this.log('debug', `Result stream of superseded session ${sessionId.slice(0, 8)} failed`, error);
      }
    });
  }

  private onResult(sessionId: string, result: PendingResult): void {
    this.emit('result', { ...result, sessionId });

    if (!this.isCurrent(sessionId)) {
      return;
    }

    this.session.lastActivityAt = this.clock.now();
    if (!result.partial && this.inFlight.has(result.sequence)) {
      this.consecutiveTimeouts = 0;
      if (this.retryCount > 0) {
        this.log('debug', `Session ${sessionId.slice(0, 8)} resolved chunk ${result.sequence}, retry count reset`);
        this.retryCount = 0;
        this.session.retryCount = 0;
      }
      this.release(result.sequence, 'resolved');
    }
  }

  private onResultsEnded(sessionId: string): void {
    if (!this.isCurrent(sessionId)) {
      return;
    }

    const state = this.session.state;
    if (state !== 'streaming' && state !== 'draining') {
      return;
    }

    if (this.inFlight.size > 0 || state === 'streaming') {
      this.handleFailure(new TransientTransportError('Result stream closed by the service'));
    }
  }

  /**
   * Submit loop: carried-over chunks first, then the handoff queue, while the
   * in-flight bound allows
   */
  private pump(): void {
    if (this.pumping) {
      return;
    }
    this.pumping = true;

    try {
      while (this.session.state === 'streaming' && this.backpressure.canSubmit(this.inFlight.size)) {
        const resend = this.carryOver.length > 0;
        const chunk = resend ? this.carryOver.shift() : this.pollHandoff();
        if (!chunk) {
          break;
        }
        this.send(chunk, resend);
      }

      if (this.session.state === 'streaming' && this.finalSeen && this.carryOver.length === 0) {
        this.transition('draining');
      }
    } finally {
      this.pumping = false;
    }

    this.backpressure.update({ handoffDepth: this.handoff.size, inFlight: this.inFlight.size });
    this.checkDrained();
  }

  private pollHandoff(): Chunk | undefined {
    if (this.finalSeen) {
      return undefined;
    }
    const chunk = this.handoff.poll();
    if (chunk?.final) {
      this.finalSeen = true;
    }
    return chunk;
  }

  private send(chunk: Chunk, resend: boolean): void {
    const handle = this.handle;
    if (!handle) {
      this.carryOver.unshift(chunk);
      return;
    }

    const sessionId = this.session.id;
    const sequence = chunk.sequence;
    const timer = setTimeout(() => this.onChunkTimeout(sessionId, sequence), this.resultTimeoutMs);
    this.inFlight.set(sequence, { chunk, sentAt: this.clock.now(), timer });
    this.stats.chunksSubmitted++;
    if (resend) {
      this.stats.chunksResent++;
    }
    this.emit('chunk:sent', chunk, resend);

    let pending: Promise<void>;
    try {
      pending = this.transport.submit(handle, chunk);
    } catch (error) {
      pending = Promise.reject(error);
    }

    pending
      .then(() => {
        if (this.isCurrent(sessionId)) {
          this.session.lastActivityAt = this.clock.now();
        }
      })
      .catch((error: unknown) => {
        if (this.isCurrent(sessionId)) {
          this.log('warn', `Submit of chunk ${sequence} failed`, error);
          this.handleFailure(error);
        }
      });
  }

  private onChunkTimeout(sessionId: string, sequence: number): void {
    if (!this.isCurrent(sessionId) || !this.inFlight.has(sequence)) {
      return;
    }

    this.consecutiveTimeouts++;
    this.stats.chunksTimedOut++;
    this.log('warn', `Chunk ${sequence} timed out after ${this.resultTimeoutMs}ms (${this.consecutiveTimeouts} in a row)`);
    this.emit('chunk:timeout', sequence);

    if (this.consecutiveTimeouts >= this.maxConsecutiveTimeouts) {
      // The timed-out chunk is resolved by its marker; the rest carry over
      this.removeInFlight(sequence);
      this.handleFailure(
        new TransientTransportError(`${this.consecutiveTimeouts} consecutive result timeouts`)
      );
      this.emit('chunk:released', sequence, 'timeout');
      return;
    }

    this.release(sequence, 'timeout');
  }

  private removeInFlight(sequence: number): void {
    const entry = this.inFlight.get(sequence);
    if (entry) {
      clearTimeout(entry.timer);
      this.inFlight.delete(sequence);
    }
  }

  private release(sequence: number, reason: ReleaseReason): void {
    this.removeInFlight(sequence);
    this.emit('chunk:released', sequence, reason);
    this.pump();
  }

  private checkDrained(): void {
    if (this.session.state !== 'draining' || this.inFlight.size > 0) {
      return;
    }
    // On shutdown, unsent chunks are truncated instead of awaited
    if (!this.shuttingDown && this.carryOver.length > 0) {
      return;
    }

    const handle = this.handle;
    this.handle = null;
    this.transition('disconnected');
    this.log('info', `Session ${this.session.id.slice(0, 8)} drained`);
    if (handle) {
      this.closeHandle(handle).catch((error: unknown) => this.log('warn', 'Close after drain failed', error));
    }

    this.emit('drained');
    this.resolveDrainWaiter();
  }

  private handleFailure(error: unknown): void {
    const state = this.session.state;
    if (state === 'disconnected' || state === 'failed') {
      return;
    }

    const cause = toError(error);
    const kind = classifyError(error);
    this.lastError = cause;
    this.log('warn', `Session ${this.session.id.slice(0, 8)} failed in ${state} (${kind}): ${cause.message}`);

    this.carryOverInFlight();
    const handle = this.handle;
    this.handle = null;
    if (handle) {
      this.closeHandle(handle).catch((closeError: unknown) => this.log('debug', 'Close after failure failed', closeError));
    }
    this.transition('failed');
    this.backpressure.update({ inFlight: 0 });

    if (this.shuttingDown) {
      this.resolveDrainWaiter();
      return;
    }

    if (kind === 'auth' || kind === 'fatal') {
      this.failTerminally(new FatalBridgeError(`Session rejected: ${cause.message}`, { cause }));
      return;
    }

    this.retryCount++;
    this.session.retryCount = this.retryCount;
    if (!canRetry(this.retryCount, this.retryPolicy)) {
      this.failTerminally(
        new FatalBridgeError(`Reconnection attempts exhausted (${this.retryPolicy.maxAttempts})`, { cause })
      );
      return;
    }

    const delay = computeBackoffDelay(this.retryCount, this.retryPolicy);
    this.log('info', `Reconnecting in ${delay}ms (attempt ${this.retryCount}/${this.retryPolicy.maxAttempts})`);
    this.emit('reconnecting', this.retryCount, delay);

    this.retryTimer = setTimeout(() => {
      this.retryTimer = null;
      this.connect().catch((connectError: unknown) => this.handleFailure(connectError));
    }, delay);
  }

  /**
   * Move in-flight chunks back for resend (at-least-once), keeping sequence order
   */
  private carryOverInFlight(): void {
    const pending = [...this.inFlight.values()].map((entry) => {
      clearTimeout(entry.timer);
      return entry.chunk;
    });
    this.inFlight.clear();
    this.carryOver = [...pending, ...this.carryOver].sort((a, b) => a.sequence - b.sequence);
  }

  private failTerminally(error: FatalBridgeError): void {
    this.terminal = true;
    if (this.fatalEmitted) {
      return;
    }
    this.fatalEmitted = true;
    this.log('error', `Session failed terminally: ${error.message}`);
    this.emit('fatal', error);
  }

  /**
   * Stop accepting chunks, wait up to graceMs for outstanding results, then
   * force the session closed and truncate everything unresolved
   */
  async shutdown(graceMs: number): Promise<void> {
    this.shuttingDown = true;

    if (this.retryTimer) {
      clearTimeout(this.retryTimer);
      this.retryTimer = null;
    }

    if (this.session.state === 'streaming') {
      this.transition('draining');
    }

    if (this.session.state === 'draining') {
      this.checkDrained();
    }

    if (this.session.state === 'draining' && graceMs > 0) {
      this.log('info', `Draining ${this.inFlight.size} in-flight chunk(s), grace ${graceMs}ms`);
      await new Promise<void>((resolve) => {
        const graceTimer = setTimeout(() => {
          this.drainWaiter = null;
          resolve();
        }, graceMs);
        this.drainWaiter = () => {
          clearTimeout(graceTimer);
          resolve();
        };
      });
    }

    this.forceDisconnect();
  }

  private resolveDrainWaiter(): void {
    const waiter = this.drainWaiter;
    this.drainWaiter = null;
    if (waiter) {
      waiter();
    }
  }

  private forceDisconnect(): void {
    const unresolved = [
      ...[...this.inFlight.values()].map((entry) => {
        clearTimeout(entry.timer);
        return entry.chunk;
      }),
      ...this.carryOver,
      ...this.handoff.clear(),
    ].sort((a, b) => a.sequence - b.sequence);
    this.inFlight.clear();
    this.carryOver = [];

    const handle = this.handle;
    this.handle = null;
    if (handle) {
      this.closeHandle(handle).catch((error: unknown) => this.log('warn', 'Forced close failed', error));
    }

    if (this.session.state !== 'disconnected') {
      this.transition('disconnected');
    }
    this.backpressure.update({ handoffDepth: 0, inFlight: 0 });

    if (unresolved.length > 0) {
      this.log('warn', `Truncating ${unresolved.length} unresolved chunk(s)`);
    }
    for (const chunk of unresolved) {
      this.emit('chunk:truncated', chunk.sequence);
    }
  }

  private async closeHandle(handle: SessionHandle): Promise<void> {
    await this.transport.close(handle);
  }

  get state(): SessionState {
    return this.session.state;
  }

  get inFlightCount(): number {
    return this.inFlight.size;
  }

  get isTerminal(): boolean {
    return this.terminal;
  }

  getSession(): Session {
    return { ...this.session };
  }

  /**
   * Get session machine status
   */
  getStatus(): {
    session: Session;
    inFlight: number[];
    carryOver: number[];
    terminal: boolean;
    lastError: string | null;
    stats: SessionStats;
  } {
    return {
      session: this.getSession(),
      inFlight: [...this.inFlight.keys()],
      carryOver: this.carryOver.map((chunk) => chunk.sequence),
      terminal: this.terminal,
      lastError: this.lastError ? this.lastError.message : null,
      stats: { ...this.stats },
    };
  }

  // Typed event emitter methods
  on<K extends keyof SessionStateMachineEvents>(
    event: K,
    listener: SessionStateMachineEvents[K]
  ): this {
    return super.on(event, listener);
  }

  emit<K extends keyof SessionStateMachineEvents>(
    event: K,
    ...args: Parameters<SessionStateMachineEvents[K]>
  ): boolean {
    return super.emit(event, ...args);
  }
}
