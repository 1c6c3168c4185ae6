/**
 * Core type definitions for the stream bridge
 */

/**
 * What the real-time path does when the bridge cannot keep up:
 * stall reports fewer samples consumed, drop overwrites the oldest buffered ones
 */
export type BackpressurePolicy = 'stall' | 'drop';

/**
 * Ring buffer behaviour at capacity
 */
export type OverrunMode = 'reject' | 'overwrite';

/**
 * Marker emitted downstream for a chunk whose result never arrived
 */
export type TimeoutMarker = 'placeholder' | 'error';

/**
 * Behaviour after an unrecoverable failure: keep the host running with silent
 * output, or report the block as finished
 */
export type FatalPolicy = 'stall' | 'abort';

export type AuthMethod = 'token' | 'signed_url' | 'anonymous';

/**
 * Credentials handed to the transport when a session opens
 */
export type Credentials =
  | { method: 'token'; token: string }
  | { method: 'signed_url'; url: string }
  | { method: 'anonymous' };

/**
 * Sequence-numbered, time-stamped slice of interleaved audio samples
 */
export interface Chunk {
  /** Monotonic sequence number, never reused within a bridge instance */
  sequence: number;
  /** Stream time of the first frame (ms) */
  startMs: number;
  /** Stream time just past the last frame (ms) */
  endMs: number;
  /** Interleaved samples */
  samples: Float32Array;
  /** Number of frames (samples / channels) */
  frameCount: number;
  /** End-of-stream marker */
  final: boolean;
}

export type SessionState =
  | 'disconnected'
  | 'connecting'
  | 'authenticated'
  | 'streaming'
  | 'draining'
  | 'failed';

/**
 * One logical connection lifecycle to the remote service
 */
export interface Session {
  id: string;
  state: SessionState;
  retryCount: number;
  /** Epoch ms of the last send or receive */
  lastActivityAt: number;
  openedAt: number | null;
}

/**
 * Result returned by the remote service for one chunk
 */
export interface PendingResult {
  sequence: number;
  payload: unknown;
  /** Interim result; exactly one final result per sequence is expected */
  partial: boolean;
}

/**
 * Result tagged with the session it arrived on
 */
export interface TaggedResult extends PendingResult {
  sessionId: string;
}

export interface RetryPolicy {
  baseDelayMs: number;
  multiplier: number;
  maxDelayMs: number;
  maxAttempts: number;
}

export type OutputKind = 'result' | 'partial' | 'placeholder' | 'error' | 'truncated';

/**
 * Item delivered to the downstream output port
 */
export interface BridgeOutput {
  sequence: number;
  startMs: number;
  endMs: number;
  kind: OutputKind;
  /** Service payload for result/partial, null for markers */
  payload: unknown;
}

/**
 * Narrow contract the host pipeline calls at a fixed cadence.
 * Both methods must return promptly whatever the remote service is doing.
 */
export interface HostBlock {
  /** Returns the number of samples consumed, or BRIDGE_DONE once the block has finished */
  process(input: Float32Array): number;
  /** Signals end-of-stream */
  flush(): void;
}

/**
 * Configuration for a bridge instance
 */
export interface BridgeConfig {
  sampleRate: number;
  channels: number;
  chunkDurationMs: number;
  ringBufferSeconds: number;
  handoffQueueCapacity: number;
  handoffLowWater: number;
  maxInFlightChunks: number;
  inFlightLowWater: number;
  backpressurePolicy: BackpressurePolicy;
  resultTimeoutMs: number;
  maxConsecutiveTimeouts: number;
  timeoutMarker: TimeoutMarker;
  emitPartials: boolean;
  shutdownGraceMs: number;
  onFatal: FatalPolicy;
  retryPolicy: RetryPolicy;
  credentials: Credentials;
}

/**
 * Bridge lifecycle phase, as seen by the host
 */
export type BridgePhase = 'running' | 'flushing' | 'draining' | 'ended' | 'failed';

/**
 * Bridge statistics
 */
export interface BridgeStats {
  /** Samples offered to process() */
  samplesOffered: number;
  /** Samples accepted into the ring buffer */
  samplesAccepted: number;
  /** Samples overwritten under the drop policy */
  samplesDropped: number;
  /** Samples refused under the stall policy (left with the host) */
  samplesStalled: number;
  chunksProduced: number;
  chunksSubmitted: number;
  chunksResent: number;
  resultsEmitted: number;
  partialsEmitted: number;
  markersEmitted: number;
  staleResultsDiscarded: number;
  duplicateResultsDiscarded: number;
  reconnects: number;
}

/**
 * Bridge status snapshot
 */
export interface BridgeStatus {
  phase: BridgePhase;
  session: Session;
  watermark: number;
  bufferedSamples: number;
  handoffDepth: number;
  inFlight: number;
  backpressure: {
    paused: boolean;
    handoffThrottled: boolean;
    inFlightThrottled: boolean;
  };
  stats: BridgeStats;
  lastError: string | null;
}
