/**
 * Error taxonomy for the bridge
 */
import type { SessionState } from '../types/index.js';

export type BridgeErrorKind = 'transient' | 'auth' | 'overrun' | 'timeout' | 'fatal';

/**
 * Typed error carrying its kind, so handlers branch on `kind` instead of
 * matching messages
 */
export class BridgeError extends Error {
  readonly kind: BridgeErrorKind;

  constructor(kind: BridgeErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BridgeError';
    this.kind = kind;
  }
}

/**
 * Connection drops, submit timeouts and the like. Retried with backoff.
 */
export class TransientTransportError extends BridgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('transient', message, options);
    this.name = 'TransientTransportError';
  }
}

/**
 * Rejected or revoked credentials. Never retried.
 */
export class AuthenticationError extends BridgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('auth', message, options);
    this.name = 'AuthenticationError';
  }
}

/**
 * Terminal bridge failure surfaced to the host
 */
export class FatalBridgeError extends BridgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('fatal', message, options);
    this.name = 'FatalBridgeError';
  }
}

export class IllegalTransitionError extends BridgeError {
  readonly from: SessionState;
  readonly to: SessionState;

  constructor(from: SessionState, to: SessionState) {
    super('fatal', `Illegal session transition ${from} -> ${to}`);
    this.name = 'IllegalTransitionError';
    this.from = from;
    this.to = to;
  }
}

export function isBridgeError(error: unknown): error is BridgeError {
  return error instanceof BridgeError;
}

/**
 * Map any thrown value onto a kind. Anything unrecognized is treated as a
 * transient transport failure.
 */
export function classifyError(error: unknown): BridgeErrorKind {
  if (isBridgeError(error)) {
    return error.kind;
  }
  return 'transient';
}

/**
 * Normalize a thrown value to an Error
 */
export function toError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }
  return new Error(typeof error === 'string' ? error : JSON.stringify(error));
}
