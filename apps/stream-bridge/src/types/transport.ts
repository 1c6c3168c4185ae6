/**
 * Transport contract between the bridge and the remote speech service.
 * The wire encoding stays behind this interface.
 */
import type { Chunk, Credentials, PendingResult } from './index.js';

/**
 * Opaque handle for one open transport session
 */
export interface SessionHandle {
  readonly id: string;
}

export interface Transport {
  /** Connect and authenticate; rejects with AuthenticationError on bad credentials */
  open(credentials: Credentials): Promise<SessionHandle>;
  /** Hand a chunk to the service; resolves once the transport has accepted it */
  submit(handle: SessionHandle, chunk: Chunk): Promise<void>;
  /** Results for the session; ends when the session closes, throws when it breaks */
  results(handle: SessionHandle): AsyncIterable<PendingResult>;
  close(handle: SessionHandle): Promise<void>;
}
