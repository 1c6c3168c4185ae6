/**
 * WebSocket protocol types for speech service communication
 */

/**
 * Chunk metadata sent alongside the PCM payload
 */
export interface ChunkDescriptor {
  /** Chunk sequence number */
  sequence: number;
  /** Stream time range (ms) */
  startMs: number;
  endMs: number;
  sampleRate: number;
  channels: number;
  /** Payload encoding (always pcm_s16le) */
  encoding: 'pcm_s16le';
  /** End-of-stream marker */
  final: boolean;
}

/**
 * Event sent when chunk data is transmitted
 */
export interface ChunkDataEvent {
  chunk: ChunkDescriptor;
  /** PCM payload (binary) */
  data: Buffer;
}

/**
 * Acknowledgement returned for a chunk:data emit
 */
export interface ChunkAck {
  accepted: boolean;
  error?: string;
}

/**
 * Event received when the service has a (partial or final) result
 */
export interface ChunkResultEvent {
  sequence: number;
  partial: boolean;
  payload: unknown;
}

/**
 * Error event for a single chunk
 */
export interface ChunkErrorEvent {
  sequence: number;
  error: string;
  code?: string;
}

/**
 * Sent by the service when credentials stop being valid mid-session
 */
export interface SessionRevokedEvent {
  reason: string;
}

/**
 * Handshake auth payload
 */
export interface HandshakeAuth {
  token?: string;
}

/**
 * Message sent by the service middleware to refuse a handshake
 */
export const UNAUTHORIZED_MESSAGE = 'unauthorized';

export interface ServerToClientEvents {
  'chunk:result': (event: ChunkResultEvent) => void;
  'chunk:error': (event: ChunkErrorEvent) => void;
  'session:revoked': (event: SessionRevokedEvent) => void;
}

export interface ClientToServerEvents {
  'chunk:data': (event: ChunkDataEvent, ack: (response: ChunkAck) => void) => void;
}
