/**
 * Socket.IO transport to the speech service
 */
import { io, Socket } from 'socket.io-client';
import type { Chunk, Credentials, PendingResult } from '../types/index.js';
import type { SessionHandle, Transport } from '../types/transport.js';
import type {
  ChunkDataEvent,
  ChunkDescriptor,
  ClientToServerEvents,
  HandshakeAuth,
  ServerToClientEvents,
} from '../types/protocol.js';
import { UNAUTHORIZED_MESSAGE } from '../types/protocol.js';
import { AsyncChannel } from '../utils/channel.js';
import { AuthenticationError, TransientTransportError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

let logger: ReturnType<typeof getLogger> | null = null;

type ServiceSocket = Socket<ServerToClientEvents, ClientToServerEvents>;

/**
 * Socket transport configuration
 */
export interface SocketTransportConfig {
  /** Speech service URL (ignored for signed_url credentials, which carry their own) */
  serverUrl: string;
  sampleRate: number;
  channels: number;
  /** Acknowledgement timeout for a chunk submission */
  submitTimeoutMs?: number;
  /** Handshake timeout */
  connectTimeoutMs?: number;
}

interface OpenSession {
  socket: ServiceSocket;
  results: AsyncChannel<PendingResult>;
}

/**
 * Convert float samples in [-1, 1] to little-endian signed 16-bit PCM
 */
export function encodePcm16(samples: Float32Array): Buffer {
  const buffer = Buffer.alloc(samples.length * 2);
  for (let i = 0; i < samples.length; i++) {
    const clamped = Math.max(-1, Math.min(1, samples[i]));
    const value = clamped < 0 ? Math.round(clamped * 0x8000) : Math.round(clamped * 0x7fff);
    buffer.writeInt16LE(value, i * 2);
  }
  return buffer;
}

/**
 * Transport over socket.io: one socket per session
 */
export class SocketTransport implements Transport {
  private config: SocketTransportConfig;
  private sessions: Map<string, OpenSession> = new Map();
  private sessionCounter: number = 0;

  constructor(config: SocketTransportConfig) {
    this.config = config;

    if (!logger) {
      try {
        logger = getLogger().child({ context: 'SocketTransport' });
      } catch {
        logger = null;
      }
    }

    this.log('info', `SocketTransport initialized for: ${config.serverUrl}`);
  }

  private log(level: 'debug' | 'info' | 'warn' | 'error', message: string, ...args: unknown[]): void {
    if (logger) {
      logger[level](message, ...args);
    }
  }

  /**
   * Connect and authenticate
   */
  async open(credentials: Credentials): Promise<SessionHandle> {
    const url = credentials.method === 'signed_url' ? credentials.url : this.config.serverUrl;
    const auth: HandshakeAuth = credentials.method === 'token' ? { token: credentials.token } : {};
    const connectTimeoutMs = this.config.connectTimeoutMs ?? 10000;

    this.log('info', `Connecting to speech service: ${url}`);

    const socket: ServiceSocket = io(url, {
      auth,
      reconnection: false,
      forceNew: true,
      transports: ['websocket'],
      timeout: connectTimeoutMs,
    });

    await new Promise<void>((resolve, reject) => {
      const timeout = setTimeout(() => {
        socket.disconnect();
        reject(new TransientTransportError('Connection timeout'));
      }, connectTimeoutMs);

      socket.once('connect', () => {
        clearTimeout(timeout);
        resolve();
      });

      socket.once('connect_error', (error) => {
        clearTimeout(timeout);
        socket.disconnect();
        if (error.message === UNAUTHORIZED_MESSAGE) {
          reject(new AuthenticationError('Speech service rejected the credentials', { cause: error }));
        } else {
          reject(new TransientTransportError(`Connection error: ${error.message}`, { cause: error }));
        }
      });
    });

    const id = `${socket.id ?? 'socket'}-${++this.sessionCounter}`;
    const results = new AsyncChannel<PendingResult>();
    this.sessions.set(id, { socket, results });
    this.setupEventHandlers(id, socket, results);

    this.log('info', `Connected to speech service (session ${id})`);
    return { id };
  }

  /**
   * Set up socket event handlers for one session
   */
  private setupEventHandlers(id: string, socket: ServiceSocket, results: AsyncChannel<PendingResult>): void {
    socket.on('chunk:result', (event) => {
      results.push({ sequence: event.sequence, partial: event.partial, payload: event.payload });
    });

    // A per-chunk service error still resolves that chunk
    socket.on('chunk:error', (event) => {
      this.log('warn', `Chunk ${event.sequence} failed on the service: ${event.error}`);
      results.push({
        sequence: event.sequence,
        partial: false,
        payload: { error: event.error, code: event.code ?? null },
      });
    });

    socket.on('session:revoked', (event) => {
      this.log('error', `Session ${id} revoked: ${event.reason}`);
      results.fail(new AuthenticationError(`Session revoked: ${event.reason}`));
    });

    socket.on('disconnect', (reason) => {
      if (reason === 'io client disconnect') {
        results.close();
        return;
      }
      this.log('warn', `Disconnected from speech service: ${reason}`);
      results.fail(new TransientTransportError(`Disconnected: ${reason}`));
    });
  }

  /**
   * Send a chunk and wait for the service to acknowledge it
   */
  async submit(handle: SessionHandle, chunk: Chunk): Promise<void> {
    const session = this.sessions.get(handle.id);
    if (!session || !session.socket.connected) {
      throw new TransientTransportError('Not connected to speech service');
    }

    const descriptor: ChunkDescriptor = {
      sequence: chunk.sequence,
      startMs: chunk.startMs,
      endMs: chunk.endMs,
      sampleRate: this.config.sampleRate,
      channels: this.config.channels,
      encoding: 'pcm_s16le',
      final: chunk.final,
    };
    const event: ChunkDataEvent = { chunk: descriptor, data: encodePcm16(chunk.samples) };

    const ack = await session.socket
      .timeout(this.config.submitTimeoutMs ?? 2000)
      .emitWithAck('chunk:data', event)
      .catch((error: unknown) => {
        throw new TransientTransportError(`Chunk ${chunk.sequence} was not acknowledged`, { cause: error });
      });

    if (!ack.accepted) {
      throw new TransientTransportError(`Chunk ${chunk.sequence} refused: ${ack.error ?? 'unknown reason'}`);
    }

    this.log('debug', `Sent chunk ${chunk.sequence} (${(event.data.length / 1024).toFixed(2)} KB)`);
  }

  results(handle: SessionHandle): AsyncIterable<PendingResult> {
    const session = this.sessions.get(handle.id);
    if (!session) {
      const closed = new AsyncChannel<PendingResult>();
      closed.fail(new TransientTransportError(`Unknown session ${handle.id}`));
      return closed;
    }
    return session.results;
  }

  /**
   * Disconnect one session
   */
  async close(handle: SessionHandle): Promise<void> {
    const session = this.sessions.get(handle.id);
    if (!session) {
      return;
    }

    this.log('info', `Closing session ${handle.id}`);
    this.sessions.delete(handle.id);
    session.socket.disconnect();
    session.results.close();
  }

  /**
   * Get connection status
   */
  getStatus(): {
    openSessions: number;
    serverUrl: string;
  } {
    return {
      openSessions: this.sessions.size,
      serverUrl: this.config.serverUrl,
    };
  }
}
