/**
 * Echo Speech Service - Socket.IO server
 * Acknowledges PCM chunks and answers each with partial results followed by
 * a final result describing the audio it received
 */
import { createServer } from 'http';
import { Server, Socket } from 'socket.io';

/**
 * Chunk metadata from protocol
 */
export interface ChunkDescriptor {
  sequence: number;
  startMs: number;
  endMs: number;
  sampleRate: number;
  channels: number;
  encoding: string;
  final: boolean;
}

/**
 * Chunk data event
 */
export interface ChunkDataEvent {
  chunk: ChunkDescriptor;
  data: Buffer;
}

export interface ChunkAck {
  accepted: boolean;
  error?: string;
}

/**
 * Final result payload
 */
export interface EchoResultPayload {
  text: string;
  sampleCount: number;
  rms: number;
  startMs: number;
  endMs: number;
}

/**
 * Partial result payload
 */
export interface EchoPartialPayload {
  text: string;
  progress: number;
}

export interface ServerToClientEvents {
  'chunk:result': (event: { sequence: number; partial: boolean; payload: EchoResultPayload | EchoPartialPayload }) => void;
  'chunk:error': (event: { sequence: number; error: string; code?: string }) => void;
  'session:revoked': (event: { reason: string }) => void;
}

export interface ClientToServerEvents {
  'chunk:data': (event: ChunkDataEvent, ack: (response: ChunkAck) => void) => void;
}

type EchoSocket = Socket<ClientToServerEvents, ServerToClientEvents>;

/**
 * Server options
 */
export interface EchoSpeechServerOptions {
  /** 0 picks a free port */
  port: number;
  /** Required handshake token; any client is accepted when unset */
  token?: string;
  /** Processing delay before the final result */
  delayMs?: number;
  /** Random extra delay per chunk, so results arrive out of order */
  jitterMs?: number;
  /** Partial results sent before each final result */
  partials?: number;
  /** Drop each connection after this many chunks */
  disconnectAfterChunks?: number;
  log?: (message: string) => void;
}

export interface EchoSpeechServerStats {
  connections: number;
  rejectedHandshakes: number;
  chunksReceived: number;
  resultsSent: number;
  bytesReceived: number;
}

export interface EchoSpeechServer {
  readonly port: number;
  readonly stats: EchoSpeechServerStats;
  /** Revoke every open session */
  revokeAll(reason: string): void;
  close(): Promise<void>;
}

/**
 * Decode little-endian 16-bit PCM and return its sample count and RMS level
 */
export function measurePcm16(data: Buffer): { sampleCount: number; rms: number } {
  const sampleCount = Math.floor(data.length / 2);
  if (sampleCount === 0) {
    return { sampleCount: 0, rms: 0 };
  }

  let sumSquares = 0;
  for (let i = 0; i < sampleCount; i++) {
    const value = data.readInt16LE(i * 2) / 0x8000;
    sumSquares += value * value;
  }
  return { sampleCount, rms: Math.round(Math.sqrt(sumSquares / sampleCount) * 1000) / 1000 };
}

/**
 * Create and start the echo speech service
 */
export async function createEchoSpeechServer(options: EchoSpeechServerOptions): Promise<EchoSpeechServer> {
  const delayMs = options.delayMs ?? 100;
  const jitterMs = options.jitterMs ?? 0;
  const partials = options.partials ?? 0;
  const log = options.log ?? (() => undefined);

  const stats: EchoSpeechServerStats = {
    connections: 0,
    rejectedHandshakes: 0,
    chunksReceived: 0,
    resultsSent: 0,
    bytesReceived: 0,
  };

  const httpServer = createServer();
  const io = new Server<ClientToServerEvents, ServerToClientEvents>(httpServer, {
    cors: {
      origin: '*',
      methods: ['GET', 'POST'],
    },
    maxHttpBufferSize: 10 * 1024 * 1024,
  });

  const timers = new Set<NodeJS.Timeout>();
  const later = (ms: number, fn: () => void): void => {
    const timer = setTimeout(() => {
      timers.delete(timer);
      fn();
    }, ms);
    timers.add(timer);
  };

  /**
   * Handshake authentication
   */
  io.use((socket, next) => {
    if (!options.token) {
      next();
      return;
    }

    const auth: Record<string, unknown> = socket.handshake.auth;
    if (auth.token !== options.token) {
      stats.rejectedHandshakes++;
      log(`Rejected handshake from ${socket.id}`);
      next(new Error('unauthorized'));
      return;
    }
    next();
  });

  /**
   * Handle client connection
   */
  io.on('connection', (socket: EchoSocket) => {
    stats.connections++;
    let chunksOnConnection = 0;
    log(`Client connected: ${socket.id} (total connections: ${stats.connections})`);

    socket.on('chunk:data', (event, ack) => {
      const { chunk, data } = event;

      if (chunk.encoding !== 'pcm_s16le' || data.length % 2 !== 0) {
        ack({ accepted: false, error: `Unsupported payload for chunk ${chunk.sequence}` });
        return;
      }

      stats.chunksReceived++;
      stats.bytesReceived += data.length;
      chunksOnConnection++;
      ack({ accepted: true });

      log(`Received chunk ${chunk.sequence} (${(data.length / 1024).toFixed(2)} KB${chunk.final ? ', final' : ''})`);

      const { sampleCount, rms } = measurePcm16(data);
      const text = `chunk ${chunk.sequence}`;
      const total = delayMs + Math.floor(Math.random() * (jitterMs + 1));

      for (let i = 1; i <= partials; i++) {
        later(Math.floor((total * i) / (partials + 1)), () => {
          socket.emit('chunk:result', {
            sequence: chunk.sequence,
            partial: true,
            payload: { text, progress: i / (partials + 1) },
          });
        });
      }

      later(total, () => {
        socket.emit('chunk:result', {
          sequence: chunk.sequence,
          partial: false,
          payload: { text, sampleCount, rms, startMs: chunk.startMs, endMs: chunk.endMs },
        });
        stats.resultsSent++;
      });

      if (options.disconnectAfterChunks !== undefined && chunksOnConnection >= options.disconnectAfterChunks) {
        log(`Dropping connection ${socket.id} after ${chunksOnConnection} chunks`);
        socket.disconnect(true);
      }
    });

    socket.on('disconnect', (reason) => {
      log(`Client disconnected: ${socket.id} (${reason})`);
    });
  });

  await new Promise<void>((resolve, reject) => {
    httpServer.once('error', reject);
    httpServer.listen(options.port, () => {
      httpServer.off('error', reject);
      resolve();
    });
  });

  const address = httpServer.address();
  const port = typeof address === 'object' && address !== null ? address.port : options.port;

  return {
    port,
    stats,
    revokeAll(reason: string): void {
      io.emit('session:revoked', { reason });
    },
    close(): Promise<void> {
      for (const timer of timers) {
        clearTimeout(timer);
      }
      timers.clear();
      return new Promise<void>((resolve, reject) => {
        io.close((error) => {
          if (error) {
            reject(error);
            return;
          }
          resolve();
        });
      });
    },
  };
}
