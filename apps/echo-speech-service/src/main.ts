/**
 * Echo Speech Service - Simple test service
 * Accepts PCM chunks and answers each with a result after a short delay
 */
import { createEchoSpeechServer } from './server.js';

const PORT = parseInt(process.env.PORT || '5100', 10);
const ECHO_DELAY_MS = parseInt(process.env.ECHO_DELAY_MS || '150', 10); // Simulate processing time
const ECHO_JITTER_MS = parseInt(process.env.ECHO_JITTER_MS || '200', 10);
const ECHO_PARTIALS = parseInt(process.env.ECHO_PARTIALS || '1', 10);
const TOKEN = process.env.SPEECH_API_TOKEN || undefined;
const DISCONNECT_AFTER = process.env.DISCONNECT_AFTER_CHUNKS
  ? parseInt(process.env.DISCONNECT_AFTER_CHUNKS, 10)
  : undefined;

const log = (message: string): void => {
  console.log(`[${new Date().toISOString()}] ${message}`);
};

console.log('Echo Speech Service starting...');

const server = await createEchoSpeechServer({
  port: PORT,
  token: TOKEN,
  delayMs: ECHO_DELAY_MS,
  jitterMs: ECHO_JITTER_MS,
  partials: ECHO_PARTIALS,
  disconnectAfterChunks: DISCONNECT_AFTER,
  log,
});

console.log(`Listening on port ${server.port}`);
console.log(`Echo delay: ${ECHO_DELAY_MS}ms (+ up to ${ECHO_JITTER_MS}ms jitter), ${ECHO_PARTIALS} partial(s) per chunk`);
console.log(`Auth: ${TOKEN ? 'token required' : 'anonymous'}\n`);

/**
 * Print statistics every 30 seconds
 */
const startTime = Date.now();
const statsTimer = setInterval(() => {
  const uptime = Math.floor((Date.now() - startTime) / 1000);
  const { stats } = server;

  console.log(`\nStatistics (uptime: ${uptime}s):`);
  console.log(`   Connections: ${stats.connections} (${stats.rejectedHandshakes} rejected)`);
  console.log(`   Chunks received: ${stats.chunksReceived}`);
  console.log(`   Results sent: ${stats.resultsSent}`);
  console.log(`   Data received: ${(stats.bytesReceived / 1024 / 1024).toFixed(2)} MB\n`);
}, 30000);

/**
 * Graceful shutdown
 */
process.on('SIGINT', () => {
  console.log('\nShutting down Echo Speech Service...');
  clearInterval(statsTimer);
  server
    .close()
    .then(() => {
      console.log('Server closed\n');
      process.exit(0);
    })
    .catch((error: unknown) => {
      console.error('Error while closing server:', error);
      process.exit(1);
    });
});

console.log('Echo Speech Service ready!\n');
