/**
 * Stream Bridge - Main Entry Point
 * Express server with REST API for bridge control
 */
import express, { Request, Response, NextFunction } from 'express';
import { getConfig, toBridgeConfig, type Config } from './utils/config.js';
import { initLogger, getLogger } from './utils/logger.js';
import { toError } from './utils/errors.js';
import { StreamBridge } from './modules/StreamBridge.js';
import { SignalSource } from './modules/SignalSource.js';
import { SocketTransport } from './services/socket-transport.service.js';
import type { BridgeOutput } from './types/index.js';

// Load configuration
const config: Config = getConfig();

// Initialize logger
initLogger(config.logging);
const logger = getLogger();

// Create Express app
const app = express();

// Middleware
app.use(express.json());

// Bridge instance (singleton) and the signal driving it
let bridge: StreamBridge | null = null;
let source: SignalSource | null = null;
const recentOutputs: BridgeOutput[] = [];
const RECENT_OUTPUT_LIMIT = 50;

function readNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

/**
 * Stop the signal and the bridge, waiting up to the shutdown grace period
 */
async function stopBridge(): Promise<void> {
  if (source) {
    source.stop();
    source = null;
  }
  if (bridge) {
    const current = bridge;
    bridge = null;
    await current.stop();
  }
}

/**
 * Health check endpoint
 */
app.get('/api/health', (req: Request, res: Response) => {
  res.json({
    status: 'healthy',
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
  });
});

/**
 * Get bridge status
 */
app.get('/api/bridge/status', (req: Request, res: Response) => {
  if (!bridge) {
    return res.json({
      isRunning: false,
      phase: 'idle',
      source: null,
      recentOutputs,
    });
  }

  res.json({
    isRunning: true,
    ...bridge.getStatus(),
    source: source ? source.getStatus() : null,
    recentOutputs,
  });
});

/**
 * Start a bridge fed by a generated tone
 */
app.post('/api/bridge/start', (req: Request, res: Response) => {
  try {
    if (bridge) {
      return res.status(400).json({
        success: false,
        error: 'Bridge is already running',
      });
    }

    const body: Record<string, unknown> = typeof req.body === 'object' && req.body !== null ? req.body : {};
    const bridgeConfig = toBridgeConfig(config);

    logger.info('Starting bridge with config:', { ...bridgeConfig, credentials: bridgeConfig.credentials.method });

    const transport = new SocketTransport({
      serverUrl: config.transport.serviceUrl,
      sampleRate: bridgeConfig.sampleRate,
      channels: bridgeConfig.channels,
      submitTimeoutMs: config.transport.submitTimeoutMs,
    });

    const current = new StreamBridge({ config: bridgeConfig, transport });
    recentOutputs.length = 0;

    current.on('output', (output) => {
      recentOutputs.push(output);
      if (recentOutputs.length > RECENT_OUTPUT_LIMIT) {
        recentOutputs.shift();
      }
      logger.debug(`Output ${output.sequence} (${output.kind})`);
    });

    current.on('backpressure', (snapshot) => {
      logger.info(`Backpressure ${snapshot.paused ? 'engaged' : 'released'}`, snapshot);
    });

    current.on('fatal', (error) => {
      logger.error('Bridge failed:', error);
    });

    current.on('end', () => {
      logger.info('Bridge stream ended', current.getStats());
      if (bridge === current) {
        bridge = null;
        source = null;
      }
    });

    const signal = new SignalSource({
      block: current,
      sampleRate: bridgeConfig.sampleRate,
      channels: bridgeConfig.channels,
      periodMs: readNumber(body.periodMs),
      frequencyHz: readNumber(body.frequencyHz),
      durationSeconds: readNumber(body.durationSeconds),
    });

    bridge = current;
    source = signal;
    signal.start();

    res.json({
      success: true,
      message: 'Bridge started successfully',
      status: current.getStatus(),
    });
  } catch (error) {
    logger.error('Failed to start bridge:', error);
    res.status(500).json({
      success: false,
      error: toError(error).message,
    });
  }
});

/**
 * Signal end-of-stream; the bridge drains and ends on its own
 */
app.post('/api/bridge/flush', (req: Request, res: Response) => {
  if (!bridge) {
    return res.status(400).json({
      success: false,
      error: 'No bridge is running',
    });
  }

  if (source) {
    source.stop();
  }
  bridge.flush();

  res.json({
    success: true,
    message: 'End of stream signalled',
    status: bridge.getStatus(),
  });
});

/**
 * Stop bridge
 */
app.post('/api/bridge/stop', async (req: Request, res: Response) => {
  try {
    if (!bridge) {
      return res.status(400).json({
        success: false,
        error: 'No bridge is running',
      });
    }

    logger.info('Stopping bridge');
    await stopBridge();

    res.json({
      success: true,
      message: 'Bridge stopped successfully',
    });
  } catch (error) {
    logger.error('Failed to stop bridge:', error);
    res.status(500).json({
      success: false,
      error: toError(error).message,
    });
  }
});

/**
 * Error handling middleware
 */
app.use((err: Error, req: Request, res: Response, next: NextFunction) => {
  logger.error('Unhandled error:', err);
  res.status(500).json({
    success: false,
    error: err.message || 'Internal server error',
  });
});

/**
 * Graceful shutdown
 */
const shutdown = async (): Promise<void> => {
  logger.info('Shutting down gracefully...');

  try {
    await stopBridge();
  } catch (error) {
    logger.error('Error stopping bridge during shutdown:', error);
  }

  process.exit(0);
};

process.on('SIGTERM', () => void shutdown());
process.on('SIGINT', () => void shutdown());

/**
 * Start server
 */
const PORT = config.server.port;
app.listen(PORT, () => {
  logger.info('Stream Bridge started');
  logger.info(`Server running on http://localhost:${PORT}`);
  logger.info(`API available at http://localhost:${PORT}/api`);
  logger.info(`Speech service: ${config.transport.serviceUrl} (auth: ${config.transport.authMethod})`);
});
