/**
 * Configuration loader and validator
 */
import dotenv from 'dotenv';
import path from 'path';
import { fileURLToPath } from 'url';
import type {
  AuthMethod,
  BackpressurePolicy,
  BridgeConfig,
  Credentials,
  FatalPolicy,
  TimeoutMarker,
} from '../types/index.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

dotenv.config({ path: path.resolve(__dirname, '../../.env') });

/**
 * Application configuration
 */
export interface Config {
  server: {
    port: number;
    nodeEnv: string;
  };
  audio: {
    sampleRate: number;
    channels: number;
    chunkDurationMs: number;
    ringBufferSeconds: number;
  };
  flow: {
    handoffQueueCapacity: number;
    handoffLowWater: number;
    maxInFlightChunks: number;
    inFlightLowWater: number;
    backpressurePolicy: BackpressurePolicy;
  };
  results: {
    resultTimeoutMs: number;
    maxConsecutiveTimeouts: number;
    timeoutMarker: TimeoutMarker;
    emitPartials: boolean;
  };
  lifecycle: {
    shutdownGraceMs: number;
    onFatal: FatalPolicy;
  };
  retry: {
    baseDelayMs: number;
    multiplier: number;
    maxDelayMs: number;
    maxAttempts: number;
  };
  transport: {
    serviceUrl: string;
    authMethod: AuthMethod;
    apiToken: string;
    submitTimeoutMs: number;
  };
  logging: {
    level: string;
    format: 'json' | 'simple';
    toFile: boolean;
    toConsole: boolean;
    logsPath: string;
    moduleFilter?: string[];
  };
}

function parseChoice<T extends string>(value: string | undefined, choices: readonly T[], fallback: T): T {
  const match = choices.find((choice) => choice === value);
  return match ?? fallback;
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return {
    server: {
      port: parseInt(env.PORT || '3100', 10),
      nodeEnv: env.NODE_ENV || 'development',
    },
    audio: {
      sampleRate: parseInt(env.SAMPLE_RATE || '16000', 10),
      channels: parseInt(env.CHANNELS || '1', 10),
      chunkDurationMs: parseInt(env.CHUNK_DURATION_MS || '100', 10),
      ringBufferSeconds: parseFloat(env.RING_BUFFER_SECONDS || '5'),
    },
    flow: {
      handoffQueueCapacity: parseInt(env.HANDOFF_QUEUE_CAPACITY || '8', 10),
      handoffLowWater: parseInt(env.HANDOFF_LOW_WATER || '2', 10),
      maxInFlightChunks: parseInt(env.MAX_IN_FLIGHT_CHUNKS || '5', 10),
      inFlightLowWater: parseInt(env.IN_FLIGHT_LOW_WATER || '2', 10),
      backpressurePolicy: parseChoice(env.BACKPRESSURE_POLICY, ['stall', 'drop'] as const, 'stall'),
    },
    results: {
      resultTimeoutMs: parseInt(env.RESULT_TIMEOUT_MS || '5000', 10),
      maxConsecutiveTimeouts: parseInt(env.MAX_CONSECUTIVE_TIMEOUTS || '3', 10),
      timeoutMarker: parseChoice(env.TIMEOUT_MARKER, ['placeholder', 'error'] as const, 'placeholder'),
      emitPartials: env.EMIT_PARTIALS !== 'false',
    },
    lifecycle: {
      shutdownGraceMs: parseInt(env.SHUTDOWN_GRACE_MS || '3000', 10),
      onFatal: parseChoice(env.ON_FATAL, ['stall', 'abort'] as const, 'abort'),
    },
    retry: {
      baseDelayMs: parseInt(env.RETRY_BASE_DELAY_MS || '500', 10),
      multiplier: parseFloat(env.RETRY_MULTIPLIER || '2'),
      maxDelayMs: parseInt(env.RETRY_MAX_DELAY_MS || '10000', 10),
      maxAttempts: parseInt(env.RETRY_MAX_ATTEMPTS || '5', 10),
    },
    transport: {
      serviceUrl: env.SPEECH_SERVICE_URL || 'http://localhost:5100',
      authMethod: parseChoice(env.SPEECH_AUTH_METHOD, ['token', 'signed_url', 'anonymous'] as const, 'token'),
      apiToken: env.SPEECH_API_TOKEN || '',
      submitTimeoutMs: parseInt(env.SUBMIT_TIMEOUT_MS || '2000', 10),
    },
    logging: {
      level: env.LOG_LEVEL || 'info',
      format: env.LOG_FORMAT === 'json' ? 'json' : 'simple',
      toFile: env.LOG_TO_FILE === 'true',
      toConsole: env.LOG_TO_CONSOLE !== 'false',
      logsPath: env.LOGS_PATH || './logs',
      moduleFilter: env.LOG_MODULE_FILTER
        ? env.LOG_MODULE_FILTER.split(',').map(m => m.trim()).filter(m => m.length > 0)
        : undefined,
    },
  };
}

/**
 * Validate configuration
 * @throws Error if configuration is invalid
 */
export function validateConfig(config: Config): void {
  const errors: string[] = [];
  const { audio, flow, results, retry, transport } = config;

  if (!(audio.sampleRate > 0)) {
    errors.push('SAMPLE_RATE must be positive');
  }

  if (!(audio.channels > 0)) {
    errors.push('CHANNELS must be positive');
  }

  if (!(audio.chunkDurationMs > 0)) {
    errors.push('CHUNK_DURATION_MS must be positive');
  }

  if (audio.ringBufferSeconds * 1000 < audio.chunkDurationMs) {
    errors.push('RING_BUFFER_SECONDS must hold at least one chunk');
  }

  if (!(flow.handoffQueueCapacity > 0)) {
    errors.push('HANDOFF_QUEUE_CAPACITY must be positive');
  }

  if (!(flow.handoffLowWater >= 0 && flow.handoffLowWater < flow.handoffQueueCapacity)) {
    errors.push('HANDOFF_LOW_WATER must be below HANDOFF_QUEUE_CAPACITY');
  }

  if (!(flow.maxInFlightChunks > 0)) {
    errors.push('MAX_IN_FLIGHT_CHUNKS must be positive');
  }

  if (!(flow.inFlightLowWater >= 0 && flow.inFlightLowWater < flow.maxInFlightChunks)) {
    errors.push('IN_FLIGHT_LOW_WATER must be below MAX_IN_FLIGHT_CHUNKS');
  }

  if (!(results.resultTimeoutMs > 0)) {
    errors.push('RESULT_TIMEOUT_MS must be positive');
  }

  if (!(results.maxConsecutiveTimeouts > 0)) {
    errors.push('MAX_CONSECUTIVE_TIMEOUTS must be positive');
  }

  if (!(retry.baseDelayMs >= 0) || !(retry.maxDelayMs >= retry.baseDelayMs)) {
    errors.push('RETRY_MAX_DELAY_MS must be at least RETRY_BASE_DELAY_MS');
  }

  if (!(retry.multiplier >= 1)) {
    errors.push('RETRY_MULTIPLIER must be at least 1');
  }

  if (!(retry.maxAttempts >= 0)) {
    errors.push('RETRY_MAX_ATTEMPTS must not be negative');
  }

  if (!transport.serviceUrl) {
    errors.push('SPEECH_SERVICE_URL is required');
  }

  if (transport.authMethod === 'token' && !transport.apiToken) {
    errors.push('SPEECH_API_TOKEN is required when SPEECH_AUTH_METHOD=token');
  }

  if (config.server.port <= 0 || config.server.port > 65535) {
    errors.push('PORT must be between 1 and 65535');
  }

  if (errors.length > 0) {
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }
}

/**
 * Get validated configuration
 */
export function getConfig(): Config {
  const config = loadConfig();
  validateConfig(config);
  return config;
}

/**
 * Credentials for the configured auth method
 */
export function resolveCredentials(transport: Config['transport']): Credentials {
  switch (transport.authMethod) {
    case 'token':
      return { method: 'token', token: transport.apiToken };
    case 'signed_url':
      return { method: 'signed_url', url: transport.serviceUrl };
    case 'anonymous':
      return { method: 'anonymous' };
  }
}

/**
 * Flatten the application configuration into a bridge configuration
 */
export function toBridgeConfig(config: Config): BridgeConfig {
  return {
    ...config.audio,
    ...config.flow,
    ...config.results,
    ...config.lifecycle,
    retryPolicy: { ...config.retry },
    credentials: resolveCredentials(config.transport),
  };
}
