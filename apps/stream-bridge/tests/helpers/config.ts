/**
 * Small bridge configuration for tests: 1 kHz mono, 10-sample chunks
 */
import type { BridgeConfig } from '../../src/types/index.js';

export function createTestConfig(overrides: Partial<BridgeConfig> = {}): BridgeConfig {
  return {
    sampleRate: 1000,
    channels: 1,
    chunkDurationMs: 10,
    ringBufferSeconds: 1,
    handoffQueueCapacity: 8,
    handoffLowWater: 2,
    maxInFlightChunks: 5,
    inFlightLowWater: 2,
    backpressurePolicy: 'stall',
    resultTimeoutMs: 1000,
    maxConsecutiveTimeouts: 3,
    timeoutMarker: 'placeholder',
    emitPartials: false,
    shutdownGraceMs: 200,
    onFatal: 'abort',
    retryPolicy: {
      baseDelayMs: 5,
      multiplier: 2,
      maxDelayMs: 20,
      maxAttempts: 3,
    },
    credentials: { method: 'token', token: 'test-secret' },
    ...overrides,
  };
}

/**
 * Ramp of `count` samples so chunk contents can be checked by value
 */
export function ramp(count: number, start: number = 0): Float32Array {
  const samples = new Float32Array(count);
  for (let i = 0; i < count; i++) {
    samples[i] = (start + i) / 1000;
  }
  return samples;
}
