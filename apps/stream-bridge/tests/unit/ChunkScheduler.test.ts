/**
 * Unit tests for ChunkScheduler
 */
import { describe, it, expect, beforeEach } from 'vitest';
import { ChunkScheduler } from '../../src/modules/ChunkScheduler.js';
import { SampleRingBuffer } from '../../src/services/sample-ring-buffer.service.js';
import { BoundedQueue } from '../../src/services/bounded-queue.service.js';
import { BackpressureController } from '../../src/services/backpressure-controller.service.js';
import type { Chunk } from '../../src/types/index.js';
import { initLogger } from '../../src/utils/logger.js';
import { ramp } from '../helpers/config.js';

// Initialize logger for tests
initLogger({
  level: 'error',
  format: 'simple',
  toFile: false,
  toConsole: false,
  logsPath: './test-logs',
});

describe('ChunkScheduler', () => {
  let ringBuffer: SampleRingBuffer;
  let handoff: BoundedQueue<Chunk>;
  let backpressure: BackpressureController;
  let scheduler: ChunkScheduler;

  const createScheduler = (channels: number = 1, handoffCapacity: number = 8): void => {
    ringBuffer = new SampleRingBuffer({ capacity: 1000 * channels, channels, overrunMode: 'reject' });
    handoff = new BoundedQueue<Chunk>(handoffCapacity);
    backpressure = new BackpressureController({
      handoffHighWater: handoffCapacity,
      handoffLowWater: Math.min(2, handoffCapacity - 1),
      inFlightHighWater: 5,
      inFlightLowWater: 2,
      policy: 'stall',
    });
    scheduler = new ChunkScheduler({
      ringBuffer,
      handoff,
      backpressure,
      sampleRate: 1000,
      channels,
      chunkDurationMs: 10,
    });
  };

  const drainHandoff = (): Chunk[] => handoff.clear();

  beforeEach(() => {
    createScheduler();
  });

  describe('initialization', () => {
    it('should derive the chunk size from sample rate and duration', () => {
      expect(scheduler.framesPerChunk).toBe(10);
      expect(scheduler.samplesPerChunk).toBe(10);
    });

    it('should size interleaved chunks by channel count', () => {
      createScheduler(2);
      expect(scheduler.framesPerChunk).toBe(10);
      expect(scheduler.samplesPerChunk).toBe(20);
    });

    it('should refuse a ring buffer smaller than one chunk', () => {
      const small = new SampleRingBuffer({ capacity: 5, overrunMode: 'reject' });
      expect(
        () =>
          new ChunkScheduler({
            ringBuffer: small,
            handoff: new BoundedQueue<Chunk>(2),
            backpressure: new BackpressureController({
              handoffHighWater: 2,
              handoffLowWater: 1,
              inFlightHighWater: 5,
              inFlightLowWater: 2,
              policy: 'stall',
            }),
            sampleRate: 1000,
            channels: 1,
            chunkDurationMs: 10,
          })
      ).toThrow('Ring buffer (5 samples) cannot hold one chunk (10 samples)');
    });
  });

  describe('chunking', () => {
    it('should produce full chunks only until end of stream', () => {
      ringBuffer.push(ramp(25));

      expect(scheduler.schedule()).toBe(2);
      expect(ringBuffer.size).toBe(5);

      const chunks = drainHandoff();
      expect(chunks.map((chunk) => chunk.sequence)).toEqual([0, 1]);
      expect(chunks.map((chunk) => chunk.final)).toEqual([false, false]);
      expect(chunks[1].samples[0]).toBeCloseTo(0.01);
    });

    it('should assign stream-time ranges from frames emitted', () => {
      ringBuffer.push(ramp(30));
      scheduler.schedule();

      const chunks = drainHandoff();
      expect(chunks.map((chunk) => [chunk.startMs, chunk.endMs])).toEqual([
        [0, 10],
        [10, 20],
        [20, 30],
      ]);
      expect(chunks[2].frameCount).toBe(10);
    });

    it('should emit the trailing samples as a short final chunk on flush', () => {
      ringBuffer.push(ramp(25));
      scheduler.flush();
      scheduler.schedule();

      const chunks = drainHandoff();
      expect(chunks.map((chunk) => chunk.samples.length)).toEqual([10, 10, 5]);
      expect(chunks[2]).toMatchObject({ sequence: 2, startMs: 20, endMs: 25, frameCount: 5, final: true });
      expect(scheduler.isComplete).toBe(true);
    });

    it('should mark the last full chunk final when the buffer is exactly aligned', () => {
      ringBuffer.push(ramp(20));
      scheduler.flush();
      scheduler.schedule();

      const chunks = drainHandoff();
      expect(chunks.map((chunk) => chunk.final)).toEqual([false, true]);
    });

    it('should emit an empty final chunk when nothing is buffered at flush', () => {
      ringBuffer.push(ramp(10));
      scheduler.schedule();
      scheduler.flush();
      scheduler.schedule();

      const chunks = drainHandoff();
      expect(chunks).toHaveLength(2);
      expect(chunks[1]).toMatchObject({ sequence: 1, frameCount: 0, final: true, startMs: 10, endMs: 10 });
    });

    it('should produce nothing after the final chunk', () => {
      ringBuffer.push(ramp(5));
      scheduler.flush();
      scheduler.schedule();
      ringBuffer.push(ramp(10));

      expect(scheduler.schedule()).toBe(0);
      expect(scheduler.getStatus().chunksProduced).toBe(1);
    });

    it('should never split a frame across chunks', () => {
      createScheduler(2);
      ringBuffer.push(ramp(50));
      scheduler.flush();
      scheduler.schedule();

      const chunks = drainHandoff();
      expect(chunks.map((chunk) => chunk.samples.length)).toEqual([20, 20, 10]);
      expect(chunks.map((chunk) => chunk.frameCount)).toEqual([10, 10, 5]);
    });
  });

  describe('admission', () => {
    it('should stop at a full handoff queue without draining samples', () => {
      createScheduler(1, 3);

      ringBuffer.push(ramp(100));
      expect(scheduler.schedule()).toBe(3);
      expect(ringBuffer.size).toBe(70);
      expect(backpressure.isPaused).toBe(true);
      expect(scheduler.schedule()).toBe(0);
      expect(ringBuffer.size).toBe(70);
    });

    it('should hold off while in-flight throttling is engaged', () => {
      backpressure.update({ inFlight: 5 });
      ringBuffer.push(ramp(30));

      expect(scheduler.schedule()).toBe(0);

      backpressure.update({ inFlight: 2 });
      expect(scheduler.schedule()).toBe(3);
    });

    it('should announce each chunk it produces', () => {
      const ready: number[] = [];
      scheduler.on('chunk:ready', (chunk) => ready.push(chunk.sequence));

      ringBuffer.push(ramp(30));
      scheduler.schedule();

      expect(ready).toEqual([0, 1, 2]);
    });
  });
});
