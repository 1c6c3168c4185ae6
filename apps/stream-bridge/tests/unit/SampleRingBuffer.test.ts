/**
 * Unit tests for SampleRingBuffer
 */
import { describe, it, expect } from 'vitest';
import { SampleRingBuffer } from '../../src/services/sample-ring-buffer.service.js';
import { initLogger } from '../../src/utils/logger.js';

// Initialize logger for tests
initLogger({
  level: 'error',
  format: 'simple',
  toFile: false,
  toConsole: false,
  logsPath: './test-logs',
});

const values = (...items: number[]): Float32Array => Float32Array.from(items);

describe('SampleRingBuffer', () => {
  describe('initialization', () => {
    it('should round capacity down to whole frames', () => {
      const buffer = new SampleRingBuffer({ capacity: 7, channels: 2, overrunMode: 'reject' });
      expect(buffer.capacity).toBe(6);
      expect(buffer.size).toBe(0);
      expect(buffer.free).toBe(6);
    });

    it('should reject a capacity below one frame', () => {
      expect(() => new SampleRingBuffer({ capacity: 1, channels: 2, overrunMode: 'reject' })).toThrow(
        'Ring buffer capacity must hold at least one frame (got 1)'
      );
    });
  });

  describe('push and drain', () => {
    it('should return samples in arrival order across the wrap point', () => {
      const buffer = new SampleRingBuffer({ capacity: 4, overrunMode: 'reject' });

      buffer.push(values(1, 2, 3));
      expect(Array.from(buffer.drain(2))).toEqual([1, 2]);
      buffer.push(values(4, 5, 6));

      expect(buffer.size).toBe(4);
      expect(Array.from(buffer.drain(10))).toEqual([3, 4, 5, 6]);
      expect(buffer.size).toBe(0);
    });

    it('should drain whole frames only', () => {
      const buffer = new SampleRingBuffer({ capacity: 8, channels: 2, overrunMode: 'reject' });

      buffer.push(values(1, 2, 3, 4, 5, 6));
      expect(Array.from(buffer.drain(3))).toEqual([1, 2]);
      expect(buffer.size).toBe(4);
    });

    it('should ignore a trailing partial frame on push', () => {
      const buffer = new SampleRingBuffer({ capacity: 8, channels: 2, overrunMode: 'reject' });

      expect(buffer.push(values(1, 2, 3))).toBe(2);
      expect(buffer.size).toBe(2);
    });

    it('should return an empty array when draining an empty buffer', () => {
      const buffer = new SampleRingBuffer({ capacity: 4, overrunMode: 'reject' });
      expect(buffer.drain(4)).toHaveLength(0);
    });
  });

  describe('overrun', () => {
    it('should accept only what fits in reject mode', () => {
      const buffer = new SampleRingBuffer({ capacity: 4, overrunMode: 'reject' });

      expect(buffer.push(values(1, 2, 3))).toBe(3);
      expect(buffer.push(values(4, 5, 6))).toBe(1);
      expect(Array.from(buffer.drain(4))).toEqual([1, 2, 3, 4]);

      const status = buffer.getStatus();
      expect(status.rejectedSamples).toBe(2);
      expect(status.droppedSamples).toBe(0);
      expect(status.overrunEvents).toBe(1);
    });

    it('should keep the newest samples in overwrite mode', () => {
      const buffer = new SampleRingBuffer({ capacity: 4, overrunMode: 'overwrite' });

      buffer.push(values(1, 2, 3));
      expect(buffer.push(values(4, 5, 6))).toBe(3);

      expect(buffer.droppedSamples).toBe(2);
      expect(Array.from(buffer.drain(4))).toEqual([3, 4, 5, 6]);
    });

    it('should count the discarded prefix of a push larger than the buffer', () => {
      const buffer = new SampleRingBuffer({ capacity: 4, overrunMode: 'overwrite' });

      buffer.push(values(1));
      expect(buffer.push(values(2, 3, 4, 5, 6, 7))).toBe(6);

      // 2 from the oversized push, 1 old sample
      expect(buffer.droppedSamples).toBe(3);
      expect(Array.from(buffer.drain(4))).toEqual([4, 5, 6, 7]);
    });

    it('should account for every sample pushed', () => {
      const buffer = new SampleRingBuffer({ capacity: 16, channels: 2, overrunMode: 'overwrite' });
      let drained = 0;

      for (let i = 0; i < 50; i++) {
        buffer.push(new Float32Array(6));
        if (i % 3 === 0) {
          drained += buffer.drain(8).length;
        }
      }

      const status = buffer.getStatus();
      expect(status.pushedSamples).toBe(300);
      expect(status.drainedSamples).toBe(drained);
      expect(status.pushedSamples).toBe(status.drainedSamples + status.droppedSamples + status.size);
    });
  });

  describe('reset', () => {
    it('should clear contents and counters', () => {
      const buffer = new SampleRingBuffer({ capacity: 4, overrunMode: 'reject' });
      buffer.push(values(1, 2, 3, 4, 5));
      buffer.reset();

      const status = buffer.getStatus();
      expect(status.size).toBe(0);
      expect(status.pushedSamples).toBe(0);
      expect(status.rejectedSamples).toBe(0);
      expect(status.fillRatio).toBe(0);
    });
  });
});
