/**
 * Unit tests for BackpressureController and BoundedQueue
 */
import { describe, it, expect, beforeEach } from 'vitest';
import {
  BackpressureController,
  type BackpressureSnapshot,
} from '../../src/services/backpressure-controller.service.js';
import { BoundedQueue } from '../../src/services/bounded-queue.service.js';
import { initLogger } from '../../src/utils/logger.js';

// Initialize logger for tests
initLogger({
  level: 'error',
  format: 'simple',
  toFile: false,
  toConsole: false,
  logsPath: './test-logs',
});

describe('BackpressureController', () => {
  let controller: BackpressureController;
  let events: Array<['pause' | 'resume', BackpressureSnapshot]>;

  beforeEach(() => {
    controller = new BackpressureController({
      handoffHighWater: 8,
      handoffLowWater: 2,
      inFlightHighWater: 5,
      inFlightLowWater: 2,
      policy: 'stall',
    });
    events = [];
    controller.on('pause', (snapshot) => events.push(['pause', snapshot]));
    controller.on('resume', (snapshot) => events.push(['resume', snapshot]));
  });

  it('should reject low-water marks at or above the high-water mark', () => {
    expect(
      () =>
        new BackpressureController({
          handoffHighWater: 4,
          handoffLowWater: 4,
          inFlightHighWater: 5,
          inFlightLowWater: 2,
          policy: 'drop',
        })
    ).toThrow('handoffLowWater must be below handoffHighWater');
  });

  describe('in-flight hysteresis', () => {
    it('should pause at the high-water mark and resume only at the low-water mark', () => {
      for (let inFlight = 1; inFlight <= 5; inFlight++) {
        controller.update({ inFlight });
      }
      expect(controller.isPaused).toBe(true);
      expect(events.map(([kind]) => kind)).toEqual(['pause']);

      controller.update({ inFlight: 4 });
      controller.update({ inFlight: 3 });
      expect(controller.isPaused).toBe(true);

      controller.update({ inFlight: 2 });
      expect(controller.isPaused).toBe(false);
      expect(events.map(([kind]) => kind)).toEqual(['pause', 'resume']);
      expect(events[1][1]).toEqual({
        paused: false,
        handoffDepth: 0,
        inFlight: 2,
        handoffThrottled: false,
        inFlightThrottled: false,
      });
    });

    it('should refuse submission at the bound and while throttled', () => {
      expect(controller.canSubmit(4)).toBe(true);
      expect(controller.canSubmit(5)).toBe(false);

      controller.update({ inFlight: 5 });
      controller.update({ inFlight: 3 });
      expect(controller.canSubmit(3)).toBe(false);

      controller.update({ inFlight: 2 });
      expect(controller.canSubmit(2)).toBe(true);
    });

    it('should not throttle below the high-water mark', () => {
      controller.update({ inFlight: 4 });
      controller.update({ inFlight: 3 });

      expect(controller.isPaused).toBe(false);
      expect(events).toHaveLength(0);
    });
  });

  describe('handoff hysteresis', () => {
    it('should stay paused while either latch is engaged', () => {
      controller.update({ handoffDepth: 8, inFlight: 5 });
      expect(controller.getSnapshot()).toMatchObject({ handoffThrottled: true, inFlightThrottled: true });

      controller.update({ handoffDepth: 0 });
      expect(controller.isPaused).toBe(true);

      controller.update({ inFlight: 0 });
      expect(controller.isPaused).toBe(false);
      expect(events.map(([kind]) => kind)).toEqual(['pause', 'resume']);
      expect(controller.getStats().pauseCount).toBe(1);
    });
  });

  it('should count overrun samples by kind', () => {
    controller.recordOverrun('stalled', 10);
    controller.recordOverrun('dropped', 4);
    controller.recordOverrun('dropped', 0);

    expect(controller.getStats()).toEqual({ stalledSamples: 10, droppedSamples: 4, pauseCount: 0 });
  });
});

describe('BoundedQueue', () => {
  it('should refuse offers beyond capacity', () => {
    const queue = new BoundedQueue<number>(2);

    expect(queue.offer(1)).toBe(true);
    expect(queue.offer(2)).toBe(true);
    expect(queue.offer(3)).toBe(false);
    expect(queue.isFull).toBe(true);
    expect(queue.size).toBe(2);
  });

  it('should poll in FIFO order', () => {
    const queue = new BoundedQueue<string>(3);
    queue.offer('a');
    queue.offer('b');

    expect(queue.peek()).toBe('a');
    expect(queue.poll()).toBe('a');
    expect(queue.poll()).toBe('b');
    expect(queue.poll()).toBeUndefined();
    expect(queue.isEmpty).toBe(true);
  });

  it('should return removed items on clear', () => {
    const queue = new BoundedQueue<number>(3);
    queue.offer(1);
    queue.offer(2);

    expect(queue.clear()).toEqual([1, 2]);
    expect(queue.size).toBe(0);
  });

  it('should reject a non-positive capacity', () => {
    expect(() => new BoundedQueue<number>(0)).toThrow('Queue capacity must be positive (got 0)');
  });
});
