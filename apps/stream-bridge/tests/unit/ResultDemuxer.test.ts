/**
 * Unit tests for ResultDemuxer
 */
import { describe, it, expect, beforeEach } from 'vitest';
import { ResultDemuxer } from '../../src/modules/ResultDemuxer.js';
import type { BridgeOutput, Chunk } from '../../src/types/index.js';
import { initLogger } from '../../src/utils/logger.js';

// Initialize logger for tests
initLogger({
  level: 'error',
  format: 'simple',
  toFile: false,
  toConsole: false,
  logsPath: './test-logs',
});

describe('ResultDemuxer', () => {
  let demuxer: ResultDemuxer;
  let outputs: BridgeOutput[];
  const SESSION = 'session-a';

  const createChunk = (sequence: number): Chunk => ({
    sequence,
    startMs: sequence * 100,
    endMs: (sequence + 1) * 100,
    samples: new Float32Array(0),
    frameCount: 0,
    final: false,
  });

  const deliverFinal = (sequence: number, sessionId: string = SESSION): void => {
    demuxer.deliver({ sequence, partial: false, payload: `r${sequence}`, sessionId });
  };

  beforeEach(() => {
    demuxer = new ResultDemuxer({ emitPartials: true, timeoutMarker: 'placeholder' });
    outputs = [];
    demuxer.on('output', (output) => outputs.push(output));
    demuxer.setActiveSession(SESSION);
    for (let i = 0; i < 10; i++) {
      demuxer.register(createChunk(i));
    }
  });

  describe('ordering', () => {
    it('should hold later results until the gap closes', () => {
      for (const sequence of [3, 1, 0, 2, 4, 5, 6, 7, 8, 9]) {
        deliverFinal(sequence);
      }

      expect(outputs.map((output) => output.sequence)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
      expect(outputs.map((output) => output.payload)).toEqual(['r0', 'r1', 'r2', 'r3', 'r4', 'r5', 'r6', 'r7', 'r8', 'r9']);
      expect(demuxer.currentWatermark).toBe(10);
      expect(demuxer.getStatus().maxBuffered).toBe(2);
    });

    it('should keep sequence order under randomized delivery and expiry', () => {
      // Deterministic PRNG so any failure replays with the same seed
      const createRandom = (seed: number): (() => number) => {
        let state = seed >>> 0;
        return () => {
          state = (state + 0x6d2b79f5) >>> 0;
          let t = Math.imul(state ^ (state >>> 15), state | 1);
          t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
          return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
        };
      };
      const count = 200;

      for (let seed = 1; seed <= 25; seed++) {
        const random = createRandom(seed);
        const shuffled = Array.from({ length: count }, (_, i) => i);
        for (let i = shuffled.length - 1; i > 0; i--) {
          const j = Math.floor(random() * (i + 1));
          [shuffled[i], shuffled[j]] = [shuffled[j], shuffled[i]];
        }

        const randomized = new ResultDemuxer({ emitPartials: false, timeoutMarker: 'placeholder' });
        const emitted: BridgeOutput[] = [];
        const resolved = new Set<number>();
        let expired = 0;
        randomized.on('output', (output) => emitted.push(output));
        randomized.setActiveSession(SESSION);
        for (let i = 0; i < count; i++) {
          randomized.register(createChunk(i));
        }

        for (const sequence of shuffled) {
          if (random() < 0.15) {
            randomized.expire(sequence, 'timeout');
            expired++;
          } else {
            randomized.deliver({ sequence, partial: false, payload: `r${sequence}`, sessionId: SESSION });
          }
          if (random() < 0.1) {
            randomized.deliver({ sequence, partial: false, payload: 'again', sessionId: SESSION });
          }
          resolved.add(sequence);

          let contiguous = 0;
          while (resolved.has(contiguous)) {
            contiguous++;
          }
          expect(emitted.map((output) => output.sequence)).toEqual(Array.from({ length: contiguous }, (_, i) => i));
        }

        expect(emitted).toHaveLength(count);
        expect(emitted.filter((output) => output.kind === 'placeholder')).toHaveLength(expired);
        expect(emitted.some((output) => output.payload === 'again')).toBe(false);
        expect(randomized.currentWatermark).toBe(count);
        expect(randomized.getStatus().buffered).toEqual([]);
      }
    });

    it('should emit nothing while the lowest sequence is missing', () => {
      deliverFinal(2);
      deliverFinal(1);

      expect(outputs).toHaveLength(0);
      expect(demuxer.getStatus().buffered).toEqual([1, 2]);

      deliverFinal(0);
      expect(outputs.map((output) => output.sequence)).toEqual([0, 1, 2]);
      expect(demuxer.getStatus().buffered).toEqual([]);
    });

    it('should carry the chunk time range on each output', () => {
      deliverFinal(0);

      expect(outputs[0]).toEqual({ sequence: 0, startMs: 0, endMs: 100, kind: 'result', payload: 'r0' });
    });

    it('should report the watermark after each advance', () => {
      const watermarks: number[] = [];
      demuxer.on('watermark', (watermark) => watermarks.push(watermark));

      deliverFinal(1);
      deliverFinal(0);
      deliverFinal(2);

      expect(watermarks).toEqual([2, 3]);
    });
  });

  describe('partials', () => {
    it('should forward partials without advancing the watermark', () => {
      demuxer.deliver({ sequence: 2, partial: true, payload: 'p2', sessionId: SESSION });

      expect(outputs).toEqual([{ sequence: 2, startMs: 200, endMs: 300, kind: 'partial', payload: 'p2' }]);
      expect(demuxer.currentWatermark).toBe(0);
    });

    it('should drop partials when disabled', () => {
      const quiet = new ResultDemuxer({ emitPartials: false, timeoutMarker: 'placeholder' });
      const seen: BridgeOutput[] = [];
      quiet.on('output', (output) => seen.push(output));
      quiet.setActiveSession(SESSION);

      quiet.deliver({ sequence: 0, partial: true, payload: 'p0', sessionId: SESSION });
      quiet.deliver({ sequence: 0, partial: false, payload: 'r0', sessionId: SESSION });

      expect(seen.map((output) => output.kind)).toEqual(['result']);
      expect(quiet.getStatus().partialsEmitted).toBe(0);
    });
  });

  describe('discarding', () => {
    it('should discard results tagged with another session', () => {
      deliverFinal(0, 'session-old');

      expect(outputs).toHaveLength(0);
      expect(demuxer.getStatus().staleDiscarded).toBe(1);
    });

    it('should discard a second result for the same sequence', () => {
      deliverFinal(1);
      deliverFinal(1);
      deliverFinal(0);
      deliverFinal(0);

      expect(outputs.map((output) => output.sequence)).toEqual([0, 1]);
      expect(demuxer.getStatus().duplicatesDiscarded).toBe(2);
    });

    it('should discard partials for sequences already emitted', () => {
      deliverFinal(0);
      demuxer.deliver({ sequence: 0, partial: true, payload: 'late', sessionId: SESSION });

      expect(outputs).toHaveLength(1);
      expect(demuxer.getStatus().duplicatesDiscarded).toBe(1);
    });
  });

  describe('expiry', () => {
    it('should fill a timed-out gap with the configured marker', () => {
      deliverFinal(1);
      demuxer.expire(0, 'timeout');

      expect(outputs.map((output) => [output.sequence, output.kind])).toEqual([
        [0, 'placeholder'],
        [1, 'result'],
      ]);
      expect(outputs[0].payload).toBeNull();
      expect(demuxer.getStatus().markersEmitted).toBe(1);
    });

    it('should use the error marker when configured', () => {
      const strict = new ResultDemuxer({ emitPartials: false, timeoutMarker: 'error' });
      const seen: BridgeOutput[] = [];
      strict.on('output', (output) => seen.push(output));

      strict.expire(0, 'timeout');

      expect(seen.map((output) => output.kind)).toEqual(['error']);
    });

    it('should mark truncated chunks as truncated', () => {
      demuxer.expire(0, 'truncated');

      expect(outputs[0].kind).toBe('truncated');
    });

    it('should ignore a late result after the marker was emitted', () => {
      demuxer.expire(0, 'timeout');
      deliverFinal(0);

      expect(outputs).toHaveLength(1);
      expect(demuxer.getStatus().duplicatesDiscarded).toBe(1);
    });

    it('should ignore expiry of a sequence that already has a result', () => {
      deliverFinal(0);
      demuxer.expire(0, 'timeout');

      expect(outputs.map((output) => output.kind)).toEqual(['result']);
    });
  });
});
