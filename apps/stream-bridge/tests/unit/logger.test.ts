/**
 * Unit tests for logger helpers
 */
import { describe, it, expect } from 'vitest';
import { describeFlow, getLogger, initLogger } from '../../src/utils/logger.js';

describe('logger', () => {
  describe('describeFlow', () => {
    it('should fold flow-control fields into one tag', () => {
      expect(describeFlow({ flow: 'pause', handoff: 8, inFlight: 5, session: 'fake-1' })).toEqual({
        summary: '<flow=pause handoff=8 in-flight=5>',
        rest: { session: 'fake-1' },
      });
    });

    it('should describe ring buffer overruns', () => {
      expect(describeFlow({ flow: 'overrun', offered: 200, free: 0 })).toEqual({
        summary: '<flow=overrun offered=200 free=0>',
        rest: {},
      });
    });

    it('should leave entries without a flow transition untouched', () => {
      const meta = { handoff: 3, reason: 'idle' };
      expect(describeFlow(meta)).toEqual({ summary: '', rest: meta });
    });
  });

  describe('initLogger', () => {
    it('should refuse to hand out a logger before initialization', () => {
      expect(() => getLogger()).toThrow('Logger not initialized. Call initLogger() first.');
    });

    it('should create a logger at the configured level', () => {
      initLogger({
        level: 'error',
        format: 'simple',
        toFile: false,
        toConsole: false,
        logsPath: './test-logs',
      });

      expect(getLogger().level).toBe('error');
    });
  });
});
