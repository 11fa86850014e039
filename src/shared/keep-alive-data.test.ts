/**
 * Keep-Alive Data Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { KeepAliveData, MAX_CHECK_INTERVAL, deriveKeepAliveConfig } from './keep-alive-data.js';
import { ErrorCode, InvalidArgumentError } from './errors.js';

describe('KeepAliveData', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-01T00:00:00.000Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('validation', () => {
    it('should accept ordered thresholds', () => {
      const data = new KeepAliveData({
        checkInterval: 100,
        warningThreshold: 300,
        timeoutThreshold: 600,
      });
      expect(data.toConfig()).toEqual({
        checkInterval: 100,
        warningThreshold: 300,
        timeoutThreshold: 600,
      });
    });

    it('should reject a warning threshold equal to the timeout', () => {
      expect(
        () =>
          new KeepAliveData({ checkInterval: 100, warningThreshold: 600, timeoutThreshold: 600 })
      ).toThrow('Invalid keep-alive thresholds: warningThreshold: warningThreshold must be less than timeoutThreshold');
    });

    it('should reject a non-positive check interval', () => {
      try {
        new KeepAliveData({ checkInterval: 0, warningThreshold: 300, timeoutThreshold: 600 });
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(InvalidArgumentError);
        expect(err).toMatchObject({ code: ErrorCode.INVALID_KEEP_ALIVE });
      }
    });

    it('should accept the longest timer delay as check interval', () => {
      const data = new KeepAliveData({
        checkInterval: MAX_CHECK_INTERVAL,
        warningThreshold: 3_000_000_000,
        timeoutThreshold: 4_000_000_000,
      });
      expect(data.checkInterval).toBe(2147483647);
    });

    it('should reject a check interval longer than a timer can wait', () => {
      expect(
        () =>
          new KeepAliveData({
            checkInterval: 3_000_000_000,
            warningThreshold: 3_000_000_001,
            timeoutThreshold: 4_000_000_000,
          })
      ).toThrow(expect.objectContaining({ code: ErrorCode.INVALID_KEEP_ALIVE }));
    });
  });

  describe('activity tracking', () => {
    it('should default last activity to now', () => {
      const data = KeepAliveData.fromTimeout(600);
      expect(data.lastActivity).toBe(Date.now());
      expect(data.getElapsed()).toBe(0);
    });

    it('should measure elapsed time since the last touch', () => {
      const data = KeepAliveData.fromTimeout(600);
      vi.advanceTimersByTime(250);
      expect(data.getElapsed()).toBe(250);

      data.touch();
      vi.advanceTimersByTime(40);
      expect(data.getElapsed()).toBe(40);
    });

    it('should accept an explicit timestamp', () => {
      const data = new KeepAliveData(
        { checkInterval: 10, warningThreshold: 20, timeoutThreshold: 30 },
        1000
      );
      data.touch(1500);
      expect(data.getElapsed(1600)).toBe(100);
    });
  });

  describe('fromTimeout', () => {
    it('should derive warning and interval from the timeout', () => {
      const data = KeepAliveData.fromTimeout(20000);
      expect(data.timeoutThreshold).toBe(20000);
      expect(data.warningThreshold).toBe(13333);
      expect(data.checkInterval).toBe(2222);
    });

    it('should reject a timeout whose derived interval overflows the timer', () => {
      // interval = floor((2e10 - 13333333333) / 3) = 2222222222
      expect(() => KeepAliveData.fromTimeout(20_000_000_000)).toThrow(
        expect.objectContaining({ code: ErrorCode.INVALID_KEEP_ALIVE })
      );
    });

    it('should reject a timeout too small to sample', () => {
      // warning = 1, interval = floor(1 / 3) = 0
      expect(() => KeepAliveData.fromTimeout(2)).toThrow(InvalidArgumentError);
    });
  });

  describe('deriveKeepAliveConfig', () => {
    it('should honour overrides', () => {
      expect(deriveKeepAliveConfig(9000, { warningThreshold: 3000 })).toEqual({
        checkInterval: 2000,
        warningThreshold: 3000,
        timeoutThreshold: 9000,
      });
      expect(deriveKeepAliveConfig(9000, { checkInterval: 500 })).toEqual({
        checkInterval: 500,
        warningThreshold: 6000,
        timeoutThreshold: 9000,
      });
    });
  });
});
