/**
 * Tests for DateFormatter utility
 */

import * as DateFormatter from '../DateFormatter';

describe('DateFormatter', () => {
  describe('decodeTimestamp', () => {
    it('should map zero to the reference epoch', () => {
      const date = DateFormatter.decodeTimestamp(0);

      expect(date.toISOString()).toBe('2001-01-01T00:00:00.000Z');
    });

    it('should add whole days', () => {
      expect(DateFormatter.decodeTimestamp(86400).toISOString()).toBe('2001-01-02T00:00:00.000Z');
    });

    it('should decode a recent timestamp', () => {
      // 24 years of seconds including 6 leap days
      expect(DateFormatter.decodeTimestamp(757382400).toISOString()).toBe('2025-01-01T00:00:00.000Z');
    });

    it('should keep fractional seconds', () => {
      expect(DateFormatter.decodeTimestamp(100.5).toISOString()).toBe('2001-01-01T00:01:40.500Z');
    });

    it('should round sub-millisecond digits to the nearest millisecond', () => {
      expect(DateFormatter.decodeTimestamp(0.0004).toISOString()).toBe('2001-01-01T00:00:00.000Z');
      expect(DateFormatter.decodeTimestamp(0.0006).toISOString()).toBe('2001-01-01T00:00:00.001Z');
      expect(DateFormatter.decodeTimestamp(757418400.123456).toISOString()).toBe('2025-01-01T10:00:00.123Z');
    });

    it('should handle dates before the reference epoch', () => {
      expect(DateFormatter.decodeTimestamp(-86400).toISOString()).toBe('2000-12-31T00:00:00.000Z');
    });
  });

  describe('encodeTimestamp', () => {
    it('should be the inverse of decodeTimestamp', () => {
      const samples = [0, 1, -1, 100.5, 757418400, 757418400.25, -31536000];

      for (const seconds of samples) {
        expect(DateFormatter.encodeTimestamp(DateFormatter.decodeTimestamp(seconds))).toBe(seconds);
      }
    });

    it('should round-trip dates', () => {
      const date = new Date('2024-01-31T23:59:59.000Z');

      expect(DateFormatter.decodeTimestamp(DateFormatter.encodeTimestamp(date)).getTime()).toBe(date.getTime());
    });

    it('should round trip only to millisecond precision', () => {
      expect(DateFormatter.encodeTimestamp(DateFormatter.decodeTimestamp(757418400.123456))).toBe(757418400.123);
      expect(DateFormatter.encodeTimestamp(DateFormatter.decodeTimestamp(123.0006))).toBe(123.001);
      expect(DateFormatter.encodeTimestamp(DateFormatter.decodeTimestamp(0.0001))).toBe(0);
    });

    it('should return negative values before 2001', () => {
      expect(DateFormatter.encodeTimestamp(new Date('2000-12-31T23:59:59Z'))).toBe(-1);
    });
  });

  describe('parseDateInput', () => {
    it('should parse to UTC midnight', () => {
      expect(DateFormatter.parseDateInput('2024-03-15').toISOString()).toBe('2024-03-15T00:00:00.000Z');
    });

    it('should reject malformed input', () => {
      expect(() => DateFormatter.parseDateInput('2024/03/15')).toThrow('Invalid date format');
      expect(() => DateFormatter.parseDateInput('15-03-2024')).toThrow('Invalid date format');
      expect(() => DateFormatter.parseDateInput('')).toThrow('Invalid date format');
    });

    it('should reject dates that do not exist', () => {
      expect(() => DateFormatter.parseDateInput('2023-02-29')).toThrow('Invalid date: 2023-02-29');
    });
  });

  describe('formatting', () => {
    const date = new Date(Date.UTC(2025, 0, 5, 8, 3, 7));

    it('should format full timestamps', () => {
      expect(DateFormatter.formatFull(date)).toBe('2025-01-05 08:03:07');
    });

    it('should format dates', () => {
      expect(DateFormatter.formatDate(date)).toBe('2025-01-05');
    });

    it('should format date and time', () => {
      expect(DateFormatter.formatDateTime(date)).toBe('2025-01-05 08:03');
    });

    it('should format short timestamps', () => {
      expect(DateFormatter.formatShort(date)).toBe('01/05 08:03');
    });
  });
});
