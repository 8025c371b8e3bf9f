import { describe, it, expect } from 'vitest';
import {
  parseCalendarDate,
  parseTimeOfDay,
  formatTimeOfDay,
  isCalendarDate,
  isTimeOfDay,
  ParseError,
} from '../../src/domain/index.js';

describe('parseCalendarDate', () => {
  it('returns a valid date unchanged', () => {
    expect(parseCalendarDate('2025-09-20')).toBe('2025-09-20');
  });

  it('accepts 29 February in leap years', () => {
    expect(parseCalendarDate('2024-02-29')).toBe('2024-02-29');
    expect(parseCalendarDate('2000-02-29')).toBe('2000-02-29');
  });

  it('rejects 29 February outside leap years', () => {
    expect(() => parseCalendarDate('2023-02-29')).toThrow(ParseError);
    expect(() => parseCalendarDate('1900-02-29')).toThrow(ParseError);
  });

  it.each([
    '2025-9-20',
    '2025-09-31',
    '2025-13-01',
    '2025-00-10',
    '2025-09-00',
    '20250920',
    ' 2025-09-20',
    '2025-09-20T10:00',
    '',
  ])('rejects %j', (input) => {
    expect(() => parseCalendarDate(input)).toThrow(ParseError);
  });

  it('carries the offending input on the error', () => {
    try {
      parseCalendarDate('2025/09/20');
      expect.unreachable();
    } catch (err: unknown) {
      expect(err).toBeInstanceOf(ParseError);
      expect(err).toMatchObject({ code: 'PARSE_ERROR', input: '2025/09/20' });
    }
  });
});

describe('parseTimeOfDay', () => {
  it('converts HH:MM to minutes since midnight', () => {
    expect(parseTimeOfDay('00:00')).toBe(0);
    expect(parseTimeOfDay('10:00')).toBe(600);
    expect(parseTimeOfDay('12:30')).toBe(750);
    expect(parseTimeOfDay('23:59')).toBe(1439);
  });

  it.each(['24:00', '9:00', '10:60', '10:5', 'ab:cd', '10:00:00', '1000', ''])('rejects %j', (input) => {
    expect(() => parseTimeOfDay(input)).toThrow(ParseError);
  });

  it('names the expected format in the message', () => {
    expect(() => parseTimeOfDay('7pm')).toThrow('Invalid time (expected HH:MM): "7pm"');
  });
});

describe('formatTimeOfDay', () => {
  it('pads hours and minutes', () => {
    expect(formatTimeOfDay(0)).toBe('00:00');
    expect(formatTimeOfDay(690)).toBe('11:30');
    expect(formatTimeOfDay(1439)).toBe('23:59');
  });
});

describe('isCalendarDate / isTimeOfDay', () => {
  it('report validity without throwing', () => {
    expect(isCalendarDate('2025-09-20')).toBe(true);
    expect(isCalendarDate('2025-02-30')).toBe(false);
    expect(isTimeOfDay('18:45')).toBe(true);
    expect(isTimeOfDay('18:4')).toBe(false);
  });
});
