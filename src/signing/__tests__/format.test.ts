import { describe, expect, it } from 'vitest';
import { formatAmzDate, formatDateStamp, parseAmzDate } from '../format.js';

describe('date formatting', () => {
  const date = new Date(Date.UTC(2013, 4, 24, 7, 8, 9));

  it('formats the date stamp', () => {
    expect(formatDateStamp(date)).toBe('20130524');
  });

  it('formats the amz date', () => {
    expect(formatAmzDate(date)).toBe('20130524T070809Z');
  });

  it('parses what it formats', () => {
    expect(parseAmzDate('20130524T070809Z')?.getTime()).toBe(date.getTime());
  });

  it('rejects other formats', () => {
    expect(parseAmzDate('2013-05-24T07:08:09Z')).toBeUndefined();
    expect(parseAmzDate('')).toBeUndefined();
  });
});
