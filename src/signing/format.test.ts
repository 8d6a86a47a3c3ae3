/**
 * Tests for signing date formats
 */

import { describe, it, expect } from 'vitest';
import { formatAmzDate, formatDateStamp } from './format.js';
import { SigningError } from './error.js';
import { captureError } from '../testing/index.js';

describe('formatDateStamp', () => {
  it('should format as YYYYMMDD', () => {
    expect(formatDateStamp(new Date('2015-08-30T12:36:00Z'))).toBe('20150830');
  });

  it('should pad the year to four digits', () => {
    const date = new Date(Date.UTC(2000, 0, 1));
    date.setUTCFullYear(999);

    expect(formatDateStamp(date)).toBe('09990101');
  });

  it('should use UTC, not local time', () => {
    expect(formatDateStamp(new Date('2020-01-01T23:30:00-05:00'))).toBe('20200102');
  });
});

describe('formatAmzDate', () => {
  it('should format as YYYYMMDDTHHMMSSZ', () => {
    expect(formatAmzDate(new Date('2015-08-30T12:36:00Z'))).toBe('20150830T123600Z');
  });

  it('should zero-pad and drop milliseconds', () => {
    expect(formatAmzDate(new Date('2020-01-02T03:04:05.999Z'))).toBe('20200102T030405Z');
  });

  it('should reject an invalid date', () => {
    const error = captureError(() => formatAmzDate(new Date('not a date')));

    expect(error).toBeInstanceOf(SigningError);
    expect(error).toMatchObject({ code: 'INVALID_TIMESTAMP' });
  });
});
