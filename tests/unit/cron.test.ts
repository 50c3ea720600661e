/**
 * Unit tests for cron validation
 */

import { describe, it, expect } from 'vitest';
import { validateCron } from '../../src/triggers/cron.js';

describe('validateCron', () => {
  it('should accept the daily default', () => {
    expect(validateCron('0 4 * * *')).toBeNull();
  });

  it('should accept lists, ranges, steps and names', () => {
    expect(validateCron('*/15 0-6,18 1 JAN-MAR mon-fri')).toBeNull();
    expect(validateCron('0 0-23/2 * * 0')).toBeNull();
    expect(validateCron('  30   4  *  *  *  ')).toBeNull();
  });

  it('should reject the wrong number of fields', () => {
    expect(validateCron('0 4 * *')).toBe('expected 5 fields, got 4');
    expect(validateCron('0 4 * * * 2024')).toBe('expected 5 fields, got 6');
    expect(validateCron('')).toBe('expected 5 fields, got 0');
  });

  it('should reject out-of-range values', () => {
    expect(validateCron('60 4 * * *')).toBe('minute value 60 out of range 0-59');
    expect(validateCron('0 4 0 * *')).toBe('day of month value 0 out of range 1-31');
    expect(validateCron('0 4 * 13 *')).toBe('month value 13 out of range 1-12');
    expect(validateCron('0 4 * * 7')).toBe('day of week value 7 out of range 0-6');
  });

  it('should reject malformed items', () => {
    expect(validateCron('a 4 * * *')).toBe('invalid value "a" in minute');
    expect(validateCron('0 4 * * */0')).toBe('invalid step "0" in day of week');
    expect(validateCron('0 6-2 * * *')).toBe('hour range "6-2" is reversed');
    expect(validateCron('0 1-2-3 * * *')).toBe('invalid range "1-2-3" in hour');
    expect(validateCron('0 4,,5 * * *')).toBe('empty list item in hour');
    expect(validateCron('5/10 4 * * *')).toBe('step requires a range or "*" in minute');
    expect(validateCron('*/5/2 4 * * *')).toBe('too many "/" in minute "*/5/2"');
  });
});
