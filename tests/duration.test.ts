import { describe, expect, it } from 'vitest';
import { formatDuration, parseDuration } from '../src/utils/duration.js';

describe('DurationParsing', () => {
  it('DurationParsesUnits reads number and unit pairs', () => {
    expect(parseDuration('2m')).toBe(120_000);
    expect(parseDuration('1h30m')).toBe(5_400_000);
    expect(parseDuration('90s')).toBe(90_000);
    expect(parseDuration('250ms')).toBe(250);
    expect(parseDuration('1.5h')).toBe(5_400_000);
    expect(parseDuration('-30s')).toBe(-30_000);
    expect(parseDuration('0')).toBe(0);
    expect(parseDuration(1_500)).toBe(1_500);
    expect(parseDuration('1500us')).toBeCloseTo(1.5, 9);
    expect(parseDuration('+2h')).toBe(7_200_000);
  });

  it('DurationRejectsMalformed names what could not be read', () => {
    expect(() => parseDuration('')).toThrow('invalid duration ""');
    expect(() => parseDuration('5')).toThrow('invalid duration "5": missing unit');
    expect(() => parseDuration('5 minutes')).toThrow('invalid duration "5 minutes": unexpected "5 minutes"');
    expect(() => parseDuration(Number.NaN)).toThrow('invalid duration NaN');
  });

  it('DurationFormatting renders hours minutes and seconds', () => {
    expect(formatDuration(0)).toBe('0s');
    expect(formatDuration(120_000)).toBe('2m');
    expect(formatDuration(5_400_000)).toBe('1h30m');
    expect(formatDuration(1_500)).toBe('1500ms');
    expect(formatDuration(-30_000)).toBe('-30s');
  });
});
