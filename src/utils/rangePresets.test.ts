import { describe, expect, it } from 'vitest';
import { clampRange, isValidRange, presetRange, RANGE_PRESETS } from './rangePresets';

const reference = new Date('2024-04-15T10:00:00Z');

describe('presetRange', () => {
  it('ends every preset today', () => {
    RANGE_PRESETS.forEach((preset) => {
      expect(presetRange(preset, reference).endDate).toBe('2024-04-15');
    });
  });

  it('counts months in the Shamsi calendar', () => {
    expect(presetRange('week', reference)).toEqual({ startDate: '2024-04-13', endDate: '2024-04-15' });
    expect(presetRange('month', reference)).toEqual({ startDate: '2024-03-20', endDate: '2024-04-15' });
    expect(presetRange('3months', reference)).toEqual({ startDate: '2024-01-21', endDate: '2024-04-15' });
    expect(presetRange('6months', reference)).toEqual({ startDate: '2023-10-23', endDate: '2024-04-15' });
  });
});

describe('isValidRange', () => {
  it('accepts ordered real dates, including a single day', () => {
    expect(isValidRange('2024-03-01', '2024-03-31')).toBe(true);
    expect(isValidRange('2024-03-01', '2024-03-01')).toBe(true);
  });

  it('rejects inverted, missing or malformed bounds', () => {
    expect(isValidRange('2024-03-31', '2024-03-01')).toBe(false);
    expect(isValidRange('', '2024-03-01')).toBe(false);
    expect(isValidRange('2024-03-01', null)).toBe(false);
    expect(isValidRange('2024-02-30', '2024-03-01')).toBe(false);
  });
});

describe('clampRange', () => {
  const bounds = { startDate: '2024-03-01', endDate: '2024-03-31' };

  it('narrows a range to the bounds', () => {
    expect(clampRange({ startDate: '2024-02-01', endDate: '2024-03-10' }, bounds)).toEqual({
      startDate: '2024-03-01',
      endDate: '2024-03-10',
    });
  });

  it('falls back to the bounds when the range lies outside them', () => {
    const clamped = clampRange({ startDate: '2024-05-01', endDate: '2024-05-31' }, bounds);
    expect(clamped).toEqual(bounds);
    expect(clamped).not.toBe(bounds);
  });
});
