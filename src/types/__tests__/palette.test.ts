import { describe, it, expect } from 'vitest';
import { PALETTE_COLORS, isPaletteColor, normalizeColor, normalizeColors } from '../palette';

describe('palette', () => {
  it('lists OFF first followed by the seven device colours', () => {
    expect(PALETTE_COLORS).toEqual(['OFF', 'WHITE', 'YELLOW', 'LIGHTBLUE', 'PURPLE', 'DARKBLUE', 'GREEN', 'RED']);
  });

  it('matches colour names case-insensitively', () => {
    expect(normalizeColor('red')).toBe('RED');
    expect(normalizeColor('LightBlue')).toBe('LIGHTBLUE');
    expect(normalizeColor('OFF')).toBe('OFF');
  });

  it('falls back to OFF for anything that is not a palette colour', () => {
    expect(normalizeColor('blue')).toBe('OFF');
    expect(normalizeColor(' red')).toBe('OFF');
    expect(normalizeColor('')).toBe('OFF');
    expect(normalizeColor(42)).toBe('OFF');
    expect(normalizeColor(null)).toBe('OFF');
  });

  it('normalizes lists element by element', () => {
    expect(normalizeColors(['green', 'nope', 'Purple'])).toEqual(['GREEN', 'OFF', 'PURPLE']);
  });

  it('only accepts canonical upper-case names as palette colours', () => {
    expect(isPaletteColor('YELLOW')).toBe(true);
    expect(isPaletteColor('yellow')).toBe(false);
    expect(isPaletteColor(undefined)).toBe(false);
  });
});
