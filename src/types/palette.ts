/**
 * Palette types for the pad grid.
 *
 * The device only understands a fixed set of colours, so every colour that
 * enters the system (a pad edit, a loaded animation, a loaded layout) goes
 * through normalizeColor first.
 */

/** All palette colours, in palette order. OFF is always first. */
export const PALETTE_COLORS = [
  'OFF',
  'WHITE',
  'YELLOW',
  'LIGHTBLUE',
  'PURPLE',
  'DARKBLUE',
  'GREEN',
  'RED',
] as const;

/**
 * PaletteColor: One of the named colours the device can display, or OFF.
 * Stored and serialized in canonical upper case.
 */
export type PaletteColor = typeof PALETTE_COLORS[number];

/** Colour used for blank pads and for any input that does not name a palette colour. */
export const DEFAULT_COLOR: PaletteColor = 'OFF';

const PALETTE_NAMES: ReadonlySet<string> = new Set(PALETTE_COLORS);

/**
 * Type guard for canonical palette names (exact, upper case).
 */
export function isPaletteColor(value: unknown): value is PaletteColor {
  return typeof value === 'string' && PALETTE_NAMES.has(value);
}

/**
 * Resolves arbitrary input to a palette colour.
 *
 * Matching is case-insensitive. Anything else (unknown names, non-strings,
 * padded strings) resolves to OFF rather than failing, so files written by
 * lenient producers keep loading.
 *
 * @example normalizeColor('red') // 'RED'
 * @example normalizeColor('blue') // 'OFF'
 */
export function normalizeColor(value: unknown): PaletteColor {
  if (typeof value !== 'string') return DEFAULT_COLOR;
  const upper = value.toUpperCase();
  return isPaletteColor(upper) ? upper : DEFAULT_COLOR;
}

/**
 * Normalizes a whole list of colours.
 */
export function normalizeColors(values: readonly unknown[]): PaletteColor[] {
  return values.map(normalizeColor);
}
