/**
 * PadAddressMap
 *
 * Stateless mapping between Pads (grid index 0-63, row-major, row 0 at the top)
 * and device Addresses (MIDI note numbers), plus palette colour to intensity code.
 *
 * ⚠️ Pad index ≠ Address. The device spaces its rows 16 notes apart, so pad 8
 * (row 1, col 0) is note 16, not note 8.
 */
import padNoteMap from '../config/padNoteMap.json';
import { COLOR_TO_VELOCITY, GRID_COLS, GRID_ROWS, PAD_COUNT } from '../config/deviceConfig';
import { PALETTE_COLORS, type PaletteColor } from '../types/palette';

function loadPadNotes(rows: readonly (readonly number[])[]): readonly number[] {
  if (rows.length !== GRID_ROWS || rows.some(row => row.length !== GRID_COLS)) {
    throw new Error(`Pad note table must be ${GRID_ROWS}x${GRID_COLS}`);
  }
  const notes = rows.flat();
  if (new Set(notes).size !== PAD_COUNT || notes.some(n => !Number.isInteger(n) || n < 0 || n > 127)) {
    throw new Error('Pad note table must hold 64 distinct MIDI notes (0-127)');
  }
  return Object.freeze(notes);
}

const PAD_NOTES = loadPadNotes(padNoteMap.rows);

const NOTE_TO_PAD: ReadonlyMap<number, number> = new Map(
  PAD_NOTES.map((note, padIndex) => [note, padIndex] as const)
);

const VELOCITY_TO_COLOR: ReadonlyMap<number, PaletteColor> = new Map(
  PALETTE_COLORS.map(color => [COLOR_TO_VELOCITY[color], color] as const)
);

export class PadAddressMap {
  /**
   * True for integer pad indices inside the grid.
   */
  static isValidPadIndex(padIndex: number): boolean {
    return Number.isInteger(padIndex) && padIndex >= 0 && padIndex < PAD_COUNT;
  }

  /**
   * Returns the device Address (MIDI note) for a Pad, or null if the index is outside the grid.
   */
  static padIndexToNote(padIndex: number): number | null {
    if (!this.isValidPadIndex(padIndex)) return null;
    return PAD_NOTES[padIndex];
  }

  /**
   * Inverse of padIndexToNote. Notes between rows (8-15, 24-31, ...) are not pads.
   */
  static noteToPadIndex(note: number): number | null {
    return NOTE_TO_PAD.get(note) ?? null;
  }

  /**
   * Row/col for a Pad index.
   */
  static padIndexToPosition(padIndex: number): { row: number; col: number } | null {
    if (!this.isValidPadIndex(padIndex)) return null;
    return { row: Math.floor(padIndex / GRID_COLS), col: padIndex % GRID_COLS };
  }

  static positionToPadIndex(row: number, col: number): number | null {
    if (!Number.isInteger(row) || !Number.isInteger(col)) return null;
    if (row < 0 || row >= GRID_ROWS || col < 0 || col >= GRID_COLS) return null;
    return row * GRID_COLS + col;
  }

  static velocityForColor(color: PaletteColor): number {
    return COLOR_TO_VELOCITY[color];
  }

  /**
   * Palette colour for a received velocity, or null when the device would not show a palette colour.
   */
  static colorForVelocity(velocity: number): PaletteColor | null {
    return VELOCITY_TO_COLOR.get(velocity) ?? null;
  }

  /**
   * All 64 Addresses in pad order.
   */
  static allNotes(): readonly number[] {
    return PAD_NOTES;
  }
}
