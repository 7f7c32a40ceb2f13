/**
 * Device and animation tunables.
 *
 * TERMINOLOGY:
 * - Pad: One of the 64 addressable cells in the 8x8 grid (index 0-63, row-major)
 * - Address: The MIDI note number the device listens on for a Pad
 * - Intensity code: The note-on velocity that selects a palette colour on the device
 */

import type { PaletteColor } from '../types/palette';

// ============================================================================
// Grid
// ============================================================================

export const GRID_ROWS = 8;
export const GRID_COLS = 8;
/** Number of pads in a frame. */
export const PAD_COUNT = GRID_ROWS * GRID_COLS;

// ============================================================================
// MIDI protocol
// ============================================================================

/** MIDI channel 0 (shown as "channel 1" by most hosts). */
export const DEFAULT_MIDI_CHANNEL = 0;

/**
 * Pause between a note-off and the note-on that follows it.
 * The device shows stale colours if the two arrive back to back.
 */
export const DEFAULT_INTER_MESSAGE_DELAY_MS = 1;

/** Multiplier applied to the inter-message delay between the off batch and the on batch of a full grid refresh. */
export const GRID_BATCH_DELAY_FACTOR = 2;

/**
 * Settle time before closing the port after the final clear.
 * Closing earlier drops the tail of the off batch.
 */
export function settleDelayFor(interMessageDelayMs: number): number {
  return interMessageDelayMs * 5 + 50;
}

/**
 * Palette colour to note-on velocity.
 * OFF is never sent as a note-on; the preceding note-off already darkens the pad.
 */
export const COLOR_TO_VELOCITY: Readonly<Record<PaletteColor, number>> = {
  OFF: 0,
  WHITE: 1,
  YELLOW: 17,
  LIGHTBLUE: 33,
  PURPLE: 49,
  DARKBLUE: 65,
  GREEN: 81,
  RED: 97,
};

/** Case-insensitive substrings used to pick the device's output port automatically. */
export const DEFAULT_PORT_KEYWORDS: readonly string[] = ['smartpad', 'midiplus', 'usb midi'];

// ============================================================================
// Animation
// ============================================================================

export const DEFAULT_ANIMATION_NAME = 'New Animation';
export const UNTITLED_ANIMATION_NAME = 'Untitled Animation';
/** 200ms = 5 FPS */
export const DEFAULT_FRAME_DELAY_MS = 200;
/** 20ms = 50 FPS, the fastest the device keeps up with. */
export const MIN_FRAME_DELAY_MS = 20;
export const MAX_ANIMATION_FRAMES = 999;

// ============================================================================
// Storage
// ============================================================================

/** Sub-directory (under the caller's base path) holding one JSON file per named layout. */
export const LAYOUTS_SUBDIR = 'user_static_layouts';
