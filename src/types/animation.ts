/**
 * Animation model types.
 *
 * TERMINOLOGY:
 * - Frame: A complete 64-colour snapshot of the grid
 * - Edit cursor: The frame currently being modified by direct user interaction (-1 = none)
 * - Playback cursor: The frame that the next playback tick will display
 */

import type { PaletteColor } from './palette';

/**
 * PlaybackState: Where the playback state machine currently sits.
 * - 'stopped': Not playing; playback cursor is 0
 * - 'playing': advance() steps through frames
 * - 'paused': Not playing; playback cursor is kept for resume()
 */
export type PlaybackState = 'stopped' | 'playing' | 'paused';

/**
 * Result of inserting a frame (add or duplicate).
 * - 'added': The new frame sits at `index` and is now the edit frame
 * - 'full': The sequence already holds the maximum number of frames; nothing changed
 * - 'notFound': The frame to duplicate does not exist; nothing changed
 */
export type FrameInsertResult =
  | { status: 'added'; index: number }
  | { status: 'full' }
  | { status: 'notFound' };

/**
 * AnimationEvent: Change notifications published by AnimationSequence.
 */
export type AnimationEvent =
  /** Frames were added, deleted, reordered or replaced wholesale */
  | { type: 'framesChanged' }
  /** Cells of a single frame changed */
  | { type: 'frameContentUpdated'; index: number }
  /** The edit cursor moved (-1 when there is no edit frame) */
  | { type: 'editFrameChanged'; index: number }
  /** Name, frame delay or loop flag changed */
  | { type: 'propertiesChanged' }
  | { type: 'playbackStateChanged'; state: PlaybackState }
  /** advance() returned the colours of `frameIndex` */
  | { type: 'playbackAdvanced'; frameIndex: number }
  /** The unsaved-changes flag flipped */
  | { type: 'modifiedChanged'; modified: boolean };

export type AnimationListener = (event: AnimationEvent) => void;

/**
 * AnimationFileData: On-disk JSON shape of an animation.
 * Keys are snake_case for compatibility with existing files.
 */
export interface AnimationFileData {
  name: string;
  frame_delay_ms: number;
  loop: boolean;
  /** One list of 64 canonical colour names per frame */
  frames: PaletteColor[][];
}

/**
 * LayoutFileData: On-disk JSON shape of a named static layout.
 */
export interface LayoutFileData {
  /** User-facing name, as typed when the layout was saved */
  display_name: string;
  /** 64 canonical colour names, row-major */
  layout_data: PaletteColor[];
}
