/**
 * AnimationSequence
 *
 * Owns the frames of one animation together with its edit cursor, playback
 * state machine and timing properties.
 *
 * TERMINOLOGY:
 * - Frame: A complete 64-colour snapshot of the grid
 * - Edit cursor: The frame being modified by direct user interaction (-1 = none)
 * - Playback cursor: The frame that the next advance() call returns
 *
 * The sequence has no timer of its own. A periodic driver (see PlaybackDriver)
 * calls advance() exactly once per tick, with a period equal to frameDelayMs.
 * Interested parties learn about changes through subscribe() or by polling
 * `revision`.
 */
import {
  DEFAULT_ANIMATION_NAME,
  DEFAULT_FRAME_DELAY_MS,
  MAX_ANIMATION_FRAMES,
  MIN_FRAME_DELAY_MS,
  PAD_COUNT,
  UNTITLED_ANIMATION_NAME,
} from '../config/deviceConfig';
import type {
  AnimationEvent,
  AnimationFileData,
  AnimationListener,
  FrameInsertResult,
  PlaybackState,
} from '../types/animation';
import type { PaletteColor } from '../types/palette';
import { Frame, type ReadonlyFrame } from './frame';

/**
 * What a new frame is built from:
 * - nothing: a blank (all OFF) frame
 * - a list of 64 colour names
 * - an existing frame, which is copied
 */
export type FrameSource = ReadonlyFrame | readonly unknown[] | null | undefined;

function isFrame(source: ReadonlyFrame | readonly unknown[]): source is ReadonlyFrame {
  return !Array.isArray(source);
}

function buildFrame(source: FrameSource): Frame {
  if (source === null || source === undefined) return Frame.blank();
  return isFrame(source) ? source.clone() : new Frame(source);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Clamps a requested frame delay to a whole number of milliseconds no shorter than MIN_FRAME_DELAY_MS.
 * Returns null for non-finite input.
 */
export function clampFrameDelay(delayMs: number): number | null {
  if (!Number.isFinite(delayMs)) return null;
  return Math.max(MIN_FRAME_DELAY_MS, Math.trunc(delayMs));
}

export class AnimationSequence {
  private _name: string;
  private _frameDelayMs = DEFAULT_FRAME_DELAY_MS;
  private _loop = true;
  private frames: Frame[] = [];

  private editIndex = -1;
  private state: PlaybackState = 'stopped';
  private playbackCursor = 0;

  private modified = false;
  private loadedFilePath: string | null = null;

  private readonly listeners = new Set<AnimationListener>();
  private _revision = 0;

  constructor(name: string = DEFAULT_ANIMATION_NAME) {
    this._name = name;
  }

  // ==========================================================================
  // Change notification
  // ==========================================================================

  /**
   * Registers a listener for change events.
   * @returns A function that removes the listener
   */
  subscribe(listener: AnimationListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Increments on every published event. */
  get revision(): number {
    return this._revision;
  }

  private emit(event: AnimationEvent): void {
    this._revision++;
    this.listeners.forEach(listener => listener(event));
  }

  private setModified(modified: boolean): void {
    if (this.modified === modified) return;
    this.modified = modified;
    this.emit({ type: 'modifiedChanged', modified });
  }

  // ==========================================================================
  // Properties
  // ==========================================================================

  get name(): string {
    return this._name;
  }

  get frameDelayMs(): number {
    return this._frameDelayMs;
  }

  get loop(): boolean {
    return this._loop;
  }

  /** True when there are changes since the last new/load/save. */
  get isModified(): boolean {
    return this.modified;
  }

  /** Path the sequence was last loaded from or saved to. */
  get filePath(): string | null {
    return this.loadedFilePath;
  }

  setName(name: string): void {
    if (this._name === name) return;
    this._name = name;
    this.emit({ type: 'propertiesChanged' });
    this.setModified(true);
  }

  /**
   * Sets the delay between frames. Values below 20ms are raised to 20ms.
   * A running driver picks the new value up on its next tick.
   */
  setFrameDelayMs(delayMs: number): void {
    const clamped = clampFrameDelay(delayMs);
    if (clamped === null || clamped === this._frameDelayMs) return;
    this._frameDelayMs = clamped;
    this.emit({ type: 'propertiesChanged' });
    this.setModified(true);
  }

  setLoop(loop: boolean): void {
    if (this._loop === loop) return;
    this._loop = loop;
    this.emit({ type: 'propertiesChanged' });
    this.setModified(true);
  }

  // ==========================================================================
  // Frames and edit cursor
  // ==========================================================================

  get frameCount(): number {
    return this.frames.length;
  }

  /** Read-only view of a frame; edits go through the sequence's mutators. */
  getFrame(index: number): ReadonlyFrame | null {
    return this.frames[index]?.asReadonly() ?? null;
  }

  /** Read-only views of the frames, in order. */
  getFrames(): readonly ReadonlyFrame[] {
    return this.frames.map(frame => frame.asReadonly());
  }

  get editFrameIndex(): number {
    return this.editIndex;
  }

  getEditFrame(): ReadonlyFrame | null {
    return this.currentEditFrame()?.asReadonly() ?? null;
  }

  private currentEditFrame(): Frame | null {
    return this.editIndex === -1 ? null : this.frames[this.editIndex] ?? null;
  }

  /**
   * Moves the edit cursor.
   * -1 clears the selection. Any other out-of-range index selects frame 0
   * (or -1 when there are no frames).
   */
  setEditFrameIndex(index: number): void {
    this.selectEditFrame(this.resolveEditIndex(index), false);
  }

  private resolveEditIndex(index: number): number {
    if (this.frames.length === 0 || index === -1) return -1;
    if (Number.isInteger(index) && index >= 0 && index < this.frames.length) return index;
    return 0;
  }

  private selectEditFrame(index: number, force: boolean): void {
    if (!force && this.editIndex === index) return;
    this.editIndex = index;
    this.emit({ type: 'editFrameChanged', index });
  }

  /**
   * Inserts a new frame and makes it the edit frame.
   *
   * @param source - Blank when absent; a 64-colour list; or a Frame to copy
   * @param atIndex - Insert position in [0, frameCount]; appends when absent or out of bounds
   */
  addFrame(source?: FrameSource, atIndex?: number): FrameInsertResult {
    if (this.frames.length >= MAX_ANIMATION_FRAMES) {
      console.warn(`[AnimationSequence] Cannot add frame: maximum of ${MAX_ANIMATION_FRAMES} frames reached`);
      return { status: 'full' };
    }

    const frame = buildFrame(source);

    let index: number;
    if (atIndex === undefined || !Number.isInteger(atIndex) || atIndex < 0 || atIndex > this.frames.length) {
      this.frames.push(frame);
      index = this.frames.length - 1;
    } else {
      this.frames.splice(atIndex, 0, frame);
      index = atIndex;
      if (this.state !== 'stopped' && atIndex <= this.playbackCursor) {
        this.playbackCursor++;
      }
    }

    this.emit({ type: 'framesChanged' });
    this.selectEditFrame(index, true);
    this.setModified(true);
    return { status: 'added', index };
  }

  /**
   * Copies the frame at `index` into the slot right after it.
   */
  duplicateFrame(index: number): FrameInsertResult {
    if (this.frames.length >= MAX_ANIMATION_FRAMES) {
      console.warn(`[AnimationSequence] Cannot duplicate frame: maximum of ${MAX_ANIMATION_FRAMES} frames reached`);
      return { status: 'full' };
    }
    const source = this.getFrame(index);
    if (!source) return { status: 'notFound' };
    return this.addFrame(source, index + 1);
  }

  /**
   * Removes a frame. When the edit frame is removed, the frame before it is
   * selected, else the one after it, else nothing (-1).
   *
   * @returns false (and no change) for an invalid index
   */
  deleteFrame(index: number): boolean {
    if (!Number.isInteger(index) || index < 0 || index >= this.frames.length) return false;
    this.frames.splice(index, 1);

    let nextEdit: number;
    if (this.frames.length === 0) {
      nextEdit = -1;
    } else if (this.editIndex === index) {
      nextEdit = index > 0 ? index - 1 : 0;
    } else if (this.editIndex > index) {
      nextEdit = this.editIndex - 1;
    } else {
      nextEdit = this.editIndex;
    }

    if (this.state !== 'stopped' && index < this.playbackCursor) {
      this.playbackCursor--;
    }

    this.emit({ type: 'framesChanged' });
    this.selectEditFrame(nextEdit, this.editIndex === index);
    this.reconcilePlaybackCursor();
    this.setModified(true);
    return true;
  }

  /**
   * Moves a frame to a new position. The edit cursor follows the frame it was on.
   *
   * @returns false (and no change) when either index is invalid or they are equal
   */
  moveFrame(fromIndex: number, toIndex: number): boolean {
    const count = this.frames.length;
    const valid = (i: number) => Number.isInteger(i) && i >= 0 && i < count;
    if (!valid(fromIndex) || !valid(toIndex) || fromIndex === toIndex) return false;

    const editFrame = this.currentEditFrame();
    const [moved] = this.frames.splice(fromIndex, 1);
    this.frames.splice(toIndex, 0, moved);

    this.emit({ type: 'framesChanged' });
    if (editFrame) {
      this.selectEditFrame(this.frames.indexOf(editFrame), false);
    }
    this.setModified(true);
    return true;
  }

  /**
   * Paints one cell of the edit frame.
   *
   * Only a real change is stored and announced, so repeated strokes over the
   * same pad produce no events (and no device traffic downstream). A pad
   * index outside the grid changes nothing.
   *
   * @returns false only when there is no edit frame
   */
  updateCellInEditFrame(padIndex: number, color: string): boolean {
    const frame = this.currentEditFrame();
    if (!frame) return false;

    if (frame.set(padIndex, color)) {
      this.emit({ type: 'frameContentUpdated', index: this.editIndex });
      this.setModified(true);
    }
    return true;
  }

  /**
   * Sets every cell of the edit frame to OFF.
   * @returns false when there is no edit frame
   */
  clearEditFrame(): boolean {
    const frame = this.currentEditFrame();
    if (!frame) return false;
    if (frame.clear()) {
      this.emit({ type: 'frameContentUpdated', index: this.editIndex });
      this.setModified(true);
    }
    return true;
  }

  /**
   * Replaces the edit frame's cells, e.g. with a named layout.
   * @returns false when there is no edit frame or the list is not 64 long
   */
  applyColorsToEditFrame(colors: readonly unknown[]): boolean {
    const frame = this.currentEditFrame();
    if (!frame || colors.length !== PAD_COUNT) return false;
    if (frame.assign(colors)) {
      this.emit({ type: 'frameContentUpdated', index: this.editIndex });
      this.setModified(true);
    }
    return true;
  }

  // ==========================================================================
  // Playback state machine
  // ==========================================================================

  get playbackState(): PlaybackState {
    return this.state;
  }

  get isPlaying(): boolean {
    return this.state === 'playing';
  }

  /** Index of the frame the next advance() returns. */
  get playbackIndex(): number {
    return this.playbackCursor;
  }

  private setPlaybackState(state: PlaybackState): void {
    this.state = state;
    this.emit({ type: 'playbackStateChanged', state });
  }

  /**
   * Starts playback from `fromIndex` when valid, else from the edit frame, else from frame 0.
   * @returns false (no-op) when there are no frames
   */
  start(fromIndex?: number): boolean {
    if (this.frames.length === 0) return false;

    if (fromIndex !== undefined && Number.isInteger(fromIndex) && fromIndex >= 0 && fromIndex < this.frames.length) {
      this.playbackCursor = fromIndex;
    } else if (this.editIndex !== -1) {
      this.playbackCursor = this.editIndex;
    } else {
      this.playbackCursor = 0;
    }
    this.setPlaybackState('playing');
    return true;
  }

  /** Playing → Paused. No-op in any other state. */
  pause(): void {
    if (this.state !== 'playing') return;
    this.setPlaybackState('paused');
  }

  /**
   * Paused → Playing, continuing from the kept playback cursor.
   * @returns false when not paused or there is nothing to play
   */
  resume(): boolean {
    if (this.state !== 'paused') return false;
    if (this.frames.length === 0) {
      this.stop();
      return false;
    }
    this.reconcilePlaybackCursor();
    this.setPlaybackState('playing');
    return true;
  }

  /** Any state → Stopped with the playback cursor at 0. */
  stop(): void {
    if (this.state === 'stopped' && this.playbackCursor === 0) return;
    this.playbackCursor = 0;
    this.setPlaybackState('stopped');
  }

  /**
   * Single playback step; the driver calls this once per tick.
   *
   * Returns the colours of the frame under the playback cursor and moves the
   * cursor on. Past the last frame the cursor wraps to 0 when looping;
   * otherwise playback stops, but the final frame's colours are still
   * returned so it gets displayed. Any call made while not playing (or with
   * no frames) stops playback and returns null.
   */
  advance(): PaletteColor[] | null {
    if (this.state !== 'playing' || this.frames.length === 0) {
      this.stop();
      return null;
    }

    const shownIndex = this.playbackCursor;
    const colors = this.frames[shownIndex].toColors();
    this.playbackCursor++;

    const reachedEnd = this.playbackCursor >= this.frames.length;
    if (reachedEnd) this.playbackCursor = 0;
    this.emit({ type: 'playbackAdvanced', frameIndex: shownIndex });
    if (reachedEnd && !this._loop) {
      this.setPlaybackState('stopped');
    }
    return colors;
  }

  /**
   * Keeps the playback cursor inside [0, frameCount) after frames are removed.
   */
  private reconcilePlaybackCursor(): void {
    if (this.frames.length === 0) {
      this.stop();
      return;
    }
    if (this.playbackCursor >= this.frames.length || this.playbackCursor < 0) {
      this.playbackCursor = 0;
    }
  }

  // ==========================================================================
  // Lifecycle and serialization
  // ==========================================================================

  /**
   * Resets to an empty, unmodified sequence with default properties.
   */
  newSequence(name: string = DEFAULT_ANIMATION_NAME): void {
    const wasStopped = this.state === 'stopped';
    this._name = name;
    this._frameDelayMs = DEFAULT_FRAME_DELAY_MS;
    this._loop = true;
    this.frames = [];
    this.editIndex = -1;
    this.state = 'stopped';
    this.playbackCursor = 0;
    this.loadedFilePath = null;

    this.emit({ type: 'framesChanged' });
    this.emit({ type: 'propertiesChanged' });
    this.emit({ type: 'editFrameChanged', index: -1 });
    if (!wasStopped) this.emit({ type: 'playbackStateChanged', state: 'stopped' });
    this.setModified(false);
  }

  /**
   * Takes over the contents of another sequence (typically one just parsed
   * from a file). Playback stops and the result counts as unmodified.
   */
  replaceWith(other: AnimationSequence, filePath: string | null = null): void {
    const wasStopped = this.state === 'stopped';
    this._name = other._name;
    this._frameDelayMs = other._frameDelayMs;
    this._loop = other._loop;
    this.frames = other.frames.map(frame => frame.clone());
    this.editIndex = other.frames.length > 0 ? Math.max(other.editIndex, 0) : -1;
    this.state = 'stopped';
    this.playbackCursor = 0;
    this.loadedFilePath = filePath;

    this.emit({ type: 'framesChanged' });
    this.emit({ type: 'propertiesChanged' });
    this.emit({ type: 'editFrameChanged', index: this.editIndex });
    if (!wasStopped) this.emit({ type: 'playbackStateChanged', state: 'stopped' });
    this.setModified(false);
  }

  /** Records a successful save. */
  markSaved(filePath: string): void {
    this.loadedFilePath = filePath;
    this.setModified(false);
  }

  toDict(): AnimationFileData {
    return {
      name: this._name,
      frame_delay_ms: this._frameDelayMs,
      loop: this._loop,
      frames: this.frames.map(frame => frame.toColors()),
    };
  }

  /**
   * Builds a sequence from parsed file data.
   *
   * Loading is lenient: frames past the maximum are dropped, frames that are
   * not a list of 64 entries are skipped, unknown colour names become OFF and
   * missing properties take their defaults. Only input that is not an object
   * at all is rejected (null).
   */
  static fromDict(data: unknown): AnimationSequence | null {
    if (!isRecord(data)) {
      console.error('[AnimationSequence] Animation data is not an object');
      return null;
    }

    const sequence = new AnimationSequence(
      typeof data.name === 'string' ? data.name : UNTITLED_ANIMATION_NAME
    );
    if (typeof data.frame_delay_ms === 'number') {
      sequence._frameDelayMs = clampFrameDelay(data.frame_delay_ms) ?? DEFAULT_FRAME_DELAY_MS;
    }
    if (typeof data.loop === 'boolean') {
      sequence._loop = data.loop;
    }

    const rawFrames = Array.isArray(data.frames) ? data.frames : [];
    for (let i = 0; i < rawFrames.length; i++) {
      if (i >= MAX_ANIMATION_FRAMES) {
        console.warn(`[AnimationSequence] Animation has more than ${MAX_ANIMATION_FRAMES} frames; truncating`, {
          frameCount: rawFrames.length,
        });
        break;
      }
      const rawFrame: unknown = rawFrames[i];
      if (Array.isArray(rawFrame) && rawFrame.length === PAD_COUNT) {
        sequence.frames.push(new Frame(rawFrame));
      } else {
        console.warn(`[AnimationSequence] Invalid frame data at index ${i}; skipping`);
      }
    }

    sequence.editIndex = sequence.frames.length > 0 ? 0 : -1;
    return sequence;
  }
}
