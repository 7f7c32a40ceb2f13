/**
 * Frame: a complete 64-colour snapshot of the pad grid.
 *
 * A frame always holds exactly PAD_COUNT cells. Frames are owned by a single
 * AnimationSequence; sharing one between sequences goes through clone().
 * Everything outside the owner sees a frame through its ReadonlyFrame view.
 */
import { v4 as uuidv4 } from 'uuid';
import { PAD_COUNT } from '../config/deviceConfig';
import { DEFAULT_COLOR, normalizeColor, type PaletteColor } from '../types/palette';
import { PadAddressMap } from './padAddressMap';

/**
 * ReadonlyFrame: The read side of a Frame. Edits go through the owning sequence.
 */
export interface ReadonlyFrame {
  readonly id: string;
  readonly length: number;
  get(padIndex: number): PaletteColor;
  isBlank(): boolean;
  toColors(): PaletteColor[];
  clone(): Frame;
  equals(other: ReadonlyFrame): boolean;
}

/**
 * Live read-only window onto a Frame; reflects later edits to it.
 */
class FrameView implements ReadonlyFrame {
  constructor(private readonly frame: Frame) {}

  get id(): string {
    return this.frame.id;
  }

  get length(): number {
    return this.frame.length;
  }

  get(padIndex: number): PaletteColor {
    return this.frame.get(padIndex);
  }

  isBlank(): boolean {
    return this.frame.isBlank();
  }

  toColors(): PaletteColor[] {
    return this.frame.toColors();
  }

  clone(): Frame {
    return this.frame.clone();
  }

  equals(other: ReadonlyFrame): boolean {
    return this.frame.equals(other);
  }
}

export class Frame implements ReadonlyFrame {
  /** Stable per-instance key for list rendering. Not part of equality or serialization. */
  readonly id: string;
  private readonly cells: PaletteColor[];
  private view: FrameView | null = null;

  /**
   * @param colors - 64 colour names. Any other length is discarded and the frame starts all OFF.
   */
  constructor(colors?: readonly unknown[] | null) {
    this.id = uuidv4();
    this.cells = colors && colors.length === PAD_COUNT
      ? Array.from(colors, normalizeColor)
      : new Array<PaletteColor>(PAD_COUNT).fill(DEFAULT_COLOR);
  }

  static blank(): Frame {
    return new Frame();
  }

  get length(): number {
    return this.cells.length;
  }

  /**
   * @throws RangeError when padIndex is outside [0, 64)
   */
  get(padIndex: number): PaletteColor {
    if (!PadAddressMap.isValidPadIndex(padIndex)) {
      throw new RangeError(`Pad index ${padIndex} is outside the grid (0-${PAD_COUNT - 1})`);
    }
    return this.cells[padIndex];
  }

  /**
   * Sets one cell. Unknown colour names store OFF; out-of-range indices are ignored.
   *
   * @returns true if the stored colour changed
   */
  set(padIndex: number, color: string): boolean {
    if (!PadAddressMap.isValidPadIndex(padIndex)) return false;
    const resolved = normalizeColor(color);
    if (this.cells[padIndex] === resolved) return false;
    this.cells[padIndex] = resolved;
    return true;
  }

  /**
   * Overwrites every cell from a 64-entry list.
   *
   * @returns true if any cell changed; false (and no change) for a wrong-length list
   */
  assign(colors: readonly unknown[]): boolean {
    if (colors.length !== PAD_COUNT) return false;
    let changed = false;
    // Index loop so holes in sparse lists resolve to OFF as well.
    for (let i = 0; i < PAD_COUNT; i++) {
      const resolved = normalizeColor(colors[i]);
      if (this.cells[i] !== resolved) {
        this.cells[i] = resolved;
        changed = true;
      }
    }
    return changed;
  }

  /**
   * @returns true if any cell changed
   */
  fill(color: string): boolean {
    return this.assign(new Array<string>(PAD_COUNT).fill(color));
  }

  clear(): boolean {
    return this.fill(DEFAULT_COLOR);
  }

  isBlank(): boolean {
    return this.cells.every(c => c === DEFAULT_COLOR);
  }

  /** Copy of all 64 cells in pad order. */
  toColors(): PaletteColor[] {
    return [...this.cells];
  }

  clone(): Frame {
    return new Frame(this.cells);
  }

  /** Compares colours only; ids are ignored. */
  equals(other: ReadonlyFrame): boolean {
    return other.length === PAD_COUNT && this.cells.every((color, i) => other.get(i) === color);
  }

  /** The same view object on every call. */
  asReadonly(): ReadonlyFrame {
    if (this.view === null) this.view = new FrameView(this);
    return this.view;
  }
}
