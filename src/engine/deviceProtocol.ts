/**
 * DeviceProtocolEncoder
 *
 * Turns pad colours into the ordered steps the device needs to show them.
 * Pure: the output depends only on the input and the encoder's options.
 *
 * Device rules encoded here:
 * 1. A pad always gets a note-off before a note-on. Sending note-on alone over
 *    a lit pad leaves it in the wrong colour.
 * 2. OFF is expressed by the note-off alone; no note-on with velocity 0 is sent.
 * 3. A full-grid refresh sends every note-off first, pauses, then sends every
 *    note-on. The brief all-dark flash is accepted in exchange for no
 *    per-pad flicker.
 */
import {
  DEFAULT_INTER_MESSAGE_DELAY_MS,
  DEFAULT_MIDI_CHANNEL,
  GRID_BATCH_DELAY_FACTOR,
  PAD_COUNT,
} from '../config/deviceConfig';
import type { DeviceMessage, DeviceStep } from '../types/device';
import { DEFAULT_COLOR, normalizeColor, type PaletteColor } from '../types/palette';
import { PadAddressMap } from './padAddressMap';

/**
 * Thrown by encodeSingle for a pad index outside [0, 64).
 */
export class InvalidPadIndexError extends RangeError {
  constructor(readonly padIndex: number) {
    super(`Invalid pad index ${padIndex}: expected an integer in [0, ${PAD_COUNT})`);
    this.name = 'InvalidPadIndexError';
  }
}

/**
 * Thrown by encodeGrid when the colour list is not exactly 64 long.
 */
export class InvalidGridLengthError extends RangeError {
  constructor(readonly received: number) {
    super(`Invalid grid length ${received}: expected ${PAD_COUNT} colours`);
    this.name = 'InvalidGridLengthError';
  }
}

export interface EncoderOptions {
  /** MIDI channel (0-15) */
  channel: number;
  /** Pause inserted between a note-off and the note-on that follows; 0 disables pauses */
  interMessageDelayMs: number;
}

const DEFAULT_ENCODER_OPTIONS: EncoderOptions = {
  channel: DEFAULT_MIDI_CHANNEL,
  interMessageDelayMs: DEFAULT_INTER_MESSAGE_DELAY_MS,
};

/** Every pad OFF; the payload used to reset the device. */
export const ALL_OFF_GRID: readonly PaletteColor[] = Object.freeze(
  new Array<PaletteColor>(PAD_COUNT).fill(DEFAULT_COLOR)
);

export class DeviceProtocolEncoder {
  readonly options: Readonly<EncoderOptions>;

  constructor(options: Partial<EncoderOptions> = {}) {
    const merged = { ...DEFAULT_ENCODER_OPTIONS, ...options };
    if (!Number.isInteger(merged.channel) || merged.channel < 0 || merged.channel > 15) {
      throw new RangeError(`MIDI channel must be 0-15, got ${merged.channel}`);
    }
    if (!Number.isFinite(merged.interMessageDelayMs) || merged.interMessageDelayMs < 0) {
      throw new RangeError(`Inter-message delay must be a non-negative number, got ${merged.interMessageDelayMs}`);
    }
    this.options = Object.freeze(merged);
  }

  /** Pause between the off batch and the on batch of encodeGrid. */
  get gridBatchDelayMs(): number {
    return this.options.interMessageDelayMs * GRID_BATCH_DELAY_FACTOR;
  }

  /**
   * Steps to show one colour on one pad: note-off, then (for any colour but
   * OFF) the inter-message pause and a note-on carrying the colour's velocity.
   *
   * @throws InvalidPadIndexError
   */
  encodeSingle(padIndex: number, color: string): DeviceStep[] {
    const note = PadAddressMap.padIndexToNote(padIndex);
    if (note === null) {
      throw new InvalidPadIndexError(padIndex);
    }

    const steps: DeviceStep[] = [this.noteOff(note)];
    const resolved = normalizeColor(color);
    if (resolved !== DEFAULT_COLOR) {
      this.pushDelay(steps, this.options.interMessageDelayMs);
      steps.push(this.noteOn(note, resolved));
    }
    return steps;
  }

  /**
   * Steps to show a whole frame: 64 note-offs in pad order, the batch pause,
   * then a note-on for every lit pad in pad order.
   *
   * @throws InvalidGridLengthError
   */
  encodeGrid(colors: readonly string[]): DeviceStep[] {
    if (colors.length !== PAD_COUNT) {
      throw new InvalidGridLengthError(colors.length);
    }

    const notes = PadAddressMap.allNotes();
    const steps: DeviceStep[] = notes.map(note => this.noteOff(note));
    this.pushDelay(steps, this.gridBatchDelayMs);

    colors.forEach((color, padIndex) => {
      const resolved = normalizeColor(color);
      if (resolved !== DEFAULT_COLOR) {
        steps.push(this.noteOn(notes[padIndex], resolved));
      }
    });
    return steps;
  }

  /**
   * Steps that turn every pad off.
   */
  encodeClear(): DeviceStep[] {
    return this.encodeGrid(ALL_OFF_GRID);
  }

  private noteOff(note: number): DeviceMessage {
    return { type: 'noteOff', channel: this.options.channel, note, velocity: 0 };
  }

  private noteOn(note: number, color: PaletteColor): DeviceMessage {
    return {
      type: 'noteOn',
      channel: this.options.channel,
      note,
      velocity: PadAddressMap.velocityForColor(color),
    };
  }

  private pushDelay(steps: DeviceStep[], ms: number): void {
    if (ms > 0) steps.push({ type: 'delay', ms });
  }
}

/**
 * Keeps only the transport messages of an encoded batch.
 */
export function messagesOf(steps: readonly DeviceStep[]): DeviceMessage[] {
  return steps.filter((step): step is DeviceMessage => step.type !== 'delay');
}
