/**
 * Unit tests for DeviceProtocolEncoder.
 */

import { describe, it, expect } from 'vitest';
import {
  ALL_OFF_GRID,
  DeviceProtocolEncoder,
  InvalidGridLengthError,
  InvalidPadIndexError,
  messagesOf,
} from '../deviceProtocol';
import { PadAddressMap } from '../padAddressMap';
import { COLOR_TO_VELOCITY } from '../../config/deviceConfig';
import type { DeviceStep } from '../../types/device';
import { PALETTE_COLORS, type PaletteColor } from '../../types/palette';

const offGrid = (): PaletteColor[] => new Array<PaletteColor>(64).fill('OFF');

describe('DeviceProtocolEncoder', () => {
  describe('encodeSingle', () => {
    it('sends note-off, pauses, then note-on with the colour velocity', () => {
      const encoder = new DeviceProtocolEncoder();
      expect(encoder.encodeSingle(9, 'RED')).toEqual<DeviceStep[]>([
        { type: 'noteOff', channel: 0, note: 17, velocity: 0 },
        { type: 'delay', ms: 1 },
        { type: 'noteOn', channel: 0, note: 17, velocity: 97 },
      ]);
    });

    it('sends only the note-off for OFF', () => {
      const encoder = new DeviceProtocolEncoder();
      expect(encoder.encodeSingle(63, 'OFF')).toEqual<DeviceStep[]>([
        { type: 'noteOff', channel: 0, note: 119, velocity: 0 },
      ]);
    });

    it('puts the note-off first for every pad and colour', () => {
      const encoder = new DeviceProtocolEncoder();
      for (let padIndex = 0; padIndex < 64; padIndex++) {
        const note = PadAddressMap.padIndexToNote(padIndex);
        for (const color of PALETTE_COLORS) {
          const messages = messagesOf(encoder.encodeSingle(padIndex, color));
          expect(messages[0]).toEqual({ type: 'noteOff', channel: 0, note, velocity: 0 });

          if (color === 'OFF') {
            expect(messages).toHaveLength(1);
          } else {
            expect(messages).toHaveLength(2);
            expect(messages[1]).toEqual({ type: 'noteOn', channel: 0, note, velocity: COLOR_TO_VELOCITY[color] });
          }
        }
      }
    });

    it('treats unknown colour names as OFF', () => {
      const encoder = new DeviceProtocolEncoder();
      expect(encoder.encodeSingle(0, 'magenta')).toEqual<DeviceStep[]>([
        { type: 'noteOff', channel: 0, note: 0, velocity: 0 },
      ]);
    });

    it('resolves colour names case-insensitively', () => {
      const encoder = new DeviceProtocolEncoder();
      const messages = messagesOf(encoder.encodeSingle(56, 'lightblue'));
      expect(messages[1]).toEqual({ type: 'noteOn', channel: 0, note: 112, velocity: 33 });
    });

    it('omits the pause when the inter-message delay is 0', () => {
      const encoder = new DeviceProtocolEncoder({ interMessageDelayMs: 0 });
      expect(encoder.encodeSingle(1, 'WHITE')).toEqual<DeviceStep[]>([
        { type: 'noteOff', channel: 0, note: 1, velocity: 0 },
        { type: 'noteOn', channel: 0, note: 1, velocity: 1 },
      ]);
    });

    it('addresses the configured channel', () => {
      const encoder = new DeviceProtocolEncoder({ channel: 9 });
      expect(messagesOf(encoder.encodeSingle(0, 'GREEN')).map(m => m.channel)).toEqual([9, 9]);
    });

    it.each([-1, 64, 2.5, Number.NaN])('rejects pad index %s', (padIndex) => {
      const encoder = new DeviceProtocolEncoder();
      expect(() => encoder.encodeSingle(padIndex, 'RED')).toThrow(InvalidPadIndexError);
    });
  });

  describe('encodeGrid', () => {
    it('sends every note-off before any note-on, separated by the batch pause', () => {
      const encoder = new DeviceProtocolEncoder();
      const colors = offGrid();
      colors[0] = 'RED';
      colors[63] = 'GREEN';

      const steps = encoder.encodeGrid(colors);
      expect(steps).toHaveLength(67);

      const offs = steps.slice(0, 64);
      expect(offs.every(step => step.type === 'noteOff')).toBe(true);
      expect(offs.map(step => (step.type === 'noteOff' ? step.note : -1))).toEqual(
        Array.from({ length: 64 }, (_, i) => Math.floor(i / 8) * 16 + (i % 8))
      );
      expect(steps[64]).toEqual({ type: 'delay', ms: 2 });
      expect(steps.slice(65)).toEqual<DeviceStep[]>([
        { type: 'noteOn', channel: 0, note: 0, velocity: 97 },
        { type: 'noteOn', channel: 0, note: 119, velocity: 81 },
      ]);
    });

    it('sends note-ons in pad order for a fully lit grid', () => {
      const encoder = new DeviceProtocolEncoder({ interMessageDelayMs: 0 });
      const steps = encoder.encodeGrid(new Array<PaletteColor>(64).fill('YELLOW'));
      expect(steps).toHaveLength(128);
      const ons = steps.slice(64);
      expect(ons.every(step => step.type === 'noteOn' && step.velocity === 17)).toBe(true);
      expect(ons[8]).toEqual({ type: 'noteOn', channel: 0, note: 16, velocity: 17 });
    });

    it('sends only note-offs and the pause for an all-OFF grid', () => {
      const encoder = new DeviceProtocolEncoder();
      const steps = encoder.encodeGrid(offGrid());
      expect(steps).toHaveLength(65);
      expect(messagesOf(steps).every(m => m.type === 'noteOff')).toBe(true);
    });

    it('rejects lists that are not 64 long', () => {
      const encoder = new DeviceProtocolEncoder();
      expect(() => encoder.encodeGrid(new Array<string>(63).fill('RED'))).toThrow(InvalidGridLengthError);
      expect(() => encoder.encodeGrid([])).toThrow('Invalid grid length 0: expected 64 colours');
    });
  });

  describe('encodeClear', () => {
    it('matches encoding an all-OFF grid', () => {
      const encoder = new DeviceProtocolEncoder();
      expect(encoder.encodeClear()).toEqual(encoder.encodeGrid(ALL_OFF_GRID));
    });
  });

  describe('options', () => {
    it('doubles the inter-message delay for the grid batch pause', () => {
      expect(new DeviceProtocolEncoder({ interMessageDelayMs: 3 }).gridBatchDelayMs).toBe(6);
    });

    it('rejects an invalid channel or delay', () => {
      expect(() => new DeviceProtocolEncoder({ channel: 16 })).toThrow(RangeError);
      expect(() => new DeviceProtocolEncoder({ interMessageDelayMs: -1 })).toThrow(RangeError);
    });
  });
});
