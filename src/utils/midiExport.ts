/**
 * MIDI clip export.
 *
 * Renders an animation as a Standard MIDI File whose notes light the pads:
 * every lit pad in frame N becomes a note on the pad's Address, with the
 * colour's intensity code as velocity, starting at N × frame delay and lasting
 * one frame delay. Played back from a DAW into the device, the clip replays
 * the animation.
 */
import { Midi } from '@tonejs/midi';
import type { AnimationSequence } from '../engine/animationSequence';
import { DeviceProtocolEncoder } from '../engine/deviceProtocol';
import { PadAddressMap } from '../engine/padAddressMap';
import { DEFAULT_COLOR } from '../types/palette';

/** MIDI velocities are 7-bit; @tonejs/midi takes them normalized to 0-1. */
const MAX_VELOCITY = 127;

/**
 * @param encoder - Supplies the MIDI channel written on the track
 * @returns The .mid file contents
 */
export function exportAnimationToMidi(
  sequence: AnimationSequence,
  encoder: DeviceProtocolEncoder = new DeviceProtocolEncoder()
): Uint8Array {
  const midi = new Midi();
  const track = midi.addTrack();
  track.name = sequence.name;
  track.channel = encoder.options.channel;

  const frameSeconds = sequence.frameDelayMs / 1000;
  sequence.getFrames().forEach((frame, frameIndex) => {
    frame.toColors().forEach((color, padIndex) => {
      if (color === DEFAULT_COLOR) return;
      const note = PadAddressMap.padIndexToNote(padIndex);
      if (note === null) return;
      track.addNote({
        midi: note,
        time: frameIndex * frameSeconds,
        duration: frameSeconds,
        velocity: PadAddressMap.velocityForColor(color) / MAX_VELOCITY,
      });
    });
  });

  console.log('[MidiExport] Exported animation', {
    name: sequence.name,
    frames: sequence.frameCount,
    notes: track.notes.length,
  });
  return midi.toArray();
}
