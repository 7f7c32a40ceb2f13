/**
 * Device transport types.
 *
 * The core never talks to a MIDI library directly. A host supplies a
 * MidiTransport (port listing and opening) and the core drives the handle it
 * returns.
 *
 * TERMINOLOGY:
 * - Address: The MIDI note number of a Pad on the device
 * - Intensity code: The note-on velocity that selects a palette colour (0 = off)
 */

/**
 * DeviceMessage: A single addressed on/off event sent to the device.
 */
export type DeviceMessage =
  | { type: 'noteOff'; channel: number; note: number; velocity: 0 }
  | { type: 'noteOn'; channel: number; note: number; velocity: number };

/**
 * DelayStep: A mandatory pause between two messages of the same batch.
 * Executed by DeviceSession; never forwarded to the transport.
 */
export interface DelayStep {
  type: 'delay';
  ms: number;
}

/**
 * DeviceStep: One entry of an encoded batch, in the order it must reach the device.
 */
export type DeviceStep = DeviceMessage | DelayStep;

/**
 * MidiOutputHandle: An open output port.
 */
export interface MidiOutputHandle {
  send(message: DeviceMessage): void | Promise<void>;
  close(): void | Promise<void>;
  /** Set by transports that can observe the port going away */
  readonly closed?: boolean;
}

/**
 * MidiTransport: Port discovery and opening, implemented by the host.
 */
export interface MidiTransport {
  listAvailableAddresses(): string[] | Promise<string[]>;
  open(address: string): MidiOutputHandle | Promise<MidiOutputHandle>;
}

/**
 * PortSelector: Picks the device's port out of the available output names.
 * Returns null when nothing suitable is found.
 */
export type PortSelector = (available: readonly string[]) => string | null;

/**
 * DeviceSessionEvent: Notifications published by DeviceSession.
 */
export type DeviceSessionEvent =
  /** `message` is the port name on connect, or a human-readable reason otherwise */
  | { type: 'connectionChanged'; connected: boolean; message: string }
  | { type: 'error'; message: string };

export type DeviceSessionListener = (event: DeviceSessionEvent) => void;
