/**
 * DeviceSession
 *
 * Owns the single open output port to the pad device and plays encoded step
 * batches into it. Nothing else holds the raw handle.
 *
 * Transport failures never escape this class: they are logged, published as
 * 'error' events, and (for connection-loss failures) move the session to
 * disconnected. Batches are delivered one at a time in call order, so two
 * quick edits never interleave their note-off/note-on pairs.
 */
import { settleDelayFor } from '../config/deviceConfig';
import { DeviceProtocolEncoder } from '../engine/deviceProtocol';
import type {
  DeviceSessionEvent,
  DeviceSessionListener,
  DeviceStep,
  MidiOutputHandle,
  MidiTransport,
  PortSelector,
} from '../types/device';
import { createKeywordPortSelector } from './portSelection';

/**
 * Thrown by transports when the device went away (unplugged, port vanished).
 */
export class DeviceDisconnectedError extends Error {
  constructor(message = 'Device disconnected') {
    super(message);
    this.name = 'DeviceDisconnectedError';
  }
}

/** System error codes that mean the port is gone rather than a single message failed. */
const CONNECTION_LOST_CODES = new Set(['ENODEV', 'EPIPE', 'ECONNRESET', 'ENXIO']);

export function isConnectionLostError(error: unknown): boolean {
  if (error instanceof DeviceDisconnectedError) return true;
  return error instanceof Error
    && 'code' in error
    && typeof error.code === 'string'
    && CONNECTION_LOST_CODES.has(error.code);
}

const isClosed = (h: MidiOutputHandle): boolean => h.closed === true;

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export interface DeviceSessionOptions {
  encoder: DeviceProtocolEncoder;
  /** Picks the device port when connect() is called without an address */
  portSelector: PortSelector;
  /** Wait after the final clear and before closing the port */
  settleDelayMs: number;
  /** Used for delay steps and the settle wait */
  sleep: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise(resolve => {
    setTimeout(resolve, ms);
  });

export class DeviceSession {
  readonly encoder: DeviceProtocolEncoder;
  private readonly portSelector: PortSelector;
  private readonly settleDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  private handle: MidiOutputHandle | null = null;
  private address: string | null = null;
  private queue: Promise<void> = Promise.resolve();
  private readonly listeners = new Set<DeviceSessionListener>();

  constructor(private readonly transport: MidiTransport, options: Partial<DeviceSessionOptions> = {}) {
    this.encoder = options.encoder ?? new DeviceProtocolEncoder();
    this.portSelector = options.portSelector ?? createKeywordPortSelector();
    this.settleDelayMs = options.settleDelayMs ?? settleDelayFor(this.encoder.options.interMessageDelayMs);
    this.sleep = options.sleep ?? defaultSleep;
  }

  // ==========================================================================
  // Events
  // ==========================================================================

  subscribe(listener: DeviceSessionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private emit(event: DeviceSessionEvent): void {
    this.listeners.forEach(listener => listener(event));
  }

  private reportError(message: string, error?: unknown): void {
    console.error(`[DeviceSession] ${message}`, error ?? '');
    this.emit({ type: 'error', message });
  }

  // ==========================================================================
  // Connection
  // ==========================================================================

  isConnected(): boolean {
    return this.handle !== null && this.handle.closed !== true;
  }

  /** Port the session is connected to, or null. */
  get connectedAddress(): string | null {
    return this.isConnected() ? this.address : null;
  }

  /**
   * Opens the device port and resets every pad to OFF.
   *
   * Without an address the port selector picks one from the transport's list.
   * Connecting to the port already open is a no-op success; connecting to a
   * different one closes the current port cleanly first.
   *
   * @returns true when connected afterwards
   */
  connect(address?: string): Promise<boolean> {
    return this.enqueue(() => this.performConnect(address));
  }

  /**
   * Closes the port. With `clearFirst` every pad is turned off and the
   * transport gets the settle delay before the port closes, so the off batch
   * is not cut short.
   */
  disconnect(clearFirst = true): Promise<void> {
    return this.enqueue(() => this.performDisconnect(clearFirst));
  }

  private async performConnect(address?: string): Promise<boolean> {
    const target = address ?? await this.selectPort();
    if (target === null) return false;

    if (this.isConnected()) {
      if (target === this.address) {
        this.emit({ type: 'connectionChanged', connected: true, message: `Already connected to ${target}` });
        return true;
      }
      await this.performDisconnect(true);
    }

    let handle: MidiOutputHandle;
    try {
      handle = await this.transport.open(target);
    } catch (error) {
      this.handle = null;
      this.address = null;
      this.reportError(`Failed to open ${target}: ${describeError(error)}`, error);
      this.emit({ type: 'connectionChanged', connected: false, message: `Failed to open ${target}` });
      return false;
    }

    this.handle = handle;
    this.address = target;
    console.log(`[DeviceSession] Opened MIDI port: ${target}`);
    this.emit({ type: 'connectionChanged', connected: true, message: target });

    await this.deliver(this.encoder.encodeClear());
    return this.isConnected();
  }

  private async selectPort(): Promise<string | null> {
    let available: string[];
    try {
      available = await this.transport.listAvailableAddresses();
    } catch (error) {
      this.failSelection(`MIDI port discovery failed: ${describeError(error)}`, error);
      return null;
    }

    if (available.length === 0) {
      this.failSelection('No MIDI output ports found.');
      return null;
    }

    const selected = this.portSelector(available);
    if (selected === null) {
      this.failSelection('Device port not found automatically. Please select one manually.');
      return null;
    }
    console.log(`[DeviceSession] Selected port: ${selected}`, { available });
    return selected;
  }

  private failSelection(message: string, error?: unknown): void {
    this.reportError(message, error);
    if (!this.isConnected()) {
      this.emit({ type: 'connectionChanged', connected: false, message });
    }
  }

  private async performDisconnect(clearFirst: boolean): Promise<void> {
    const handle = this.handle;
    const address = this.address;

    if (handle) {
      if (clearFirst && this.isConnected()) {
        console.log('[DeviceSession] Turning all pads off before closing');
        await this.deliver(this.encoder.encodeClear());
        await this.sleep(this.settleDelayMs);
      }
      // A connection lost during the final clear has already been torn down.
      if (this.handle !== handle) return;
      await this.closeHandle(handle, address);
    }

    this.handle = null;
    this.address = null;
    this.emit({
      type: 'connectionChanged',
      connected: false,
      message: address ? `Disconnected from ${address}` : 'Disconnected',
    });
  }

  private async closeHandle(handle: MidiOutputHandle, address: string | null): Promise<void> {
    try {
      await handle.close();
      console.log(`[DeviceSession] MIDI port ${address ?? ''} closed`);
    } catch (error) {
      this.reportError(`Error closing MIDI port ${address ?? ''}: ${describeError(error)}`, error);
    }
  }

  /**
   * Tears the connection down after a connection-loss failure.
   */
  private async dropConnection(handle: MidiOutputHandle, reason: string): Promise<void> {
    const address = this.address;
    this.handle = null;
    this.address = null;
    if (handle.closed !== true) {
      await this.closeHandle(handle, address);
    }
    this.emit({ type: 'connectionChanged', connected: false, message: reason });
  }

  // ==========================================================================
  // Sending
  // ==========================================================================

  /**
   * Plays a batch of steps into the device in order, honouring delay steps.
   *
   * Never rejects. A failed message is reported and the rest of the batch is
   * still sent, unless the failure means the device is gone, in which case
   * the session disconnects and the batch is abandoned.
   *
   * @returns true when every message was handed to the transport
   */
  send(steps: readonly DeviceStep[]): Promise<boolean> {
    return this.enqueue(() => this.deliver(steps));
  }

  /** Shows one colour on one pad. Invalid pad indices are reported, not thrown. */
  sendPad(padIndex: number, color: string): Promise<boolean> {
    let steps: DeviceStep[];
    try {
      steps = this.encoder.encodeSingle(padIndex, color);
    } catch (error) {
      console.warn(`[DeviceSession] ${describeError(error)}`);
      return Promise.resolve(false);
    }
    return this.send(steps);
  }

  /** Shows a full 64-colour frame. Wrong-length lists are reported, not thrown. */
  sendGrid(colors: readonly string[]): Promise<boolean> {
    let steps: DeviceStep[];
    try {
      steps = this.encoder.encodeGrid(colors);
    } catch (error) {
      console.warn(`[DeviceSession] ${describeError(error)}`);
      return Promise.resolve(false);
    }
    return this.send(steps);
  }

  /** Turns every pad off. */
  clearDevice(): Promise<boolean> {
    return this.send(this.encoder.encodeClear());
  }

  private async deliver(steps: readonly DeviceStep[]): Promise<boolean> {
    const handle = this.handle;
    if (!handle || !this.isConnected()) return false;

    let allSent = true;
    for (const step of steps) {
      if (this.handle !== handle || handle.closed === true) {
        if (this.handle === handle) {
          await this.dropConnection(handle, 'Device connection lost');
        }
        return false;
      }
      if (step.type === 'delay') {
        await this.sleep(step.ms);
        continue;
      }
      try {
        await handle.send(step);
      } catch (error) {
        allSent = false;
        this.reportError(`MIDI send error (${step.type} ${step.note}): ${describeError(error)}`, error);
        if (isConnectionLostError(error) || isClosed(handle)) {
          await this.dropConnection(handle, 'Device connection lost');
          return false;
        }
      }
    }
    return allSent;
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const result = this.queue.then(task);
    this.queue = result.then(
      () => undefined,
      (error: unknown) => {
        console.error('[DeviceSession] Unexpected failure in queued task', error);
      }
    );
    return result;
  }
}
