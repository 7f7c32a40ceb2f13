/**
 * In-process stand-in for a MIDI output transport.
 * Records every message and can be told to fail.
 */
import type { DeviceMessage, MidiOutputHandle, MidiTransport } from '../../types/device';
import { DeviceDisconnectedError } from '../DeviceSession';

export class FakeOutputHandle implements MidiOutputHandle {
  readonly sent: DeviceMessage[] = [];
  closed = false;
  closeCount = 0;
  /** Thrown (once) by the next send() */
  sendError: unknown = null;

  send(message: DeviceMessage): void {
    if (this.closed) throw new DeviceDisconnectedError('Port is closed');
    if (this.sendError !== null) {
      const error = this.sendError;
      this.sendError = null;
      throw error;
    }
    this.sent.push(message);
  }

  close(): void {
    this.closed = true;
    this.closeCount++;
  }
}

export class FakeTransport implements MidiTransport {
  readonly handles = new Map<string, FakeOutputHandle>();
  readonly opened: string[] = [];
  /** Thrown by the next open() */
  openError: unknown = null;

  constructor(public ports: string[] = ['SmartPad MIDI 1']) {}

  listAvailableAddresses(): string[] {
    return [...this.ports];
  }

  open(address: string): FakeOutputHandle {
    if (this.openError !== null) {
      const error = this.openError;
      this.openError = null;
      throw error;
    }
    if (!this.ports.includes(address)) {
      throw new Error(`No such port: ${address}`);
    }
    const handle = new FakeOutputHandle();
    this.handles.set(address, handle);
    this.opened.push(address);
    return handle;
  }

  handleFor(address: string): FakeOutputHandle {
    const handle = this.handles.get(address);
    if (!handle) throw new Error(`Port ${address} was never opened`);
    return handle;
  }
}

export const noSleep = (): Promise<void> => Promise.resolve();
