/**
 * PlaybackDriver
 *
 * The periodic timer behind animation playback. Each tick calls
 * AnimationSequence.advance() exactly once and sends the returned frame to
 * the device. The timer re-arms itself with the sequence's current frame
 * delay, so a delay change takes effect from the next tick.
 *
 * The driver follows the sequence's playback events: starting the sequence
 * (through the driver or directly) begins ticking, and pausing or stopping it
 * halts the timer. Once a non-looping sequence has shown its last frame, the
 * following tick notices playback has ended and halts.
 */
import type { AnimationSequence } from '../engine/animationSequence';
import type { AnimationEvent } from '../types/animation';
import type { DeviceSession } from './DeviceSession';

export class PlaybackDriver {
  private timer: ReturnType<typeof setTimeout> | null = null;
  private running = false;
  /** Set while the driver itself is changing playback state. */
  private ticking = false;
  private pending: Promise<void> = Promise.resolve();
  private readonly unsubscribe: () => void;

  constructor(
    private readonly sequence: AnimationSequence,
    private readonly session: DeviceSession
  ) {
    this.unsubscribe = sequence.subscribe(event => this.handleSequenceEvent(event));
  }

  /** True while the timer is armed. */
  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Starts playback on the device.
   * @returns false when the device is not connected or the sequence has no frames
   */
  play(fromIndex?: number): boolean {
    if (!this.session.isConnected()) {
      console.warn('[PlaybackDriver] Cannot start: device not connected');
      return false;
    }
    if (!this.sequence.start(fromIndex)) {
      console.warn('[PlaybackDriver] Cannot start: no frames');
      return false;
    }
    return true;
  }

  pause(): void {
    this.sequence.pause();
  }

  resume(): boolean {
    if (!this.session.isConnected()) {
      console.warn('[PlaybackDriver] Cannot resume: device not connected');
      return false;
    }
    return this.sequence.resume();
  }

  stop(): void {
    this.sequence.stop();
  }

  /**
   * Resolves once the tick (or halt) in progress has finished talking to the device.
   */
  settled(): Promise<void> {
    return this.pending;
  }

  /** Stops listening to the sequence and disarms the timer without touching the device. */
  dispose(): void {
    this.unsubscribe();
    this.disarm();
  }

  private handleSequenceEvent(event: AnimationEvent): void {
    if (event.type !== 'playbackStateChanged' || this.ticking) return;
    if (event.state === 'playing') {
      this.running = true;
      this.arm();
      console.log('[PlaybackDriver] Started', {
        fromIndex: this.sequence.playbackIndex,
        frameDelayMs: this.sequence.frameDelayMs,
      });
    } else if (this.running) {
      this.halt();
    }
  }

  private arm(): void {
    if (this.timer !== null) clearTimeout(this.timer);
    this.timer = setTimeout(() => {
      this.timer = null;
      this.pending = this.pending
        .then(() => this.tick())
        .catch((error: unknown) => {
          console.error('[PlaybackDriver] Tick failed', error);
        });
    }, this.sequence.frameDelayMs);
  }

  private disarm(): void {
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.running = false;
  }

  private async tick(): Promise<void> {
    if (!this.running) return;
    if (!this.sequence.isPlaying || !this.session.isConnected()) {
      this.ticking = true;
      this.sequence.stop();
      this.ticking = false;
      this.disarm();
      await this.restoreDisplay();
      return;
    }

    this.ticking = true;
    const colors = this.sequence.advance();
    this.ticking = false;

    if (colors) {
      await this.session.sendGrid(colors);
    }
    if (this.running) this.arm();
  }

  private halt(): void {
    this.disarm();
    this.pending = this.pending.then(() => this.restoreDisplay());
  }

  /**
   * After a stop (not a pause) the device goes back to showing the edit
   * frame, or goes dark when there is none.
   */
  private async restoreDisplay(): Promise<void> {
    console.log('[PlaybackDriver] Stopped', { state: this.sequence.playbackState });
    if (this.sequence.playbackState !== 'stopped' || !this.session.isConnected()) return;

    const editFrame = this.sequence.getEditFrame();
    if (editFrame) {
      await this.session.sendGrid(editFrame.toColors());
    } else {
      await this.session.clearDevice();
    }
  }
}
