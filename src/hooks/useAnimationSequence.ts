/**
 * Animation Sequence Hook
 *
 * Exposes an AnimationSequence to React components as an immutable snapshot
 * that re-renders on every change event (frame edits, cursor moves, playback
 * steps, property changes).
 */

import { useCallback, useRef, useSyncExternalStore } from 'react';
import type { AnimationSequence } from '../engine/animationSequence';
import type { PlaybackState } from '../types/animation';

export interface AnimationSequenceSnapshot {
  /** Sequence revision the snapshot was taken at */
  revision: number;
  name: string;
  frameDelayMs: number;
  loop: boolean;
  frameCount: number;
  /** -1 when no frame is selected */
  editFrameIndex: number;
  playbackState: PlaybackState;
  /** Frame the next playback step shows */
  playbackIndex: number;
  /** Unsaved changes since the last new/load/save */
  isModified: boolean;
}

function takeSnapshot(sequence: AnimationSequence): AnimationSequenceSnapshot {
  return {
    revision: sequence.revision,
    name: sequence.name,
    frameDelayMs: sequence.frameDelayMs,
    loop: sequence.loop,
    frameCount: sequence.frameCount,
    editFrameIndex: sequence.editFrameIndex,
    playbackState: sequence.playbackState,
    playbackIndex: sequence.playbackIndex,
    isModified: sequence.isModified,
  };
}

export function useAnimationSequence(sequence: AnimationSequence): AnimationSequenceSnapshot {
  // useSyncExternalStore needs the same object back until something changes.
  const cacheRef = useRef<{ sequence: AnimationSequence; snapshot: AnimationSequenceSnapshot } | null>(null);

  const subscribe = useCallback(
    (onStoreChange: () => void) => sequence.subscribe(() => onStoreChange()),
    [sequence]
  );

  const getSnapshot = useCallback((): AnimationSequenceSnapshot => {
    const cached = cacheRef.current;
    if (cached && cached.sequence === sequence && cached.snapshot.revision === sequence.revision) {
      return cached.snapshot;
    }
    const snapshot = takeSnapshot(sequence);
    cacheRef.current = { sequence, snapshot };
    return snapshot;
  }, [sequence]);

  return useSyncExternalStore(subscribe, getSnapshot, getSnapshot);
}
