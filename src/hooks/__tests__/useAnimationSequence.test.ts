// @vitest-environment jsdom
import { describe, it, expect } from 'vitest';
import { act, renderHook } from '@testing-library/react';
import { AnimationSequence } from '../../engine/animationSequence';
import { useAnimationSequence } from '../useAnimationSequence';

describe('useAnimationSequence', () => {
  it('reflects the sequence state on first render', () => {
    const sequence = new AnimationSequence('Hooked');
    const { result } = renderHook(() => useAnimationSequence(sequence));

    expect(result.current).toEqual({
      revision: 0,
      name: 'Hooked',
      frameDelayMs: 200,
      loop: true,
      frameCount: 0,
      editFrameIndex: -1,
      playbackState: 'stopped',
      playbackIndex: 0,
      isModified: false,
    });
  });

  it('re-renders with a new snapshot after edits', () => {
    const sequence = new AnimationSequence('Hooked');
    const { result } = renderHook(() => useAnimationSequence(sequence));

    act(() => {
      sequence.addFrame();
      sequence.addFrame();
      sequence.setEditFrameIndex(0);
    });

    expect(result.current.frameCount).toBe(2);
    expect(result.current.editFrameIndex).toBe(0);
    expect(result.current.isModified).toBe(true);
    expect(result.current.revision).toBe(sequence.revision);
  });

  it('follows playback steps', () => {
    const sequence = new AnimationSequence('Hooked');
    sequence.addFrame();
    sequence.addFrame();
    const { result } = renderHook(() => useAnimationSequence(sequence));

    act(() => {
      sequence.start(0);
      sequence.advance();
    });
    expect(result.current.playbackState).toBe('playing');
    expect(result.current.playbackIndex).toBe(1);
  });

  it('keeps the same snapshot object while nothing changes', () => {
    const sequence = new AnimationSequence('Hooked');
    const { result, rerender } = renderHook(() => useAnimationSequence(sequence));
    const first = result.current;
    rerender();
    expect(result.current).toBe(first);
  });
});
