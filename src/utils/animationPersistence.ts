/**
 * Animation persistence utilities for saving and loading sequences as JSON files.
 *
 * File shape: { name, frame_delay_ms, loop, frames: [[64 colour names], ...] }
 */

import { mkdir, readFile, readdir, unlink, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { AnimationSequence } from '../engine/animationSequence';
import { isNotFoundError, sanitizeFileKey } from './fileNames';

const ANIMATION_EXTENSION = '.json';

/**
 * Writes the sequence to disk with canonical colour names and marks it saved.
 *
 * @returns false when the file could not be written; the sequence stays modified
 */
export async function saveAnimationFile(sequence: AnimationSequence, filePath: string): Promise<boolean> {
  try {
    const json = JSON.stringify(sequence.toDict(), null, 4);
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(filePath, json, 'utf8');
    sequence.markSaved(filePath);
    console.log(`[AnimationPersistence] Saved '${sequence.name}' to ${filePath}`);
    return true;
  } catch (err) {
    console.error(`[AnimationPersistence] Failed to save animation to ${filePath}:`, err);
    return false;
  }
}

/**
 * Parses an animation file into a fresh sequence.
 *
 * @returns null on I/O errors, malformed JSON, or JSON that is not an object
 */
export async function readAnimationFile(filePath: string): Promise<AnimationSequence | null> {
  let parsed: unknown;
  try {
    const text = await readFile(filePath, 'utf8');
    parsed = JSON.parse(text);
  } catch (err) {
    console.error(`[AnimationPersistence] Failed to read animation from ${filePath}:`, err);
    return null;
  }
  return AnimationSequence.fromDict(parsed);
}

/**
 * Replaces the contents of `sequence` with the animation stored at `filePath`.
 * On failure the sequence is left exactly as it was.
 */
export async function loadAnimationFile(sequence: AnimationSequence, filePath: string): Promise<boolean> {
  const loaded = await readAnimationFile(filePath);
  if (!loaded) return false;
  sequence.replaceWith(loaded, filePath);
  console.log(`[AnimationPersistence] Loaded '${sequence.name}' (${sequence.frameCount} frames) from ${filePath}`);
  return true;
}

/**
 * Path an animation with this name is saved under inside `directory`.
 */
export function animationFilePath(directory: string, name: string): string {
  return join(directory, `${sanitizeFileKey(name)}${ANIMATION_EXTENSION}`);
}

/**
 * Base names (without extension) of the animation files in a directory, sorted.
 * A missing directory has no animations.
 */
export async function listAnimationFiles(directory: string): Promise<string[]> {
  try {
    const entries = await readdir(directory);
    return entries
      .filter(entry => entry.endsWith(ANIMATION_EXTENSION))
      .map(entry => entry.slice(0, -ANIMATION_EXTENSION.length))
      .sort();
  } catch (err) {
    if (isNotFoundError(err)) return [];
    console.error(`[AnimationPersistence] Failed to list animations in ${directory}:`, err);
    return [];
  }
}

/**
 * Deletes an animation file. A file that does not exist counts as deleted.
 */
export async function deleteAnimationFile(filePath: string): Promise<boolean> {
  try {
    await unlink(filePath);
    return true;
  } catch (err) {
    if (isNotFoundError(err)) return true;
    console.error(`[AnimationPersistence] Failed to delete ${filePath}:`, err);
    return false;
  }
}
