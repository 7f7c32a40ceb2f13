/**
 * LayoutLibrary
 *
 * Named static layouts (single 64-colour grids), one JSON file per layout:
 * { display_name, layout_data: [64 colour names] }
 *
 * Files are keyed by the sanitized display name, so "My Layout!" lives in
 * my_layout.json. Lookups accept the key, anything that sanitizes to it, or a
 * case-insensitive match on the display name.
 */

import { mkdir, readFile, readdir, unlink, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { LAYOUTS_SUBDIR, PAD_COUNT } from '../config/deviceConfig';
import type { LayoutFileData } from '../types/animation';
import { normalizeColors, type PaletteColor } from '../types/palette';
import { isNotFoundError, keyToTitle, sanitizeFileKey } from './fileNames';

export interface LayoutEntry {
  /** Sanitized name; also the file's base name */
  key: string;
  displayName: string;
}

export type LayoutLibraryEvent =
  | { type: 'layoutsChanged' }
  | { type: 'error'; message: string };

export type LayoutLibraryListener = (event: LayoutLibraryEvent) => void;

/**
 * Filesystem-safe key for a layout name.
 * @example sanitizeLayoutName('My Layout!') // 'my_layout'
 */
export const sanitizeLayoutName = sanitizeFileKey;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class LayoutLibrary {
  readonly layoutsDir: string;
  private readonly listeners = new Set<LayoutLibraryListener>();

  /**
   * @param baseStoragePath - Directory under which the layouts sub-directory is created
   */
  constructor(baseStoragePath: string) {
    this.layoutsDir = join(baseStoragePath, LAYOUTS_SUBDIR);
  }

  subscribe(listener: LayoutLibraryListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private emit(event: LayoutLibraryEvent): void {
    this.listeners.forEach(listener => listener(event));
  }

  private reportError(message: string, err?: unknown): void {
    console.error(`[LayoutLibrary] ${message}`, err ?? '');
    this.emit({ type: 'error', message });
  }

  private filePathFor(key: string): string {
    return join(this.layoutsDir, `${key}.json`);
  }

  /**
   * All readable layouts, sorted by display name. Unreadable files are skipped.
   */
  async listLayouts(): Promise<LayoutEntry[]> {
    let files: string[];
    try {
      files = await readdir(this.layoutsDir);
    } catch (err) {
      if (!isNotFoundError(err)) {
        this.reportError(`Could not list layouts in ${this.layoutsDir}`, err);
      }
      return [];
    }

    const entries: LayoutEntry[] = [];
    for (const file of files) {
      if (!file.endsWith('.json')) continue;
      const key = file.slice(0, -'.json'.length);
      try {
        const parsed: unknown = JSON.parse(await readFile(this.filePathFor(key), 'utf8'));
        const displayName = isRecord(parsed) && typeof parsed.display_name === 'string'
          ? parsed.display_name
          : keyToTitle(key);
        entries.push({ key, displayName });
      } catch (err) {
        console.warn(`[LayoutLibrary] Could not read or parse layout file ${file}; skipping`, err);
      }
    }
    return entries.sort((a, b) => a.displayName.localeCompare(b.displayName));
  }

  /** Display names of all layouts, sorted. */
  async listLayoutNames(): Promise<string[]> {
    return (await this.listLayouts()).map(entry => entry.displayName);
  }

  /**
   * Saves (or overwrites) a layout. Colour names are normalized before writing.
   *
   * @returns false for an empty name, a name with no usable characters, a
   *          colour list that is not 64 long, or a write failure
   */
  async saveLayout(displayName: string, colors: readonly unknown[]): Promise<boolean> {
    const trimmed = displayName.trim();
    if (!trimmed) {
      this.reportError('Layout name cannot be empty.');
      return false;
    }
    if (colors.length !== PAD_COUNT) {
      this.reportError(`Invalid layout data: must be a list of ${PAD_COUNT} color names.`);
      return false;
    }
    const key = sanitizeLayoutName(trimmed);
    if (!key) {
      this.reportError('Invalid layout name after sanitization.');
      return false;
    }

    const data: LayoutFileData = {
      display_name: trimmed,
      layout_data: normalizeColors(colors),
    };
    const filePath = this.filePathFor(key);
    try {
      await mkdir(this.layoutsDir, { recursive: true });
      await writeFile(filePath, JSON.stringify(data, null, 4), 'utf8');
    } catch (err) {
      this.reportError(`Error saving layout '${trimmed}' to ${filePath}`, err);
      return false;
    }
    this.emit({ type: 'layoutsChanged' });
    return true;
  }

  /**
   * Loads a layout's colours by key or display name.
   *
   * @returns The 64 normalized colours, or null if the layout is missing or malformed
   */
  async loadLayout(name: string): Promise<PaletteColor[] | null> {
    const key = await this.resolveKey(name);
    if (key === null) return null;

    const filePath = this.filePathFor(key);
    let parsed: unknown;
    try {
      parsed = JSON.parse(await readFile(filePath, 'utf8'));
    } catch (err) {
      this.reportError(`Error loading layout '${name}' from ${filePath}`, err);
      return null;
    }

    const layoutData = isRecord(parsed) ? parsed.layout_data : undefined;
    if (!Array.isArray(layoutData) || layoutData.length !== PAD_COUNT) {
      this.reportError(`Invalid data format in layout file: ${filePath}`);
      return null;
    }
    return normalizeColors(layoutData);
  }

  /**
   * Deletes a layout by key or display name. A layout that does not exist counts as deleted.
   */
  async deleteLayout(name: string): Promise<boolean> {
    const key = await this.resolveKey(name);
    if (key === null) return true;

    try {
      await unlink(this.filePathFor(key));
    } catch (err) {
      if (isNotFoundError(err)) return true;
      this.reportError(`Error deleting layout file for '${name}'`, err);
      return false;
    }
    this.emit({ type: 'layoutsChanged' });
    return true;
  }

  /**
   * Finds the file key for a name: its sanitized form if that file exists,
   * otherwise the layout whose display name matches case-insensitively.
   */
  private async resolveKey(name: string): Promise<string | null> {
    const entries = await this.listLayouts();
    const key = sanitizeLayoutName(name);
    if (key && entries.some(entry => entry.key === key)) return key;

    const wanted = name.trim().toLowerCase();
    const match = entries.find(entry => entry.displayName.toLowerCase() === wanted);
    return match ? match.key : null;
  }
}
