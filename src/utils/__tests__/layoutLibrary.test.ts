/**
 * Tests for LayoutLibrary against a temporary storage directory.
 */

import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { PaletteColor } from '../../types/palette';
import { LayoutLibrary, sanitizeLayoutName, type LayoutLibraryEvent } from '../layoutLibrary';

function checkerboard(): PaletteColor[] {
  return Array.from({ length: 64 }, (_, i): PaletteColor => ((Math.floor(i / 8) + i) % 2 === 0 ? 'RED' : 'OFF'));
}

describe('sanitizeLayoutName', () => {
  it('drops punctuation and joins words with underscores', () => {
    expect(sanitizeLayoutName('My Layout!')).toBe('my_layout');
    expect(sanitizeLayoutName('  Fire -- Works ')).toBe('fire_works');
    expect(sanitizeLayoutName('?!')).toBe('');
  });
});

describe('LayoutLibrary', () => {
  let baseDir: string;
  let library: LayoutLibrary;
  let events: LayoutLibraryEvent[];

  beforeEach(async () => {
    baseDir = await mkdtemp(join(tmpdir(), 'pad-layouts-'));
    library = new LayoutLibrary(baseDir);
    events = [];
    library.subscribe(event => events.push(event));
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(baseDir, { recursive: true, force: true });
  });

  async function writeRawLayout(key: string, content: string): Promise<void> {
    await mkdir(library.layoutsDir, { recursive: true });
    await writeFile(join(library.layoutsDir, `${key}.json`), content, 'utf8');
  }

  it('keeps layouts in the user_static_layouts sub-directory', () => {
    expect(library.layoutsDir).toBe(join(baseDir, 'user_static_layouts'));
  });

  describe('saveLayout', () => {
    it('writes the display name and colours under the sanitized key', async () => {
      expect(await library.saveLayout('My Layout!', checkerboard())).toBe(true);
      expect(await readdir(library.layoutsDir)).toEqual(['my_layout.json']);

      const stored: unknown = JSON.parse(await readFile(join(library.layoutsDir, 'my_layout.json'), 'utf8'));
      expect(stored).toEqual({ display_name: 'My Layout!', layout_data: checkerboard() });
      expect(events).toEqual([{ type: 'layoutsChanged' }]);
    });

    it('normalizes colour names before writing', async () => {
      const colors: string[] = new Array<string>(64).fill('green');
      colors[63] = 'chartreuse';
      await library.saveLayout('Lawn', colors);

      const loaded = await library.loadLayout('Lawn');
      expect(loaded?.[0]).toBe('GREEN');
      expect(loaded?.[63]).toBe('OFF');
    });

    it('overwrites an existing layout with the same name', async () => {
      await library.saveLayout('Pattern', checkerboard());
      await library.saveLayout('pattern', new Array<PaletteColor>(64).fill('WHITE'));
      expect(await readdir(library.layoutsDir)).toEqual(['pattern.json']);
      expect(await library.loadLayout('Pattern')).toEqual(new Array<PaletteColor>(64).fill('WHITE'));
    });

    it('rejects an empty name', async () => {
      expect(await library.saveLayout('   ', checkerboard())).toBe(false);
      expect(events).toEqual([{ type: 'error', message: 'Layout name cannot be empty.' }]);
    });

    it('rejects colour lists that are not 64 long', async () => {
      expect(await library.saveLayout('Short', ['RED', 'GREEN'])).toBe(false);
      expect(events).toEqual([{ type: 'error', message: 'Invalid layout data: must be a list of 64 color names.' }]);
    });

    it('rejects a name with nothing left after sanitizing', async () => {
      expect(await library.saveLayout('!!!', checkerboard())).toBe(false);
      expect(events).toEqual([{ type: 'error', message: 'Invalid layout name after sanitization.' }]);
    });
  });

  describe('loadLayout', () => {
    it('finds a layout by any name that sanitizes to its key', async () => {
      await library.saveLayout('My Layout!', checkerboard());
      expect(await library.loadLayout('my layout!')).toEqual(checkerboard());
      expect(await library.loadLayout('my_layout')).toEqual(checkerboard());
    });

    it('finds a layout by display name when the key differs', async () => {
      await writeRawLayout('custom_key', JSON.stringify({ display_name: 'Starfield', layout_data: checkerboard() }));
      expect(await library.loadLayout('STARFIELD')).toEqual(checkerboard());
    });

    it('returns null for an unknown layout', async () => {
      expect(await library.loadLayout('Nothing Here')).toBeNull();
    });

    it('returns null for a layout with the wrong number of colours', async () => {
      await writeRawLayout('tiny', JSON.stringify({ display_name: 'Tiny', layout_data: ['RED'] }));
      expect(await library.loadLayout('Tiny')).toBeNull();
      expect(events[events.length - 1]).toEqual({
        type: 'error',
        message: `Invalid data format in layout file: ${join(library.layoutsDir, 'tiny.json')}`,
      });
    });
  });

  describe('listLayouts', () => {
    it('is empty before anything is saved', async () => {
      expect(await library.listLayouts()).toEqual([]);
    });

    it('sorts by display name and skips unreadable files', async () => {
      await library.saveLayout('zebra', checkerboard());
      await library.saveLayout('Apple', checkerboard());
      await writeRawLayout('broken', '{ not json');

      expect(await library.listLayouts()).toEqual([
        { key: 'apple', displayName: 'Apple' },
        { key: 'zebra', displayName: 'zebra' },
      ]);
      expect(await library.listLayoutNames()).toEqual(['Apple', 'zebra']);
    });

    it('titles files that carry no display name from their key', async () => {
      await writeRawLayout('night_sky', JSON.stringify({ layout_data: checkerboard() }));
      expect(await library.listLayouts()).toEqual([{ key: 'night_sky', displayName: 'Night Sky' }]);
    });
  });

  describe('deleteLayout', () => {
    it('removes the file and announces the change', async () => {
      await library.saveLayout('Temporary', checkerboard());
      events.length = 0;

      expect(await library.deleteLayout('temporary')).toBe(true);
      expect(await library.listLayouts()).toEqual([]);
      expect(events).toEqual([{ type: 'layoutsChanged' }]);
    });

    it('treats a missing layout as deleted', async () => {
      expect(await library.deleteLayout('Never Saved')).toBe(true);
      expect(events).toEqual([]);
    });
  });
});
