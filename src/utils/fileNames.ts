/**
 * File-name helpers shared by the animation and layout stores.
 */

/**
 * Turns a user-facing name into a filesystem-safe, lowercase key.
 * Punctuation is dropped and runs of spaces/hyphens become a single underscore.
 *
 * @example sanitizeFileKey('My Layout!') // 'my_layout'
 * @example sanitizeFileKey('  Fire -- Works ') // 'fire_works'
 */
export function sanitizeFileKey(name: string): string {
  return name
    .trim()
    .replace(/[^\p{L}\p{N}_\s-]/gu, '')
    .replace(/[-\s]+/g, '_')
    .toLowerCase();
}

/**
 * Readable fallback for a key whose file carries no display name.
 *
 * @example keyToTitle('my_layout') // 'My Layout'
 */
export function keyToTitle(key: string): string {
  return key
    .split('_')
    .filter(word => word.length > 0)
    .map(word => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

/**
 * True for Node errors reporting a missing file or directory.
 */
export function isNotFoundError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
