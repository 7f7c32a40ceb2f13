/**
 * Port selection strategies for DeviceSession.
 */
import { DEFAULT_PORT_KEYWORDS } from '../config/deviceConfig';
import type { PortSelector } from '../types/device';

/**
 * Picks the first available port whose name contains any of the keywords
 * (case-insensitive). Ports are tried in the order the transport lists them.
 *
 * @example createKeywordPortSelector(['smartpad'])(['IAC Bus', 'SmartPad MIDI 1']) // 'SmartPad MIDI 1'
 */
export function createKeywordPortSelector(keywords: readonly string[] = DEFAULT_PORT_KEYWORDS): PortSelector {
  const needles = keywords.map(k => k.toLowerCase()).filter(k => k.length > 0);
  return (available) => {
    const match = available.find(name => {
      const haystack = name.toLowerCase();
      return needles.some(needle => haystack.includes(needle));
    });
    return match ?? null;
  };
}

