/**
 * @fileoverview ClipboardEntry factory
 * @module data/ClipboardEntry
 */

import type { ClipboardEntry } from '../types';

/**
 * Create a frozen entry for captured text.
 * Every call produces a distinct object, so a register holding a copy of a
 * history entry never aliases the history slot.
 *
 * @param text - Captured text
 * @param createdAt - Capture time, defaults to now
 */
export function createClipboardEntry(text: string, createdAt: number = Date.now()): ClipboardEntry {
  return Object.freeze({ text, createdAt });
}
