/**
 * @fileoverview History buffer - bounded clipboard history with a navigation cursor
 * @module data/HistoryBuffer
 *
 * Entries are stored most-recent-last:
 * - push() appends, collapses consecutive duplicates and evicts the oldest
 *   entries once capacity is exceeded
 * - the cursor is "unset" after every push, which means it points at newest
 * - navigation clamps at both ends; there is no wraparound
 */

import type { Callback, ClipboardEntry, CursorState, HistoryDisplayItem } from '../types';
import { DEFAULT_MAX_HISTORY } from '../core/Constants';
import { previewText } from '../core/formatting';
import { createClipboardEntry } from './ClipboardEntry';

/**
 * History buffer options
 */
export interface HistoryBufferOptions {
  /** Maximum retained entries (positive integer) */
  capacity?: number;
  /** Keep identical text deeper in the buffer (default: true) */
  allowDuplicates?: boolean;
  onStateChange?: Callback<CursorState>;
}

/**
 * Throw RangeError unless the capacity is a positive integer
 */
export function assertCapacity(capacity: number): void {
  if (!Number.isInteger(capacity) || capacity < 1) {
    throw new RangeError(`History capacity must be a positive integer, got ${capacity}`);
  }
}

/**
 * Bounded, ordered clipboard history
 */
export class HistoryBuffer {
  private entries: ClipboardEntry[] = [];
  /** null = unset, i.e. at newest */
  private cursor: number | null = null;
  private capacity: number;
  private allowDuplicates: boolean;
  private options: HistoryBufferOptions;

  /**
   * @param options - Configuration
   */
  constructor(options: HistoryBufferOptions = {}) {
    this.options = options;
    this.capacity = options.capacity ?? DEFAULT_MAX_HISTORY;
    this.allowDuplicates = options.allowDuplicates ?? true;
    assertCapacity(this.capacity);
  }

  /**
   * Number of entries held
   */
  get size(): number {
    return this.entries.length;
  }

  /**
   * Current capacity
   */
  getCapacity(): number {
    return this.capacity;
  }

  /**
   * Change the capacity, evicting the oldest entries if the buffer is now too long.
   * A set cursor keeps pointing at the same entry; if that entry was evicted
   * it moves to the oldest survivor.
   */
  setCapacity(capacity: number): void {
    assertCapacity(capacity);
    this.capacity = capacity;
    if (this.entries.length > capacity) {
      const evicted = this.entries.length - capacity;
      this.entries.splice(0, evicted);
      if (this.cursor !== null) {
        this.cursor = Math.max(this.cursor - evicted, 0);
      }
      this._notifyStateChange();
    }
  }

  /**
   * Change the duplicate policy for subsequent pushes
   */
  setAllowDuplicates(allow: boolean): void {
    this.allowDuplicates = allow;
  }

  /**
   * Record captured text as the newest entry.
   *
   * If the newest entry already holds identical text, no entry is created:
   * the existing one is returned and the cursor goes back to it.
   *
   * @param text - Captured text (empty text is accepted)
   * @returns The entry now at the newest position
   */
  push(text: string): ClipboardEntry {
    const newest = this.entries[this.entries.length - 1];

    if (newest && newest.text === text) {
      this.cursor = null;
      this._notifyStateChange();
      return newest;
    }

    if (!this.allowDuplicates) {
      const existing = this.entries.findIndex(e => e.text === text);
      if (existing !== -1) {
        this.entries.splice(existing, 1);
      }
    }

    const entry = createClipboardEntry(text);
    this.entries.push(entry);

    // Limit history size
    if (this.entries.length > this.capacity) {
      this.entries.splice(0, this.entries.length - this.capacity);
    }

    this.cursor = null;
    this._notifyStateChange();
    return entry;
  }

  /**
   * Step one entry toward newest, staying put at the newest end
   * @returns The entry under the cursor, or null when empty
   */
  moveNext(): ClipboardEntry | null {
    if (this.entries.length === 0) return null;
    this.cursor = Math.min(this.cursorIndex() + 1, this.entries.length - 1);
    this._notifyStateChange();
    return this.entries[this.cursor];
  }

  /**
   * Step one entry toward oldest, staying put at the oldest end
   * @returns The entry under the cursor, or null when empty
   */
  movePrevious(): ClipboardEntry | null {
    if (this.entries.length === 0) return null;
    this.cursor = Math.max(this.cursorIndex() - 1, 0);
    this._notifyStateChange();
    return this.entries[this.cursor];
  }

  /**
   * Jump to the newest entry
   */
  moveToNewest(): ClipboardEntry | null {
    if (this.entries.length === 0) return null;
    this.cursor = null;
    this._notifyStateChange();
    return this.current();
  }

  /**
   * Jump to the oldest entry
   */
  moveToOldest(): ClipboardEntry | null {
    if (this.entries.length === 0) return null;
    this.cursor = 0;
    this._notifyStateChange();
    return this.entries[0];
  }

  /**
   * Put the cursor on a buffer index (0 = oldest).
   * Indices outside the buffer fall back to newest.
   */
  moveTo(index: number): ClipboardEntry | null {
    if (this.entries.length === 0) return null;
    this.cursor = Number.isInteger(index) && index >= 0 && index < this.entries.length
      ? index
      : null;
    this._notifyStateChange();
    return this.current();
  }

  /**
   * Delete the entry at a buffer index (0 = oldest).
   *
   * When the cursor was on the removed entry it moves to the next older one;
   * an unset cursor stays at newest.
   *
   * @returns The removed entry, or null when the index is out of range
   */
  remove(index: number): ClipboardEntry | null {
    if (!Number.isInteger(index) || index < 0 || index >= this.entries.length) {
      return null;
    }

    const [removed] = this.entries.splice(index, 1);

    if (this.entries.length === 0) {
      this.cursor = null;
    } else if (this.cursor !== null && index <= this.cursor) {
      this.cursor = Math.max(this.cursor - 1, 0);
    }

    this._notifyStateChange();
    return removed;
  }

  /**
   * Entry under the cursor, without moving it
   */
  current(): ClipboardEntry | null {
    if (this.entries.length === 0) return null;
    return this.entries[this.cursorIndex()];
  }

  /**
   * Effective cursor index (newest when unset), or -1 when empty
   */
  cursorIndex(): number {
    if (this.entries.length === 0) return -1;
    return this.cursor ?? this.entries.length - 1;
  }

  /**
   * Cursor position as a state-machine state
   */
  cursorState(): CursorState {
    if (this.entries.length === 0) return { kind: 'empty' };

    const index = this.cursorIndex();
    if (index === this.entries.length - 1) return { kind: 'atNewest', index };
    if (index === 0) return { kind: 'atOldest', index };
    return { kind: 'atOlder', index };
  }

  /**
   * Entries oldest first (copy)
   */
  getEntries(): ClipboardEntry[] {
    return [...this.entries];
  }

  /**
   * Display projection, newest first
   */
  listForDisplay(): HistoryDisplayItem[] {
    const current = this.cursorIndex();
    const items: HistoryDisplayItem[] = [];

    for (let i = this.entries.length - 1; i >= 0; i--) {
      const text = this.entries[i].text;
      items.push({ index: i, preview: previewText(text), text, isCurrent: i === current });
    }

    return items;
  }

  /**
   * Clear all entries and the cursor
   */
  reset(): void {
    this.entries = [];
    this.cursor = null;
    this._notifyStateChange();
  }

  /**
   * Notify subscribers of cursor changes
   * @private
   */
  private _notifyStateChange(): void {
    if (this.options.onStateChange) {
      this.options.onStateChange(this.cursorState());
    }
  }
}
