/**
 * @fileoverview Yank stack - copies queued for consuming paste
 * @module data/YankStack
 *
 * While yank mode is on, every copy is also queued here. yank() hands the
 * entries back oldest first and removes them, so a run of copies can be
 * pasted elsewhere in the order it was taken. Once full, the oldest queued
 * entry is dropped.
 */

import type { ClipboardEntry, HistoryDisplayItem } from '../types';
import { DEFAULT_MAX_HISTORY } from '../core/Constants';
import { previewText } from '../core/formatting';
import { assertCapacity } from './HistoryBuffer';
import { createClipboardEntry } from './ClipboardEntry';

export class YankStack {
  /** Most-recent-last */
  private entries: ClipboardEntry[] = [];
  private capacity: number;

  constructor(capacity: number = DEFAULT_MAX_HISTORY) {
    assertCapacity(capacity);
    this.capacity = capacity;
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Queue text. Identical text to the newest queued entry is not queued twice.
   */
  push(text: string): ClipboardEntry {
    const newest = this.entries[this.entries.length - 1];
    if (newest && newest.text === text) {
      return newest;
    }

    const entry = createClipboardEntry(text);
    this.entries.push(entry);
    this.trim();
    return entry;
  }

  /**
   * Change the capacity, dropping the oldest queued entries if needed
   */
  setCapacity(capacity: number): void {
    assertCapacity(capacity);
    this.capacity = capacity;
    this.trim();
  }

  private trim(): void {
    if (this.entries.length > this.capacity) {
      this.entries.splice(0, this.entries.length - this.capacity);
    }
  }

  /**
   * Remove and return the oldest queued entry
   */
  yank(): ClipboardEntry | null {
    return this.entries.shift() ?? null;
  }

  /**
   * Oldest queued entry, without removing it
   */
  peek(): ClipboardEntry | null {
    return this.entries[0] ?? null;
  }

  clear(): void {
    this.entries = [];
  }

  /**
   * Display projection, newest first. The next entry to be yanked is marked current.
   */
  listForDisplay(): HistoryDisplayItem[] {
    const items: HistoryDisplayItem[] = [];
    for (let i = this.entries.length - 1; i >= 0; i--) {
      const text = this.entries[i].text;
      items.push({ index: i, preview: previewText(text), text, isCurrent: i === 0 });
    }
    return items;
  }
}
