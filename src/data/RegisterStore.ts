/**
 * @fileoverview Register store - named single-slot clipboard storage
 * @module data/RegisterStore
 *
 * Registers live independently of the history: they are never evicted or
 * deduplicated, and writing a key always replaces its previous entry.
 * Key validation happens at the ClipboardManager boundary.
 */

import type { ClipboardEntry, RegisterDisplayItem, RegisterGroup } from '../types';
import { REGISTER_GROUPS } from '../core/Constants';
import { previewText } from '../core/formatting';

/**
 * Mapping from single-character key to one entry
 */
export class RegisterStore {
  private registers = new Map<string, ClipboardEntry>();

  get size(): number {
    return this.registers.size;
  }

  /**
   * Store an entry, replacing whatever the key held
   */
  set(key: string, entry: ClipboardEntry): void {
    this.registers.set(key, entry);
  }

  /**
   * @returns The entry for the key, or null if it was never set
   */
  get(key: string): ClipboardEntry | null {
    return this.registers.get(key) ?? null;
  }

  has(key: string): boolean {
    return this.registers.has(key);
  }

  /**
   * Remove every key of a group
   * @returns Number of registers removed
   */
  reset(group: RegisterGroup = 'all'): number {
    if (group === 'all') {
      const removed = this.registers.size;
      this.registers.clear();
      return removed;
    }

    const keys = REGISTER_GROUPS[group];
    let removed = 0;
    for (const key of [...this.registers.keys()]) {
      if (keys.includes(key)) {
        this.registers.delete(key);
        removed++;
      }
    }
    return removed;
  }

  /**
   * Display projection sorted by key (code-point order)
   */
  listForDisplay(): RegisterDisplayItem[] {
    return [...this.registers.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, entry]) => ({ key, preview: previewText(entry.text), text: entry.text }));
  }
}
