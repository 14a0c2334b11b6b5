/**
 * @fileoverview Text formatting for status messages and display panels
 * @module core/formatting
 */

import { PREVIEW_LENGTH } from './Constants';
import type { HistoryDisplayItem, RegisterDisplayItem } from '../types';

/**
 * Single-line preview for quick-panel rows.
 * Newlines become a literal `\n`; the result is cut at `maxLength`.
 */
export function previewText(text: string, maxLength: number = PREVIEW_LENGTH): string {
  return text.replace(/\n/g, '\\n').slice(0, maxLength);
}

/**
 * Status-bar message for the entry the cursor moved to
 */
export function formatStatusMessage(text: string): string {
  const escaped = text
    .replace(/\t/g, '\\t')
    .replace(/\n/g, '\\n')
    .replace(/\r/g, '\\r');
  return `Set Clipboard to "${escaped}"`;
}

function normalizeLineEndings(text: string): string {
  return text.replace(/\t/g, '\\t').replace(/\r\n/g, '\n').replace(/\r/g, '\n');
}

function rule(width: number, count: number): string {
  return '='.repeat(width + String(count).length + 2);
}

/**
 * Render the history (or yank) output panel.
 * Rows are expected newest first, as listForDisplay() returns them.
 *
 * @example
 * ```
 *  CLIPBOARD HISTORY (2)
 * =======================
 * -->   1. baz
 *       2. bar
 * ```
 */
export function formatHistoryPanel(items: readonly HistoryDisplayItem[], title: string): string {
  let out = ` ${title} HISTORY (${items.length})\n`;
  out += `${rule(20, items.length)}\n`;

  items.forEach((item, i) => {
    const marker = item.isCurrent ? '--> ' : '    ';
    const number = String(i + 1).slice(-3).padStart(3);
    const body = normalizeLineEndings(item.text).replace(/\n/g, '\n       > ');
    out += `${marker}${number}. ${body}\n`;
  });

  return out;
}

/**
 * Render the register output panel
 */
export function formatRegisterPanel(items: readonly RegisterDisplayItem[]): string {
  let out = ` CLIPBOARD REGISTERS (${items.length})\n`;
  out += `${rule(21, items.length)}\n`;

  for (const item of items) {
    const body = normalizeLineEndings(item.text).replace(/\n/g, '\n > ');
    out += `${item.key}: ${body}\n`;
  }

  return out;
}
