/**
 * @fileoverview Application-wide constants
 * @module core/Constants
 *
 * Centralized constants to eliminate magic numbers and strings.
 */

import type { RegisterGroup } from '../types';

/**
 * Default number of entries kept in the clipboard history
 */
export const DEFAULT_MAX_HISTORY = 256;

/**
 * Preview length for quick-panel rows
 */
export const PREVIEW_LENGTH = 64;

/**
 * Characters belonging to each resettable register group
 */
export const REGISTER_GROUPS: Readonly<Record<Exclude<RegisterGroup, 'all'>, string>> = Object.freeze({
  numbers: '1234567890',
  lowercase: 'abcdefghijklmnopqrstuvwxyz',
  uppercase: 'ABCDEFGHIJKLMNOPQRSTUVWXYZ',
} as const);

/**
 * Register groups accepted by resetRegisters()
 */
export const REGISTER_GROUP_NAMES: readonly RegisterGroup[] = Object.freeze([
  'numbers', 'lowercase', 'uppercase', 'all'
] as const);

/**
 * Titles used by the display panels
 */
export const PANEL_TITLES = Object.freeze({
  HISTORY: 'CLIPBOARD',
  YANK: 'YANK',
} as const);
