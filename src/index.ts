/**
 * @fileoverview Clip History - public API
 * @module clip-history
 *
 * A clipboard-history engine: a bounded, navigable record of copied text,
 * named single-character registers and a yank stack, kept in step with one
 * external clipboard slot.
 */

// Types
export type {
  ClipboardEntry,
  PasteOptions,
  PasteResult,
  CursorState,
  HistoryDisplayItem,
  RegisterDisplayItem,
  RegisterGroup,
  CaptureKind,
  CaptureEvent,
  ClipboardState,
} from './types';

// Core
export {
  DEFAULT_MAX_HISTORY,
  PREVIEW_LENGTH,
  REGISTER_GROUPS,
  REGISTER_GROUP_NAMES,
  PANEL_TITLES,
} from './core/Constants';
export {
  InvalidRegisterKeyError,
  ClipboardSyncError,
  isValidRegisterKey,
  assertRegisterKey,
} from './core/errors';
export {
  ClipboardSettings,
  DEFAULT_SETTINGS,
  sanitizeSettings,
  type ClipboardSettingsConfig,
} from './core/ClipboardSettings';
export {
  previewText,
  formatStatusMessage,
  formatHistoryPanel,
  formatRegisterPanel,
} from './core/formatting';

// Data
export { createClipboardEntry } from './data/ClipboardEntry';
export { HistoryBuffer, type HistoryBufferOptions } from './data/HistoryBuffer';
export { RegisterStore } from './data/RegisterStore';
export { YankStack } from './data/YankStack';

// Services
export * from './services';

// Commands
export * from './commands';
