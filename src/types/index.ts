// =============================================================================
// CORE TYPES - Clip History
// =============================================================================

/**
 * One captured clipboard fragment.
 * Entries are frozen on creation and never mutated afterwards.
 */
export interface ClipboardEntry {
  /** Captured text */
  readonly text: string;
  /** Capture time in epoch milliseconds (display and tie-breaks only) */
  readonly createdAt: number;
}

/**
 * Options threaded through to the host's paste routine.
 * The engine never indents anything itself.
 */
export interface PasteOptions {
  /** Ask the host to use its indent-aware paste (default: false) */
  indent?: boolean;
  /**
   * Remove the pasted entry from the history afterwards (default: false).
   * Honoured by pasteCurrent and selectAndGetText.
   */
  pop?: boolean;
}

/**
 * Text handed back to the host for insertion or display
 */
export interface PasteResult {
  text: string;
  indent: boolean;
}

/**
 * Position of the history cursor.
 * A buffer holding a single entry reports `atNewest`.
 */
export type CursorState =
  | { kind: 'empty' }
  | { kind: 'atNewest'; index: number }
  | { kind: 'atOlder'; index: number }
  | { kind: 'atOldest'; index: number };

/**
 * Row of the history (or yank) display projection
 */
export interface HistoryDisplayItem {
  /** Buffer index, 0 = oldest. Pass to selectAndGetText() to choose the row. */
  index: number;
  /** Single-line, truncated preview */
  preview: string;
  /** Full entry text, for panels that render it */
  text: string;
  /** True for the row under the cursor */
  isCurrent: boolean;
}

/**
 * Row of the register display projection
 */
export interface RegisterDisplayItem {
  key: string;
  preview: string;
  text: string;
}

/**
 * Register groups that can be reset together.
 * `all` also removes keys outside the three named groups.
 */
export type RegisterGroup = 'numbers' | 'lowercase' | 'uppercase' | 'all';

/**
 * Whether a capture came from a copy or a cut
 */
export type CaptureKind = 'copy' | 'cut' | 'external';

/**
 * Emitted by ClipboardManager whenever text is captured
 */
export interface CaptureEvent {
  kind: CaptureKind;
  entry: ClipboardEntry;
  /** False when the capture went to the yank stack only */
  addedToHistory: boolean;
}

/**
 * Snapshot of the engine published on ClipboardManager.state$
 */
export interface ClipboardState {
  historySize: number;
  cursor: CursorState;
  currentText: string | null;
  registerCount: number;
  yankMode: boolean;
  yankSize: number;
}

/**
 * Callback function type
 */
export type Callback<T = void> = (value: T) => void;
