/**
 * @fileoverview IClipboardManager Interface
 * @module services/interfaces/IClipboardManager
 *
 * Public API of the clipboard engine, as bound to user commands.
 * Commands depend on this interface so they can be tested against mocks.
 */

import type { BehaviorSubject, Observable } from 'rxjs';
import type {
    CaptureEvent,
    ClipboardEntry,
    ClipboardState,
    HistoryDisplayItem,
    PasteOptions,
    PasteResult,
    RegisterDisplayItem,
    RegisterGroup,
} from '../../types';

/**
 * ClipboardManager Interface
 *
 * "No entry" results are null. Invalid register keys throw
 * InvalidRegisterKeyError; clipboard failures throw ClipboardSyncError.
 */
export interface IClipboardManager {
    /** Snapshot of history, registers and yank state */
    readonly state$: BehaviorSubject<ClipboardState>;

    /** Every capture (copy, cut or external) */
    readonly captures$: Observable<CaptureEvent>;

    // --- capture ---

    /**
     * Record a copy and mirror it to the clipboard
     * @returns The history (or yank) entry, or null when an empty copy is ignored
     */
    copy(selectedText: string): ClipboardEntry | null;

    /**
     * Same as copy(); the host deletes the selection
     */
    cut(selectedText: string): ClipboardEntry | null;

    /**
     * Record text another application put on the clipboard, without writing back
     */
    captureExternal(text: string): ClipboardEntry | null;

    // --- history ---

    /** Current history entry, re-mirrored; `pop` then removes it from the history */
    pasteCurrent(options?: PasteOptions): PasteResult | null;

    /** Move toward newest, mirror, return */
    nextAndGetText(options?: PasteOptions): PasteResult | null;

    /** Move toward oldest, mirror, return */
    previousAndGetText(options?: PasteOptions): PasteResult | null;

    /** Jump to newest, mirror, return */
    newestAndGetText(options?: PasteOptions): PasteResult | null;

    /** Jump to oldest, mirror, return */
    oldestAndGetText(options?: PasteOptions): PasteResult | null;

    /** Select a buffer index (as listed by describeHistory), mirror, return; honours `pop` */
    selectAndGetText(index: number, options?: PasteOptions): PasteResult | null;

    /** Drop every history entry */
    clearHistory(): void;

    // --- registers ---

    /** Store text in a register and mirror it */
    copyToRegister(key: string, selectedText: string): ClipboardEntry;

    /** Read a register and mirror it; null when the key was never set */
    pasteFromRegister(key: string, options?: PasteOptions): PasteResult | null;

    /** Copy the current history entry into a register by value */
    storeCurrentInRegister(key: string): ClipboardEntry | null;

    /** Remove a group of registers, returning how many were removed */
    resetRegisters(group?: RegisterGroup): number;

    // --- yank ---

    /** Flip yank mode, returning the new mode */
    toggleYankMode(): boolean;

    isYankMode(): boolean;

    /** Consume the oldest queued copy and mirror it */
    yank(options?: PasteOptions): PasteResult | null;

    clearYankStack(): void;

    // --- display ---

    describeHistory(): HistoryDisplayItem[];
    describeRegisters(): RegisterDisplayItem[];
    describeYankStack(): HistoryDisplayItem[];

    /** Text most recently written to (or observed on) the clipboard */
    getLastMirrored(): string | null;
}
