/**
 * @fileoverview Clipboard Manager - history, registers and clipboard mirroring
 * @module services/ClipboardManager
 *
 * Owns one HistoryBuffer, one RegisterStore and one YankStack per editing
 * context, and keeps the OS clipboard in step with the history cursor:
 * every operation that changes the current history entry writes that
 * entry's text to the clipboard port before returning.
 *
 * Registers bypass the history. They write the clipboard only when a
 * register is filled or pasted, never while navigating.
 *
 * Usage:
 * ```typescript
 * const manager = new ClipboardManager(new SystemClipboardPort());
 * manager.copy('foo');
 * manager.copy('bar');
 * manager.previousAndGetText(); // { text: 'foo', indent: false }, clipboard = 'foo'
 * ```
 */

import { BehaviorSubject, Subject, Subscription, skip } from 'rxjs';
import type {
    CaptureEvent,
    CaptureKind,
    ClipboardEntry,
    ClipboardState,
    HistoryDisplayItem,
    PasteOptions,
    PasteResult,
    RegisterDisplayItem,
    RegisterGroup,
} from '../types';
import { ClipboardSettings, type ClipboardSettingsConfig } from '../core/ClipboardSettings';
import { assertRegisterKey } from '../core/errors';
import { createClipboardEntry } from '../data/ClipboardEntry';
import { HistoryBuffer } from '../data/HistoryBuffer';
import { RegisterStore } from '../data/RegisterStore';
import { YankStack } from '../data/YankStack';
import type { IClipboardManager } from './interfaces/IClipboardManager';
import type { IClipboardSyncPort } from './interfaces/IClipboardSyncPort';

/**
 * Clipboard history engine for one editing context
 */
export class ClipboardManager implements IClipboardManager {
    public readonly state$: BehaviorSubject<ClipboardState>;

    private readonly _captures$ = new Subject<CaptureEvent>();
    public readonly captures$ = this._captures$.asObservable();

    private readonly history: HistoryBuffer;
    private readonly registers = new RegisterStore();
    private readonly yankStack: YankStack;

    private yankMode: boolean;
    private lastMirrored: string | null = null;
    private explicitYankMode: boolean;
    private settingsSubscription: Subscription;

    /**
     * @param port - Clipboard slot to mirror into
     * @param settings - Shared settings (defaults when omitted)
     */
    constructor(
        private readonly port: IClipboardSyncPort,
        private readonly settings: ClipboardSettings = new ClipboardSettings()
    ) {
        this.history = new HistoryBuffer({
            capacity: settings.get('maxHistory'),
            allowDuplicates: settings.get('allowHistoryDuplicates'),
            onStateChange: () => this._emitState(),
        });
        this.yankStack = new YankStack(settings.get('maxHistory'));
        this.explicitYankMode = settings.get('explicitYankMode');
        this.yankMode = !this.explicitYankMode;
        this.state$ = new BehaviorSubject<ClipboardState>(this.snapshot());

        this.settingsSubscription = settings.settings$
            .pipe(skip(1))
            .subscribe(cfg => this.applySettings(cfg));
    }

    // =========================================================================
    // Capture
    // =========================================================================

    copy(selectedText: string): ClipboardEntry | null {
        return this.capture('copy', selectedText);
    }

    cut(selectedText: string): ClipboardEntry | null {
        return this.capture('cut', selectedText);
    }

    captureExternal(text: string): ClipboardEntry | null {
        if (text === this.lastMirrored) return null;
        if (text === '' && this.settings.get('ignoreEmptyCopies')) return null;

        const entry = this.history.push(text);
        this.lastMirrored = text;
        this.log('Captured external clipboard change', { length: text.length });
        this._captures$.next({ kind: 'external', entry, addedToHistory: true });
        return entry;
    }

    private capture(kind: CaptureKind, text: string): ClipboardEntry | null {
        if (text === '' && this.settings.get('ignoreEmptyCopies')) {
            this.log(`Ignoring empty ${kind}`);
            return null;
        }

        let entry: ClipboardEntry | null = null;
        let addedToHistory = true;

        if (this.yankMode) {
            const queued = this.yankStack.push(text);
            // Explicit yank mode keeps the run of copies out of the history
            if (this.explicitYankMode) {
                entry = queued;
                addedToHistory = false;
                this._emitState();
            }
        }

        if (entry === null) {
            entry = this.history.push(text);
        }

        this.mirror(entry.text);
        this._captures$.next({ kind, entry, addedToHistory });
        return entry;
    }

    // =========================================================================
    // History navigation
    // =========================================================================

    pasteCurrent(options: PasteOptions = {}): PasteResult | null {
        return this.popIfRequested(this.select(this.history.current(), options), options);
    }

    nextAndGetText(options: PasteOptions = {}): PasteResult | null {
        return this.select(this.history.moveNext(), options);
    }

    previousAndGetText(options: PasteOptions = {}): PasteResult | null {
        return this.select(this.history.movePrevious(), options);
    }

    newestAndGetText(options: PasteOptions = {}): PasteResult | null {
        return this.select(this.history.moveToNewest(), options);
    }

    oldestAndGetText(options: PasteOptions = {}): PasteResult | null {
        return this.select(this.history.moveToOldest(), options);
    }

    selectAndGetText(index: number, options: PasteOptions = {}): PasteResult | null {
        return this.popIfRequested(this.select(this.history.moveTo(index), options), options);
    }

    clearHistory(): void {
        this.history.reset();
        this.log('History cleared');
    }

    private select(entry: ClipboardEntry | null, options: PasteOptions): PasteResult | null {
        if (!entry) {
            this.log('Nothing in history');
            return null;
        }

        this.mirror(entry.text);
        return this.toResult(entry, options);
    }

    /**
     * Drop the entry under the cursor after it was pasted with `pop`.
     * The clipboard keeps the popped text.
     */
    private popIfRequested(result: PasteResult | null, options: PasteOptions): PasteResult | null {
        if (result && options.pop) {
            this.history.remove(this.history.cursorIndex());
            this.log('Popped pasted entry from history');
        }
        return result;
    }

    // =========================================================================
    // Registers
    // =========================================================================

    copyToRegister(key: string, selectedText: string): ClipboardEntry {
        assertRegisterKey(key);

        const entry = createClipboardEntry(selectedText);
        this.registers.set(key, entry);
        this.mirror(entry.text);
        this.log(`Registered in ${key}`);
        this._emitState();
        return entry;
    }

    pasteFromRegister(key: string, options: PasteOptions = {}): PasteResult | null {
        assertRegisterKey(key);

        const entry = this.registers.get(key);
        if (!entry) {
            this.log(`Register ${key} is empty`);
            return null;
        }

        this.mirror(entry.text);
        return this.toResult(entry, options);
    }

    storeCurrentInRegister(key: string): ClipboardEntry | null {
        assertRegisterKey(key);

        const current = this.history.current();
        if (!current) return null;

        const entry = createClipboardEntry(current.text, current.createdAt);
        this.registers.set(key, entry);
        this._emitState();
        return entry;
    }

    resetRegisters(group: RegisterGroup = 'all'): number {
        const removed = this.registers.reset(group);
        this.log(`Reset ${removed} register(s)`, { group });
        this._emitState();
        return removed;
    }

    // =========================================================================
    // Yank stack
    // =========================================================================

    toggleYankMode(): boolean {
        this.yankMode = !this.yankMode;
        // Leaving explicit yank mode discards whatever is still queued
        if (!this.yankMode && this.explicitYankMode) {
            this.yankStack.clear();
        }
        this.log(`Yank mode ${this.yankMode ? 'on' : 'off'}`);
        this._emitState();
        return this.yankMode;
    }

    isYankMode(): boolean {
        return this.yankMode;
    }

    yank(options: PasteOptions = {}): PasteResult | null {
        const entry = this.yankStack.yank();
        if (!entry) {
            this.log('Nothing to yank');
            return null;
        }

        this.mirror(entry.text);

        if (
            this.yankStack.size === 0 &&
            this.explicitYankMode &&
            this.settings.get('endYankModeOnEmptiedStack')
        ) {
            this.yankMode = false;
            this.log('Yank stack emptied, yank mode off');
        }

        this._emitState();
        return this.toResult(entry, options);
    }

    clearYankStack(): void {
        this.yankStack.clear();
        this._emitState();
    }

    // =========================================================================
    // Display projections
    // =========================================================================

    describeHistory(): HistoryDisplayItem[] {
        return this.history.listForDisplay();
    }

    describeRegisters(): RegisterDisplayItem[] {
        return this.registers.listForDisplay();
    }

    describeYankStack(): HistoryDisplayItem[] {
        return this.yankStack.listForDisplay();
    }

    getLastMirrored(): string | null {
        return this.lastMirrored;
    }

    /**
     * Stop following settings changes and complete the observables
     */
    dispose(): void {
        this.settingsSubscription.unsubscribe();
        this._captures$.complete();
        this.state$.complete();
    }

    // =========================================================================
    // Internals
    // =========================================================================

    private mirror(text: string): void {
        this.port.write(text);
        this.lastMirrored = text;
        this.log('Mirrored to clipboard', { length: text.length });
    }

    private toResult(entry: ClipboardEntry, options: PasteOptions): PasteResult {
        return { text: entry.text, indent: options.indent ?? false };
    }

    private applySettings(cfg: ClipboardSettingsConfig): void {
        this.history.setAllowDuplicates(cfg.allowHistoryDuplicates);
        this.history.setCapacity(cfg.maxHistory);
        this.yankStack.setCapacity(cfg.maxHistory);

        if (cfg.explicitYankMode !== this.explicitYankMode) {
            this.explicitYankMode = cfg.explicitYankMode;
            this.yankMode = !cfg.explicitYankMode;
        }

        this._emitState();
    }

    private snapshot(): ClipboardState {
        const current = this.history.current();
        return {
            historySize: this.history.size,
            cursor: this.history.cursorState(),
            currentText: current ? current.text : null,
            registerCount: this.registers.size,
            yankMode: this.yankMode,
            yankSize: this.yankStack.size,
        };
    }

    /**
     * Publish the current snapshot
     * @private
     */
    private _emitState(): void {
        this.state$.next(this.snapshot());
    }

    /**
     * Log a debug message
     * @private
     */
    private log(
        message: string,
        data?: Record<string, unknown>,
        level: 'log' | 'warn' | 'error' = 'log'
    ): void {
        if (!this.settings.get('debug') && level === 'log') return;

        const prefix = '[ClipboardManager]';
        if (data) {
            console[level](prefix, message, data);
        } else {
            console[level](prefix, message);
        }
    }
}
