/**
 * @fileoverview Clipboard Monitor - picks up text copied outside the editor
 * @module services/ClipboardMonitor
 *
 * Polls the clipboard port on an rxjs interval. Text that differs from what
 * the manager last mirrored becomes an implicit push. Navigation mirrors
 * synchronously, so the last mirrored value is always the navigation
 * selection and a poll never overwrites it.
 */

import { Subscription, interval, map, filter } from 'rxjs';
import type { IClipboardManager } from './interfaces/IClipboardManager';
import type { IClipboardSyncPort } from './interfaces/IClipboardSyncPort';

/**
 * Monitor options
 */
export interface ClipboardMonitorOptions {
    /** Poll interval in milliseconds */
    intervalMs: number;
    /** Called when a read fails; polling continues. Defaults to console.error. */
    onError?: (error: unknown) => void;
}

export class ClipboardMonitor {
    private subscription: Subscription | null = null;
    private readonly onError: (error: unknown) => void;

    constructor(
        private readonly manager: IClipboardManager,
        private readonly port: IClipboardSyncPort,
        private readonly options: ClipboardMonitorOptions
    ) {
        this.onError = options.onError ?? (error => {
            console.error('[ClipboardMonitor] Clipboard read failed:', error);
        });
    }

    /**
     * Start polling. Calling start() while running restarts the poll.
     */
    start(): void {
        if (this.options.intervalMs <= 0) {
            console.warn('[ClipboardMonitor] Interval must be positive, not starting');
            return;
        }

        this.stop();

        this.subscription = interval(this.options.intervalMs)
            .pipe(
                map(() => this.readSafely()),
                filter((text): text is string => text !== null),
                filter(text => text !== this.manager.getLastMirrored())
            )
            .subscribe(text => {
                this.manager.captureExternal(text);
            });
    }

    stop(): void {
        if (this.subscription) {
            this.subscription.unsubscribe();
            this.subscription = null;
        }
    }

    isRunning(): boolean {
        return this.subscription !== null;
    }

    /**
     * Poll once, outside the interval
     * @returns The captured text, or null when nothing new was seen
     */
    pollNow(): string | null {
        const text = this.readSafely();
        if (text === null || text === this.manager.getLastMirrored()) return null;
        return this.manager.captureExternal(text) ? text : null;
    }

    private readSafely(): string | null {
        try {
            return this.port.read();
        } catch (error) {
            this.onError(error);
            return null;
        }
    }
}
