/**
 * @fileoverview In-process clipboard slot
 * @module services/MemoryClipboardPort
 *
 * For headless hosts and tests. setExternal() simulates another
 * application writing the clipboard.
 */

import type { IClipboardSyncPort } from './interfaces/IClipboardSyncPort';

export class MemoryClipboardPort implements IClipboardSyncPort {
    private text: string;
    private writes: string[] = [];

    constructor(initial: string = '') {
        this.text = initial;
    }

    read(): string {
        return this.text;
    }

    write(text: string): void {
        this.text = text;
        this.writes.push(text);
    }

    /**
     * Change the slot without recording it as an engine write
     */
    setExternal(text: string): void {
        this.text = text;
    }

    /**
     * Every value written by the engine, oldest first
     */
    getWrites(): string[] {
        return [...this.writes];
    }
}
