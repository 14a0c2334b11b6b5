/**
 * @fileoverview System clipboard adapter
 * @module services/SystemClipboardPort
 *
 * Mirrors into the OS clipboard through clipboardy's synchronous API.
 * Failures are rethrown as ClipboardSyncError.
 */

import clipboard from 'clipboardy';
import { ClipboardSyncError } from '../core/errors';
import type { IClipboardSyncPort } from './interfaces/IClipboardSyncPort';

export class SystemClipboardPort implements IClipboardSyncPort {
    read(): string {
        try {
            return clipboard.readSync();
        } catch (error) {
            throw new ClipboardSyncError('Failed to read the system clipboard', error);
        }
    }

    write(text: string): void {
        try {
            clipboard.writeSync(text);
        } catch (error) {
            throw new ClipboardSyncError('Failed to write the system clipboard', error);
        }
    }
}
