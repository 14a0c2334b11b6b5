/**
 * @fileoverview Unit tests for SystemClipboardPort
 * clipboardy is mocked; no real clipboard is touched.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';

const clipboardy = vi.hoisted(() => ({
    readSync: vi.fn<() => string>(),
    writeSync: vi.fn<(text: string) => void>(),
}));

vi.mock('clipboardy', () => ({ default: clipboardy }));

import { SystemClipboardPort } from '../../src/services/SystemClipboardPort';
import { ClipboardSyncError } from '../../src/core/errors';

describe('SystemClipboardPort', () => {
    let port: SystemClipboardPort;

    beforeEach(() => {
        clipboardy.readSync.mockReset();
        clipboardy.writeSync.mockReset();
        port = new SystemClipboardPort();
    });

    it('reads the clipboard', () => {
        clipboardy.readSync.mockReturnValue('from the os');

        expect(port.read()).toBe('from the os');
    });

    it('writes the clipboard', () => {
        port.write('to the os');

        expect(clipboardy.writeSync).toHaveBeenCalledWith('to the os');
    });

    it('wraps read failures', () => {
        const cause = new Error('xsel not found');
        clipboardy.readSync.mockImplementation(() => {
            throw cause;
        });

        expect(() => port.read()).toThrow(ClipboardSyncError);
        try {
            port.read();
        } catch (error) {
            expect(error).toBeInstanceOf(ClipboardSyncError);
            if (error instanceof ClipboardSyncError) {
                expect(error.message).toBe('Failed to read the system clipboard');
                expect(error.code).toBe('CLIPBOARD_SYNC_ERROR');
                expect(error.cause).toBe(cause);
            }
        }
    });

    it('wraps write failures', () => {
        clipboardy.writeSync.mockImplementation(() => {
            throw new Error('no display');
        });

        expect(() => port.write('text')).toThrow('Failed to write the system clipboard');
    });
});
