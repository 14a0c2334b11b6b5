/**
 * @fileoverview IClipboardSyncPort Interface
 * @module services/interfaces/IClipboardSyncPort
 *
 * The single OS clipboard slot. Synchronous; last writer wins.
 */

/**
 * Clipboard slot the engine mirrors into.
 * Implementations throw ClipboardSyncError when the slot is unavailable.
 */
export interface IClipboardSyncPort {
    /**
     * Current clipboard text ('' when the clipboard holds no text)
     */
    read(): string;

    /**
     * Replace the clipboard text
     */
    write(text: string): void;
}
