/**
 * @fileoverview Error types raised by the clipboard engine
 * @module core/errors
 *
 * Empty history and unknown registers are ordinary `null` results, not errors.
 * Only violated preconditions and clipboard I/O failures throw.
 */

/**
 * A register key that is not a single printable, non-whitespace character
 */
export class InvalidRegisterKeyError extends Error {
    readonly code = 'INVALID_REGISTER_KEY';

    constructor(public readonly key: string) {
        super(`Invalid register key ${JSON.stringify(key)}: expected a single printable character`);
        this.name = 'InvalidRegisterKeyError';
    }
}

/**
 * Reading or writing the OS clipboard failed
 */
export class ClipboardSyncError extends Error {
    readonly code = 'CLIPBOARD_SYNC_ERROR';

    constructor(message: string, cause?: unknown) {
        super(message, { cause });
        this.name = 'ClipboardSyncError';
    }
}

const NON_PRINTABLE = /[\p{Cc}\p{Cf}\p{Z}]/u;

/**
 * Check a register key
 */
export function isValidRegisterKey(key: string): boolean {
    const codePoints = Array.from(key);
    return codePoints.length === 1 && !NON_PRINTABLE.test(key);
}

/**
 * Throw InvalidRegisterKeyError unless the key is valid
 */
export function assertRegisterKey(key: string): void {
    if (!isValidRegisterKey(key)) {
        throw new InvalidRegisterKeyError(key);
    }
}
