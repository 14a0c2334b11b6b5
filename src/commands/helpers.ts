/**
 * @fileoverview Shared steps for commands that insert text
 * @module commands/helpers
 */

import type { PasteResult } from '../types';
import type { CommandContext, CommandResult } from './types';

/**
 * Insert a PasteResult through the host editor.
 * A null result becomes an info notice and a failed CommandResult.
 */
export function insertResult(
    ctx: CommandContext,
    result: PasteResult | null,
    emptyMessage: string
): CommandResult {
    if (!result) {
        ctx.statusService?.info(emptyMessage);
        return { success: false, message: emptyMessage };
    }

    ctx.editor.insertText(result.text, { indent: result.indent });
    return { success: true, data: result };
}

/**
 * True when the history holds at least one entry
 */
export function hasHistory(ctx: CommandContext): boolean {
    return ctx.clipboard.state$.value.historySize > 0;
}

export const NOTHING_IN_HISTORY = 'Nothing in history';
