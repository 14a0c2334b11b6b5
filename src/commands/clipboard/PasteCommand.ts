/**
 * @fileoverview Paste Command
 * @module commands/clipboard/PasteCommand
 */

import type { Command, CommandContext, CommandResult, HistoryPasteArgs } from '../types';
import { hasHistory, insertResult, NOTHING_IN_HISTORY } from '../helpers';

/**
 * Paste the entry under the history cursor.
 *
 * The entry is mirrored to the clipboard again before it is inserted, so a
 * value overwritten by another application is restored.
 */
export const PasteCommand: Command<HistoryPasteArgs> = {
    id: 'clipboard.paste',
    label: 'Paste',
    category: 'clipboard',
    aliases: ['paste'],
    shortcut: 'Ctrl+V',
    description: 'Paste the current clipboard history entry',
    disabledMessage: NOTHING_IN_HISTORY,

    canExecute(ctx: CommandContext): boolean {
        return hasHistory(ctx);
    },

    execute(ctx: CommandContext, args?: HistoryPasteArgs): CommandResult {
        const result = ctx.clipboard.pasteCurrent({ indent: args?.indent, pop: args?.pop });
        return insertResult(ctx, result, NOTHING_IN_HISTORY);
    }
};
