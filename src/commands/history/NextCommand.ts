/**
 * @fileoverview Next Command
 * @module commands/history/NextCommand
 */

import type { Command, CommandContext, CommandResult } from '../types';
import { formatStatusMessage } from '../../core/formatting';
import { hasHistory, NOTHING_IN_HISTORY } from '../helpers';

/**
 * Move the history cursor one step toward the newest entry.
 * The selected entry is written to the clipboard; nothing is inserted.
 */
export const NextCommand: Command = {
    id: 'history.next',
    label: 'Next Clipboard Entry',
    category: 'history',
    aliases: ['next'],
    description: 'Set the clipboard to the next newer history entry',
    disabledMessage: NOTHING_IN_HISTORY,

    canExecute(ctx: CommandContext): boolean {
        return hasHistory(ctx);
    },

    execute(ctx: CommandContext): CommandResult {
        const result = ctx.clipboard.nextAndGetText();
        if (!result) {
            return { success: false, message: NOTHING_IN_HISTORY };
        }

        ctx.statusService?.info(formatStatusMessage(result.text));
        return { success: true, data: result };
    }
};
