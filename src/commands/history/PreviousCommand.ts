/**
 * @fileoverview Previous Command
 * @module commands/history/PreviousCommand
 */

import type { Command, CommandContext, CommandResult } from '../types';
import { formatStatusMessage } from '../../core/formatting';
import { hasHistory, NOTHING_IN_HISTORY } from '../helpers';

/**
 * Move the history cursor one step toward the oldest entry.
 * The selected entry is written to the clipboard; nothing is inserted.
 */
export const PreviousCommand: Command = {
    id: 'history.previous',
    label: 'Previous Clipboard Entry',
    category: 'history',
    aliases: ['previous'],
    description: 'Set the clipboard to the next older history entry',
    disabledMessage: NOTHING_IN_HISTORY,

    canExecute(ctx: CommandContext): boolean {
        return hasHistory(ctx);
    },

    execute(ctx: CommandContext): CommandResult {
        const result = ctx.clipboard.previousAndGetText();
        if (!result) {
            return { success: false, message: NOTHING_IN_HISTORY };
        }

        ctx.statusService?.info(formatStatusMessage(result.text));
        return { success: true, data: result };
    }
};
