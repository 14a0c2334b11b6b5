/**
 * @fileoverview Choose and Paste Command
 * @module commands/history/ChooseAndPasteCommand
 *
 * Backs the host's quick panel: the host lists describeHistory() rows and
 * passes the chosen row's `index` back here.
 */

import type { ChooseArgs, Command, CommandContext, CommandResult } from '../types';
import { hasHistory, insertResult, NOTHING_IN_HISTORY } from '../helpers';

export const ChooseAndPasteCommand: Command<ChooseArgs> = {
    id: 'history.chooseAndPaste',
    label: 'Choose and Paste',
    category: 'history',
    aliases: ['choose_and_paste'],
    description: 'Paste a history entry picked from a list',
    disabledMessage: NOTHING_IN_HISTORY,

    canExecute(ctx: CommandContext, args?: ChooseArgs): boolean {
        return hasHistory(ctx) && args !== undefined && Number.isInteger(args.index);
    },

    execute(ctx: CommandContext, args?: ChooseArgs): CommandResult {
        if (!args) {
            return { success: false, message: 'No history entry chosen' };
        }

        return insertResult(
            ctx,
            ctx.clipboard.selectAndGetText(args.index, { indent: args.indent, pop: args.pop }),
            NOTHING_IN_HISTORY
        );
    }
};
