/**
 * @fileoverview Yank Command
 * @module commands/yank/YankCommand
 */

import type { Command, CommandContext, CommandResult, PasteArgs } from '../types';
import { insertResult } from '../helpers';

const NOTHING_TO_YANK = 'Nothing to yank';

/**
 * Insert the oldest queued copy and drop it from the yank stack.
 * Repeated yanks replay a run of copies in the order they were made.
 */
export const YankCommand: Command<PasteArgs> = {
    id: 'yank.yank',
    label: 'Yank',
    category: 'yank',
    aliases: ['yank'],
    disabledMessage: NOTHING_TO_YANK,

    canExecute(ctx: CommandContext): boolean {
        return ctx.clipboard.state$.value.yankSize > 0;
    },

    execute(ctx: CommandContext, args?: PasteArgs): CommandResult {
        return insertResult(ctx, ctx.clipboard.yank({ indent: args?.indent }), NOTHING_TO_YANK);
    }
};
