/**
 * @fileoverview Clear Yank List Command
 * @module commands/yank/ClearYankListCommand
 */

import type { Command, CommandContext, CommandResult } from '../types';

export const ClearYankListCommand: Command = {
    id: 'yank.clear',
    label: 'Clear Yank List',
    category: 'yank',
    aliases: ['clear_yank_list'],

    canExecute(): boolean {
        return true;
    },

    execute(ctx: CommandContext): CommandResult {
        ctx.clipboard.clearYankStack();
        ctx.statusService?.success('Yank history cleared');
        return { success: true };
    }
};
