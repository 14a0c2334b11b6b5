/**
 * @fileoverview Clear History Command
 * @module commands/history/ClearHistoryCommand
 */

import type { Command, CommandContext, CommandResult } from '../types';

export const ClearHistoryCommand: Command = {
    id: 'history.clear',
    label: 'Clear Clipboard History',
    category: 'history',
    aliases: ['clear_history'],
    description: 'Drop every history entry; registers are kept',

    canExecute(): boolean {
        return true;
    },

    execute(ctx: CommandContext): CommandResult {
        ctx.clipboard.clearHistory();
        ctx.statusService?.success('Clipboard history cleared');
        return { success: true };
    }
};
