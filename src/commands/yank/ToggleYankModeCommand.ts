/**
 * @fileoverview Toggle Yank Mode Command
 * @module commands/yank/ToggleYankModeCommand
 */

import type { Command, CommandContext, CommandResult } from '../types';

export const ToggleYankModeCommand: Command = {
    id: 'yank.toggleMode',
    label: 'Toggle Yank Mode',
    category: 'yank',
    aliases: ['yank_mode'],
    description: 'Queue copies on the yank stack',

    canExecute(): boolean {
        return true;
    },

    execute(ctx: CommandContext): CommandResult {
        const enabled = ctx.clipboard.toggleYankMode();
        ctx.statusService?.info(`Yank mode ${enabled ? 'on' : 'off'}`);
        return { success: true, data: { yankMode: enabled } };
    }
};
