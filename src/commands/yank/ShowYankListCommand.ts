/**
 * @fileoverview Show Yank List Command
 * @module commands/yank/ShowYankListCommand
 */

import type { Command, CommandContext, CommandResult } from '../types';
import { PANEL_TITLES } from '../../core/Constants';
import { formatHistoryPanel } from '../../core/formatting';

/**
 * Render the yank stack in an output panel; the next entry to yank is marked
 */
export const ShowYankListCommand: Command = {
    id: 'yank.show',
    label: 'Show Yank List',
    category: 'yank',
    aliases: ['show_yank_list'],

    canExecute(ctx: CommandContext): boolean {
        return ctx.statusService !== null;
    },

    execute(ctx: CommandContext): CommandResult {
        const content = formatHistoryPanel(ctx.clipboard.describeYankStack(), PANEL_TITLES.YANK);
        ctx.statusService?.showPanel(content);
        return { success: true, data: content };
    }
};
