/**
 * @fileoverview Show History Command
 * @module commands/history/ShowHistoryCommand
 */

import type { Command, CommandContext, CommandResult } from '../types';
import { PANEL_TITLES } from '../../core/Constants';
import { formatHistoryPanel } from '../../core/formatting';

/**
 * Render the clipboard history, newest first, in an output panel
 */
export const ShowHistoryCommand: Command = {
    id: 'history.show',
    label: 'Show Clipboard History',
    category: 'history',
    aliases: ['show'],

    canExecute(ctx: CommandContext): boolean {
        return ctx.statusService !== null;
    },

    execute(ctx: CommandContext): CommandResult {
        const content = formatHistoryPanel(ctx.clipboard.describeHistory(), PANEL_TITLES.HISTORY);
        ctx.statusService?.showPanel(content);
        return { success: true, data: content };
    }
};
