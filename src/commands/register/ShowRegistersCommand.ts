/**
 * @fileoverview Show Registers Command
 * @module commands/register/ShowRegistersCommand
 */

import type { Command, CommandContext, CommandResult } from '../types';
import { formatRegisterPanel } from '../../core/formatting';

export const ShowRegistersCommand: Command = {
    id: 'register.show',
    label: 'Show Registers',
    category: 'register',
    aliases: ['show_registers'],

    canExecute(ctx: CommandContext): boolean {
        return ctx.statusService !== null;
    },

    execute(ctx: CommandContext): CommandResult {
        const content = formatRegisterPanel(ctx.clipboard.describeRegisters());
        ctx.statusService?.showPanel(content);
        return { success: true, data: content };
    }
};
