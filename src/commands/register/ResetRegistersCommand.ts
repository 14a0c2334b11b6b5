/**
 * @fileoverview Reset Registers Command
 * @module commands/register/ResetRegistersCommand
 */

import type { Command, CommandContext, CommandResult, ResetRegistersArgs } from '../types';
import { REGISTER_GROUP_NAMES } from '../../core/Constants';

/**
 * Remove a group of registers (numbers, lowercase, uppercase or all).
 * Defaults to all.
 */
export const ResetRegistersCommand: Command<ResetRegistersArgs> = {
    id: 'register.reset',
    label: 'Reset Registers',
    category: 'register',
    aliases: ['reset_registers'],
    disabledMessage: 'Unknown register group',

    canExecute(_ctx: CommandContext, args?: ResetRegistersArgs): boolean {
        const group = args?.group;
        return group === undefined || REGISTER_GROUP_NAMES.includes(group);
    },

    execute(ctx: CommandContext, args?: ResetRegistersArgs): CommandResult {
        const group = args?.group ?? 'all';
        const removed = ctx.clipboard.resetRegisters(group);
        ctx.statusService?.success(`Reset ${removed} register(s)`);
        return { success: true, data: { group, removed } };
    }
};
