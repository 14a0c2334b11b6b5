/**
 * @fileoverview Store Current in Register Command
 * @module commands/register/StoreCurrentInRegisterCommand
 */

import type { Command, CommandContext, CommandResult, RegisterArgs } from '../types';
import { isValidRegisterKey } from '../../core/errors';
import { hasHistory, NOTHING_IN_HISTORY } from '../helpers';
import { INVALID_REGISTER } from './messages';

/**
 * Copy the entry under the history cursor into a register.
 * The clipboard is left as it is.
 */
export const StoreCurrentInRegisterCommand: Command<RegisterArgs> = {
    id: 'register.storeCurrent',
    label: 'Store Current Entry in Register',
    category: 'register',
    aliases: ['store_current_in_register'],
    disabledMessage: 'Nothing in history or not a valid register',

    canExecute(ctx: CommandContext, args?: RegisterArgs): boolean {
        return hasHistory(ctx) && args !== undefined && isValidRegisterKey(args.key);
    },

    execute(ctx: CommandContext, args?: RegisterArgs): CommandResult {
        if (!args) {
            return { success: false, message: INVALID_REGISTER };
        }

        const entry = ctx.clipboard.storeCurrentInRegister(args.key);
        if (!entry) {
            ctx.statusService?.info(NOTHING_IN_HISTORY);
            return { success: false, message: NOTHING_IN_HISTORY };
        }

        ctx.statusService?.info(`Registered in ${args.key}`);
        return { success: true, data: { key: args.key, text: entry.text } };
    }
};
