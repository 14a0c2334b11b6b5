/**
 * @fileoverview Copy to Register Command
 * @module commands/register/CopyToRegisterCommand
 */

import type { Command, CommandContext, CommandResult, RegisterArgs } from '../types';
import { isValidRegisterKey } from '../../core/errors';
import { INVALID_REGISTER } from './messages';

/**
 * Store the editor selection in a register.
 * The history is not touched; the clipboard is set to the stored text.
 */
export const CopyToRegisterCommand: Command<RegisterArgs> = {
    id: 'register.copy',
    label: 'Copy to Register',
    category: 'register',
    aliases: ['copy_to_register'],
    disabledMessage: INVALID_REGISTER,

    canExecute(_ctx: CommandContext, args?: RegisterArgs): boolean {
        return args !== undefined && isValidRegisterKey(args.key);
    },

    execute(ctx: CommandContext, args?: RegisterArgs): CommandResult {
        if (!args) {
            return { success: false, message: INVALID_REGISTER };
        }

        const entry = ctx.clipboard.copyToRegister(args.key, ctx.editor.getSelectedText());
        ctx.statusService?.info(`Registered in ${args.key}`);
        return { success: true, data: { key: args.key, text: entry.text } };
    }
};
