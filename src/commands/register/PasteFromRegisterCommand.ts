/**
 * @fileoverview Paste from Register Command
 * @module commands/register/PasteFromRegisterCommand
 */

import type { Command, CommandContext, CommandResult, RegisterArgs } from '../types';
import { isValidRegisterKey } from '../../core/errors';
import { insertResult } from '../helpers';
import { emptyRegister, INVALID_REGISTER } from './messages';

/**
 * Insert a register's text and set the clipboard to it
 */
export const PasteFromRegisterCommand: Command<RegisterArgs> = {
    id: 'register.paste',
    label: 'Paste from Register',
    category: 'register',
    aliases: ['paste_from_register'],
    disabledMessage: INVALID_REGISTER,

    canExecute(_ctx: CommandContext, args?: RegisterArgs): boolean {
        return args !== undefined && isValidRegisterKey(args.key);
    },

    execute(ctx: CommandContext, args?: RegisterArgs): CommandResult {
        if (!args) {
            return { success: false, message: INVALID_REGISTER };
        }

        const result = insertResult(
            ctx,
            ctx.clipboard.pasteFromRegister(args.key, { indent: args.indent }),
            emptyRegister(args.key)
        );
        if (result.success) {
            ctx.statusService?.info(`Pasted register ${args.key}`);
        }
        return result;
    }
};
