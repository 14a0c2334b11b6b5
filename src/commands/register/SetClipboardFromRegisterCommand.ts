/**
 * @fileoverview Set Clipboard from Register Command
 * @module commands/register/SetClipboardFromRegisterCommand
 */

import type { Command, CommandContext, CommandResult, RegisterArgs } from '../types';
import { isValidRegisterKey } from '../../core/errors';
import { emptyRegister, INVALID_REGISTER } from './messages';

/**
 * Put a register's text on the clipboard without inserting it
 */
export const SetClipboardFromRegisterCommand: Command<RegisterArgs> = {
    id: 'register.setClipboard',
    label: 'Set Clipboard from Register',
    category: 'register',
    aliases: ['set_clipboard_from_register'],
    disabledMessage: INVALID_REGISTER,

    canExecute(_ctx: CommandContext, args?: RegisterArgs): boolean {
        return args !== undefined && isValidRegisterKey(args.key);
    },

    execute(ctx: CommandContext, args?: RegisterArgs): CommandResult {
        if (!args) {
            return { success: false, message: INVALID_REGISTER };
        }

        const result = ctx.clipboard.pasteFromRegister(args.key);
        if (!result) {
            const message = emptyRegister(args.key);
            ctx.statusService?.info(message);
            return { success: false, message };
        }

        ctx.statusService?.info(`Clipboard set to register '${args.key}'`);
        return { success: true, data: result };
    }
};
