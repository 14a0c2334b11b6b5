/**
 * @fileoverview Copy Command
 * @module commands/clipboard/CopyCommand
 *
 * Records the editor selection and mirrors it to the clipboard.
 */

import type { Command, CommandContext, CommandResult } from '../types';

/**
 * Copy selection command.
 *
 * Behavior:
 * - Pushes the selection onto the history (or the yank stack in yank mode)
 * - Writes the text to the clipboard
 * - Copying the newest entry again leaves the history unchanged
 */
export const CopyCommand: Command = {
    id: 'clipboard.copy',
    label: 'Copy',
    category: 'clipboard',
    aliases: ['copy'],
    shortcut: 'Ctrl+C',
    description: 'Copy the selection into the clipboard history',

    canExecute(): boolean {
        return true;
    },

    execute(ctx: CommandContext): CommandResult {
        const entry = ctx.clipboard.copy(ctx.editor.getSelectedText());

        if (!entry) {
            return { success: false, message: 'Nothing copied' };
        }

        return { success: true, data: { text: entry.text } };
    }
};
