/**
 * @fileoverview Cut Command
 * @module commands/clipboard/CutCommand
 */

import type { Command, CommandContext, CommandResult } from '../types';

/**
 * Cut selection command.
 *
 * Same capture as Copy; the selection is deleted from the editor afterwards,
 * even when an empty cut was ignored.
 */
export const CutCommand: Command = {
    id: 'clipboard.cut',
    label: 'Cut',
    category: 'clipboard',
    aliases: ['cut'],
    shortcut: 'Ctrl+X',
    description: 'Cut the selection into the clipboard history',

    canExecute(): boolean {
        return true;
    },

    execute(ctx: CommandContext): CommandResult {
        const entry = ctx.clipboard.cut(ctx.editor.getSelectedText());
        ctx.editor.deleteSelection();

        if (!entry) {
            return { success: false, message: 'Nothing cut' };
        }

        return { success: true, data: { text: entry.text } };
    }
};
