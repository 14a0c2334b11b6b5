/**
 * @fileoverview Combined navigate + paste commands
 * @module commands/history/NavigateAndPasteCommands
 *
 * next_and_paste / previous_and_paste move first and insert the new entry.
 * paste_and_next / paste_and_previous insert the current entry, then move,
 * leaving the clipboard on the entry the cursor moved to.
 */

import type { Command, CommandContext, CommandResult, PasteArgs } from '../types';
import type { IClipboardManager } from '../../services/interfaces/IClipboardManager';
import type { PasteOptions, PasteResult } from '../../types';
import { hasHistory, insertResult, NOTHING_IN_HISTORY } from '../helpers';

type Move = (clipboard: IClipboardManager, options: PasteOptions) => PasteResult | null;

const moveNext: Move = (clipboard, options) => clipboard.nextAndGetText(options);
const movePrevious: Move = (clipboard, options) => clipboard.previousAndGetText(options);

function moveThenPaste(id: string, label: string, alias: string, move: Move): Command<PasteArgs> {
    return {
        id,
        label,
        category: 'history',
        aliases: [alias],
        disabledMessage: NOTHING_IN_HISTORY,

        canExecute(ctx: CommandContext): boolean {
            return hasHistory(ctx);
        },

        execute(ctx: CommandContext, args?: PasteArgs): CommandResult {
            return insertResult(ctx, move(ctx.clipboard, { indent: args?.indent }), NOTHING_IN_HISTORY);
        }
    };
}

function pasteThenMove(id: string, label: string, alias: string, move: Move): Command<PasteArgs> {
    return {
        id,
        label,
        category: 'history',
        aliases: [alias],
        disabledMessage: NOTHING_IN_HISTORY,

        canExecute(ctx: CommandContext): boolean {
            return hasHistory(ctx);
        },

        execute(ctx: CommandContext, args?: PasteArgs): CommandResult {
            const options = { indent: args?.indent };
            const result = insertResult(ctx, ctx.clipboard.pasteCurrent(options), NOTHING_IN_HISTORY);
            if (result.success) {
                move(ctx.clipboard, options);
            }
            return result;
        }
    };
}

export const NextAndPasteCommand = moveThenPaste(
    'history.nextAndPaste', 'Next and Paste', 'next_and_paste', moveNext
);

export const PreviousAndPasteCommand = moveThenPaste(
    'history.previousAndPaste', 'Previous and Paste', 'previous_and_paste', movePrevious
);

export const PasteAndNextCommand = pasteThenMove(
    'history.pasteAndNext', 'Paste and Next', 'paste_and_next', moveNext
);

export const PasteAndPreviousCommand = pasteThenMove(
    'history.pasteAndPrevious', 'Paste and Previous', 'paste_and_previous', movePrevious
);
