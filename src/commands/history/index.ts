/**
 * @fileoverview History Commands - cycle, choose, show and clear
 * @module commands/history
 */

export { NextCommand } from './NextCommand';
export { PreviousCommand } from './PreviousCommand';
export {
    NextAndPasteCommand,
    PreviousAndPasteCommand,
    PasteAndNextCommand,
    PasteAndPreviousCommand
} from './NavigateAndPasteCommands';
export { ChooseAndPasteCommand } from './ChooseAndPasteCommand';
export { ShowHistoryCommand } from './ShowHistoryCommand';
export { ClearHistoryCommand } from './ClearHistoryCommand';
