/**
 * @fileoverview Command Registry - Public API
 * @module commands
 *
 * Central export for the Command Registry system.
 *
 * Usage:
 * ```typescript
 * import { CommandService, registerClipboardCommands } from './commands';
 *
 * const commandService = new CommandService();
 * commandService.setContext({ clipboard, editor, statusService });
 * registerClipboardCommands(commandService);
 *
 * await commandService.execute('history.previous');
 * await commandService.execute('paste_from_register', { args: { key: 'a' } });
 * await commandService.executeShortcut('Ctrl+V');
 * ```
 */

// Types
export type {
    Command,
    CommandContext,
    CommandCategory,
    CommandResult,
    ExecuteOptions,
    ICommandService,
    PasteArgs,
    HistoryPasteArgs,
    ChooseArgs,
    RegisterArgs,
    ResetRegistersArgs
} from './types';

// Service
export { CommandService } from './CommandService';
export type { CommandServiceOptions, CommandStats } from './CommandService';

// Command categories
export { CopyCommand, CutCommand, PasteCommand } from './clipboard';
export {
    NextCommand,
    PreviousCommand,
    NextAndPasteCommand,
    PreviousAndPasteCommand,
    PasteAndNextCommand,
    PasteAndPreviousCommand,
    ChooseAndPasteCommand,
    ShowHistoryCommand,
    ClearHistoryCommand
} from './history';
export {
    CopyToRegisterCommand,
    PasteFromRegisterCommand,
    SetClipboardFromRegisterCommand,
    StoreCurrentInRegisterCommand,
    ShowRegistersCommand,
    ResetRegistersCommand
} from './register';
export { ToggleYankModeCommand, YankCommand, ClearYankListCommand, ShowYankListCommand } from './yank';

import type { ICommandService } from './types';
import { CopyCommand, CutCommand, PasteCommand } from './clipboard';
import {
    NextCommand,
    PreviousCommand,
    NextAndPasteCommand,
    PreviousAndPasteCommand,
    PasteAndNextCommand,
    PasteAndPreviousCommand,
    ChooseAndPasteCommand,
    ShowHistoryCommand,
    ClearHistoryCommand
} from './history';
import {
    CopyToRegisterCommand,
    PasteFromRegisterCommand,
    SetClipboardFromRegisterCommand,
    StoreCurrentInRegisterCommand,
    ShowRegistersCommand,
    ResetRegistersCommand
} from './register';
import { ToggleYankModeCommand, YankCommand, ClearYankListCommand, ShowYankListCommand } from './yank';

/**
 * Register every clipboard command with a CommandService.
 * Call once per editing context, after setting the context.
 *
 * @param service - The CommandService to register into
 */
export function registerClipboardCommands(service: ICommandService): void {
    // Clipboard commands
    service.register(CopyCommand);
    service.register(CutCommand);
    service.register(PasteCommand);

    // History commands
    service.register(NextCommand);
    service.register(PreviousCommand);
    service.register(NextAndPasteCommand);
    service.register(PreviousAndPasteCommand);
    service.register(PasteAndNextCommand);
    service.register(PasteAndPreviousCommand);
    service.register(ChooseAndPasteCommand);
    service.register(ShowHistoryCommand);
    service.register(ClearHistoryCommand);

    // Register commands
    service.register(CopyToRegisterCommand);
    service.register(PasteFromRegisterCommand);
    service.register(SetClipboardFromRegisterCommand);
    service.register(StoreCurrentInRegisterCommand);
    service.register(ShowRegistersCommand);
    service.register(ResetRegistersCommand);

    // Yank commands
    service.register(ToggleYankModeCommand);
    service.register(YankCommand);
    service.register(ClearYankListCommand);
    service.register(ShowYankListCommand);
}
