/**
 * @fileoverview Register Commands - named single-character registers
 * @module commands/register
 */

export { CopyToRegisterCommand } from './CopyToRegisterCommand';
export { PasteFromRegisterCommand } from './PasteFromRegisterCommand';
export { SetClipboardFromRegisterCommand } from './SetClipboardFromRegisterCommand';
export { StoreCurrentInRegisterCommand } from './StoreCurrentInRegisterCommand';
export { ShowRegistersCommand } from './ShowRegistersCommand';
export { ResetRegistersCommand } from './ResetRegistersCommand';
