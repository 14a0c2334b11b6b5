/**
 * @fileoverview Clipboard Commands - Copy, cut, paste operations
 * @module commands/clipboard
 */

export { CopyCommand } from './CopyCommand';
export { CutCommand } from './CutCommand';
export { PasteCommand } from './PasteCommand';
