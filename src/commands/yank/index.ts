/**
 * @fileoverview Yank Commands - queue copies and replay them in order
 * @module commands/yank
 */

export { ToggleYankModeCommand } from './ToggleYankModeCommand';
export { YankCommand } from './YankCommand';
export { ClearYankListCommand } from './ClearYankListCommand';
export { ShowYankListCommand } from './ShowYankListCommand';
