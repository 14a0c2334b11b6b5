/**
 * @fileoverview Status messages shared by the register commands
 * @module commands/register/messages
 */

export const INVALID_REGISTER = 'Not a valid register';

export function emptyRegister(key: string): string {
    return `Register ${key} is empty`;
}
