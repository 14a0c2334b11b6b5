/**
 * @fileoverview Command Registry Types
 * @module commands/types
 *
 * Type definitions for the Command Registry pattern.
 *
 * Each user action (copy, next, paste from register...) is a Command. The
 * host maps its own command names, keybindings and menu entries onto command
 * ids through the CommandService instead of dispatching on strings itself.
 *
 * Key concepts:
 * - Command<TArgs>: A discrete, testable user action with typed arguments
 * - CommandContext: Injected services available to all commands
 * - CommandService: Central registry and executor
 */

import type { IClipboardManager } from '../services/interfaces/IClipboardManager';
import type { IHostEditor, IStatusService } from '../services/interfaces/IHostEditor';
import type { RegisterGroup } from '../types';

// =============================================================================
// COMMAND CONTEXT
// =============================================================================

/**
 * Injected dependencies available to all commands.
 *
 * NOTE: Services are injected here; command-specific arguments (register
 * key, history index, indent) use the generic TArgs parameter on Command<TArgs>.
 */
export interface CommandContext {
    /** Clipboard history engine */
    readonly clipboard: IClipboardManager;

    /** Host editor selection and insertion */
    readonly editor: IHostEditor;

    /** User notifications, absent in headless hosts */
    readonly statusService: IStatusService | null;
}

// =============================================================================
// COMMAND CATEGORIES
// =============================================================================

/**
 * Command category for organization and filtering.
 */
export type CommandCategory =
    | 'clipboard'   // Copy, cut, paste
    | 'history'     // Cycle, choose, show, clear history
    | 'register'    // Named registers
    | 'yank';       // Yank stack

// =============================================================================
// COMMAND ARGUMENTS
// =============================================================================

/** Arguments for commands that insert text */
export interface PasteArgs {
    /** Use the host's indent-aware paste */
    indent?: boolean;
}

/** Arguments for commands that paste a history entry */
export interface HistoryPasteArgs extends PasteArgs {
    /** Remove the entry from the history once pasted */
    pop?: boolean;
}

/** Arguments for choose-and-paste */
export interface ChooseArgs extends HistoryPasteArgs {
    /** Buffer index as listed by describeHistory() */
    index: number;
}

/** Arguments for register commands */
export interface RegisterArgs extends PasteArgs {
    /** Single-character register key */
    key: string;
}

/** Arguments for register reset */
export interface ResetRegistersArgs {
    group?: RegisterGroup;
}

// =============================================================================
// COMMAND RESULT
// =============================================================================

/**
 * Result returned by command execution.
 */
export interface CommandResult {
    /** Whether the command completed successfully */
    success: boolean;

    /** Optional message for user feedback */
    message?: string;

    /** Optional data returned by the command */
    data?: unknown;
}

// =============================================================================
// COMMAND INTERFACE
// =============================================================================

/**
 * Command definition with typed arguments.
 *
 * @example
 * ```typescript
 * const PasteFromRegisterCommand: Command<RegisterArgs> = {
 *   id: 'register.paste',
 *   label: 'Paste from Register',
 *   category: 'register',
 *   aliases: ['paste_from_register'],
 *   canExecute: (ctx, args) => args !== undefined && isValidRegisterKey(args.key),
 *   execute: (ctx, args) => { ... }
 * };
 * ```
 *
 * @typeParam TArgs - Type of command-specific arguments (defaults to void)
 */
export interface Command<TArgs = void> {
    /**
     * Unique identifier using dot notation.
     * Convention: {category}.{action}
     * Examples: 'clipboard.copy', 'history.next', 'register.paste'
     */
    id: string;

    /**
     * Human-readable label for display in menus and command palette.
     */
    label: string;

    /**
     * Command category for grouping and filtering.
     */
    category: CommandCategory;

    /**
     * Other names the host may use for this command (e.g. 'next_and_paste').
     */
    aliases?: string[];

    /**
     * Keyboard shortcut (optional).
     * Examples: 'Ctrl+C', 'Ctrl+Shift+V'
     */
    shortcut?: string;

    /**
     * Description for command palette and tooltips (optional).
     */
    description?: string;

    /**
     * Notice shown when the command is invoked while canExecute() is false
     * (e.g. 'Nothing in history').
     */
    disabledMessage?: string;

    /**
     * Check if the command can execute in the current state.
     *
     * @param ctx - Command context with all dependencies
     * @param args - Optional typed command arguments
     */
    canExecute(ctx: CommandContext, args?: TArgs): boolean;

    /**
     * Execute the command.
     *
     * @param ctx - Command context with all dependencies
     * @param args - Optional typed command arguments
     */
    execute(ctx: CommandContext, args?: TArgs): CommandResult | Promise<CommandResult> | void;
}

// =============================================================================
// EXECUTE OPTIONS
// =============================================================================

/**
 * Options for executing a command via CommandService.execute()
 */
export interface ExecuteOptions<TArgs = unknown> {
    /** Typed arguments to pass to the command */
    args?: TArgs;

    /** If true, skip canExecute() check */
    force?: boolean;

    /** If true, don't notify the user */
    silent?: boolean;
}

// =============================================================================
// COMMAND SERVICE INTERFACE
// =============================================================================

/**
 * CommandService public interface.
 */
export interface ICommandService {
    /** Set the command context (call once during init) */
    setContext(ctx: CommandContext): void;

    /** Register a command (accepts any Command type) */
    register<TArgs>(command: Command<TArgs>): void;

    /** Execute a command by ID or alias with typed args */
    execute<TArgs = unknown>(id: string, options?: ExecuteOptions<TArgs>): Promise<CommandResult>;

    /** Execute command for a keyboard shortcut */
    executeShortcut(shortcut: string): Promise<CommandResult | null>;

    /** Check if a command can execute (with optional args) */
    canExecute<TArgs = unknown>(id: string, args?: TArgs): boolean;
}
