/**
 * @fileoverview Command Service - registry and executor for host actions
 * @module commands/CommandService
 *
 * Hosts never call ClipboardManager directly. Keymaps, menus and palettes
 * name a command by id, alias or shortcut; the service resolves it, checks
 * canExecute() against the injected context and runs it.
 */

import { BehaviorSubject, Observable, map, distinctUntilChanged } from 'rxjs';
import type {
    Command,
    CommandContext,
    CommandResult,
    ExecuteOptions,
    ICommandService
} from './types';

/**
 * CommandService options
 */
export interface CommandServiceOptions {
    /** Log routine registration and execution */
    debug?: boolean;
}

/**
 * Registry counts, logged at start-up
 */
export interface CommandStats {
    commandCount: number;
    aliasCount: number;
    shortcutCount: number;
    categories: Record<string, number>;
}

const MODIFIER_ORDER = ['Ctrl', 'Shift', 'Alt'] as const;
type Modifier = typeof MODIFIER_ORDER[number];

const MODIFIER_NAMES: Record<string, Modifier> = {
    ctrl: 'Ctrl',
    control: 'Ctrl',
    cmd: 'Ctrl',
    meta: 'Ctrl',
    shift: 'Shift',
    alt: 'Alt',
    option: 'Alt'
};

/**
 * Canonical spelling of a shortcut: modifiers as Ctrl, Shift, Alt in that
 * order, then the key (single characters upper-cased).
 *
 * @example
 * normalizeShortcut('shift+cmd+v') // 'Ctrl+Shift+V'
 */
export function normalizeShortcut(shortcut: string): string {
    const modifiers = new Set<Modifier>();
    let key = '';

    for (const part of shortcut.split('+').map(p => p.trim())) {
        const modifier = MODIFIER_NAMES[part.toLowerCase()];
        if (modifier) {
            modifiers.add(modifier);
        } else {
            key = part.length === 1 ? part.toUpperCase() : part;
        }
    }

    return [...MODIFIER_ORDER.filter(m => modifiers.has(m)), key].join('+');
}

export class CommandService implements ICommandService {
    private readonly commands = new Map<string, Command<unknown>>();
    /** alias -> command id */
    private readonly aliases = new Map<string, string>();
    /** normalized shortcut -> command id */
    private readonly shortcuts = new Map<string, string>();
    /** Bumped whenever clipboard state changes */
    private readonly revision$ = new BehaviorSubject<number>(0);

    private context: CommandContext | null = null;
    private debugMode: boolean;

    constructor(options: CommandServiceOptions = {}) {
        this.debugMode = options.debug ?? false;
    }

    setContext(ctx: CommandContext): void {
        this.context = ctx;
        this.log('Context set');
    }

    /**
     * Register a command together with its aliases and shortcut.
     * A second registration under the same id, alias or shortcut replaces the first.
     */
    register<TArgs>(command: Command<TArgs>): void {
        if (this.commands.has(command.id)) {
            console.warn(`[CommandService] Command '${command.id}' already registered, overwriting`);
        }
        this.commands.set(command.id, command);

        for (const alias of command.aliases ?? []) {
            this.bind(this.aliases, alias, command.id, 'Alias');
        }
        if (command.shortcut) {
            this.bind(this.shortcuts, normalizeShortcut(command.shortcut), command.id, 'Shortcut');
        }

        this.log(`Registered command: ${command.id}`, { category: command.category });
    }

    /**
     * Execute a command by id or alias.
     *
     * Never rejects: a missing command, a missing context, a refused
     * canExecute() and a thrown error all come back as `{ success: false }`.
     */
    async execute<TArgs = unknown>(
        id: string,
        options: ExecuteOptions<TArgs> = {}
    ): Promise<CommandResult> {
        const command = this.lookup(id);
        if (!command) {
            const message = `Command '${id}' not found`;
            this.log(message, undefined, 'warn');
            return { success: false, message };
        }

        const ctx = this.context;
        if (!ctx) {
            const message = 'CommandService context not set';
            this.log(message, undefined, 'error');
            return { success: false, message };
        }

        try {
            if (!options.force && !command.canExecute(ctx, options.args)) {
                return this.refuse(ctx, command, options);
            }

            this.log(`Executing command: ${command.id}`, options.args ? { args: options.args } : undefined);
            const result: CommandResult = (await command.execute(ctx, options.args)) ?? { success: true };

            if (!result.success) {
                this.log(`Command '${command.id}' failed: ${result.message}`, undefined, 'warn');
            }
            return result;
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            console.error(`[CommandService] Command '${command.id}' threw error:`, error);
            if (!options.silent) {
                ctx.statusService?.error(`Error: ${message}`);
            }
            return { success: false, message };
        }
    }

    /**
     * Execute the command bound to a shortcut
     * @returns null when nothing is bound to it
     */
    async executeShortcut(shortcut: string): Promise<CommandResult | null> {
        const commandId = this.shortcuts.get(normalizeShortcut(shortcut));
        if (commandId === undefined) {
            this.log(`No command bound to shortcut: ${shortcut}`);
            return null;
        }
        return this.execute(commandId);
    }

    canExecute<TArgs = unknown>(id: string, args?: TArgs): boolean {
        const command = this.lookup(id);
        return command !== undefined && this.context !== null && command.canExecute(this.context, args);
    }

    /**
     * Signal that clipboard state changed, re-evaluating every canExecute$ stream
     */
    notifyStateChange(): void {
        this.revision$.next(this.revision$.value + 1);
    }

    /**
     * Enabled state of a command: emits now, then on each change
     */
    canExecute$(id: string): Observable<boolean> {
        return this.revision$.pipe(
            map(() => this.canExecute(id)),
            distinctUntilChanged()
        );
    }

    getStats(): CommandStats {
        const categories: Record<string, number> = {};
        for (const command of this.commands.values()) {
            categories[command.category] = (categories[command.category] ?? 0) + 1;
        }

        return {
            commandCount: this.commands.size,
            aliasCount: this.aliases.size,
            shortcutCount: this.shortcuts.size,
            categories
        };
    }

    enableDebug(): void {
        this.debugMode = true;
    }

    disableDebug(): void {
        this.debugMode = false;
    }

    private lookup(idOrAlias: string): Command<unknown> | undefined {
        return this.commands.get(idOrAlias) ?? this.commands.get(this.aliases.get(idOrAlias) ?? '');
    }

    private bind(table: Map<string, string>, name: string, commandId: string, kind: string): void {
        const existing = table.get(name);
        if (existing !== undefined && existing !== commandId) {
            console.warn(`[CommandService] ${kind} '${name}' already bound to '${existing}', rebinding to '${commandId}'`);
        }
        table.set(name, commandId);
    }

    private refuse<TArgs>(
        ctx: CommandContext,
        command: Command<unknown>,
        options: ExecuteOptions<TArgs>
    ): CommandResult {
        this.log(`Command '${command.id}' cannot execute in current state`);
        if (command.disabledMessage === undefined) {
            return { success: false, message: 'Command cannot execute in current state' };
        }
        if (!options.silent) {
            ctx.statusService?.info(command.disabledMessage);
        }
        return { success: false, message: command.disabledMessage };
    }

    /**
     * Log a debug message
     * @private
     */
    private log(
        message: string,
        data?: Record<string, unknown>,
        level: 'log' | 'warn' | 'error' = 'log'
    ): void {
        if (!this.debugMode && level === 'log') return;

        const prefix = '[CommandService]';
        if (data) {
            console[level](prefix, message, data);
        } else {
            console[level](prefix, message);
        }
    }
}
