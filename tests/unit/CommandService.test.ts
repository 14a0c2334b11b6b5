/**
 * @fileoverview Unit tests for CommandService
 * Tests the command registry, execution, alias and shortcut handling.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { CommandService, normalizeShortcut } from '../../src/commands/CommandService';
import type { Command, CommandContext } from '../../src/commands/types';
import { ClipboardManager } from '../../src/services/ClipboardManager';
import { MemoryClipboardPort } from '../../src/services/MemoryClipboardPort';
import { FakeEditor, RecordingStatusService } from '../helpers/fakes';

// Import actual commands for integration tests
import { CopyCommand } from '../../src/commands/clipboard/CopyCommand';
import { PasteCommand } from '../../src/commands/clipboard/PasteCommand';
import { NextCommand } from '../../src/commands/history/NextCommand';
import { PasteFromRegisterCommand } from '../../src/commands/register/PasteFromRegisterCommand';

// Context factory
function createContext(overrides: Partial<CommandContext> = {}): CommandContext {
    return {
        clipboard: new ClipboardManager(new MemoryClipboardPort()),
        editor: new FakeEditor(),
        statusService: new RecordingStatusService(),
        ...overrides,
    };
}

// Mock command factory
function createMockCommand(overrides: Partial<Command> = {}): Command {
    return {
        id: 'test.command',
        label: 'Test Command',
        category: 'clipboard',
        canExecute: vi.fn().mockReturnValue(true),
        execute: vi.fn().mockReturnValue({ success: true }),
        ...overrides,
    };
}

describe('CommandService', () => {
    let service: CommandService;

    beforeEach(() => {
        service = new CommandService();
    });

    describe('register', () => {
        it('makes a command executable by id and by alias', async () => {
            const command = createMockCommand({ id: 'test.register', aliases: ['do_it'] });
            service.setContext(createContext());

            service.register(command);
            await service.execute('test.register');
            await service.execute('do_it');

            expect(command.execute).toHaveBeenCalledTimes(2);
        });

        it('binds the shortcut in any spelling', async () => {
            const command = createMockCommand({ id: 'test.norm', shortcut: 'shift+ctrl+v' });
            service.setContext(createContext());
            service.register(command);

            await service.executeShortcut('Ctrl+Shift+V');
            await service.executeShortcut('cmd+shift+v');

            expect(command.execute).toHaveBeenCalledTimes(2);
        });

        it('warns on duplicate command ID', () => {
            const consoleSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

            service.register(createMockCommand({ id: 'test.dup' }));
            service.register(createMockCommand({ id: 'test.dup' }));

            expect(consoleSpy).toHaveBeenCalledWith(
                "[CommandService] Command 'test.dup' already registered, overwriting"
            );
        });

        it('warns when an alias moves to another command', () => {
            const consoleSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

            service.register(createMockCommand({ id: 'first', aliases: ['shared'] }));
            service.register(createMockCommand({ id: 'second', aliases: ['shared'] }));

            expect(consoleSpy).toHaveBeenCalledWith(
                "[CommandService] Alias 'shared' already bound to 'first', rebinding to 'second'"
            );
        });
    });

    describe('normalizeShortcut', () => {
        it.each([
            ['ctrl+c', 'Ctrl+C'],
            ['shift+cmd+v', 'Ctrl+Shift+V'],
            ['Option + Control + x', 'Ctrl+Alt+X'],
            ['alt+Insert', 'Alt+Insert'],
        ])('spells %j as %j', (raw, expected) => {
            expect(normalizeShortcut(raw)).toBe(expected);
        });
    });

    describe('execute', () => {
        it('executes a registered command', async () => {
            const context = createContext();
            const command = createMockCommand({ id: 'test.exec' });

            service.setContext(context);
            service.register(command);

            const result = await service.execute('test.exec');

            expect(result.success).toBe(true);
            expect(command.execute).toHaveBeenCalledWith(context, undefined);
        });

        it('executes a command by alias', async () => {
            const command = createMockCommand({ id: 'test.byalias', aliases: ['by_alias'] });

            service.setContext(createContext());
            service.register(command);

            const result = await service.execute('by_alias');

            expect(result.success).toBe(true);
            expect(command.execute).toHaveBeenCalledTimes(1);
        });

        it('returns error for unregistered command', async () => {
            service.setContext(createContext());

            const result = await service.execute('nonexistent');

            expect(result).toEqual({ success: false, message: "Command 'nonexistent' not found" });
        });

        it('returns error when context not set', async () => {
            vi.spyOn(console, 'error').mockImplementation(() => {});
            service.register(createMockCommand({ id: 'test.nocontext' }));

            const result = await service.execute('test.nocontext');

            expect(result).toEqual({ success: false, message: 'CommandService context not set' });
        });

        it('checks canExecute before executing', async () => {
            const command = createMockCommand({
                id: 'test.canexec',
                canExecute: vi.fn().mockReturnValue(false),
            });

            service.setContext(createContext());
            service.register(command);

            const result = await service.execute('test.canexec');

            expect(result.success).toBe(false);
            expect(command.execute).not.toHaveBeenCalled();
        });

        it('shows the disabled message', async () => {
            const statusService = new RecordingStatusService();
            service.setContext(createContext({ statusService }));
            service.register(createMockCommand({
                id: 'test.disabled',
                disabledMessage: 'Nothing here',
                canExecute: () => false,
            }));

            const result = await service.execute('test.disabled');

            expect(result).toEqual({ success: false, message: 'Nothing here' });
            expect(statusService.notices).toEqual([{ level: 'info', message: 'Nothing here' }]);
        });

        it('keeps quiet about a disabled command when silent', async () => {
            const statusService = new RecordingStatusService();
            service.setContext(createContext({ statusService }));
            service.register(createMockCommand({
                id: 'test.quiet',
                disabledMessage: 'Nothing here',
                canExecute: () => false,
            }));

            await service.execute('test.quiet', { silent: true });

            expect(statusService.notices).toEqual([]);
        });

        it('skips canExecute check when force is true', async () => {
            const command = createMockCommand({
                id: 'test.force',
                canExecute: vi.fn().mockReturnValue(false),
            });

            service.setContext(createContext());
            service.register(command);

            const result = await service.execute('test.force', { force: true });

            expect(result.success).toBe(true);
            expect(command.execute).toHaveBeenCalled();
        });

        it('passes args to command', async () => {
            const context = createContext();
            const command = createMockCommand({ id: 'test.args' });

            service.setContext(context);
            service.register(command);

            await service.execute('test.args', { args: { key: 'a' } });

            expect(command.execute).toHaveBeenCalledWith(context, { key: 'a' });
        });

        it('treats a void result as success', async () => {
            service.setContext(createContext());
            service.register(createMockCommand({ id: 'test.void', execute: () => undefined }));

            const result = await service.execute('test.void');

            expect(result).toEqual({ success: true });
        });

        it('handles async commands', async () => {
            const command = createMockCommand({
                id: 'test.async',
                execute: vi.fn().mockResolvedValue({ success: true, message: 'async done' }),
            });

            service.setContext(createContext());
            service.register(command);

            const result = await service.execute('test.async');

            expect(result.success).toBe(true);
            expect(result.message).toBe('async done');
        });

        it('catches and reports errors', async () => {
            const consoleSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
            const statusService = new RecordingStatusService();
            service.setContext(createContext({ statusService }));
            service.register(createMockCommand({
                id: 'test.error',
                execute: vi.fn().mockImplementation(() => {
                    throw new Error('Test error');
                }),
            }));

            const result = await service.execute('test.error');

            expect(result).toEqual({ success: false, message: 'Test error' });
            expect(statusService.notices).toEqual([{ level: 'error', message: 'Error: Test error' }]);
            expect(consoleSpy).toHaveBeenCalled();
        });
    });

    describe('executeShortcut', () => {
        it('executes command by shortcut', async () => {
            service.setContext(createContext());
            service.register(createMockCommand({ id: 'test.shortcut', shortcut: 'Ctrl+S' }));

            const result = await service.executeShortcut('Ctrl+S');

            expect(result).toEqual({ success: true });
        });

        it('returns null for unregistered shortcut', async () => {
            service.setContext(createContext());

            const result = await service.executeShortcut('Ctrl+Unknown');

            expect(result).toBeNull();
        });
    });

    describe('canExecute', () => {
        it('returns true when command can execute', () => {
            service.setContext(createContext());
            service.register(createMockCommand({ id: 'test.can', canExecute: () => true }));

            expect(service.canExecute('test.can')).toBe(true);
        });

        it('returns false when command cannot execute', () => {
            service.setContext(createContext());
            service.register(createMockCommand({ id: 'test.cannot', canExecute: () => false }));

            expect(service.canExecute('test.cannot')).toBe(false);
        });

        it('returns false for unregistered command', () => {
            service.setContext(createContext());

            expect(service.canExecute('nonexistent')).toBe(false);
        });

        it('returns false when context not set', () => {
            service.register(createMockCommand({ id: 'test.nocontext2' }));

            expect(service.canExecute('test.nocontext2')).toBe(false);
        });
    });

    describe('getStats', () => {
        it('returns correct statistics', () => {
            service.register(createMockCommand({ id: 'h1', category: 'history', shortcut: 'Ctrl+1', aliases: ['one'] }));
            service.register(createMockCommand({ id: 'h2', category: 'history', shortcut: 'Ctrl+2' }));
            service.register(createMockCommand({ id: 'y1', category: 'yank', shortcut: 'Ctrl+3' }));

            expect(service.getStats()).toEqual({
                commandCount: 3,
                aliasCount: 1,
                shortcutCount: 3,
                categories: { history: 2, yank: 1 },
            });
        });
    });

    describe('canExecute$', () => {
        it('emits the current state, then changes on notifyStateChange', () => {
            let canExec = false;
            service.setContext(createContext());
            service.register(createMockCommand({ id: 'test.reactive', canExecute: () => canExec }));

            const values: boolean[] = [];
            const subscription = service.canExecute$('test.reactive').subscribe(v => values.push(v));

            canExec = true;
            service.notifyStateChange();
            service.notifyStateChange();

            expect(values).toEqual([false, true]);
            subscription.unsubscribe();
        });
    });
});

describe('Command Integration', () => {
    let service: CommandService;

    beforeEach(() => {
        service = new CommandService();
    });

    describe('history commands', () => {
        it('cannot execute when the history is empty', () => {
            service.setContext(createContext());
            service.register(NextCommand);
            service.register(PasteCommand);

            expect(service.canExecute('history.next')).toBe(false);
            expect(service.canExecute('clipboard.paste')).toBe(false);
        });

        it('can execute once something was copied', () => {
            const context = createContext();
            context.clipboard.copy('text');

            service.setContext(context);
            service.register(NextCommand);

            expect(service.canExecute('history.next')).toBe(true);
        });
    });

    describe('clipboard commands', () => {
        it('copy is always available', () => {
            service.setContext(createContext());
            service.register(CopyCommand);

            expect(service.canExecute('clipboard.copy')).toBe(true);
        });
    });

    describe('register commands', () => {
        it('needs a valid register key', () => {
            service.setContext(createContext());
            service.register(PasteFromRegisterCommand);

            expect(service.canExecute('register.paste')).toBe(false);
            expect(service.canExecute('register.paste', { key: 'ab' })).toBe(false);
            expect(service.canExecute('register.paste', { key: 'a' })).toBe(true);
        });
    });
});
