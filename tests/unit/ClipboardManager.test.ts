/**
 * @fileoverview Unit tests for ClipboardManager
 * Tests capture, navigation, mirroring, registers and the yank stack.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ClipboardManager } from '../../src/services/ClipboardManager';
import { MemoryClipboardPort } from '../../src/services/MemoryClipboardPort';
import { ClipboardSettings } from '../../src/core/ClipboardSettings';
import { ClipboardSyncError, InvalidRegisterKeyError } from '../../src/core/errors';
import type { IClipboardSyncPort } from '../../src/services/interfaces/IClipboardSyncPort';
import type { CaptureEvent } from '../../src/types';

describe('ClipboardManager', () => {
    let port: MemoryClipboardPort;
    let manager: ClipboardManager;

    beforeEach(() => {
        port = new MemoryClipboardPort();
        manager = new ClipboardManager(port);
    });

    describe('copy and cut', () => {
        it('mirrors each capture to the clipboard', () => {
            manager.copy('foo');
            manager.cut('bar');

            expect(port.getWrites()).toEqual(['foo', 'bar']);
            expect(port.read()).toBe('bar');
        });

        it('keeps one entry for a repeated copy', () => {
            manager.copy('x');
            manager.copy('x');

            expect(manager.state$.value.historySize).toBe(1);
        });

        it('publishes captures with their kind', () => {
            const events: CaptureEvent[] = [];
            manager.captures$.subscribe(e => events.push(e));

            manager.copy('a');
            manager.cut('b');

            expect(events.map(e => [e.kind, e.entry.text, e.addedToHistory])).toEqual([
                ['copy', 'a', true],
                ['cut', 'b', true],
            ]);
        });

        it('ignores empty copies when configured', () => {
            manager = new ClipboardManager(port, new ClipboardSettings({ ignoreEmptyCopies: true }));

            expect(manager.copy('')).toBeNull();
            expect(port.getWrites()).toEqual([]);
            expect(manager.state$.value.historySize).toBe(0);
        });

        it('records empty copies by default', () => {
            expect(manager.copy('')?.text).toBe('');
            expect(port.getWrites()).toEqual(['']);
        });
    });

    describe('history navigation', () => {
        beforeEach(() => {
            manager.copy('foo');
            manager.copy('bar');
            manager.copy('baz');
        });

        it('mirrors every entry the cursor moves to', () => {
            expect(manager.previousAndGetText()).toEqual({ text: 'bar', indent: false });
            expect(manager.previousAndGetText()).toEqual({ text: 'foo', indent: false });
            expect(manager.previousAndGetText()).toEqual({ text: 'foo', indent: false });
            expect(manager.nextAndGetText()).toEqual({ text: 'bar', indent: false });

            expect(port.getWrites().slice(3)).toEqual(['bar', 'foo', 'foo', 'bar']);
        });

        it('threads the indent option through', () => {
            expect(manager.pasteCurrent({ indent: true })).toEqual({ text: 'baz', indent: true });
        });

        it('re-mirrors the current entry on paste', () => {
            port.setExternal('something else');

            manager.pasteCurrent();

            expect(port.read()).toBe('baz');
        });

        it('jumps to either end', () => {
            expect(manager.oldestAndGetText()?.text).toBe('foo');
            expect(manager.newestAndGetText()?.text).toBe('baz');
        });

        it('selects a buffer index', () => {
            expect(manager.selectAndGetText(1, { indent: true })).toEqual({ text: 'bar', indent: true });
            expect(manager.state$.value.cursor).toEqual({ kind: 'atOlder', index: 1 });
            expect(port.read()).toBe('bar');
        });

        it('publishes the cursor on state$', () => {
            manager.previousAndGetText();

            expect(manager.state$.value).toEqual({
                historySize: 3,
                cursor: { kind: 'atOlder', index: 1 },
                currentText: 'bar',
                registerCount: 0,
                yankMode: true,
                yankSize: 3,
            });
        });

        it('pops the pasted entry when asked', () => {
            expect(manager.pasteCurrent({ pop: true })).toEqual({ text: 'baz', indent: false });

            expect(manager.describeHistory().map(item => item.text)).toEqual(['bar', 'foo']);
            expect(port.read()).toBe('baz');
            expect(manager.state$.value.currentText).toBe('bar');
        });

        it('pops a chosen entry and moves to the next older one', () => {
            expect(manager.selectAndGetText(1, { pop: true })?.text).toBe('bar');

            expect(manager.describeHistory().map(item => item.text)).toEqual(['baz', 'foo']);
            expect(manager.state$.value.cursor).toEqual({ kind: 'atOldest', index: 0 });
        });

        it('keeps the entry when pop is not set', () => {
            manager.pasteCurrent({ pop: false });

            expect(manager.state$.value.historySize).toBe(3);
        });

        it('clears the history', () => {
            manager.clearHistory();

            expect(manager.state$.value.historySize).toBe(0);
            expect(manager.pasteCurrent()).toBeNull();
        });
    });

    describe('empty history', () => {
        it('returns null without touching the clipboard', () => {
            expect(manager.nextAndGetText()).toBeNull();
            expect(manager.previousAndGetText()).toBeNull();
            expect(manager.pasteCurrent()).toBeNull();
            expect(manager.selectAndGetText(0)).toBeNull();
            expect(port.getWrites()).toEqual([]);
        });
    });

    describe('single entry', () => {
        it('stays on the entry and mirrors it again', () => {
            manager.copy('alpha');

            expect(manager.previousAndGetText()?.text).toBe('alpha');
            expect(port.getWrites()).toEqual(['alpha', 'alpha']);
        });
    });

    describe('registers', () => {
        it('stores and returns register text', () => {
            manager.copyToRegister('a', 'hello');

            expect(manager.pasteFromRegister('a')).toEqual({ text: 'hello', indent: false });
            expect(manager.pasteFromRegister('b')).toBeNull();
        });

        it('mirrors on register copy and paste', () => {
            manager.copyToRegister('a', 'hello');
            manager.copy('other');
            manager.pasteFromRegister('a');

            expect(port.getWrites()).toEqual(['hello', 'other', 'hello']);
        });

        it('does not add register text to the history', () => {
            manager.copyToRegister('a', 'hello');

            expect(manager.state$.value.historySize).toBe(0);
            expect(manager.state$.value.registerCount).toBe(1);
        });

        it('keeps registers when history entries are evicted', () => {
            manager = new ClipboardManager(port, new ClipboardSettings({ maxHistory: 1 }));
            manager.copyToRegister('k', 'kept');
            manager.copy('a');
            manager.copy('b');

            expect(manager.pasteFromRegister('k')?.text).toBe('kept');
        });

        it.each(['', 'ab', ' ', '\n', '\u200b'])('rejects key %j', key => {
            expect(() => manager.copyToRegister(key, 'x')).toThrow(InvalidRegisterKeyError);
            expect(() => manager.pasteFromRegister(key)).toThrow(InvalidRegisterKeyError);
            expect(manager.state$.value.registerCount).toBe(0);
        });

        it('accepts a single non-ASCII character', () => {
            manager.copyToRegister('\u00e9', 'accent');

            expect(manager.pasteFromRegister('\u00e9')?.text).toBe('accent');
        });

        it('stores the current history entry without mirroring', () => {
            manager.copy('first');
            manager.copy('second');
            manager.previousAndGetText();
            const writes = port.getWrites().length;

            const entry = manager.storeCurrentInRegister('q');

            expect(entry?.text).toBe('first');
            expect(port.getWrites()).toHaveLength(writes);
            expect(manager.describeRegisters()).toEqual([
                { key: 'q', preview: 'first', text: 'first' },
            ]);
        });

        it('returns null when storing from an empty history', () => {
            expect(manager.storeCurrentInRegister('q')).toBeNull();
        });

        it('resets a group of registers', () => {
            manager.copyToRegister('a', 'x');
            manager.copyToRegister('1', 'y');

            expect(manager.resetRegisters('lowercase')).toBe(1);
            expect(manager.pasteFromRegister('a')).toBeNull();
            expect(manager.pasteFromRegister('1')?.text).toBe('y');
            expect(manager.state$.value.registerCount).toBe(1);
        });
    });

    describe('yank stack', () => {
        it('queues every copy while implicit yank mode is on', () => {
            manager.copy('one');
            manager.copy('two');

            expect(manager.isYankMode()).toBe(true);
            expect(manager.yank()?.text).toBe('one');
            expect(manager.yank()?.text).toBe('two');
            expect(manager.yank()).toBeNull();
            expect(manager.state$.value.historySize).toBe(2);
        });

        it('mirrors yanked text', () => {
            manager.copy('one');
            manager.copy('two');

            manager.yank();

            expect(port.read()).toBe('one');
        });

        it('keeps explicit-mode copies out of the history', () => {
            manager = new ClipboardManager(port, new ClipboardSettings({ explicitYankMode: true }));
            expect(manager.isYankMode()).toBe(false);

            manager.toggleYankMode();
            const entry = manager.copy('queued');

            expect(entry?.text).toBe('queued');
            expect(manager.state$.value.historySize).toBe(0);
            expect(manager.state$.value.yankSize).toBe(1);
            expect(port.read()).toBe('queued');
        });

        it('leaves explicit yank mode when the stack empties, if configured', () => {
            manager = new ClipboardManager(
                port,
                new ClipboardSettings({ explicitYankMode: true, endYankModeOnEmptiedStack: true })
            );
            manager.toggleYankMode();
            manager.copy('a');
            manager.copy('b');

            manager.yank();
            expect(manager.isYankMode()).toBe(true);

            manager.yank();
            expect(manager.isYankMode()).toBe(false);
        });

        it('never queues more than the history capacity', () => {
            manager = new ClipboardManager(port, new ClipboardSettings({ maxHistory: 3 }));
            for (const text of ['c1', 'c2', 'c3', 'c4', 'c5']) manager.copy(text);

            expect(manager.state$.value.yankSize).toBe(3);
            expect(manager.yank()?.text).toBe('c3');
        });

        it('trims the stack when the capacity shrinks', () => {
            const settings = new ClipboardSettings();
            manager = new ClipboardManager(port, settings);
            manager.copy('a');
            manager.copy('b');
            manager.copy('c');

            settings.set('maxHistory', 1);

            expect(manager.describeYankStack().map(item => item.text)).toEqual(['c']);
        });

        it('discards the queued run when explicit yank mode is toggled off', () => {
            manager = new ClipboardManager(port, new ClipboardSettings({ explicitYankMode: true }));
            manager.toggleYankMode();
            manager.copy('a');
            manager.copy('b');

            expect(manager.toggleYankMode()).toBe(false);

            expect(manager.state$.value.yankSize).toBe(0);
            expect(manager.yank()).toBeNull();
        });

        it('keeps the stack when implicit yank mode is toggled off', () => {
            manager.copy('a');

            manager.toggleYankMode();

            expect(manager.state$.value.yankSize).toBe(1);
        });

        it('clears the stack', () => {
            manager.copy('a');

            manager.clearYankStack();

            expect(manager.state$.value.yankSize).toBe(0);
            expect(manager.yank()).toBeNull();
        });
    });

    describe('captureExternal', () => {
        it('records text from another application without writing it back', () => {
            manager.copy('mine');

            const entry = manager.captureExternal('theirs');

            expect(entry?.text).toBe('theirs');
            expect(port.getWrites()).toEqual(['mine']);
            expect(manager.getLastMirrored()).toBe('theirs');
            expect(manager.pasteCurrent()?.text).toBe('theirs');
        });

        it('ignores the text it mirrored itself', () => {
            manager.copy('mine');

            expect(manager.captureExternal('mine')).toBeNull();
            expect(manager.state$.value.historySize).toBe(1);
        });

        it('publishes an external capture', () => {
            const listener = vi.fn();
            manager.captures$.subscribe(listener);

            manager.captureExternal('outside');

            expect(listener).toHaveBeenCalledWith(
                expect.objectContaining({ kind: 'external', addedToHistory: true })
            );
        });
    });

    describe('clipboard failures', () => {
        const failingPort: IClipboardSyncPort = {
            read: () => '',
            write: () => {
                throw new ClipboardSyncError('Failed to write the system clipboard', new Error('no display'));
            },
        };

        it('propagates the sync error and keeps the push', () => {
            manager = new ClipboardManager(failingPort);

            expect(() => manager.copy('text')).toThrow(ClipboardSyncError);
            expect(manager.state$.value.historySize).toBe(1);
        });
    });

    describe('settings', () => {
        it('applies a capacity change to the history', () => {
            const settings = new ClipboardSettings();
            manager = new ClipboardManager(port, settings);
            manager.copy('a');
            manager.copy('b');
            manager.copy('c');

            settings.set('maxHistory', 2);

            expect(manager.describeHistory().map(item => item.text)).toEqual(['c', 'b']);
        });

        it('applies the duplicate policy to later copies', () => {
            const settings = new ClipboardSettings();
            manager = new ClipboardManager(port, settings);
            settings.set('allowHistoryDuplicates', false);

            manager.copy('a');
            manager.copy('b');
            manager.copy('a');

            expect(manager.describeHistory().map(item => item.text)).toEqual(['a', 'b']);
        });
    });

    describe('dispose', () => {
        it('completes state$', () => {
            const complete = vi.fn();
            manager.state$.subscribe({ complete });

            manager.dispose();

            expect(complete).toHaveBeenCalled();
        });
    });
});
