/**
 * @fileoverview Clipboard settings
 * @module core/ClipboardSettings
 *
 * Typed settings with defaults, loaded from overrides or a JSON file.
 * Unknown keys and values of the wrong type are reported and replaced by the
 * default.
 *
 * Usage:
 *   const settings = ClipboardSettings.fromFile('clip-history.settings.json');
 *   settings.get('maxHistory');
 *   settings.settings$.subscribe(cfg => ...);
 */

import { existsSync, readFileSync } from 'fs';
import { BehaviorSubject } from 'rxjs';
import { DEFAULT_MAX_HISTORY } from './Constants';

/**
 * Settings definitions
 */
export interface ClipboardSettingsConfig {
    /** History capacity */
    maxHistory: number;
    /** Keep identical text deeper in the history (consecutive copies are always collapsed) */
    allowHistoryDuplicates: boolean;
    /** Treat copy/cut of empty text as a no-op */
    ignoreEmptyCopies: boolean;
    /** Yank mode must be toggled explicitly; while on, copies skip the history */
    explicitYankMode: boolean;
    /** Leave explicit yank mode once the yank stack is emptied */
    endYankModeOnEmptiedStack: boolean;
    /** Record the clipboard's text (when not empty) as the first history entry at start-up */
    captureClipboardOnStart: boolean;
    /** Clipboard monitor poll interval in ms, 0 disables monitoring */
    monitorIntervalMs: number;
    /** Verbose console tracing */
    debug: boolean;
}

/**
 * Default values
 */
export const DEFAULT_SETTINGS: Readonly<ClipboardSettingsConfig> = Object.freeze({
    maxHistory: DEFAULT_MAX_HISTORY,
    allowHistoryDuplicates: true,
    ignoreEmptyCopies: false,
    explicitYankMode: false,
    endYankModeOnEmptiedStack: false,
    captureClipboardOnStart: true,
    monitorIntervalMs: 0,
    debug: false,
});

const BOOLEAN_KEYS = [
    'allowHistoryDuplicates',
    'ignoreEmptyCopies',
    'explicitYankMode',
    'endYankModeOnEmptiedStack',
    'captureClipboardOnStart',
    'debug',
] as const;

/** Numeric keys with their minimum value */
const NUMBER_KEYS = [
    ['maxHistory', 1],
    ['monitorIntervalMs', 0],
] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isKnownKey(key: string): key is keyof ClipboardSettingsConfig {
    return Object.prototype.hasOwnProperty.call(DEFAULT_SETTINGS, key);
}

/**
 * Keep the well-typed subset of raw settings input
 *
 * @param input - Parsed JSON or caller overrides
 * @param source - Where the input came from, for warnings
 */
export function sanitizeSettings(input: unknown, source: string = 'overrides'): Partial<ClipboardSettingsConfig> {
    const result: Partial<ClipboardSettingsConfig> = {};

    if (!isRecord(input)) {
        console.warn(`[ClipboardSettings] Ignoring ${source}: expected an object`);
        return result;
    }

    for (const key of Object.keys(input)) {
        if (!isKnownKey(key)) {
            console.warn(`[ClipboardSettings] Unknown setting '${key}' in ${source}`);
        }
    }

    for (const key of BOOLEAN_KEYS) {
        const value = input[key];
        if (value === undefined) continue;
        if (typeof value === 'boolean') {
            result[key] = value;
        } else {
            console.warn(`[ClipboardSettings] '${key}' in ${source} must be a boolean, using default`);
        }
    }

    for (const [key, min] of NUMBER_KEYS) {
        const value = input[key];
        if (value === undefined) continue;
        if (typeof value === 'number' && Number.isInteger(value) && value >= min) {
            result[key] = value;
        } else {
            console.warn(`[ClipboardSettings] '${key}' in ${source} must be an integer >= ${min}, using default`);
        }
    }

    return result;
}

/**
 * Settings service
 *
 * Constructor is public; create one per editing context and inject it.
 */
export class ClipboardSettings {
    public readonly settings$: BehaviorSubject<ClipboardSettingsConfig>;

    constructor(overrides: Partial<ClipboardSettingsConfig> = {}) {
        this.settings$ = new BehaviorSubject<ClipboardSettingsConfig>({
            ...DEFAULT_SETTINGS,
            ...sanitizeSettings(overrides),
        });
    }

    /**
     * Load settings from a JSON file. A missing file yields the defaults.
     */
    static fromFile(path: string): ClipboardSettings {
        if (!existsSync(path)) {
            return new ClipboardSettings();
        }

        try {
            const parsed: unknown = JSON.parse(readFileSync(path, 'utf8'));
            return new ClipboardSettings(sanitizeSettings(parsed, path));
        } catch (err) {
            console.warn(`[ClipboardSettings] Failed to load ${path}:`, err);
            return new ClipboardSettings();
        }
    }

    /**
     * Get a setting value
     */
    get<K extends keyof ClipboardSettingsConfig>(key: K): ClipboardSettingsConfig[K] {
        return this.settings$.value[key];
    }

    /**
     * Set a setting value
     */
    set<K extends keyof ClipboardSettingsConfig>(key: K, value: ClipboardSettingsConfig[K]): void {
        const patch: Partial<ClipboardSettingsConfig> = {};
        patch[key] = value;
        this.update(patch);
    }

    /**
     * Merge several values at once; invalid values are dropped with a warning
     */
    update(patch: Partial<ClipboardSettingsConfig>): void {
        const clean = sanitizeSettings(patch);
        if (Object.keys(clean).length === 0) return;
        this.settings$.next({ ...this.settings$.value, ...clean });
    }

    /**
     * Get all settings
     */
    getAll(): ClipboardSettingsConfig {
        return { ...this.settings$.value };
    }

    /**
     * Reset all settings to defaults
     */
    reset(): void {
        this.settings$.next({ ...DEFAULT_SETTINGS });
    }
}
