/**
 * @fileoverview App Initializer - wires one editing context together
 * @module services/AppInitializer
 *
 * Builds the settings, clipboard engine, command registry and optional
 * clipboard monitor for one editing context, and tears them down again.
 * There is no process-wide instance: hosts with several windows create one
 * initializer per window.
 *
 * Usage:
 * ```typescript
 * const history = createClipboardHistory({ editor, statusService });
 * await history.commands.execute('copy');
 * history.dispose();
 * ```
 */

import { Subscription } from 'rxjs';
import { CommandService } from '../commands/CommandService';
import { registerClipboardCommands } from '../commands';
import { ClipboardSettings, type ClipboardSettingsConfig } from '../core/ClipboardSettings';
import { ClipboardSyncError } from '../core/errors';
import { ClipboardManager } from './ClipboardManager';
import { ClipboardMonitor } from './ClipboardMonitor';
import { SystemClipboardPort } from './SystemClipboardPort';
import type { IClipboardSyncPort } from './interfaces/IClipboardSyncPort';
import type { IHostEditor, IStatusService } from './interfaces/IHostEditor';

/**
 * App initializer options
 */
export interface AppInitializerOptions {
  /** Host editor collaborator */
  editor: IHostEditor;
  /** Notices and panels; omit for headless hosts */
  statusService?: IStatusService | null;
  /** Clipboard slot, defaults to the OS clipboard */
  port?: IClipboardSyncPort;
  /** Settings instance, or overrides for a new one */
  settings?: ClipboardSettings | Partial<ClipboardSettingsConfig>;
}

/**
 * Everything an editing context needs, as returned by initialize()
 */
export interface ClipboardHistory {
  settings: ClipboardSettings;
  manager: ClipboardManager;
  commands: CommandService;
  monitor: ClipboardMonitor;
  dispose(): void;
}

/**
 * App Initializer
 * Handles the initialization sequence for one editing context
 */
export class AppInitializer {
  private readonly options: AppInitializerOptions;
  private history: ClipboardHistory | null = null;
  private subscriptions = new Subscription();

  constructor(options: AppInitializerOptions) {
    this.options = options;
  }

  /**
   * Build and wire the context. Calling it again returns the same context.
   */
  initialize(): ClipboardHistory {
    if (this.history) {
      console.warn('[AppInitializer] Already initialized');
      return this.history;
    }

    const settings = this._resolveSettings();
    const port = this.options.port ?? new SystemClipboardPort();
    const manager = new ClipboardManager(port, settings);
    if (settings.get('captureClipboardOnStart')) {
      this._captureStartupClipboard(manager, port);
    }

    const commands = new CommandService({ debug: settings.get('debug') });
    commands.setContext({
      clipboard: manager,
      editor: this.options.editor,
      statusService: this.options.statusService ?? null,
    });
    registerClipboardCommands(commands);

    // Command availability follows engine state
    this.subscriptions.add(manager.state$.subscribe(() => commands.notifyStateChange()));
    this.subscriptions.add(
      settings.settings$.subscribe(cfg => {
        if (cfg.debug) commands.enableDebug();
        else commands.disableDebug();
      })
    );

    const monitor = new ClipboardMonitor(manager, port, {
      intervalMs: settings.get('monitorIntervalMs'),
    });
    if (settings.get('monitorIntervalMs') > 0) {
      monitor.start();
    }

    this.history = {
      settings,
      manager,
      commands,
      monitor,
      dispose: () => this.dispose(),
    };

    const stats = commands.getStats();
    if (settings.get('debug')) {
      console.log(
        `[AppInitializer] Registered ${stats.commandCount} commands with ${stats.aliasCount} aliases`,
        stats.categories
      );
    }

    return this.history;
  }

  isInitialized(): boolean {
    return this.history !== null;
  }

  /**
   * Stop the monitor and release every subscription
   */
  dispose(): void {
    if (!this.history) return;

    this.history.monitor.stop();
    this.subscriptions.unsubscribe();
    this.subscriptions = new Subscription();
    this.history.manager.dispose();
    this.history = null;
  }

  /**
   * Seed the history with whatever the clipboard already holds.
   * An unreadable clipboard is reported and start-up continues.
   */
  private _captureStartupClipboard(manager: ClipboardManager, port: IClipboardSyncPort): void {
    try {
      const text = port.read();
      if (text !== '') {
        manager.captureExternal(text);
      }
    } catch (error) {
      if (!(error instanceof ClipboardSyncError)) throw error;
      console.warn('[AppInitializer] Could not read the clipboard at start-up:', error.message);
    }
  }

  private _resolveSettings(): ClipboardSettings {
    const settings = this.options.settings;
    if (settings instanceof ClipboardSettings) {
      return settings;
    }
    return new ClipboardSettings(settings ?? {});
  }
}

/**
 * Build a ready-to-use editing context
 */
export function createClipboardHistory(options: AppInitializerOptions): ClipboardHistory {
  return new AppInitializer(options).initialize();
}
