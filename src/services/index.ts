/**
 * Services Index
 *
 * Central export for all service modules.
 */

export { ClipboardManager } from './ClipboardManager';
export { ClipboardMonitor, type ClipboardMonitorOptions } from './ClipboardMonitor';
export { SystemClipboardPort } from './SystemClipboardPort';
export { MemoryClipboardPort } from './MemoryClipboardPort';
export {
  AppInitializer,
  createClipboardHistory,
  type AppInitializerOptions,
  type ClipboardHistory,
} from './AppInitializer';
export type { IClipboardManager, IClipboardSyncPort, IHostEditor, IStatusService } from './interfaces';
