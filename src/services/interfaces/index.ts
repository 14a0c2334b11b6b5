/**
 * @fileoverview Service Interfaces - External Boundaries
 * @module services/interfaces
 *
 * Interfaces for the engine's collaborators (OS clipboard, host editor,
 * status display) and for the engine itself.
 *
 * These interfaces enable:
 * - Easy mocking in unit tests
 * - Clear API contracts
 * - Dependency inversion
 */

export type { IClipboardManager } from './IClipboardManager';
export type { IClipboardSyncPort } from './IClipboardSyncPort';
export type { IHostEditor, IStatusService } from './IHostEditor';
