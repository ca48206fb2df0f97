/**
 * @fileoverview Dialog store factory.
 *
 * Returns the dialog store selected by DIALOG_STORE_PROVIDER.
 * Singleton pattern - returns the same instance on repeated calls.
 */

import config from '../../config.js';
import type { DialogStore } from './types.js';
import { SqliteDialogStore } from './sqlite.js';
import { MemoryDialogStore } from './memory.js';

export type {
  AppendOptions,
  Compaction,
  CustomerInfo,
  Dialog,
  DialogPatch,
  DialogPriority,
  DialogStatus,
  DialogStore,
} from './types.js';
export { OPEN_STATUSES } from './types.js';
export { SqliteDialogStore } from './sqlite.js';
export { MemoryDialogStore } from './memory.js';

let instance: DialogStore | null = null;

/**
 * Get the dialog store instance.
 *
 * Returns a singleton instance that persists across calls.
 */
export function getDialogStore(): DialogStore {
  if (instance) {
    return instance;
  }

  instance = config.dialogs.provider === 'memory'
    ? new MemoryDialogStore()
    : new SqliteDialogStore(config.dialogs.sqlitePath);
  return instance;
}

/**
 * Close the dialog store.
 * Call this during graceful shutdown.
 */
export function closeDialogStore(): void {
  if (instance) {
    instance.close();
    instance = null;
  }
}

/**
 * Reset the dialog store instance.
 * Useful for tests.
 */
export function resetDialogStore(): void {
  instance = null;
}
