/**
 * @fileoverview In-memory dialog store.
 *
 * Same contract as the SQLite store, for tests and ephemeral deployments.
 * Values are copied on the way in and out so callers never share state
 * with the store.
 */

import type { ConversationContext, MessageRecord, SummaryRecord } from '../../orchestrator/types.js';
import type { AppendOptions, Dialog, DialogPatch, DialogStatus, DialogStore } from './types.js';
import { OPEN_STATUSES } from './types.js';
import { NotFoundError, StorageError } from '../../utils/errors.js';

interface Entry {
  dialog: Dialog;
  summary: SummaryRecord | null;
  messages: MessageRecord[];
}

export class MemoryDialogStore implements DialogStore {
  private readonly entries = new Map<string, Entry>();

  private require(dialogId: string): Entry {
    const entry = this.entries.get(dialogId);
    if (!entry) {
      throw new NotFoundError(`Dialog not found: ${dialogId}`, { dialogId });
    }
    return entry;
  }

  private static patched(dialog: Dialog, patch: DialogPatch): Dialog {
    const next: Dialog = { ...dialog, updatedAt: patch.updatedAt };
    if (patch.status !== undefined) next.status = patch.status;
    if (patch.currentHandler !== undefined) next.currentHandler = patch.currentHandler;
    if (patch.metadata !== undefined) next.metadata = structuredClone(patch.metadata);
    return next;
  }

  /**
   * Build the next entry without touching the current one, so a failure
   * leaves the store unchanged.
   */
  private static appended(entry: Entry, records: MessageRecord[], options: AppendOptions): Entry {
    let messages = [...entry.messages, ...structuredClone(records)];
    let summary = entry.summary;

    if (options.compaction) {
      const dropped = new Set(options.compaction.droppedIds);
      messages = messages.filter(message => !dropped.has(message.id));
      summary = { ...options.compaction.summary };
    }

    const dialog = options.patch ? MemoryDialogStore.patched(entry.dialog, options.patch) : entry.dialog;
    return { dialog, summary, messages };
  }

  async createDialog(dialog: Dialog, records: MessageRecord[] = [], options: AppendOptions = {}): Promise<Dialog> {
    if (this.entries.has(dialog.id)) {
      throw new StorageError(`createDialog failed: duplicate id ${dialog.id}`, { operation: 'createDialog' });
    }
    const entry: Entry = { dialog: structuredClone(dialog), summary: null, messages: [] };
    this.entries.set(dialog.id, MemoryDialogStore.appended(entry, records, options));
    return this.getDialog(dialog.id);
  }

  async getDialog(dialogId: string): Promise<Dialog> {
    return structuredClone(this.require(dialogId).dialog);
  }

  async load(dialogId: string): Promise<ConversationContext> {
    const entry = this.require(dialogId);
    return structuredClone({ summary: entry.summary, messages: entry.messages });
  }

  async append(dialogId: string, records: MessageRecord[], options: AppendOptions = {}): Promise<void> {
    const entry = this.require(dialogId);
    this.entries.set(dialogId, MemoryDialogStore.appended(entry, records, options));
  }

  async updateDialog(dialogId: string, patch: DialogPatch): Promise<Dialog> {
    const entry = this.require(dialogId);
    entry.dialog = MemoryDialogStore.patched(entry.dialog, patch);
    return this.getDialog(dialogId);
  }

  async deleteDialog(dialogId: string): Promise<boolean> {
    return this.entries.delete(dialogId);
  }

  async listInactive(cutoff: number): Promise<string[]> {
    return this.idsWhere(dialog => OPEN_STATUSES.includes(dialog.status) && dialog.updatedAt < cutoff);
  }

  async listClosedBefore(cutoff: number): Promise<string[]> {
    return this.idsWhere(dialog => dialog.status === 'closed' && dialog.updatedAt < cutoff);
  }

  async countDialogs(statuses?: readonly DialogStatus[]): Promise<number> {
    if (!statuses || statuses.length === 0) return this.entries.size;
    return this.idsWhere(dialog => statuses.includes(dialog.status)).length;
  }

  isHealthy(): boolean {
    return true;
  }

  close(): void {
    this.entries.clear();
  }

  private idsWhere(predicate: (dialog: Dialog) => boolean): string[] {
    return [...this.entries.values()]
      .map(entry => entry.dialog)
      .filter(predicate)
      .sort((a, b) => a.updatedAt - b.updatedAt)
      .map(dialog => dialog.id);
  }
}
