/**
 * @fileoverview Dialog store types.
 */

import type { ConversationContext, MessageRecord, SummaryRecord } from '../../orchestrator/types.js';

export type DialogStatus = 'pending' | 'active' | 'escalated' | 'closed';

export type DialogPriority = 'low' | 'normal' | 'high' | 'urgent';

/** Statuses that still accept messages. */
export const OPEN_STATUSES: readonly DialogStatus[] = ['pending', 'active', 'escalated'];

export interface CustomerInfo {
  name: string;
  phone?: string;
  email?: string;
  customerId?: string;
}

/**
 * A dialog row. `currentHandler` mirrors the newest agent attribution and
 * is kept for listing and status queries; ownership is always derived
 * from the messages.
 */
export interface Dialog {
  id: string;
  customer: CustomerInfo;
  status: DialogStatus;
  source: string;
  priority: DialogPriority;
  currentHandler: string | null;
  metadata: Record<string, unknown>;
  createdAt: number;
  updatedAt: number;
}

/**
 * Fields of the dialog row that change after creation.
 */
export interface DialogPatch {
  status?: DialogStatus;
  currentHandler?: string | null;
  metadata?: Record<string, unknown>;
  updatedAt: number;
}

/**
 * Replacement of the oldest records by one summary.
 */
export interface Compaction {
  summary: SummaryRecord;
  droppedIds: string[];
}

export interface AppendOptions {
  compaction?: Compaction;
  patch?: DialogPatch;
}

/**
 * Dialog store interface.
 *
 * `append` commits records, compaction and row update together or not at all.
 */
export interface DialogStore {
  /**
   * Create a dialog together with its first records.
   */
  createDialog(dialog: Dialog, records?: MessageRecord[], options?: AppendOptions): Promise<Dialog>;

  /**
   * @throws NotFoundError for an unknown id
   */
  getDialog(dialogId: string): Promise<Dialog>;

  /**
   * Retained window (chronological) plus the active summary.
   * @throws NotFoundError for an unknown id
   */
  load(dialogId: string): Promise<ConversationContext>;

  /**
   * @throws NotFoundError for an unknown id
   * @throws StorageError when the write fails
   */
  append(dialogId: string, records: MessageRecord[], options?: AppendOptions): Promise<void>;

  /**
   * @throws NotFoundError for an unknown id
   */
  updateDialog(dialogId: string, patch: DialogPatch): Promise<Dialog>;

  /**
   * @returns false when the id was unknown
   */
  deleteDialog(dialogId: string): Promise<boolean>;

  /**
   * Ids of open dialogs not updated since `cutoff` (ms epoch).
   */
  listInactive(cutoff: number): Promise<string[]>;

  /**
   * Ids of closed dialogs not updated since `cutoff` (ms epoch).
   */
  listClosedBefore(cutoff: number): Promise<string[]>;

  /**
   * Number of dialogs, optionally restricted to the given statuses.
   */
  countDialogs(statuses?: readonly DialogStatus[]): Promise<number>;

  /**
   * Cheap liveness probe for health checks.
   */
  isHealthy(): boolean;

  /**
   * Release resources.
   */
  close(): void;
}
