/**
 * @fileoverview SQLite dialog store.
 *
 * Dialog rows carry the active summary; messages live in their own table
 * with a per-dialog sequence number and the handler attribution as a
 * column. Every multi-statement write runs in one transaction.
 */

import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import type { ConversationContext, MessageRecord, Sender, SummaryRecord } from '../../orchestrator/types.js';
import type {
  AppendOptions,
  CustomerInfo,
  Dialog,
  DialogPatch,
  DialogPriority,
  DialogStatus,
  DialogStore,
} from './types.js';
import { OPEN_STATUSES } from './types.js';
import { AppError, NotFoundError, StorageError, errorMessage } from '../../utils/errors.js';

interface DialogRow {
  id: string;
  customer_json: string;
  status: string;
  source: string;
  priority: string;
  current_handler: string | null;
  metadata_json: string;
  summary_text: string | null;
  summary_covered_count: number;
  summary_created_at: number | null;
  created_at: number;
  updated_at: number;
}

interface MessageRow {
  id: string;
  sender: string;
  text: string;
  handler: string | null;
  metadata_json: string;
  created_at: number;
}

const STATUSES: readonly DialogStatus[] = ['pending', 'active', 'escalated', 'closed'];
const PRIORITIES: readonly DialogPriority[] = ['low', 'normal', 'high', 'urgent'];
const SENDERS: readonly Sender[] = ['user', 'agent', 'system'];

function parseObject(json: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(json);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return {};
  }
  return { ...parsed };
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function parseCustomer(json: string): CustomerInfo {
  const raw = parseObject(json);
  const customer: CustomerInfo = { name: optionalString(raw.name) ?? '' };
  const phone = optionalString(raw.phone);
  const email = optionalString(raw.email);
  const customerId = optionalString(raw.customerId);
  if (phone !== undefined) customer.phone = phone;
  if (email !== undefined) customer.email = email;
  if (customerId !== undefined) customer.customerId = customerId;
  return customer;
}

function pick<T extends string>(allowed: readonly T[], value: string, fallback: T): T {
  return allowed.find(item => item === value) ?? fallback;
}

/**
 * SQLite implementation of the dialog store.
 */
export class SqliteDialogStore implements DialogStore {
  private db: Database.Database;

  constructor(dbPath: string) {
    // Ensure directory exists
    if (dbPath !== ':memory:') {
      const dir = path.dirname(dbPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(dbPath);
    if (dbPath !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.pragma('foreign_keys = ON');
    this.initSchema();
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS dialogs (
        id TEXT PRIMARY KEY,
        customer_json TEXT NOT NULL,
        status TEXT NOT NULL,
        source TEXT NOT NULL,
        priority TEXT NOT NULL,
        current_handler TEXT,
        metadata_json TEXT NOT NULL DEFAULT '{}',
        summary_text TEXT,
        summary_covered_count INTEGER NOT NULL DEFAULT 0,
        summary_created_at INTEGER,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_dialogs_status_updated
        ON dialogs(status, updated_at);

      CREATE TABLE IF NOT EXISTS dialog_messages (
        id TEXT PRIMARY KEY,
        dialog_id TEXT NOT NULL REFERENCES dialogs(id) ON DELETE CASCADE,
        seq INTEGER NOT NULL,
        sender TEXT NOT NULL,
        text TEXT NOT NULL,
        handler TEXT,
        metadata_json TEXT NOT NULL DEFAULT '{}',
        created_at INTEGER NOT NULL
      );

      CREATE UNIQUE INDEX IF NOT EXISTS idx_dialog_messages_seq
        ON dialog_messages(dialog_id, seq);
    `);
  }

  private toDialog(row: DialogRow): Dialog {
    return {
      id: row.id,
      customer: parseCustomer(row.customer_json),
      status: pick(STATUSES, row.status, 'active'),
      source: row.source,
      priority: pick(PRIORITIES, row.priority, 'normal'),
      currentHandler: row.current_handler,
      metadata: parseObject(row.metadata_json),
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }

  private toRecord(row: MessageRow): MessageRecord {
    const record: MessageRecord = {
      id: row.id,
      sender: pick(SENDERS, row.sender, 'system'),
      text: row.text,
      timestamp: row.created_at,
      metadata: parseObject(row.metadata_json),
    };
    if (row.handler !== null) {
      record.handler = row.handler;
    }
    return record;
  }

  private findRow(dialogId: string): DialogRow | undefined {
    return this.db
      .prepare<[string], DialogRow>('SELECT * FROM dialogs WHERE id = ?')
      .get(dialogId);
  }

  private requireRow(dialogId: string): DialogRow {
    const row = this.findRow(dialogId);
    if (!row) {
      throw new NotFoundError(`Dialog not found: ${dialogId}`, { dialogId });
    }
    return row;
  }

  /**
   * Run a write, mapping driver failures to StorageError.
   */
  private write<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof AppError) throw error;
      throw new StorageError(`${operation} failed: ${errorMessage(error)}`, { operation });
    }
  }

  private applyPatch(dialogId: string, patch: DialogPatch): void {
    const assignments: string[] = ['updated_at = ?'];
    const params: Array<string | number | null> = [patch.updatedAt];

    if (patch.status !== undefined) {
      assignments.push('status = ?');
      params.push(patch.status);
    }
    if (patch.currentHandler !== undefined) {
      assignments.push('current_handler = ?');
      params.push(patch.currentHandler);
    }
    if (patch.metadata !== undefined) {
      assignments.push('metadata_json = ?');
      params.push(JSON.stringify(patch.metadata));
    }

    params.push(dialogId);
    this.db.prepare(`UPDATE dialogs SET ${assignments.join(', ')} WHERE id = ?`).run(...params);
  }

  private appendInTransaction(dialogId: string, records: MessageRecord[], options: AppendOptions): void {
    this.requireRow(dialogId);

    const maxRow = this.db
      .prepare<[string], { max_seq: number | null }>(
        'SELECT MAX(seq) AS max_seq FROM dialog_messages WHERE dialog_id = ?'
      )
      .get(dialogId);
    let seq = maxRow?.max_seq ?? 0;

    const insert = this.db.prepare(
      `INSERT INTO dialog_messages (id, dialog_id, seq, sender, text, handler, metadata_json, created_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
    );
    for (const record of records) {
      seq += 1;
      insert.run(
        record.id,
        dialogId,
        seq,
        record.sender,
        record.text,
        record.handler ?? null,
        JSON.stringify(record.metadata),
        record.timestamp
      );
    }

    if (options.compaction) {
      const remove = this.db.prepare('DELETE FROM dialog_messages WHERE dialog_id = ? AND id = ?');
      for (const id of options.compaction.droppedIds) {
        remove.run(dialogId, id);
      }
      const { summary } = options.compaction;
      this.db
        .prepare(
          `UPDATE dialogs SET summary_text = ?, summary_covered_count = ?, summary_created_at = ?
           WHERE id = ?`
        )
        .run(summary.text, summary.coveredCount, summary.createdAt, dialogId);
    }

    if (options.patch) {
      this.applyPatch(dialogId, options.patch);
    }
  }

  async createDialog(dialog: Dialog, records: MessageRecord[] = [], options: AppendOptions = {}): Promise<Dialog> {
    this.write('createDialog', () => {
      const create = this.db.transaction(() => {
        this.db
          .prepare(
            `INSERT INTO dialogs
             (id, customer_json, status, source, priority, current_handler, metadata_json, created_at, updated_at)
             VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`
          )
          .run(
            dialog.id,
            JSON.stringify(dialog.customer),
            dialog.status,
            dialog.source,
            dialog.priority,
            dialog.currentHandler,
            JSON.stringify(dialog.metadata),
            dialog.createdAt,
            dialog.updatedAt
          );
        this.appendInTransaction(dialog.id, records, options);
      });
      create();
    });

    return this.getDialog(dialog.id);
  }

  async getDialog(dialogId: string): Promise<Dialog> {
    return this.toDialog(this.requireRow(dialogId));
  }

  async load(dialogId: string): Promise<ConversationContext> {
    const row = this.requireRow(dialogId);

    const messages = this.db
      .prepare<[string], MessageRow>(
        `SELECT id, sender, text, handler, metadata_json, created_at
         FROM dialog_messages WHERE dialog_id = ? ORDER BY seq ASC`
      )
      .all(dialogId)
      .map(messageRow => this.toRecord(messageRow));

    const summary: SummaryRecord | null = row.summary_text === null
      ? null
      : {
          text: row.summary_text,
          coveredCount: row.summary_covered_count,
          createdAt: row.summary_created_at ?? row.updated_at,
        };

    return { summary, messages };
  }

  async append(dialogId: string, records: MessageRecord[], options: AppendOptions = {}): Promise<void> {
    this.write('append', () => {
      const run = this.db.transaction(() => this.appendInTransaction(dialogId, records, options));
      run();
    });
  }

  async updateDialog(dialogId: string, patch: DialogPatch): Promise<Dialog> {
    this.write('updateDialog', () => {
      this.requireRow(dialogId);
      this.applyPatch(dialogId, patch);
    });
    return this.getDialog(dialogId);
  }

  async deleteDialog(dialogId: string): Promise<boolean> {
    return this.write('deleteDialog', () => {
      const remove = this.db.transaction(() => {
        this.db.prepare('DELETE FROM dialog_messages WHERE dialog_id = ?').run(dialogId);
        return this.db.prepare('DELETE FROM dialogs WHERE id = ?').run(dialogId).changes > 0;
      });
      return remove();
    });
  }

  async listInactive(cutoff: number): Promise<string[]> {
    const placeholders = OPEN_STATUSES.map(() => '?').join(', ');
    return this.db
      .prepare<Array<string | number>, { id: string }>(
        `SELECT id FROM dialogs WHERE status IN (${placeholders}) AND updated_at < ? ORDER BY updated_at ASC`
      )
      .all(...OPEN_STATUSES, cutoff)
      .map(row => row.id);
  }

  async listClosedBefore(cutoff: number): Promise<string[]> {
    return this.db
      .prepare<[number], { id: string }>(
        `SELECT id FROM dialogs WHERE status = 'closed' AND updated_at < ? ORDER BY updated_at ASC`
      )
      .all(cutoff)
      .map(row => row.id);
  }

  async countDialogs(statuses?: readonly DialogStatus[]): Promise<number> {
    if (!statuses || statuses.length === 0) {
      const row = this.db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM dialogs').get();
      return row?.count ?? 0;
    }
    const placeholders = statuses.map(() => '?').join(', ');
    const row = this.db
      .prepare<string[], { count: number }>(`SELECT COUNT(*) AS count FROM dialogs WHERE status IN (${placeholders})`)
      .get(...statuses);
    return row?.count ?? 0;
  }

  isHealthy(): boolean {
    try {
      this.db.prepare('SELECT 1').get();
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Close the database connection.
   */
  close(): void {
    this.db.close();
  }
}
