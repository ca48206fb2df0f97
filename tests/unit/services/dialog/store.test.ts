/**
 * Contract tests shared by the SQLite and in-memory dialog stores.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { SqliteDialogStore } from '../../../../src/services/dialog/sqlite.js';
import { MemoryDialogStore } from '../../../../src/services/dialog/memory.js';
import type { Dialog, DialogStore } from '../../../../src/services/dialog/types.js';
import { OPEN_STATUSES } from '../../../../src/services/dialog/types.js';
import type { MessageRecord } from '../../../../src/orchestrator/types.js';
import { NotFoundError, StorageError } from '../../../../src/utils/errors.js';

function dialog(id: string, overrides: Partial<Dialog> = {}): Dialog {
  return {
    id,
    customer: { name: 'Test Customer', email: 'customer@example.com' },
    status: 'pending',
    source: 'api',
    priority: 'normal',
    currentHandler: null,
    metadata: {},
    createdAt: 1000,
    updatedAt: 1000,
    ...overrides,
  };
}

function record(id: string, sender: MessageRecord['sender'], text: string, handler?: string): MessageRecord {
  const result: MessageRecord = { id, sender, text, timestamp: 2000, metadata: { n: id } };
  if (handler) result.handler = handler;
  return result;
}

describe.each([
  ['SqliteDialogStore', () => new SqliteDialogStore(':memory:')],
  ['MemoryDialogStore', () => new MemoryDialogStore()],
])('%s', (_name, createStore: () => DialogStore) => {
  let store: DialogStore;

  beforeEach(() => {
    store = createStore();
  });

  afterEach(() => {
    store.close();
  });

  it('creates and reads back a dialog', async () => {
    const created = await store.createDialog(dialog('d1'));

    expect(created).toEqual(dialog('d1'));
    expect(await store.getDialog('d1')).toEqual(dialog('d1'));
    expect(await store.load('d1')).toEqual({ summary: null, messages: [] });
  });

  it('creates a dialog together with its first turn', async () => {
    const records = [record('m1', 'user', 'Hi'), record('m2', 'agent', 'Hello', 'general')];

    const created = await store.createDialog(dialog('d1'), records, {
      patch: { status: 'active', currentHandler: 'general', updatedAt: 3000 },
    });

    expect(created.status).toBe('active');
    expect(created.currentHandler).toBe('general');
    expect(created.updatedAt).toBe(3000);
    expect((await store.load('d1')).messages).toEqual(records);
  });

  it('rejects a duplicate dialog id', async () => {
    await store.createDialog(dialog('d1'));

    await expect(store.createDialog(dialog('d1'))).rejects.toBeInstanceOf(StorageError);
  });

  it('appends records in order and keeps handler attribution', async () => {
    await store.createDialog(dialog('d1'));
    await store.append('d1', [record('m1', 'user', 'Hi')]);
    await store.append('d1', [record('m2', 'agent', 'Hello', 'sales'), record('m3', 'system', 'Note')]);

    const { messages } = await store.load('d1');

    expect(messages.map(m => m.id)).toEqual(['m1', 'm2', 'm3']);
    expect(messages[1].handler).toBe('sales');
    expect(messages[0].handler).toBeUndefined();
    expect(messages[1].metadata).toEqual({ n: 'm2' });
  });

  it('applies compaction and the row update with the append', async () => {
    await store.createDialog(dialog('d1'));
    await store.append('d1', [record('m1', 'user', 'One'), record('m2', 'agent', 'Two', 'general')]);

    await store.append('d1', [record('m3', 'user', 'Three')], {
      compaction: { summary: { text: 'Customer: One', coveredCount: 1, createdAt: 4000 }, droppedIds: ['m1'] },
      patch: { status: 'escalated', currentHandler: 'escalation', metadata: { handoffCount: 1 }, updatedAt: 4000 },
    });

    const context = await store.load('d1');
    expect(context.summary).toEqual({ text: 'Customer: One', coveredCount: 1, createdAt: 4000 });
    expect(context.messages.map(m => m.id)).toEqual(['m2', 'm3']);

    const updated = await store.getDialog('d1');
    expect(updated.status).toBe('escalated');
    expect(updated.currentHandler).toBe('escalation');
    expect(updated.metadata).toEqual({ handoffCount: 1 });
    expect(updated.updatedAt).toBe(4000);
  });

  it('raises NotFoundError for unknown dialogs', async () => {
    await expect(store.getDialog('missing')).rejects.toBeInstanceOf(NotFoundError);
    await expect(store.load('missing')).rejects.toBeInstanceOf(NotFoundError);
    await expect(store.append('missing', [record('m1', 'user', 'Hi')])).rejects.toBeInstanceOf(NotFoundError);
    await expect(store.updateDialog('missing', { updatedAt: 1 })).rejects.toBeInstanceOf(NotFoundError);
  });

  it('deletes a dialog with its messages', async () => {
    await store.createDialog(dialog('d1'), [record('m1', 'user', 'Hi')]);

    expect(await store.deleteDialog('d1')).toBe(true);
    expect(await store.deleteDialog('d1')).toBe(false);
    await expect(store.load('d1')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('lists idle open dialogs and old closed dialogs, oldest first', async () => {
    await store.createDialog(dialog('recent', { status: 'active', updatedAt: 9000 }));
    await store.createDialog(dialog('idle', { status: 'escalated', updatedAt: 2000 }));
    await store.createDialog(dialog('idler', { status: 'pending', updatedAt: 1000 }));
    await store.createDialog(dialog('closed', { status: 'closed', updatedAt: 1500 }));

    expect(await store.listInactive(5000)).toEqual(['idler', 'idle']);
    expect(await store.listClosedBefore(5000)).toEqual(['closed']);
    expect(await store.listClosedBefore(1000)).toEqual([]);
  });

  it('counts dialogs by status', async () => {
    await store.createDialog(dialog('a', { status: 'active' }));
    await store.createDialog(dialog('b', { status: 'closed' }));
    await store.createDialog(dialog('c', { status: 'escalated' }));

    expect(await store.countDialogs()).toBe(3);
    expect(await store.countDialogs(OPEN_STATUSES)).toBe(2);
    expect(await store.countDialogs(['closed'])).toBe(1);
    expect(store.isHealthy()).toBe(true);
  });
});

describe('SqliteDialogStore persistence', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'switchboard-dialogs-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('keeps dialogs across reopen', async () => {
    const dbPath = path.join(dir, 'nested', 'dialogs.db');
    const first = new SqliteDialogStore(dbPath);
    await first.createDialog(dialog('d1'), [record('m1', 'user', 'Hi')]);
    first.close();

    const second = new SqliteDialogStore(dbPath);
    expect((await second.load('d1')).messages.map(m => m.text)).toEqual(['Hi']);
    second.close();
  });

  it('opens file databases in WAL mode', () => {
    const dbPath = path.join(dir, 'dialogs.db');
    new SqliteDialogStore(dbPath).close();

    const raw = new Database(dbPath);
    expect(raw.pragma('journal_mode', { simple: true })).toBe('wal');
    raw.close();
  });

  it('writes nothing from a batch that fails part-way', async () => {
    const store = new SqliteDialogStore(path.join(dir, 'dialogs.db'));
    await store.createDialog(dialog('d1'), [record('m1', 'user', 'Hi')]);

    await expect(
      store.append('d1', [record('m2', 'agent', 'Hello', 'general'), record('m1', 'user', 'Duplicate id')], {
        patch: { status: 'active', updatedAt: 5000 },
      })
    ).rejects.toBeInstanceOf(StorageError);

    expect((await store.load('d1')).messages.map(m => m.id)).toEqual(['m1']);
    expect((await store.getDialog('d1')).status).toBe('pending');
    expect(store.isHealthy()).toBe(true);
    store.close();
  });
});
