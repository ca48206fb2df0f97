/**
 * @fileoverview Dialog lifecycle around the turn engine.
 *
 * Every mutation of a dialog runs under that dialog's lock:
 * load → processTurn → compact → commit. The commit writes the turn's
 * records, any compaction and the row update in one store call, so a
 * failed or cancelled turn leaves nothing behind.
 */

import { randomUUID } from 'crypto';
import type { ConversationContext, MessageRecord, Sender, SummaryRecord, TurnResult } from '../../orchestrator/types.js';
import type { OrchestratorDeps } from '../../orchestrator/orchestrate.js';
import type { Summarizer } from '../../orchestrator/summarizer.js';
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
import { processTurn } from '../../orchestrator/orchestrate.js';
import { compactContext, getWindowStats } from '../../orchestrator/conversation-window.js';
import { KeyedMutex } from '../../utils/keyed-mutex.js';
import { DialogError, TurnCancelledError, errorMessage } from '../../utils/errors.js';
import { createLogger } from '../../utils/observability/index.js';

const logger = createLogger({ domain: 'dialog-manager' });

const MINUTE_MS = 60 * 1000;
const DAY_MS = 24 * 60 * MINUTE_MS;

export interface DialogManagerSettings {
  /** Retained window size; older records are summarized */
  maxHistoryLength: number;

  /** Idle time before an open dialog is closed by cleanup */
  timeoutMinutes: number;

  /** Handler whose ownership marks a dialog as escalated */
  escalationHandler: string;
}

export interface DialogManagerDeps {
  store: DialogStore;
  orchestrator: OrchestratorDeps;
  summarizer: Summarizer;
  settings: DialogManagerSettings;
  mutex?: KeyedMutex;
  now?: () => number;
  newId?: () => string;
}

export interface CreateDialogRequest {
  customer: CustomerInfo;
  initialMessage?: string;
  source?: string;
  priority?: DialogPriority;
}

export interface MessageRequest {
  message: string;
  messageType: Sender;
  metadata?: Record<string, unknown>;
}

export interface CallOptions {
  signal?: AbortSignal;
}

export interface TurnResponse {
  dialogId: string;

  /** Id of the agent reply record */
  messageId: string;
  agentResponse: string;
  currentHandler: string;
  previousHandler: string | null;
  handoffReason: string | null;
  intent: string | null;
  timestamp: number;
  metadata: Readonly<Record<string, unknown>>;
}

export interface NoteResponse {
  dialogId: string;
  messageId: string;
  sender: Sender;
  timestamp: number;
}

export interface DialogHistory {
  dialog: Dialog;
  summary: SummaryRecord | null;
  messages: MessageRecord[];
}

export interface DialogStatusView {
  dialogId: string;
  status: DialogStatus;
  currentHandler: string | null;
  priority: DialogPriority;
  messageCount: number;
  summarizedCount: number;
  createdAt: number;
  updatedAt: number;
}

interface PreparedCommit {
  records: MessageRecord[];
  options: AppendOptions;
}

export class DialogManager {
  private readonly store: DialogStore;
  private readonly mutex: KeyedMutex;
  private readonly now: () => number;
  private readonly newId: () => string;

  constructor(private readonly deps: DialogManagerDeps) {
    this.store = deps.store;
    this.mutex = deps.mutex ?? new KeyedMutex();
    this.now = deps.now ?? Date.now;
    this.newId = deps.newId ?? randomUUID;
  }

  /**
   * Create a dialog; with an initial message the first turn runs before
   * anything is stored.
   */
  async createDialog(request: CreateDialogRequest, options: CallOptions = {}): Promise<DialogHistory> {
    const now = this.now();
    const dialog: Dialog = {
      id: this.newId(),
      customer: { ...request.customer },
      status: 'pending',
      source: request.source ?? 'api',
      priority: request.priority ?? 'normal',
      currentHandler: null,
      metadata: {},
      createdAt: now,
      updatedAt: now,
    };

    if (!request.initialMessage) {
      await this.store.createDialog(dialog);
      logger.info('dialog_created', { dialogId: dialog.id, source: dialog.source, priority: dialog.priority });
      return this.getDialogHistory(dialog.id);
    }

    const initialMessage = request.initialMessage;
    await this.mutex.runExclusive(dialog.id, async () => {
      const empty: ConversationContext = { summary: null, messages: [] };
      const { result, commit } = await this.runTurn(dialog, empty, { message: initialMessage, messageType: 'user' }, options);
      await this.store.createDialog(dialog, commit.records, commit.options);
      this.logCommitted(dialog.id, result);
    });

    logger.info('dialog_created', {
      dialogId: dialog.id,
      source: dialog.source,
      priority: dialog.priority,
      hasInitialMessage: true,
    });
    return this.getDialogHistory(dialog.id);
  }

  /**
   * Run one customer turn.
   *
   * @throws NotFoundError for an unknown dialog
   * @throws DialogError when the dialog no longer accepts messages
   */
  async sendMessage(dialogId: string, request: MessageRequest, options: CallOptions = {}): Promise<TurnResponse> {
    return this.mutex.runExclusive(dialogId, async () => {
      const dialog = await this.requireOpen(dialogId);
      const context = await this.store.load(dialogId);

      const { result, agentRecord, commit } = await this.runTurn(dialog, context, request, options);
      await this.store.append(dialogId, commit.records, commit.options);
      this.logCommitted(dialogId, result);

      return {
        dialogId,
        messageId: agentRecord.id,
        agentResponse: result.response,
        currentHandler: result.currentHandler,
        previousHandler: result.previousHandler,
        handoffReason: result.handoffReason,
        intent: result.intent,
        timestamp: agentRecord.timestamp,
        metadata: result.metadata,
      };
    });
  }

  /**
   * Record a system or agent note without running a turn.
   */
  async recordNote(dialogId: string, request: MessageRequest): Promise<NoteResponse> {
    return this.mutex.runExclusive(dialogId, async () => {
      const dialog = await this.requireOpen(dialogId);
      const context = await this.store.load(dialogId);
      const now = this.now();

      const note: MessageRecord = {
        id: this.newId(),
        sender: request.messageType,
        text: request.message,
        timestamp: now,
        metadata: { ...request.metadata },
      };
      if (request.messageType === 'agent' && dialog.currentHandler) {
        note.handler = dialog.currentHandler;
      }

      const commit = await this.prepareCommit(dialogId, context, [note], { updatedAt: now });
      await this.store.append(dialogId, commit.records, commit.options);

      logger.info('note_recorded', { dialogId, messageType: request.messageType });
      return { dialogId, messageId: note.id, sender: note.sender, timestamp: now };
    });
  }

  async getDialogHistory(dialogId: string): Promise<DialogHistory> {
    const dialog = await this.store.getDialog(dialogId);
    const context = await this.store.load(dialogId);
    return { dialog, summary: context.summary, messages: context.messages };
  }

  async getDialogStatus(dialogId: string): Promise<DialogStatusView> {
    const dialog = await this.store.getDialog(dialogId);
    const stats = getWindowStats(await this.store.load(dialogId));
    return {
      dialogId,
      status: dialog.status,
      currentHandler: dialog.currentHandler,
      priority: dialog.priority,
      messageCount: stats.messageCount,
      summarizedCount: stats.summarizedCount,
      createdAt: dialog.createdAt,
      updatedAt: dialog.updatedAt,
    };
  }

  /**
   * Close a dialog. Closing a closed dialog is a no-op.
   */
  async closeDialog(dialogId: string, reason = 'completed'): Promise<DialogHistory> {
    await this.mutex.runExclusive(dialogId, async () => {
      const dialog = await this.store.getDialog(dialogId);
      if (dialog.status === 'closed') return;
      await this.markClosed(dialog, reason);
    });
    return this.getDialogHistory(dialogId);
  }

  /**
   * Close a dialog only if it is still open and idle since before `cutoff`,
   * re-read under the dialog lock so a turn that just committed keeps it open.
   */
  private async closeIfIdle(dialogId: string, cutoff: number): Promise<boolean> {
    return this.mutex.runExclusive(dialogId, async () => {
      const dialog = await this.store.getDialog(dialogId);
      if (!OPEN_STATUSES.includes(dialog.status) || dialog.updatedAt >= cutoff) {
        return false;
      }
      await this.markClosed(dialog, 'timeout');
      return true;
    });
  }

  private async markClosed(dialog: Dialog, reason: string): Promise<void> {
    const now = this.now();
    await this.store.updateDialog(dialog.id, {
      status: 'closed',
      metadata: { ...dialog.metadata, closeReason: reason, closedAt: now },
      updatedAt: now,
    });
    logger.info('dialog_closed', { dialogId: dialog.id, reason });
  }

  /**
   * Delete a dialog and its messages. Open dialogs need `force`.
   *
   * @throws NotFoundError for an unknown dialog
   * @throws DialogError for an open dialog without force
   */
  async deleteDialog(dialogId: string, force = false): Promise<void> {
    await this.mutex.runExclusive(dialogId, async () => {
      const dialog = await this.store.getDialog(dialogId);
      if (dialog.status !== 'closed' && !force) {
        throw new DialogError(`Dialog ${dialogId} is ${dialog.status}; close it first or use force`, {
          dialogId,
          status: dialog.status,
        });
      }
      await this.store.deleteDialog(dialogId);
      logger.info('dialog_deleted', { dialogId, forced: force });
    });
  }

  /**
   * Close open dialogs idle for longer than the configured timeout.
   *
   * @returns number of dialogs closed
   */
  async cleanupInactiveDialogs(): Promise<number> {
    const cutoff = this.now() - this.deps.settings.timeoutMinutes * MINUTE_MS;
    const ids = await this.store.listInactive(cutoff);

    let closed = 0;
    for (const dialogId of ids) {
      try {
        if (await this.closeIfIdle(dialogId, cutoff)) {
          closed++;
        }
      } catch (error) {
        logger.error('inactive_close_failed', { dialogId, error: errorMessage(error) });
      }
    }

    if (closed > 0) {
      logger.info('inactive_dialogs_closed', { count: closed });
    }
    return closed;
  }

  /**
   * Delete closed dialogs last updated more than `olderThanDays` ago.
   *
   * @returns number of dialogs deleted
   */
  async cleanupClosedDialogs(olderThanDays: number): Promise<number> {
    const cutoff = this.now() - olderThanDays * DAY_MS;
    const ids = await this.store.listClosedBefore(cutoff);

    let deleted = 0;
    for (const dialogId of ids) {
      try {
        await this.deleteDialog(dialogId);
        deleted++;
      } catch (error) {
        logger.error('closed_delete_failed', { dialogId, error: errorMessage(error) });
      }
    }

    if (deleted > 0) {
      logger.info('closed_dialogs_deleted', { count: deleted });
    }
    return deleted;
  }

  private logCommitted(dialogId: string, result: TurnResult): void {
    logger.info('turn_committed', {
      dialogId,
      handler: result.currentHandler,
      previousHandler: result.previousHandler ?? undefined,
      reason: result.handoffReason ?? undefined,
    });
  }

  private async requireOpen(dialogId: string): Promise<Dialog> {
    const dialog = await this.store.getDialog(dialogId);
    if (!OPEN_STATUSES.includes(dialog.status)) {
      throw new DialogError(`Dialog ${dialogId} is not open (status: ${dialog.status})`, {
        dialogId,
        status: dialog.status,
      });
    }
    return dialog;
  }

  /**
   * Append `records` to the window and compact it; nothing is written.
   */
  private async prepareCommit(
    dialogId: string,
    context: ConversationContext,
    records: MessageRecord[],
    patch: DialogPatch,
    signal?: AbortSignal
  ): Promise<PreparedCommit> {
    const window: ConversationContext = {
      summary: context.summary,
      messages: [...context.messages, ...records],
    };

    const compaction = await compactContext(window, {
      maxMessages: this.deps.settings.maxHistoryLength,
      summarizer: this.deps.summarizer,
      now: this.now,
      signal,
    });

    const options: AppendOptions = { patch };
    if (compaction.compacted && compaction.context.summary) {
      options.compaction = {
        summary: compaction.context.summary,
        droppedIds: compaction.dropped.map(record => record.id),
      };
      logger.info('context_compacted', {
        dialogId,
        count: compaction.dropped.length,
        coveredCount: compaction.context.summary.coveredCount,
      });
    }

    return { records, options };
  }

  private async runTurn(
    dialog: Dialog,
    context: ConversationContext,
    request: MessageRequest,
    options: CallOptions
  ): Promise<{ result: TurnResult; agentRecord: MessageRecord; commit: PreparedCommit }> {
    const userRecord: MessageRecord = {
      id: this.newId(),
      sender: 'user',
      text: request.message,
      timestamp: this.now(),
      metadata: { ...request.metadata },
    };

    const result = await processTurn(dialog.id, request.message, context, this.deps.orchestrator, {
      signal: options.signal,
    });

    const now = this.now();
    const agentRecord: MessageRecord = {
      id: this.newId(),
      sender: 'agent',
      text: result.response,
      handler: result.currentHandler,
      timestamp: now,
      metadata: {
        ...result.metadata,
        intent: result.intent,
        previousHandler: result.previousHandler,
        handoffReason: result.handoffReason,
      },
    };

    const previousHandoffs = typeof dialog.metadata.handoffCount === 'number' ? dialog.metadata.handoffCount : 0;
    const metadata: Record<string, unknown> = {
      ...dialog.metadata,
      handoffCount: previousHandoffs + (result.handoffReason ? 1 : 0),
    };
    if (result.intent) metadata.lastIntent = result.intent;
    if (result.handoffReason) metadata.lastHandoffReason = result.handoffReason;

    const status: DialogStatus = result.currentHandler === this.deps.settings.escalationHandler ? 'escalated' : 'active';
    const commit = await this.prepareCommit(
      dialog.id,
      context,
      [userRecord, agentRecord],
      { status, currentHandler: result.currentHandler, metadata, updatedAt: now },
      options.signal
    );

    if (options.signal?.aborted) {
      throw new TurnCancelledError();
    }

    return { result, agentRecord, commit };
  }
}
