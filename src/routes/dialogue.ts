/**
 * @fileoverview Dialogue API routes.
 *
 * Thin HTTP layer over DialogManager: validate, call, present. Timestamps
 * leave the service as ISO strings. A client that disconnects mid-turn
 * aborts that turn, so nothing from it is committed.
 */

import { Router, Request, Response } from 'express';
import type {
  DialogHistory,
  DialogManager,
  DialogStatusView,
  TurnResponse,
} from '../services/dialog/manager.js';
import type { MessageRecord } from '../orchestrator/types.js';
import config from '../config.js';
import { parseCount, parseCreateDialog, parseFlag, parseMessage } from './validation.js';
import { sendError } from './errors.js';
import { createLogger, withLogContext } from '../utils/observability/index.js';

const logger = createLogger({ domain: 'dialogue-routes' });

type RouteHandler = (req: Request, res: Response) => Promise<void>;

function iso(timestamp: number): string {
  return new Date(timestamp).toISOString();
}

function presentMessage(record: MessageRecord): Record<string, unknown> {
  return {
    id: record.id,
    sender: record.sender,
    text: record.text,
    handler: record.handler ?? null,
    timestamp: iso(record.timestamp),
    metadata: record.metadata,
  };
}

export function presentHistory(history: DialogHistory): Record<string, unknown> {
  const { dialog, summary } = history;
  return {
    dialogId: dialog.id,
    customer: dialog.customer,
    status: dialog.status,
    source: dialog.source,
    priority: dialog.priority,
    currentHandler: dialog.currentHandler,
    metadata: dialog.metadata,
    createdAt: iso(dialog.createdAt),
    updatedAt: iso(dialog.updatedAt),
    summary: summary
      ? { text: summary.text, coveredCount: summary.coveredCount, createdAt: iso(summary.createdAt) }
      : null,
    messages: history.messages.map(presentMessage),
  };
}

function presentTurn(turn: TurnResponse): Record<string, unknown> {
  return { ...turn, timestamp: iso(turn.timestamp) };
}

function presentStatus(view: DialogStatusView): Record<string, unknown> {
  return { ...view, createdAt: iso(view.createdAt), updatedAt: iso(view.updatedAt) };
}

/**
 * Abort signal tied to the client connection.
 */
function connectionSignal(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableEnded) {
      logger.warn('client_disconnected');
      controller.abort();
    }
  });
  return controller.signal;
}

function dialogIdOf(req: Request): string {
  return req.params.dialogId ?? '';
}

/**
 * Run a handler and send any failure through the error mapper.
 */
function route(handler: RouteHandler): RouteHandler {
  return async (req, res) => {
    try {
      await handler(req, res);
    } catch (error) {
      sendError(res, error);
    }
  };
}

export function createDialogueRouter(manager: DialogManager): Router {
  const router = Router();
  const maxMessageLength = config.dialogs.maxMessageLength;

  router.post('/dialogue/create', route(async (req, res) => {
    const request = parseCreateDialog(req.body, maxMessageLength);
    const history = await manager.createDialog(request, { signal: connectionSignal(res) });
    res.status(201).json(presentHistory(history));
  }));

  router.post('/dialogue/:dialogId/message', route(async (req, res) => {
    const dialogId = dialogIdOf(req);
    const request = parseMessage(req.body, maxMessageLength);

    await withLogContext({ dialogId }, async () => {
      if (request.messageType !== 'user') {
        const note = await manager.recordNote(dialogId, request);
        res.status(202).json({ ...note, timestamp: iso(note.timestamp) });
        return;
      }

      const turn = await manager.sendMessage(dialogId, request, { signal: connectionSignal(res) });
      res.json(presentTurn(turn));
    });
  }));

  router.get('/dialogue/:dialogId/history', route(async (req, res) => {
    res.json(presentHistory(await manager.getDialogHistory(dialogIdOf(req))));
  }));

  router.get('/dialogue/:dialogId/status', route(async (req, res) => {
    res.json(presentStatus(await manager.getDialogStatus(dialogIdOf(req))));
  }));

  router.post('/dialogue/:dialogId/close', route(async (req, res) => {
    const reason = typeof req.query.reason === 'string' && req.query.reason.trim()
      ? req.query.reason.trim()
      : 'completed';
    res.json(presentHistory(await manager.closeDialog(dialogIdOf(req), reason)));
  }));

  // Registered before /dialogue/:dialogId so "cleanup" is never taken as an id
  router.delete('/dialogue/cleanup', route(async (_req, res) => {
    const closedCount = await manager.cleanupInactiveDialogs();
    res.json({ closedCount });
  }));

  router.delete('/dialogue/cleanup/closed', route(async (req, res) => {
    const olderThanDays = parseCount(req.query.olderThanDays, 'olderThanDays', config.dialogs.closedRetentionDays);
    const deletedCount = await manager.cleanupClosedDialogs(olderThanDays);
    res.json({ deletedCount, olderThanDays });
  }));

  router.delete('/dialogue/:dialogId', route(async (req, res) => {
    const dialogId = dialogIdOf(req);
    await manager.deleteDialog(dialogId, parseFlag(req.query.force));
    res.json({ dialogId, deleted: true });
  }));

  return router;
}
