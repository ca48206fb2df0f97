/**
 * Multi-turn conversations through the real handlers and the keyword
 * provider, from the HTTP surface down to the store.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import type { Express } from 'express';
import { API, createTestApp, keywordReply } from '../helpers/app.js';

describe('conversation flows', () => {
  let app: Express;

  beforeEach(() => {
    ({ app } = createTestApp());
  });

  async function start(initialMessage: string): Promise<string> {
    const response = await request(app)
      .post(`${API}/dialogue/create`)
      .send({ customer: { name: 'Ada' }, initialMessage });
    expect(response.status).toBe(201);
    return response.body.dialogId;
  }

  async function say(dialogId: string, message: string) {
    const response = await request(app).post(`${API}/dialogue/${dialogId}/message`).send({ message });
    expect(response.status).toBe(200);
    return response.body;
  }

  async function statusOf(dialogId: string): Promise<string> {
    const response = await request(app).get(`${API}/dialogue/${dialogId}/status`);
    return response.body.status;
  }

  it('escalates a refund and hands back once the customer is satisfied', async () => {
    const dialogId = await start('I was charged twice on my invoice');

    const refund = await say(dialogId, 'I want a refund');
    expect(refund).toMatchObject({
      currentHandler: 'escalation',
      previousHandler: 'sales',
      handoffReason: 'refund_escalation',
      agentResponse: keywordReply('escalation'),
    });
    expect(await statusOf(dialogId)).toBe('escalated');

    const resolved = await say(dialogId, 'Thanks, that worked');
    expect(resolved).toMatchObject({
      currentHandler: 'general',
      previousHandler: 'escalation',
      handoffReason: 'issue_resolved',
    });
    expect(await statusOf(dialogId)).toBe('active');

    const history = await request(app).get(`${API}/dialogue/${dialogId}/history`);
    expect(history.body.metadata).toEqual({
      handoffCount: 3,
      lastIntent: 'billing_issue',
      lastHandoffReason: 'issue_resolved',
    });
    expect(history.body.messages.filter((m: { sender: string }) => m.sender === 'agent').map((m: { handler: string }) => m.handler))
      .toEqual(['sales', 'escalation', 'general']);
  });

  it('escalates a critical incident on the first message', async () => {
    const response = await request(app)
      .post(`${API}/dialogue/create`)
      .send({ customer: { name: 'Ada' }, initialMessage: 'Our service is down, total outage' });

    expect(response.body.status).toBe('escalated');
    expect(response.body.currentHandler).toBe('escalation');
    expect(response.body.messages[1].metadata).toMatchObject({
      intent: 'technical_issue',
      previousHandler: 'technical',
      handoffReason: 'critical_incident',
      handoffChain: ['technical', 'escalation'],
    });
  });

  it('hands an out-of-scope request to the matching specialist', async () => {
    const dialogId = await start('What are your opening hours?');

    const turn = await say(dialogId, 'My wifi router is broken');

    expect(turn).toMatchObject({
      currentHandler: 'technical',
      previousHandler: 'general',
      handoffReason: 'out_of_scope:technical_support',
      agentResponse: keywordReply('technical'),
    });
  });

  it('escalates on a supervisor request', async () => {
    const dialogId = await start('My wifi router is broken');

    const turn = await say(dialogId, 'Let me talk to a manager');

    expect(turn).toMatchObject({
      currentHandler: 'escalation',
      previousHandler: 'technical',
      handoffReason: 'supervisor_requested',
    });
  });

  it('escalates after repeated unresolved turns', async () => {
    const dialogId = await start('What are your opening hours?');
    const second = await say(dialogId, 'And your address?');
    expect(second.currentHandler).toBe('general');
    expect(second.metadata.unresolvedTurns).toBe(2);

    const third = await say(dialogId, 'Still no answer about the address');

    expect(third).toMatchObject({
      currentHandler: 'escalation',
      previousHandler: 'general',
      handoffReason: 'unresolved_after_3_turns',
    });
  });

  it('sends an unclassifiable first message to the default handler', async () => {
    const dialogId = await start('Hello there');

    const history = await request(app).get(`${API}/dialogue/${dialogId}/history`);

    expect(history.body.currentHandler).toBe('general');
    expect(history.body.messages[1].metadata.handoffReason).toBe('initial_routing');
    expect(history.body.messages[1].metadata.routingFallback).toBe('unknown_intent');
  });
});
