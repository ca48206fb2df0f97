import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import type { Express } from 'express';
import { API, createTestApp } from '../helpers/app.js';

describe('agents and health API', () => {
  let app: Express;

  beforeEach(() => {
    ({ app } = createTestApp());
  });

  describe('GET /agents', () => {
    it('lists every registered handler', async () => {
      const response = await request(app).get(`${API}/agents`);

      expect(response.status).toBe(200);
      expect(response.body.total).toBe(4);
      expect(response.body.available).toBe(4);
      expect(response.body.agents.map((agent: { name: string }) => agent.name)).toEqual([
        'general',
        'sales',
        'technical',
        'escalation',
      ]);
      expect(response.body.agents[1]).toMatchObject({
        name: 'sales',
        specialization: 'billing_and_sales',
        intents: ['billing_issue', 'purchase_inquiry'],
        available: true,
      });
    });
  });

  describe('PATCH /agents/:name/availability', () => {
    it('marks a handler unavailable and routing falls back', async () => {
      const patched = await request(app).patch(`${API}/agents/sales/availability`).send({ available: false });
      expect(patched.status).toBe(200);
      expect(patched.body.available).toBe(false);

      const created = await request(app)
        .post(`${API}/dialogue/create`)
        .send({ customer: { name: 'Ada' }, initialMessage: 'Question about my invoice' });

      expect(created.body.currentHandler).toBe('general');
      expect(created.body.messages[1].metadata.routingFallback).toBe('target_unavailable');

      const listed = await request(app).get(`${API}/agents`);
      expect(listed.body.available).toBe(3);
    });

    it('returns 404 for an unknown handler', async () => {
      const response = await request(app).patch(`${API}/agents/billing/availability`).send({ available: true });

      expect(response.status).toBe(404);
      expect(response.body.error).toEqual({
        type: 'NOT_FOUND',
        message: 'Handler not found: billing',
        details: { handler: 'billing' },
      });
    });

    it('rejects a non-boolean flag', async () => {
      const response = await request(app).patch(`${API}/agents/sales/availability`).send({ available: 'no' });

      expect(response.status).toBe(400);
      expect(response.body.error.message).toBe('available must be a boolean.');
    });
  });

  describe('GET /health', () => {
    it('reports healthy with all handlers up', async () => {
      await request(app).post(`${API}/dialogue/create`).send({ customer: { name: 'Ada' } });

      const response = await request(app).get(`${API}/health`);

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({
        status: 'healthy',
        version: '0.1.0',
        handlers: { total: 4, available: ['general', 'sales', 'technical', 'escalation'] },
        storage: { provider: 'memory', available: true, openDialogs: 1 },
      });
    });

    it('reports degraded when escalation is unavailable', async () => {
      await request(app).patch(`${API}/agents/escalation/availability`).send({ available: false });

      const response = await request(app).get(`${API}/health`);

      expect(response.status).toBe(200);
      expect(response.body.status).toBe('degraded');
    });

    it('serves service info at the root', async () => {
      const response = await request(app).get('/');

      expect(response.body).toEqual({
        name: 'Switchboard Agents',
        version: '0.1.0',
        apiPrefix: '/api/v1',
        docs: '/api/v1/health',
      });
    });
  });
});
