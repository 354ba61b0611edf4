// tests/app.spec.ts
import * as path from 'path';
import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { createApp } from '../src/app';
import { loadConfig } from '../src/config';
import { RuleBasedSlotExtractor } from '../src/services/aiService';
import { loadTermGlossary, loadVendorDirectory } from '../src/services/dataLoader';
import { FIXED_NOW, recordingLogger } from './fixtures';

const DATA_DIR = path.join(process.cwd(), 'data');

function buildApp() {
  const logger = recordingLogger();
  return createApp({
    config: loadConfig({ DATA_DIR }),
    directory: loadVendorDirectory(DATA_DIR, logger),
    glossary: loadTermGlossary(DATA_DIR, logger),
    extractor: new RuleBasedSlotExtractor(),
    logger,
    now: () => FIXED_NOW
  });
}

function postJson(body: unknown): RequestInit {
  return { method: 'POST', headers: { 'content-type': 'application/json' }, body: JSON.stringify(body) };
}

const sessionSchema = z.object({ session_id: z.string() });

describe('status and lookup routes', () => {
  it('reports demo mode without an API key', async () => {
    const res = await buildApp().request('/api/status');
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      status: 'ok',
      apiKey: { configured: false, masked: '미설정' },
      mode: 'demo',
      vendors: { total: 7, active: 6, completed: 6 },
      sessions: 0,
      timestamp: '2026-03-02T09:00:00.000Z'
    });
  });

  it('lists the slot flow per category', async () => {
    const res = await buildApp().request('/api/categories');
    const body = z
      .object({ categories: z.array(z.object({ code: z.string(), label: z.string(), slots: z.array(z.string()) })) })
      .parse(await res.json());
    expect(body.categories.map(c => c.code)).toEqual(['card', 'banner', 'poster', 'sticker', 'banner_large', 'brochure']);
    expect(body.categories[0].slots).toEqual(['paper', 'printing', 'finishing', 'quantity', 'due_days', 'region', 'budget']);
  });

  it('filters vendors by category label', async () => {
    const app = buildApp();
    const res = await app.request('/api/vendors?category=스티커');
    expect(await res.json()).toMatchObject({ category: 'sticker', count: 2 });

    const bad = await app.request('/api/vendors?category=머그컵');
    expect(bad.status).toBe(400);
  });
});

describe('POST /api/slots/normalize', () => {
  it('normalizes raw slots and reports what is missing', async () => {
    const res = await buildApp().request(
      '/api/slots/normalize',
      postJson({ slots: { category: '포스터', quantity: '50부', region: '서울 종로' } })
    );
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      slots: { category: 'poster', quantity: 50, region: '서울-종로' },
      missing: ['paper', 'coating', 'due_days', 'budget'],
      next: { done: false, slot: 'paper' },
      validation: { valid: true, errors: {} }
    });
  });
});

describe('POST /api/quote/rank', () => {
  it('ranks eligible vendors and renders the report', async () => {
    const res = await buildApp().request(
      '/api/quote/rank',
      postJson({ slots: { category: '명함', quantity: '200부', due_days: '3일', budget: '10만원 이하' } })
    );
    expect(res.status).toBe(200);
    const body = z
      .object({
        slots: z.object({ budget: z.number(), budget_comparator: z.string() }),
        ranking: z.object({ count: z.number(), items: z.array(z.object({ shop_id: z.number() })) }),
        quote_report: z.string(),
        message: z.string()
      })
      .parse(await res.json());

    expect(body.slots).toEqual({ budget: 100000, budget_comparator: 'max' });
    expect(body.ranking.count).toBe(3);
    expect(body.ranking.items).toHaveLength(3);
    expect(body.message).toContain('🎯 추천 인쇄소 TOP 3 (후보 3곳)');
  });

  it('ranks a category served by a single vendor', async () => {
    const res = await buildApp().request('/api/quote/rank', postJson({ slots: { category: 'banner', quantity: 1 } }));
    expect(await res.json()).toMatchObject({ ranking: { count: 1 } });
  });

  it('rejects slots that break the contract', async () => {
    const app = buildApp();

    const noCategory = await app.request('/api/quote/rank', postJson({ slots: { quantity: 100 } }));
    expect(noCategory.status).toBe(400);
    expect(await noCategory.json()).toMatchObject({ fields: { category: '필수 항목입니다.' } });

    const zero = await app.request('/api/quote/rank', postJson({ slots: { category: 'card', quantity: '0부' } }));
    expect(zero.status).toBe(400);
    expect(await zero.json()).toMatchObject({ fields: { quantity: '수량은 1 이상의 정수여야 합니다.' } });
  });

  it('rejects a malformed body', async () => {
    const res = await buildApp().request('/api/quote/rank', {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: '{bad'
    });
    expect(res.status).toBe(400);
    const body = z.object({ fields: z.record(z.string(), z.string()) }).parse(await res.json());
    expect(Object.keys(body.fields)).toEqual(['body']);
  });
});

describe('chat routes', () => {
  it('opens a session and answers messages', async () => {
    const app = buildApp();
    const created = await app.request('/api/chat/sessions', { method: 'POST' });
    expect(created.status).toBe(201);
    const { session_id } = sessionSchema.parse(await created.json());

    const res = await app.request(`/api/chat/sessions/${session_id}/send`, postJson({ message: '명함 200부' }));
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      session_id,
      reply: { type: 'ask', slot: 'paper', slots: { category: 'card', quantity: 200 } }
    });

    const reset = await app.request(`/api/chat/sessions/${session_id}/reset`, { method: 'POST' });
    expect(await reset.json()).toMatchObject({ session_id, reply: { type: 'ask', slot: 'category' } });
  });

  it('deletes a session and forgets it', async () => {
    const app = buildApp();
    const { session_id } = sessionSchema.parse(await (await app.request('/api/chat/sessions', { method: 'POST' })).json());

    const deleted = await app.request(`/api/chat/sessions/${session_id}`, { method: 'DELETE' });
    expect(deleted.status).toBe(200);
    expect(await deleted.json()).toEqual({ session_id, deleted: true });

    const send = await app.request(`/api/chat/sessions/${session_id}/send`, postJson({ message: '명함 200부' }));
    expect(send.status).toBe(404);

    const again = await app.request(`/api/chat/sessions/${session_id}`, { method: 'DELETE' });
    expect(again.status).toBe(404);

    expect(await (await app.request('/api/status')).json()).toMatchObject({ sessions: 0 });
  });

  it('validates the message and the session id', async () => {
    const app = buildApp();
    const { session_id } = sessionSchema.parse(await (await app.request('/api/chat/sessions', { method: 'POST' })).json());

    const empty = await app.request(`/api/chat/sessions/${session_id}/send`, postJson({ message: '  ' }));
    expect(empty.status).toBe(400);
    expect(await empty.json()).toMatchObject({ fields: { message: '메시지를 입력해주세요.' } });

    const missing = await app.request('/api/chat/sessions/unknown/send', postJson({ message: '안녕하세요' }));
    expect(missing.status).toBe(404);
  });
});
