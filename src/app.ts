import { Hono } from 'hono';
import type { Context } from 'hono';
import { cors } from 'hono/cors';
import { z } from 'zod';

import type { AppConfig } from './config';
import { SessionNotFoundError, SlotValidationError, VendorPoolUnavailableError } from './errors';
import { CATEGORIES, CATEGORY_LABELS } from './types';
import type { Logger, VendorRecord } from './types';
import { checkAPIKey, ExplanationCache } from './services/aiService';
import type { SlotExtractor } from './services/aiService';
import { ConversationService, SessionStore } from './services/conversation';
import { VendorDirectory } from './services/dataLoader';
import type { TermGlossary } from './services/dataLoader';
import { normalizeCategory } from './services/normalizer';
import { rankVendors } from './services/oneqScore';
import { renderQuoteReport, renderRankingMessage } from './services/quoteReport';
import { findMissing, mergeSlots, nextMissingSlot, requiredSlots, slotQuestions, validateSlots } from './services/requirements';

export interface AppDeps {
  config: AppConfig;
  directory: VendorDirectory;
  glossary: TermGlossary;
  extractor: SlotExtractor;
  store?: SessionStore;
  cache?: ExplanationCache;
  logger: Logger;
  now?: () => Date;
}

const slotsBodySchema = z.object({
  slots: z.record(z.string(), z.unknown())
});

const chatBodySchema = z.object({
  message: z.string().trim().min(1, '메시지를 입력해주세요.')
});

// 요청 본문 검증 실패는 필드별 메시지로 400
async function readBody<T>(c: Context, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
  const body: unknown = await c.req.json().catch(() => null);
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const fields: Record<string, string> = {};
    for (const issue of parsed.error.issues) {
      const key = issue.path.length ? issue.path.join('.') : 'body';
      if (!fields[key]) fields[key] = issue.message;
    }
    throw new SlotValidationError(fields);
  }
  return parsed.data;
}

function errorResponse(c: Context, error: unknown) {
  if (error instanceof SlotValidationError) return c.json({ error: error.message, fields: error.fields }, 400);
  if (error instanceof SessionNotFoundError) return c.json({ error: error.message }, 404);
  if (error instanceof VendorPoolUnavailableError) return c.json({ error: error.message }, 503);
  return c.json({ error: String(error) }, 500);
}

function vendorSummary(v: VendorRecord) {
  return {
    id: v.id,
    name: v.name,
    phone: v.phone,
    address: v.address,
    is_verified: v.is_verified,
    available_categories: v.available_categories,
    production_time: v.production_time,
    delivery_options: v.delivery_options
  };
}

export function createApp(deps: AppDeps) {
  const app = new Hono();
  const store = deps.store ?? new SessionStore({ now: deps.now });
  const conversation = new ConversationService({
    store,
    extractor: deps.extractor,
    directory: deps.directory,
    glossary: deps.glossary,
    cache: deps.cache ?? new ExplanationCache(),
    logger: deps.logger,
    now: deps.now
  });
  const now = deps.now ?? (() => new Date());

  // CORS 설정
  app.use('/*', cors());

  // 서비스/API 키 상태 확인
  app.get('/api/status', (c) => {
    const apiKey = checkAPIKey(deps.config.anthropicApiKey);
    return c.json({
      status: 'ok',
      apiKey,
      mode: apiKey.configured ? 'llm' : 'demo',
      vendors: deps.directory.summary(),
      sessions: store.size,
      timestamp: now().toISOString()
    });
  });

  // 카테고리별 수집 항목
  app.get('/api/categories', (c) => {
    return c.json({
      categories: CATEGORIES.map(code => ({
        code,
        label: CATEGORY_LABELS[code],
        slots: requiredSlots(code),
        questions: slotQuestions(code)
      }))
    });
  });

  app.get('/api/vendors', (c) => {
    const param = c.req.query('category');
    if (!param) {
      return c.json({ count: deps.directory.size, vendors: deps.directory.vendors.map(vendorSummary) });
    }
    const category = normalizeCategory(param);
    if (!category) return c.json({ error: `알 수 없는 카테고리: ${param}` }, 400);
    const vendors = deps.directory.eligibleFor(category);
    return c.json({ category, count: vendors.length, vendors: vendors.map(vendorSummary) });
  });

  // 원시 슬롯 → 정규화 슬롯 + 누락 항목
  app.post('/api/slots/normalize', async (c) => {
    try {
      const body = await readBody(c, slotsBodySchema);
      const slots = mergeSlots({}, body.slots);
      return c.json({
        slots,
        missing: findMissing(slots),
        next: nextMissingSlot(slots),
        validation: validateSlots(slots)
      });
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  // OneQ 점수 랭킹
  app.post('/api/quote/rank', async (c) => {
    try {
      const body = await readBody(c, slotsBodySchema);
      const slots = mergeSlots({}, body.slots);
      const ranking = rankVendors(slots, deps.directory.vendors, { now: now(), logger: deps.logger });
      return c.json({
        slots,
        ranking,
        quote_report: renderQuoteReport(slots),
        message: renderRankingMessage(slots, ranking)
      });
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  // 대화형 견적
  app.post('/api/chat/sessions', (c) => {
    const session = store.create();
    return c.json({ session_id: session.id, reply: conversation.greeting() }, 201);
  });

  app.delete('/api/chat/sessions/:id', (c) => {
    const id = c.req.param('id');
    if (!store.delete(id)) return errorResponse(c, new SessionNotFoundError(id));
    return c.json({ session_id: id, deleted: true });
  });

  app.post('/api/chat/sessions/:id/send', async (c) => {
    try {
      const body = await readBody(c, chatBodySchema);
      const reply = await conversation.handleMessage(c.req.param('id'), body.message);
      return c.json({ session_id: c.req.param('id'), reply });
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  app.post('/api/chat/sessions/:id/reset', (c) => {
    try {
      const session = store.reset(c.req.param('id'));
      return c.json({ session_id: session.id, reply: conversation.greeting() });
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  return app;
}
