// tests/conversation.spec.ts
import * as path from 'path';
import { describe, it, expect, beforeEach } from 'vitest';
import { SessionNotFoundError } from '../src/errors';
import { ExplanationCache, RuleBasedSlotExtractor } from '../src/services/aiService';
import { ConversationService, HISTORY_LIMIT, SESSION_TTL_MS, SessionStore } from '../src/services/conversation';
import type { ChatReply } from '../src/services/conversation';
import { loadTermGlossary, loadVendorDirectory } from '../src/services/dataLoader';
import { FIXED_NOW, recordingLogger } from './fixtures';

const DATA_DIR = path.join(process.cwd(), 'data');

const CARD_ANSWERS = ['명함 만들고 싶어요', '아트지', '양면 컬러', '무광', '200부', '3일', '서울 중구', '10만원 이하'];

describe('ConversationService', () => {
  let store: SessionStore;
  let cache: ExplanationCache;
  let service: ConversationService;
  let sessionId: string;

  beforeEach(() => {
    const logger = recordingLogger();
    store = new SessionStore();
    cache = new ExplanationCache();
    service = new ConversationService({
      store,
      extractor: new RuleBasedSlotExtractor(),
      directory: loadVendorDirectory(DATA_DIR, logger),
      glossary: loadTermGlossary(DATA_DIR, logger),
      cache,
      logger,
      now: () => FIXED_NOW
    });
    sessionId = store.create().id;
  });

  async function sendAll(messages: string[]): Promise<ChatReply[]> {
    const replies: ChatReply[] = [];
    for (const message of messages) replies.push(await service.handleMessage(sessionId, message));
    return replies;
  }

  it('greets with the category question', () => {
    const reply = service.greeting();
    expect(reply.type).toBe('ask');
    expect(reply.type === 'ask' && reply.slot).toBe('category');
  });

  it('asks each slot in order and confirms the summary', async () => {
    const replies = await sendAll(CARD_ANSWERS);

    expect(replies.slice(0, -1).map(r => (r.type === 'ask' ? r.slot : r.type))).toEqual([
      'paper',
      'printing',
      'finishing',
      'quantity',
      'due_days',
      'region',
      'budget'
    ]);
    const last = replies[replies.length - 1];
    expect(last.type).toBe('confirm');
    expect(last.message.endsWith('예산: 100,000원 이하\n\n위 내용으로 견적을 진행할까요?')).toBe(true);
    expect(store.get(sessionId).slots).toEqual({
      category: 'card',
      paper: '아트지',
      printing: '양면 컬러',
      finishing: '무광',
      quantity: 200,
      due_days: 3,
      region: '서울-중구',
      budget: 100000,
      budget_comparator: 'max'
    });
  });

  it('ranks vendors on agreement and starts over', async () => {
    await sendAll(CARD_ANSWERS);
    const reply = await service.handleMessage(sessionId, '네 맞아요');

    expect(reply.type).toBe('match');
    if (reply.type === 'match') {
      expect(reply.ranking.count).toBe(3);
      expect(reply.ranking.items.map(c => c.shop_id).sort()).toEqual([1, 2, 5]);
      expect(reply.message).toContain('🎯 추천 인쇄소 TOP 3 (후보 3곳)');
      expect(reply.quote_report.startsWith('📋 최종 견적서')).toBe(true);
      expect(reply.slots.quantity).toBe(200);
    }
    expect(store.get(sessionId).slots).toEqual({});
  });

  it('explains glossary terms without touching slots', async () => {
    await sendAll(['명함 만들고 싶어요']);
    const reply = await service.handleMessage(sessionId, '무광이 뭐야?');

    expect(reply).toEqual({
      type: 'explain',
      term: '무광',
      message: "'무광': 빛을 반사하지 않는 코팅 방식으로, 차분하고 고급스러운 느낌을 줍니다. 주로 명함, 브로슈어, 고급 인쇄물에 사용됩니다.",
      slots: { category: 'card' }
    });
    await service.handleMessage(sessionId, '무광이 뭐야?');
    expect(cache.size).toBe(1);
  });

  it('clears a slot on a correction request and accepts the new value', async () => {
    await sendAll(CARD_ANSWERS.slice(0, 5));
    const reply = await service.handleMessage(sessionId, '수량 다시 할게요');

    expect(reply.type === 'ask' && reply.slot).toBe('quantity');
    expect(store.get(sessionId).slots.quantity).toBeUndefined();

    await service.handleMessage(sessionId, '500부');
    expect(store.get(sessionId).slots.quantity).toBe(500);
  });

  it('rejects values that break the slot contract and asks again', async () => {
    await sendAll(CARD_ANSWERS.slice(0, 4));
    const reply = await service.handleMessage(sessionId, '0부');

    expect(reply).toMatchObject({
      type: 'ask',
      slot: 'quantity',
      message: '수량은 1 이상의 정수여야 합니다. 몇 부 필요하신가요?',
      errors: { quantity: '수량은 1 이상의 정수여야 합니다.' }
    });
    expect(store.get(sessionId).slots.quantity).toBeUndefined();
  });

  it('resets the session on request', async () => {
    await sendAll(CARD_ANSWERS.slice(0, 3));
    const reply = await service.handleMessage(sessionId, '처음부터 다시 할게요');

    expect(reply).toEqual({ type: 'reset', message: '처음부터 다시 시작할게요. 어떤 인쇄물을 제작하시나요?', slots: {} });
    expect(store.get(sessionId).slots).toEqual({});
  });

  it('keeps a bounded history', async () => {
    await sendAll([...CARD_ANSWERS, ...CARD_ANSWERS, ...CARD_ANSWERS]);
    const history = store.get(sessionId).history;
    expect(history).toHaveLength(HISTORY_LIMIT);
    expect(history[history.length - 1].role).toBe('assistant');
  });

  it('fails for an unknown session', async () => {
    await expect(service.handleMessage('missing', '안녕하세요')).rejects.toBeInstanceOf(SessionNotFoundError);
  });
});

describe('SessionStore', () => {
  it('creates, resets and deletes sessions', () => {
    const store = new SessionStore();
    const session = store.create();
    session.slots.category = 'card';

    expect(store.reset(session.id).slots).toEqual({});
    expect(store.size).toBe(1);
    expect(store.delete(session.id)).toBe(true);
    expect(() => store.get(session.id)).toThrow(SessionNotFoundError);
  });

  it('expires sessions once they outlive the TTL', () => {
    let clock = FIXED_NOW.getTime();
    const store = new SessionStore({ ttlMs: 1000, now: () => new Date(clock) });
    const old = store.create();
    expect(old.createdAt).toEqual(FIXED_NOW);

    clock += 999;
    expect(store.get(old.id)).toBe(old);

    clock += 1;
    expect(() => store.get(old.id)).toThrow(SessionNotFoundError);
    expect(store.size).toBe(0);
  });

  it('prunes expired sessions when a new one opens', () => {
    let clock = FIXED_NOW.getTime();
    const store = new SessionStore({ now: () => new Date(clock) });
    store.create();
    store.create();

    clock += SESSION_TTL_MS;
    const fresh = store.create();
    expect(store.size).toBe(1);
    expect(store.get(fresh.id)).toBe(fresh);
    expect(store.pruneExpired()).toBe(0);
  });
});
