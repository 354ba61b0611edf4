import { randomUUID } from 'crypto';
import type { Logger, RankingResult, RequirementSlots, SlotKey } from '../types';
import { SessionNotFoundError } from '../errors';
import { consoleLogger } from '../utils/helpers';
import { ExplanationCache } from './aiService';
import type { SlotExtractor } from './aiService';
import { findTerm, VendorDirectory } from './dataLoader';
import type { TermGlossary } from './dataLoader';
import { rankVendors } from './oneqScore';
import { renderQuoteReport, renderRankingMessage, renderSummary } from './quoteReport';
import { detectCorrection, findMissing, isSlotKey, mergeSlots, nextMissingSlot, validateSlots } from './requirements';

export interface ChatTurn {
  role: 'user' | 'assistant';
  content: string;
}

export interface ChatSession {
  id: string;
  history: ChatTurn[];
  slots: RequirementSlots;
  createdAt: Date;
}

export type ChatReply =
  | { type: 'ask'; message: string; slot?: SlotKey; choices: string[]; slots: RequirementSlots; missing: SlotKey[]; errors?: Record<string, string> }
  | { type: 'explain'; term: string; message: string; slots: RequirementSlots }
  | { type: 'confirm'; message: string; choices: string[]; slots: RequirementSlots }
  | { type: 'match'; message: string; quote_report: string; ranking: RankingResult; slots: RequirementSlots }
  | { type: 'reset'; message: string; slots: RequirementSlots };

export const HISTORY_LIMIT = 20;
export const CONFIRM_CHOICES = ['네 맞아요', '수정할게요'];

// 메모리 세션 저장소 (프로세스 수명)
export const SESSION_TTL_MS = 24 * 60 * 60 * 1000;

export interface SessionStoreOptions {
  ttlMs?: number;
  now?: () => Date;
}

export class SessionStore {
  private readonly sessions = new Map<string, ChatSession>();
  private readonly ttlMs: number;
  private readonly now: () => Date;

  constructor(options: SessionStoreOptions = {}) {
    this.ttlMs = options.ttlMs ?? SESSION_TTL_MS;
    this.now = options.now ?? (() => new Date());
  }

  get size(): number {
    return this.sessions.size;
  }

  create(): ChatSession {
    this.pruneExpired();
    const session: ChatSession = { id: randomUUID(), history: [], slots: {}, createdAt: this.now() };
    this.sessions.set(session.id, session);
    return session;
  }

  get(id: string): ChatSession {
    const session = this.sessions.get(id);
    if (!session || this.isExpired(session)) {
      this.sessions.delete(id);
      throw new SessionNotFoundError(id);
    }
    return session;
  }

  reset(id: string): ChatSession {
    const session = this.get(id);
    session.history = [];
    session.slots = {};
    return session;
  }

  delete(id: string): boolean {
    return this.sessions.delete(id);
  }

  // 만료된 세션 수를 돌려준다
  pruneExpired(): number {
    let removed = 0;
    for (const [id, session] of this.sessions) {
      if (!this.isExpired(session)) continue;
      this.sessions.delete(id);
      removed += 1;
    }
    return removed;
  }

  private isExpired(session: ChatSession): boolean {
    return this.now().getTime() - session.createdAt.getTime() >= this.ttlMs;
  }
}

export interface ConversationDeps {
  store: SessionStore;
  extractor: SlotExtractor;
  directory: VendorDirectory;
  glossary: TermGlossary;
  cache: ExplanationCache;
  logger?: Logger;
  now?: () => Date;
}

export class ConversationService {
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(private readonly deps: ConversationDeps) {
    this.logger = deps.logger ?? consoleLogger;
    this.now = deps.now ?? (() => new Date());
  }

  greeting(): ChatReply {
    return this.askReply({});
  }

  async handleMessage(sessionId: string, utterance: string): Promise<ChatReply> {
    const session = this.deps.store.get(sessionId);
    session.history.push({ role: 'user', content: utterance });

    const intent = await this.deps.extractor.classifyIntent(utterance, session.slots);
    this.logger.info(`💬 [${session.id.slice(0, 8)}] intent=${intent}`);

    let reply: ChatReply;
    if (intent === 'RESET') {
      session.slots = {};
      const first = nextMissingSlot({});
      reply = { type: 'reset', message: `처음부터 다시 시작할게요. ${first.prompt}`, slots: {} };
    } else if (intent === 'EXPLAIN' && findTerm(this.deps.glossary, utterance)) {
      reply = await this.explain(session, utterance);
    } else if (intent === 'MATCH' && findMissing(session.slots).length === 0) {
      reply = this.match(session);
    } else {
      reply = await this.ask(session, utterance);
    }

    session.history.push({ role: 'assistant', content: reply.message });
    if (session.history.length > HISTORY_LIMIT) session.history.splice(0, session.history.length - HISTORY_LIMIT);
    return reply;
  }

  private async explain(session: ChatSession, utterance: string): Promise<ChatReply> {
    const term = findTerm(this.deps.glossary, utterance) ?? '';
    const facts = this.deps.glossary.get(term) ?? null;
    const message = await this.deps.cache.getOrCreate(term, utterance, () =>
      this.deps.extractor.explainTerm(term, facts, utterance)
    );
    return { type: 'explain', term, message, slots: session.slots };
  }

  private async ask(session: ChatSession, utterance: string): Promise<ChatReply> {
    let working: RequirementSlots = { ...session.slots };

    // 수정 요청이면 해당 슬롯을 비우고 다시 받는다
    const correction = detectCorrection(utterance, working.category);
    if (correction) {
      delete working[correction];
      if (correction === 'budget') delete working.budget_comparator;
      this.logger.info(`✏️ 수정 요청 감지 - ${correction} 슬롯 초기화`);
    }

    const raw = await this.deps.extractor.extractSlots(utterance, working);
    working = mergeSlots(working, raw, { corrections: correction ? [correction] : [] });

    // 계약 위반 값은 버리고 다시 묻는다
    const { valid, errors } = validateSlots(working);
    if (!valid) {
      for (const key of Object.keys(errors)) {
        if (isSlotKey(key)) delete working[key];
      }
    }
    session.slots = working;

    const next = nextMissingSlot(working);
    if (next.done) {
      return {
        type: 'confirm',
        message: `${renderSummary(working)}\n\n위 내용으로 견적을 진행할까요?`,
        choices: [...CONFIRM_CHOICES],
        slots: working
      };
    }
    return this.askReply(working, valid ? undefined : errors);
  }

  private askReply(slots: RequirementSlots, errors?: Record<string, string>): ChatReply {
    const next = nextMissingSlot(slots);
    const prefix = errors ? `${Object.values(errors).join(' ')} ` : '';
    return {
      type: 'ask',
      message: prefix + next.prompt,
      slot: next.done ? undefined : next.slot,
      choices: next.done ? [] : next.choices,
      slots,
      missing: findMissing(slots),
      errors
    };
  }

  // 견적서 + 인쇄소 추천 후 슬롯 초기화
  private match(session: ChatSession): ChatReply {
    const slots = session.slots;
    const ranking = rankVendors(slots, this.deps.directory.vendors, { now: this.now(), logger: this.logger });
    this.logger.info(`🎯 추천 완료 - 후보 ${ranking.count}곳`);
    session.slots = {};
    return {
      type: 'match',
      message: renderRankingMessage(slots, ranking),
      quote_report: renderQuoteReport(slots),
      ranking,
      slots
    };
  }
}
