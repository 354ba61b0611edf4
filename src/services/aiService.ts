import { z } from 'zod';
import { CATEGORIES, CATEGORY_LABELS } from '../types';
import type { Logger, OptionSlotKey, RequirementSlots } from '../types';
import { cleanString, consoleLogger } from '../utils/helpers';
import { normalizeCategory, normalizeDeliveryMethod } from './normalizer';
import { findMissing, isSlotKey, nextMissingSlot, slotQuestions } from './requirements';
import type { RawSlotInput } from './requirements';
import type { TermFacts } from './dataLoader';

export type Intent = 'ASK' | 'EXPLAIN' | 'CONFIRM' | 'MATCH' | 'RESET';

// 대화 계층이 의존하는 추출 기능 (LLM 구현과 규칙 기반 구현 교체 가능)
export interface SlotExtractor {
  extractSlots(utterance: string, slots: RequirementSlots): Promise<RawSlotInput>;
  classifyIntent(utterance: string, slots: RequirementSlots): Promise<Intent>;
  explainTerm(term: string, facts: TermFacts | null, question: string): Promise<string>;
}

const OPTION_SLOTS: readonly OptionSlotKey[] = ['paper', 'size', 'printing', 'finishing', 'coating', 'type', 'stand', 'processing', 'folding'];

function isOptionSlot(key: string): key is OptionSlotKey {
  return OPTION_SLOTS.some(k => k === key);
}

const POSITIVE_KEYWORDS = ['네 맞습니다', '네 맞아요', '맞습니다', '맞아요', '그래요', '좋아요', '괜찮아요', '그렇습니다', '그렇네요', '맞아', '좋아', '괜찮아', '진행', '네'];
const NEGATIVE_KEYWORDS = ['아니', '수정', '바꿀', '바꿔', '다시', '변경'];
const EXPLAIN_KEYWORDS = ['뭐야', '뭔가요', '뭐예요', '무엇', '설명', '차이', '뜻이', '알려줘', '궁금'];
const DECISION_KEYWORDS = ['로 할게', '로 하겠', '로 할래', '로 해줘', '로 해주세요', '걸로', '거로'];
const RESET_PATTERN = /처음부터|초기화|리셋|reset|새로 시작/i;

const REGION_PATTERN = /(서울|경기|인천|부산|대구|광주|대전|울산|세종|강원|충북|충남|전북|전남|경북|경남|제주)(?:특별시|광역시|도)?(?:[\s\-/]*([가-힣]+?(?:구|시|군)))?(?![가-힣])/;
const QUANTITY_PATTERN = /(\d[\d,]*)\s*(부|개|장|매)(?![가-힣])/;
const SIZE_PATTERN = /(\d+(?:\.\d+)?\s*[x×*]\s*\d+(?:\.\d+)?\s*(?:mm|cm|m)?)|((?:원형|지름)\s*\d+(?:\.\d+)?\s*(?:mm|cm)?)|\b([AaBb][0-5])\b/;
const DUE_PATTERN = /(\d+)\s*(일|주|days?|weeks?)(?:\s*(?:이내|안에|후|뒤))?|당일|오늘|내일|모레/;
const BUDGET_PATTERN = /\d[\d,]*(?:\.\d+)?\s*(?:만(?:\s*\d+\s*천)?|천)\s*원?(?:\s*(?:이하|미만|이상|초과|까지|내외|정도))?|\d[\d,]*\s*원(?:\s*(?:이하|미만|이상|초과|까지))?/;

export function isPositiveAnswer(utterance: string): boolean {
  const msg = utterance.trim();
  if (NEGATIVE_KEYWORDS.some(k => msg.includes(k))) return false;
  return POSITIVE_KEYWORDS.some(k => msg.includes(k));
}

// 선택지 응답에서 어미 제거 ('아트지로 할게요' → '아트지')
function stripAnswerEnding(text: string): string {
  return text
    .replace(/\s*(으로|로)?\s*(할게요|할께요|할게|하겠습니다|하겠어요|할래요|할래|해주세요|해줘|부탁해요|주세요|요)[.!]*$/, '')
    .trim();
}

// 키워드/정규식 기반 추출 (API 키가 없을 때의 데모 모드)
export class RuleBasedSlotExtractor implements SlotExtractor {
  async extractSlots(utterance: string, slots: RequirementSlots): Promise<RawSlotInput> {
    const text = cleanString(utterance);
    const out: RawSlotInput = {};
    if (!text) return out;

    const category = slots.category ?? normalizeCategory(text) ?? undefined;
    if (!slots.category && category) out.category = category;

    const quantity = text.match(QUANTITY_PATTERN);
    if (quantity) out.quantity = quantity[0];

    const size = text.match(SIZE_PATTERN);
    if (size) out.size = size[0];

    const due = text.match(DUE_PATTERN);
    if (due) out.due_days = due[0];

    const budget = text.match(BUDGET_PATTERN);
    if (budget) out.budget = budget[0];

    const region = text.match(REGION_PATTERN);
    if (region) out.region = region[2] ? `${region[1]}-${region[2]}` : region[1];

    const delivery = normalizeDeliveryMethod(text);
    if (delivery) out.delivery_method = delivery;

    if (category) {
      for (const question of slotQuestions(category)) {
        if (!isOptionSlot(question.slot) || out[question.slot]) continue;
        const choice = question.choices.find(c => text.includes(c));
        if (choice) out[question.slot] = choice;
      }
    }

    // 인식된 값이 없으면 현재 묻고 있는 슬롯에 대한 답으로 본다
    const next = nextMissingSlot(slots);
    if (!next.done && Object.keys(out).length === 0 && !NEGATIVE_KEYWORDS.some(k => text.includes(k))) {
      const answer = isOptionSlot(next.slot) ? stripAnswerEnding(text) : text;
      if (answer) out[next.slot] = answer;
    }
    return out;
  }

  async classifyIntent(utterance: string, slots: RequirementSlots): Promise<Intent> {
    const msg = cleanString(utterance);
    if (RESET_PATTERN.test(msg)) return 'RESET';
    if (EXPLAIN_KEYWORDS.some(k => msg.includes(k)) && !DECISION_KEYWORDS.some(k => msg.includes(k))) return 'EXPLAIN';
    if (findMissing(slots).length === 0) return isPositiveAnswer(msg) ? 'MATCH' : 'CONFIRM';
    return 'ASK';
  }

  async explainTerm(term: string, facts: TermFacts | null, _question: string): Promise<string> {
    if (!facts) return `'${term}'에 대한 정보가 아직 준비되지 않았습니다.`;
    const useCases = facts.use_cases ? ` 주로 ${facts.use_cases}에 사용됩니다.` : '';
    return `'${term}': ${facts.description}${useCases}`;
  }
}

const llmResponseSchema = z.object({
  content: z.array(z.object({ type: z.string().optional(), text: z.string().optional() })).default([])
});

const extractedSlotsSchema = z.record(z.string(), z.union([z.string(), z.number(), z.null()]));
const intentSchema = z.object({ action: z.enum(['ASK', 'EXPLAIN', 'CONFIRM', 'MATCH', 'RESET']) });

// 응답 텍스트에서 첫 JSON 객체만 잘라낸다
export function extractJson(text: string): unknown {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start < 0 || end <= start) return null;
  try {
    return JSON.parse(text.slice(start, end + 1));
  } catch {
    return null;
  }
}

export interface AnthropicOptions {
  apiKey: string;
  model: string;
  maxTokens: number;
  fetchImpl?: typeof fetch;
  fallback?: SlotExtractor;
  logger?: Logger;
}

const SYSTEM_PROMPT = '당신은 인쇄 견적 전문 상담원입니다. 항상 한국어로 답하고, 요청한 형식만 출력하세요.';
const CATEGORY_LIST = CATEGORIES.map(c => `${c}(${CATEGORY_LABELS[c]})`).join(', ');

export class AnthropicSlotExtractor implements SlotExtractor {
  private readonly fetchImpl: typeof fetch;
  private readonly fallback: SlotExtractor;
  private readonly logger: Logger;

  constructor(private readonly options: AnthropicOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.fallback = options.fallback ?? new RuleBasedSlotExtractor();
    this.logger = options.logger ?? consoleLogger;
  }

  // 실패 시 null (호출부에서 규칙 기반으로 대체)
  private async callLLM(prompt: string, system: string = SYSTEM_PROMPT): Promise<string | null> {
    if (!this.options.apiKey) return null;

    try {
      const response = await this.fetchImpl('https://api.anthropic.com/v1/messages', {
        method: 'POST',
        headers: {
          'x-api-key': this.options.apiKey,
          'anthropic-version': '2023-06-01',
          'content-type': 'application/json'
        },
        body: JSON.stringify({
          model: this.options.model,
          max_tokens: this.options.maxTokens,
          system,
          messages: [{ role: 'user', content: prompt }]
        })
      });
      if (!response.ok) {
        this.logger.warn(`⚠️ LLM 호출 실패: HTTP ${response.status}`);
        return null;
      }

      const parsed = llmResponseSchema.safeParse(await response.json());
      const text = parsed.success ? parsed.data.content[0]?.text : undefined;
      if (!text) {
        this.logger.warn('⚠️ LLM 응답 파싱 실패');
        return null;
      }
      return text;
    } catch (error) {
      const errMsg = error instanceof Error ? error.message : String(error);
      this.logger.warn(`⚠️ LLM 호출 실패: ${errMsg.slice(0, 80)}`);
      return null;
    }
  }

  async extractSlots(utterance: string, slots: RequirementSlots): Promise<RawSlotInput> {
    const base = await this.fallback.extractSlots(utterance, slots);
    const prompt = `아래 사용자 발화에서 인쇄 견적 정보를 JSON 객체 하나로만 추출해줘.
가능한 키: category, paper, size, printing, finishing, coating, type, stand, processing, folding, quantity, due_days, region, budget, delivery_method
category 값: ${CATEGORY_LIST}
발화에 없는 키는 넣지 마.

현재 견적 정보: ${JSON.stringify(slots)}
사용자 발화: ${utterance}`;

    const text = await this.callLLM(prompt);
    if (!text) return base;

    const parsed = extractedSlotsSchema.safeParse(extractJson(text));
    if (!parsed.success) return base;

    const out: RawSlotInput = { ...base };
    for (const [key, value] of Object.entries(parsed.data)) {
      if (isSlotKey(key) && value !== null && value !== '') out[key] = value;
    }
    return out;
  }

  async classifyIntent(utterance: string, slots: RequirementSlots): Promise<Intent> {
    const missing = findMissing(slots);
    const prompt = `사용자 발화의 의도를 {"action": "ASK|EXPLAIN|CONFIRM|MATCH|RESET"} 형식으로만 답해줘.
- 용어 질문("뭐야", "설명해", "차이점") → EXPLAIN
- 정보 제공, 수정 요청 → ASK
- 모든 정보가 채워진 상태에서 긍정 응답 → MATCH
- 처음부터 다시 → RESET
남은 항목: ${missing.length ? missing.join(', ') : '없음'}
사용자 발화: ${utterance}`;

    const text = await this.callLLM(prompt);
    const parsed = text ? intentSchema.safeParse(extractJson(text)) : null;
    if (!parsed || !parsed.success) return this.fallback.classifyIntent(utterance, slots);

    // 필수 항목이 남아 있으면 견적 생성으로 넘어가지 않는다
    const action = parsed.data.action;
    if ((action === 'MATCH' || action === 'CONFIRM') && missing.length > 0) return 'ASK';
    return action;
  }

  async explainTerm(term: string, facts: TermFacts | null, question: string): Promise<string> {
    if (!facts) return this.fallback.explainTerm(term, facts, question);

    const isComparison = ['차이', '비교', '다르'].some(k => question.includes(k));
    const system = isComparison
      ? '인쇄 용어 비교 설명: 각 용어의 정의와 주요 차이점을 명확하게 설명하세요. 마크다운 없이 순수 텍스트로.'
      : '인쇄 용어 설명: 정의, 효과, 사용처를 포함하여 친절하게 3문장 이내로 설명하세요. 마크다운 없이 순수 텍스트로.';
    const prompt = `용어: ${term}
설명: ${facts.description}
사용처: ${facts.use_cases}
사용자 질문: ${question}`;

    const text = await this.callLLM(prompt, system);
    return text ? text.trim() : this.fallback.explainTerm(term, facts, question);
  }
}

// 용어 설명 캐시 (프로세스 수명, 만료 없음). 호출자가 소유
export class ExplanationCache {
  private readonly entries = new Map<string, string>();

  get size(): number {
    return this.entries.size;
  }

  async getOrCreate(term: string, question: string, produce: () => Promise<string>): Promise<string> {
    const key = `${term}:${question}`;
    const cached = this.entries.get(key);
    if (cached !== undefined) return cached;
    const text = await produce();
    this.entries.set(key, text);
    return text;
  }
}

export function createSlotExtractor(options: AnthropicOptions): SlotExtractor {
  return options.apiKey ? new AnthropicSlotExtractor(options) : new RuleBasedSlotExtractor();
}

// API 키 상태 확인
export function checkAPIKey(apiKey: string): { configured: boolean; masked: string } {
  const configured = !!apiKey;
  const masked = configured
    ? `${apiKey.slice(0, 10)}...${apiKey.slice(-4)}`
    : '미설정';
  return { configured, masked };
}
