import { z } from 'zod';
import { CATEGORIES, CATEGORY_LABELS } from '../types';
import type { BudgetComparator, Category, RequirementSlots, SlotKey } from '../types';
import { SlotValidationError } from '../errors';
import { cleanString } from '../utils/helpers';
import {
  normalizeCategory,
  normalizeDeliveryMethod,
  normalizeDueDays,
  normalizeQuantity,
  normalizeRegion,
  parseBudget
} from './normalizer';

export interface SlotQuestion {
  slot: SlotKey;
  prompt: string;
  choices: string[];
}

export type NextSlot =
  | { done: false; slot: SlotKey; prompt: string; choices: string[] }
  | { done: true; prompt: string };

export type RawSlotInput = Partial<Record<SlotKey, unknown>>;

const CATEGORY_QUESTION: SlotQuestion = {
  slot: 'category',
  prompt: '어떤 인쇄물을 제작하시나요?',
  choices: CATEGORIES.map(c => CATEGORY_LABELS[c])
};

// 모든 카테고리 공통 마지막 3개 슬롯
const COMMON_TAIL: SlotQuestion[] = [
  { slot: 'due_days', prompt: '납기는 며칠 후면 좋을까요?', choices: ['1일', '2일', '3일', '5일', '7일'] },
  { slot: 'region', prompt: '지역은 어디로 설정할까요?', choices: ['서울-중구', '서울-종로', '경기-성남'] },
  { slot: 'budget', prompt: '예산은 얼마로 설정하시겠어요?', choices: ['5만원', '10만원', '20만원'] }
];

// 카테고리별 슬롯 수집 순서
const CATEGORY_SLOT_FLOW: Record<Category, SlotQuestion[]> = {
  card: [
    { slot: 'paper', prompt: '명함 용지 종류를 선택해주세요.', choices: ['일반지', '고급지', '아트지', '코팅지'] },
    { slot: 'printing', prompt: '인쇄 방식을 선택해주세요.', choices: ['단면 흑백', '단면 컬러', '양면 흑백', '양면 컬러'] },
    { slot: 'finishing', prompt: '후가공 옵션을 선택해주세요.', choices: ['무광', '유광', '스팟', '엠보싱'] },
    { slot: 'quantity', prompt: '몇 부 필요하신가요?', choices: ['100부', '200부', '500부', '1000부'] }
  ],
  banner: [
    { slot: 'size', prompt: '배너 사이즈를 선택해주세요.', choices: ['1x3m', '2x4m', '3x6m'] },
    { slot: 'stand', prompt: '배너 거치대 종류를 선택해주세요.', choices: ['X자형', 'A자형', '롤업형'] },
    { slot: 'quantity', prompt: '몇 개 필요하신가요?', choices: ['1개', '2개', '5개'] }
  ],
  poster: [
    { slot: 'paper', prompt: '포스터 용지 종류를 선택해주세요.', choices: ['일반지', '아트지', '코팅지', '합지'] },
    { slot: 'coating', prompt: '코팅 종류를 선택해주세요.', choices: ['무광', '유광', '스팟', '없음'] },
    { slot: 'quantity', prompt: '몇 부 필요하신가요?', choices: ['10부', '50부', '100부', '200부'] }
  ],
  sticker: [
    { slot: 'type', prompt: '스티커 종류를 선택해주세요.', choices: ['일반스티커', '방수스티커', '반사스티커', '전사스티커'] },
    { slot: 'size', prompt: '스티커 사이즈를 선택해주세요. 원형은 지름으로 알려주세요.', choices: ['50x50mm', '100x100mm', '200x200mm', '원형 50mm'] },
    { slot: 'quantity', prompt: '몇 개 필요하신가요?', choices: ['100개', '500개', '1000개'] }
  ],
  banner_large: [
    { slot: 'size', prompt: '현수막 사이즈를 선택해주세요.', choices: ['1x3m', '2x4m', '3x6m'] },
    { slot: 'processing', prompt: '현수막 추가 가공 종류를 선택해주세요.', choices: ['고리', '지퍼', '없음'] },
    { slot: 'quantity', prompt: '몇 개 필요하신가요?', choices: ['1개', '2개', '5개'] }
  ],
  brochure: [
    { slot: 'paper', prompt: '브로슈어 용지 종류를 선택해주세요.', choices: ['일반지', '아트지', '코팅지', '합지'] },
    { slot: 'size', prompt: '브로슈어 사이즈를 선택해주세요.', choices: ['A4', 'A5', 'B5', '명함크기'] },
    { slot: 'folding', prompt: '브로슈어 접지 종류를 선택해주세요.', choices: ['2단접지', '3단접지', 'Z접지', '없음'] },
    { slot: 'quantity', prompt: '몇 부 필요하신가요?', choices: ['100부', '200부', '500부', '1000부'] }
  ]
};

export const READY_PROMPT = '모든 정보가 수집되었습니다. 견적을 생성할까요?';

export const SLOT_KEYS: readonly SlotKey[] = [
  'category', 'paper', 'size', 'printing', 'finishing', 'coating', 'type', 'stand', 'processing', 'folding',
  'quantity', 'due_days', 'region', 'budget', 'budget_comparator', 'delivery_method'
];

export function isSlotKey(key: string): key is SlotKey {
  return SLOT_KEYS.some(k => k === key);
}

export function slotQuestions(category: Category): SlotQuestion[] {
  return [...CATEGORY_SLOT_FLOW[category], ...COMMON_TAIL];
}

export function requiredSlots(category: Category): SlotKey[] {
  return slotQuestions(category).map(q => q.slot);
}

export function isFilled(value: unknown): boolean {
  return value !== undefined && value !== null && value !== '';
}

export function findMissing(slots: RequirementSlots): SlotKey[] {
  if (!slots.category) return ['category'];
  return requiredSlots(slots.category).filter(key => !isFilled(slots[key]));
}

// 채워지지 않은 첫 슬롯의 질문만 반환 (선형 탐색, 이미 채운 슬롯은 다시 묻지 않음)
export function nextMissingSlot(slots: RequirementSlots): NextSlot {
  const flow = slots.category ? slotQuestions(slots.category) : [CATEGORY_QUESTION];
  const next = flow.find(q => !isFilled(slots[q.slot]));
  if (!next) return { done: true, prompt: READY_PROMPT };
  return { done: false, slot: next.slot, prompt: next.prompt, choices: [...next.choices] };
}

function applySlot(out: RequirementSlots, key: SlotKey, raw: unknown): void {
  switch (key) {
    case 'category': {
      const category = normalizeCategory(raw);
      if (category) out.category = category;
      return;
    }
    case 'quantity': {
      const quantity = normalizeQuantity(raw);
      if (quantity !== null) out.quantity = quantity;
      return;
    }
    case 'due_days': {
      const days = normalizeDueDays(raw);
      if (days !== null) out.due_days = days;
      return;
    }
    case 'budget': {
      const budget = parseBudget(raw);
      if (budget) {
        out.budget = budget.amount;
        out.budget_comparator = budget.comparator;
      }
      return;
    }
    case 'budget_comparator': {
      if (isComparator(raw)) out.budget_comparator = raw;
      return;
    }
    case 'region': {
      const region = normalizeRegion(raw);
      if (region) out.region = region;
      return;
    }
    case 'delivery_method': {
      const method = normalizeDeliveryMethod(raw);
      if (method) out.delivery_method = method;
      return;
    }
    default: {
      const text = cleanString(raw);
      if (text) out[key] = text;
    }
  }
}

function isComparator(value: unknown): value is BudgetComparator {
  return value === 'max' || value === 'min' || value === 'exact';
}

// 이미 채워진 슬롯은 덮어쓰지 않음 (corrections에 명시된 슬롯만 예외)
export function mergeSlots(
  current: RequirementSlots,
  incoming: RawSlotInput,
  options: { corrections?: SlotKey[] } = {}
): RequirementSlots {
  const out: RequirementSlots = { ...current };
  const corrections = new Set(options.corrections || []);
  let budgetWritten = false;

  for (const [key, raw] of Object.entries(incoming)) {
    if (!isSlotKey(key) || key === 'budget_comparator' || !isFilled(raw)) continue;
    if (isFilled(out[key]) && !corrections.has(key)) continue;
    applySlot(out, key, raw);
    if (key === 'budget' && out.budget !== current.budget) budgetWritten = true;
  }

  // 명시적인 예산 방향은 예산과 함께 들어왔을 때만 반영
  const comparator = incoming.budget_comparator;
  if (isComparator(comparator) && (budgetWritten || !out.budget_comparator || corrections.has('budget_comparator'))) {
    out.budget_comparator = comparator;
  }
  return out;
}

const slotContractSchema = z.object({
  quantity: z
    .number({ invalid_type_error: '수량은 숫자여야 합니다.' })
    .int('수량은 1 이상의 정수여야 합니다.')
    .min(1, '수량은 1 이상의 정수여야 합니다.')
    .optional(),
  due_days: z
    .number({ invalid_type_error: '납기는 숫자여야 합니다.' })
    .int('납기는 1 이상의 정수일로 입력해주세요.')
    .min(1, '납기는 1 이상의 정수일로 입력해주세요.')
    .optional(),
  budget: z
    .number({ invalid_type_error: '예산은 숫자여야 합니다.' })
    .int('예산은 0원 이상의 정수여야 합니다.')
    .min(0, '예산은 0원 이상의 정수여야 합니다.')
    .optional()
});

export interface SlotValidation {
  valid: boolean;
  errors: Record<string, string>;
}

export function validateSlots(slots: RequirementSlots, options: { requireComplete?: boolean } = {}): SlotValidation {
  const errors: Record<string, string> = {};

  if (options.requireComplete) {
    for (const key of findMissing(slots)) {
      errors[key] = '필수 항목입니다.';
    }
  }

  const parsed = slotContractSchema.safeParse(slots);
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      const field = String(issue.path[0] ?? 'slots');
      if (!errors[field]) errors[field] = issue.message;
    }
  }

  return { valid: Object.keys(errors).length === 0, errors };
}

// 랭킹 엔진 진입 전 계약 검증
export function assertValidSlots(slots: RequirementSlots): RequirementSlots {
  const { valid, errors } = validateSlots(slots);
  if (!valid) throw new SlotValidationError(errors);
  return slots;
}

const CORRECTION_VERBS = ['다시', '수정', '바꿀', '바꿔', '변경'];

const CORRECTION_KEYWORDS: [SlotKey, string[]][] = [
  ['quantity', ['수량', '몇 부', '부수', '개수']],
  ['size', ['사이즈', '크기', '규격']],
  ['paper', ['재질', '종이', '용지']],
  ['finishing', ['마감', '코팅', '후가공']],
  ['printing', ['색상', '컬러', '인쇄방식', '인쇄 방식']],
  ['due_days', ['납기', '기간', '일정']],
  ['region', ['지역', '위치', '장소']],
  ['budget', ['예산', '금액']]
];

// 카테고리마다 같은 의미의 슬롯 이름이 다르다 (포스터 코팅, 스티커 종류)
const SLOT_ALIASES: Partial<Record<SlotKey, SlotKey>> = {
  finishing: 'coating',
  paper: 'type'
};

// "수량 다시 할게요" → 'quantity'
export function detectCorrection(utterance: string, category?: Category): SlotKey | null {
  const msg = utterance.toLowerCase();
  if (!CORRECTION_VERBS.some(v => msg.includes(v))) return null;

  for (const [slot, keywords] of CORRECTION_KEYWORDS) {
    if (!keywords.some(kw => msg.includes(kw))) continue;
    if (!category) return slot;
    const required = requiredSlots(category);
    if (required.includes(slot)) return slot;
    const alias = SLOT_ALIASES[slot];
    if (alias && required.includes(alias)) return alias;
  }
  return null;
}
