import type { BudgetComparator, Category, FinishingCode, RequirementSlots, VendorRecord } from '../types';
import { clamp, containsText, round1 } from '../utils/helpers';
import { finishingOf } from './pricing';

const HOUR_MS = 3600 * 1000;

// 납기 여유(h) 구간별 점수. 늦더라도 0점은 주지 않음 (협의 여지)
const DEADLINE_LADDER: [number, number][] = [
  [0, 100],
  [-24, 80],
  [-48, 60],
  [-72, 40],
  [-120, 20]
];
const DEADLINE_FLOOR = 5;

export function deadlineScore(now: Date, etaHours: number, dueDays: number): number {
  const days = Math.max(Math.trunc(dueDays) || 1, 1);
  const deadline = now.getTime() + days * 24 * HOUR_MS;
  const finish = now.getTime() + etaHours * HOUR_MS;
  const slackHours = (deadline - finish) / HOUR_MS;

  for (const [threshold, score] of DEADLINE_LADDER) {
    if (slackHours >= threshold) return score;
  }
  return DEADLINE_FLOOR;
}

export const DEFAULT_DAILY_CAPACITY = 2000;

// 카테고리별로 "소재"에 해당하는 슬롯
const MATERIAL_SLOT: Record<Category, 'paper' | 'type' | 'stand' | 'processing'> = {
  card: 'paper',
  poster: 'paper',
  brochure: 'paper',
  sticker: 'type',
  banner: 'stand',
  banner_large: 'processing'
};

// 명함/포스터는 대부분 표준 규격을 처리하므로 사이즈 매칭 제외
const SIZE_MATCH_EXEMPT: readonly Category[] = ['card', 'poster'];

// 인쇄소 텍스트는 코드가 아닌 자연어로 적혀 있다
const FINISHING_DISPLAY: Record<Exclude<FinishingCode, 'NONE'>, string[]> = {
  MATTE: ['무광', '매트', 'matte'],
  GLOSS: ['유광', '글로시', 'gloss']
};

export function specFitScore(vendor: VendorRecord, category: Category, slots: RequirementSlots): number {
  const caps = vendor.capabilities[category] ?? {};
  const q = slots.quantity && slots.quantity > 0 ? slots.quantity : 1;
  let score = 0;

  if (containsText(caps.material_options, slots[MATERIAL_SLOT[category]])) score += 35;

  const finishing = finishingOf(slots);
  if (finishing !== 'NONE' && FINISHING_DISPLAY[finishing].some(word => containsText(caps.finishing_options, word))) {
    score += 25;
  }

  if (!SIZE_MATCH_EXEMPT.includes(category)) {
    const sizeSource = caps.size_options || caps.quantity_price_info;
    if (containsText(sizeSource, slots.size)) score += 20;
  }

  const declared = vendor.config?.capacity_info?.daily_capacity_units;
  const daily = declared && declared > 0 ? declared : DEFAULT_DAILY_CAPACITY;
  score += 20 * Math.max(0, (daily - q) / daily);

  return round1(Math.min(100, score));
}

export interface BudgetInput {
  amount?: number;
  comparator?: BudgetComparator;
}

// 후보군 안에서의 상대 가격 점수 + 예산 보정
export function priceFitScores(prices: Map<number, number>, budget: BudgetInput = {}): Map<number, number> {
  const scores = new Map<number, number>();
  if (prices.size === 0) return scores;

  const values = [...prices.values()];
  const min = Math.min(...values);
  const max = Math.max(...values);
  const range = max - min;

  const amount = budget.amount ?? 0;
  // '이상' 예산은 하한이라 초과/미달 보정을 하지 않음
  const shaped = amount > 0 && budget.comparator !== 'min';

  for (const [id, price] of prices) {
    let score = range === 0 ? 50 : (100 * (max - price)) / range;
    if (shaped) {
      if (price > amount) {
        score -= Math.min(50, ((price - amount) / amount) * 100);
      } else {
        score += Math.min(20, ((amount - price) / amount) * 50);
      }
    }
    scores.set(id, clamp(score, 0, 100));
  }
  return scores;
}
