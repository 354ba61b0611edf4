import type { Category, CandidateScores, Logger, RankingResult, RequirementSlots, ScoredCandidate, VendorRecord } from '../types';
import { SlotValidationError } from '../errors';
import { clamp, consoleLogger, round1 } from '../utils/helpers';
import { assertValidSlots } from './requirements';
import { estimatePrice } from './pricing';
import { estimateEtaHours } from './leadTime';
import { deadlineScore, priceFitScores, specFitScore } from './scoring';

// 가중치 (가격 40%, 납기 30%, 작업 적합도 30%)
export const WEIGHTS = { price: 0.4, due: 0.3, work: 0.3 } as const;
export const MAX_CONTRIBUTION = { price: 40, due: 30, work: 30 } as const;

export const TOP_N = 3;
export const DEFAULT_DUE_DAYS = 3;
const NEUTRAL_SCORE = 50;

export interface RankOptions {
  now?: Date;
  logger?: Logger;
}

export function isEligible(vendor: VendorRecord, category: Category): boolean {
  return vendor.is_active
    && vendor.registration_status === 'completed'
    && vendor.available_categories.includes(category);
}

// 동점 정렬용 고정 오프셋. 점수 합계에는 더하지 않는다
export function tieBreakOffset(vendorId: number): number {
  return (Math.abs(Math.trunc(vendorId)) % 7) * 0.07;
}

export function contribution(score: number, weight: number, cap: number): number {
  return clamp(Math.round(score * weight), 0, cap);
}

export function recommendationReason(price: number, due: number, work: number): string {
  const reasons: string[] = [];
  if (price >= 80) reasons.push('경쟁력 있는 가격');
  else if (price >= 60) reasons.push('합리적인 가격');
  if (due >= 80) reasons.push('빠른 납기');
  else if (due >= 60) reasons.push('안정적인 납기');
  if (work >= 80) reasons.push('완벽한 스펙 매칭');
  else if (work >= 60) reasons.push('적합한 작업 능력');
  if (reasons.length === 0) reasons.push('종합적인 만족도');
  return reasons.join(', ');
}

interface Evaluation {
  vendor: VendorRecord;
  price: number;
  eta: number;
  due: number;
  work: number;
  degraded: boolean;
}

function evaluate(
  vendor: VendorRecord,
  category: Category,
  slots: RequirementSlots,
  now: Date,
  logger: Logger
): Evaluation {
  try {
    const price = estimatePrice(vendor, category, slots);
    const eta = estimateEtaHours(vendor, category, slots);
    const due = deadlineScore(now, eta, slots.due_days ?? DEFAULT_DUE_DAYS);
    const work = specFitScore(vendor, category, slots);
    return { vendor, price, eta, due, work, degraded: false };
  } catch (error) {
    // 한 곳의 실패로 전체 추천이 멈추지 않도록 중립 점수로 대체
    logger.warn(`⚠️ 인쇄소 ${vendor.id}(${vendor.name}) 점수 계산 실패, 기본 점수 적용: ${String(error)}`);
    return { vendor, price: 0, eta: 0, due: NEUTRAL_SCORE, work: NEUTRAL_SCORE, degraded: true };
  }
}

function toCandidate(ev: Evaluation, priceScore: number): ScoredCandidate {
  const { vendor } = ev;
  const price_weighted = contribution(priceScore, WEIGHTS.price, MAX_CONTRIBUTION.price);
  const due_weighted = contribution(ev.due, WEIGHTS.due, MAX_CONTRIBUTION.due);
  const work_weighted = contribution(ev.work, WEIGHTS.work, MAX_CONTRIBUTION.work);

  const scores: CandidateScores = {
    price: round1(priceScore),
    due: ev.due,
    work: ev.work,
    price_weighted,
    due_weighted,
    work_weighted,
    oneq_total: price_weighted + due_weighted + work_weighted
  };

  return {
    shop_id: vendor.id,
    shop_name: vendor.name,
    phone: vendor.phone,
    address: vendor.address,
    email: vendor.email,
    total_price: ev.price,
    eta_hours: round1(ev.eta),
    production_time: vendor.production_time,
    delivery_options: vendor.delivery_options,
    is_verified: vendor.is_verified,
    scores,
    reason: ev.degraded ? '점수 계산 중 오류가 발생했습니다.' : recommendationReason(priceScore, ev.due, ev.work),
    degraded: ev.degraded
  };
}

function compareCandidates(a: ScoredCandidate, b: ScoredCandidate): number {
  const byTotal = b.scores.oneq_total - a.scores.oneq_total;
  if (byTotal !== 0) return byTotal;
  const byOffset = tieBreakOffset(b.shop_id) - tieBreakOffset(a.shop_id);
  if (byOffset !== 0) return byOffset;
  return a.shop_id - b.shop_id;
}

// OneQ 점수 계산 + Top3
export function rankVendors(slots: RequirementSlots, vendors: VendorRecord[], options: RankOptions = {}): RankingResult {
  const category = slots.category;
  if (!category) throw new SlotValidationError({ category: '필수 항목입니다.' });
  assertValidSlots(slots);

  const now = options.now ?? new Date();
  const logger = options.logger ?? consoleLogger;

  const eligible = vendors.filter(v => isEligible(v, category));
  if (eligible.length === 0) return { count: 0, items: [], all: [] };

  const evaluations = eligible.map(v => evaluate(v, category, slots, now, logger));

  // 가격 점수는 정상 계산된 인쇄소끼리만 비교 (키는 평가 순번, id가 겹쳐도 덮어쓰지 않음)
  const prices = new Map<number, number>();
  evaluations.forEach((ev, index) => {
    if (!ev.degraded) prices.set(index, ev.price);
  });
  const priceScores = priceFitScores(prices, { amount: slots.budget, comparator: slots.budget_comparator });

  const all = evaluations
    .map((ev, index) => toCandidate(ev, priceScores.get(index) ?? NEUTRAL_SCORE))
    .sort(compareCandidates);

  return { count: eligible.length, items: all.slice(0, TOP_N), all };
}
