import { CATEGORY_LABELS } from '../types';
import type { BudgetComparator, Category, OptionSlotKey, RankingResult, RequirementSlots, ScoredCandidate } from '../types';
import { round1 } from '../utils/helpers';

const DIVIDER = '━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━';
const MEDALS = ['🥇', '🥈', '🥉'];

const OPTION_LABELS: [OptionSlotKey, string][] = [
  ['paper', '용지'],
  ['printing', '인쇄'],
  ['finishing', '후가공'],
  ['coating', '코팅'],
  ['type', '종류'],
  ['stand', '거치대'],
  ['processing', '가공'],
  ['folding', '접지'],
  ['size', '사이즈']
];

const DELIVERY_LABELS = { pickup: '방문 수령', courier: '퀵', truck: '화물', parcel: '택배' } as const;

const BUDGET_SUFFIX: Record<BudgetComparator, string> = { max: ' 이하', min: ' 이상', exact: '' };

export const NO_MATCH_MESSAGE = [
  '😥 조건에 맞는 인쇄소를 찾지 못했습니다.',
  '납기나 예산 조건을 조금 완화해서 다시 요청해 주세요.'
].join('\n');

export function quantityUnit(category?: Category): string {
  return category === 'card' || category === 'poster' || category === 'brochure' || !category ? '부' : '개';
}

export function formatWon(amount: number): string {
  return `${Math.round(amount).toLocaleString('ko-KR')}원`;
}

export function formatBudget(slots: RequirementSlots): string {
  if (slots.budget === undefined) return '미정';
  return formatWon(slots.budget) + BUDGET_SUFFIX[slots.budget_comparator ?? 'exact'];
}

// 단위는 고정 포맷으로 붙인다 (사용자가 '200부'라고 적어도 '200부부'가 되지 않음)
export function renderSummary(slots: RequirementSlots): string {
  const lines: string[] = [`항목: ${slots.category ? CATEGORY_LABELS[slots.category] : '미정'}`];
  for (const [key, label] of OPTION_LABELS) {
    const value = slots[key];
    if (value) lines.push(`${label}: ${value}`);
  }
  if (slots.quantity !== undefined) lines.push(`수량: ${slots.quantity}${quantityUnit(slots.category)}`);
  if (slots.region) lines.push(`지역: ${slots.region}`);
  if (slots.due_days !== undefined) lines.push(`납기: ${slots.due_days}일`);
  if (slots.budget !== undefined) lines.push(`예산: ${formatBudget(slots)}`);
  if (slots.delivery_method) lines.push(`배송: ${DELIVERY_LABELS[slots.delivery_method]}`);
  return lines.join('\n');
}

export function renderQuoteReport(slots: RequirementSlots): string {
  return ['📋 최종 견적서', DIVIDER, renderSummary(slots), DIVIDER].join('\n');
}

export function formatRecommendation(candidate: ScoredCandidate, rank: number): string {
  const { scores } = candidate;
  const medal = MEDALS[rank - 1] ?? '🏅';
  const verified = candidate.is_verified ? ' ✅' : '';
  const price = candidate.degraded ? '견적 확인 필요' : formatWon(candidate.total_price);
  const eta = candidate.degraded ? '확인 필요' : `약 ${round1(candidate.eta_hours)}시간`;

  return [
    `${medal} ${rank}위 ${candidate.shop_name}${verified}`,
    `   OneQ 점수: ${scores.oneq_total}점 (가격 ${scores.price_weighted}/40, 납기 ${scores.due_weighted}/30, 적합도 ${scores.work_weighted}/30)`,
    `   예상 견적: ${price} | 예상 소요: ${eta}`,
    `   연락처: ${candidate.phone || '-'} | 주소: ${candidate.address || '-'}`,
    `   추천 이유: ${candidate.reason}`
  ].join('\n');
}

export function renderRankingMessage(slots: RequirementSlots, ranking: RankingResult): string {
  if (ranking.count === 0) return NO_MATCH_MESSAGE;

  const recommendations = ranking.items.map((c, i) => formatRecommendation(c, i + 1));
  return [
    renderQuoteReport(slots),
    '',
    `🎯 추천 인쇄소 TOP ${ranking.items.length} (후보 ${ranking.count}곳)`,
    DIVIDER,
    recommendations.join('\n\n'),
    '',
    '💡 다음 단계: 추천 인쇄소에 직접 연락하여 주문을 진행해 주세요.'
  ].join('\n');
}
