// tests/oneqScore.spec.ts
import { describe, it, expect } from 'vitest';
import { SlotValidationError } from '../src/errors';
import { contribution, isEligible, rankVendors, recommendationReason, tieBreakOffset } from '../src/services/oneqScore';
import type { RequirementSlots, VendorRecord } from '../src/types';
import { FIXED_NOW, makeVendor, recordingLogger } from './fixtures';

const CARD_SLOTS: RequirementSlots = { category: 'card', quantity: 100, size: '90x50mm', due_days: 7 };

function pool(): VendorRecord[] {
  return [
    makeVendor({ id: 1, name: '가', capabilities: { card: { material_options: '아트지' } } }),
    makeVendor({ id: 2, name: '나' }),
    makeVendor({ id: 3, name: '다', config: { leadtime_profile: { base_hours: 200 } } }),
    makeVendor({ id: 4, name: '라', config: { pricing_rules: { card: { base_unit_price: 150 } } } }),
    makeVendor({ id: 5, name: '마', capabilities: { card: { material_options: '아트지, 고급지' } } })
  ];
}

describe('rankVendors', () => {
  it('scores a single vendor from neutral price, full deadline and fit', () => {
    const result = rankVendors(CARD_SLOTS, [makeVendor()], { now: FIXED_NOW, logger: recordingLogger() });
    expect(result.count).toBe(1);
    const [top] = result.items;
    expect(top.scores).toEqual({
      price: 50,
      due: 100,
      work: 19,
      price_weighted: 20,
      due_weighted: 30,
      work_weighted: 6,
      oneq_total: 56
    });
    expect(top.eta_hours).toBe(21.7);
    expect(top.reason).toBe('빠른 납기');
    expect(top.degraded).toBe(false);
  });

  it('returns an explicit empty result for an empty pool', () => {
    expect(rankVendors({ category: 'card' }, [])).toEqual({ count: 0, items: [], all: [] });
  });

  it('counts only eligible vendors', () => {
    const vendors = [
      makeVendor({ id: 1 }),
      makeVendor({ id: 2, is_active: false }),
      makeVendor({ id: 3, registration_status: 'step2' }),
      makeVendor({ id: 4, available_categories: ['banner'] })
    ];
    const result = rankVendors(CARD_SLOTS, vendors, { now: FIXED_NOW, logger: recordingLogger() });
    expect(result.count).toBe(1);
    expect(result.all.map(c => c.shop_id)).toEqual([1]);
  });

  it('returns the top three of the sorted pool', () => {
    const result = rankVendors({ ...CARD_SLOTS, paper: '아트지' }, pool(), { now: FIXED_NOW, logger: recordingLogger() });
    expect(result.count).toBe(5);
    expect(result.all).toHaveLength(5);
    expect(result.items).toEqual(result.all.slice(0, 3));
    const totals = result.all.map(c => c.scores.oneq_total);
    expect(totals).toEqual([...totals].sort((a, b) => b - a));
  });

  it('keeps each contribution within its weight and sums them exactly', () => {
    const result = rankVendors({ ...CARD_SLOTS, paper: '아트지', budget: 20000 }, pool(), { now: FIXED_NOW, logger: recordingLogger() });
    for (const c of result.all) {
      const s = c.scores;
      expect(s.price_weighted).toBeLessThanOrEqual(40);
      expect(s.due_weighted).toBeLessThanOrEqual(30);
      expect(s.work_weighted).toBeLessThanOrEqual(30);
      expect(s.oneq_total).toBe(s.price_weighted + s.due_weighted + s.work_weighted);
      expect(Number.isInteger(s.oneq_total)).toBe(true);
    }
  });

  it('does not depend on input order', () => {
    const forward = rankVendors(CARD_SLOTS, pool(), { now: FIXED_NOW, logger: recordingLogger() });
    const reversed = rankVendors(CARD_SLOTS, pool().reverse(), { now: FIXED_NOW, logger: recordingLogger() });
    expect(reversed.all.map(c => c.shop_id)).toEqual(forward.all.map(c => c.shop_id));
  });

  it('ranks the slow vendor below its peers on deadline', () => {
    const result = rankVendors({ ...CARD_SLOTS, due_days: 1 }, pool(), { now: FIXED_NOW, logger: recordingLogger() });
    const slow = result.all.find(c => c.shop_id === 3);
    expect(slow?.scores.due).toBe(5);
    expect(result.all[result.all.length - 1].shop_id).toBe(3);
  });

  it('falls back to neutral scores for a vendor that cannot be priced', () => {
    const logger = recordingLogger();
    const broken = makeVendor({ id: 9, name: '오류', config: { pricing_rules: { card: { base_unit_price: Number.NaN } } } });
    const result = rankVendors(CARD_SLOTS, [makeVendor({ id: 1 }), broken], { now: FIXED_NOW, logger });

    expect(result.count).toBe(2);
    const degraded = result.all.find(c => c.shop_id === 9);
    expect(degraded?.degraded).toBe(true);
    expect(degraded?.total_price).toBe(0);
    expect(degraded?.scores).toEqual({
      price: 50,
      due: 50,
      work: 50,
      price_weighted: 20,
      due_weighted: 15,
      work_weighted: 15,
      oneq_total: 50
    });
    expect(degraded?.reason).toBe('점수 계산 중 오류가 발생했습니다.');
    expect(logger.warnings).toHaveLength(1);
    expect(logger.warnings[0]).toContain('인쇄소 9(오류)');
  });

  it('scores price per vendor even when ids repeat', () => {
    const cheap = makeVendor({ id: 1, name: '싼집', config: { pricing_rules: { card: { base_unit_price: 100 } } } });
    const dear = makeVendor({ id: 1, name: '비싼집', config: { pricing_rules: { card: { base_unit_price: 1000 } } } });
    const result = rankVendors(CARD_SLOTS, [cheap, dear], { now: FIXED_NOW, logger: recordingLogger() });

    expect(result.all.map(c => [c.shop_name, c.scores.price])).toEqual([
      ['싼집', 100],
      ['비싼집', 0]
    ]);
  });

  it('breaks ties by the id offset, then by id', () => {
    const broken = (id: number) =>
      makeVendor({ id, name: `오류${id}`, config: { pricing_rules: { card: { base_unit_price: Number.NaN } } } });
    const opts = { now: FIXED_NOW, logger: recordingLogger() };

    // 3 % 7 = 3, 8 % 7 = 1
    expect(rankVendors(CARD_SLOTS, [broken(8), broken(3)], opts).all.map(c => c.shop_id)).toEqual([3, 8]);
    // 7 % 7 = 14 % 7 = 0
    expect(rankVendors(CARD_SLOTS, [broken(14), broken(7)], opts).all.map(c => c.shop_id)).toEqual([7, 14]);
  });

  it('rejects slots without a category or with invalid values', () => {
    expect(() => rankVendors({ quantity: 100 }, pool())).toThrow(SlotValidationError);
    expect(() => rankVendors({ category: 'card', quantity: 0 }, pool())).toThrow(SlotValidationError);
  });
});

describe('helpers', () => {
  it('checks eligibility', () => {
    expect(isEligible(makeVendor(), 'card')).toBe(true);
    expect(isEligible(makeVendor(), 'poster')).toBe(false);
    expect(isEligible(makeVendor({ registration_status: 'step1' }), 'card')).toBe(false);
  });

  it('clamps rounded contributions', () => {
    expect(contribution(100, 0.4, 40)).toBe(40);
    expect(contribution(19, 0.3, 30)).toBe(6);
    expect(contribution(-10, 0.3, 30)).toBe(0);
  });

  it('keeps the tie-break offset below one point', () => {
    expect(tieBreakOffset(7)).toBe(0);
    expect(tieBreakOffset(13)).toBeCloseTo(0.42, 10);
  });

  it('builds reasons from score thresholds', () => {
    expect(recommendationReason(85, 90, 95)).toBe('경쟁력 있는 가격, 빠른 납기, 완벽한 스펙 매칭');
    expect(recommendationReason(65, 60, 70)).toBe('합리적인 가격, 안정적인 납기, 적합한 작업 능력');
    expect(recommendationReason(10, 10, 10)).toBe('종합적인 만족도');
  });
});
