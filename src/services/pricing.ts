import type { Category, FinishingCode, PricingRule, RequirementSlots, VendorRecord } from '../types';
import { cleanString, stableHash } from '../utils/helpers';
import { areaCm2, normalizeFinishing, parseSize } from './normalizer';
import { requiredSlots } from './requirements';

// 카테고리별 기본 단가/방식 (인쇄소 설정이 없을 때의 휴리스틱)
export const DEFAULT_PRICING: Record<Category, PricingRule> = {
  card: {
    mode: 'unit',
    rate_per_cm2: 0,
    base_unit_price: 300,
    color_multiplier: 1.2,
    duplex_multiplier: 1.5,
    finishing_prices: { GLOSS: 50, MATTE: 80, NONE: 0 }
  },
  poster: {
    mode: 'area',
    rate_per_cm2: 0.02,
    base_unit_price: 0,
    color_multiplier: 1.2,
    duplex_multiplier: 1.7,
    finishing_prices: { GLOSS: 200, MATTE: 250, NONE: 0 }
  },
  banner: {
    mode: 'area',
    rate_per_cm2: 0.015,
    base_unit_price: 0,
    color_multiplier: 1.15,
    duplex_multiplier: 1.0,
    finishing_prices: { NONE: 0 }
  },
  sticker: {
    mode: 'area',
    rate_per_cm2: 0.03,
    base_unit_price: 0,
    color_multiplier: 1.2,
    duplex_multiplier: 1.0,
    finishing_prices: { GLOSS: 60, MATTE: 80, NONE: 0 }
  },
  banner_large: {
    mode: 'area',
    rate_per_cm2: 0.012,
    base_unit_price: 0,
    color_multiplier: 1.0,
    duplex_multiplier: 1.0,
    finishing_prices: { NONE: 0 }
  },
  brochure: {
    mode: 'unit',
    rate_per_cm2: 0,
    base_unit_price: 700,
    color_multiplier: 1.2,
    duplex_multiplier: 1.6,
    finishing_prices: { NONE: 0 }
  }
};

export const VARIANCE_MIN = 0.9;
export const VARIANCE_MAX = 1.1;

// 인쇄소 설정이 기본값보다 우선 (후가공 단가표는 키 단위 병합)
export function resolvePricingRule(vendor: VendorRecord, category: Category): PricingRule {
  const base = DEFAULT_PRICING[category];
  const override = vendor.config?.pricing_rules?.[category] ?? {};
  return {
    mode: override.mode ?? base.mode,
    rate_per_cm2: override.rate_per_cm2 ?? base.rate_per_cm2,
    base_unit_price: override.base_unit_price ?? base.base_unit_price,
    color_multiplier: override.color_multiplier ?? base.color_multiplier,
    duplex_multiplier: override.duplex_multiplier ?? base.duplex_multiplier,
    finishing_prices: { ...base.finishing_prices, ...override.finishing_prices }
  };
}

// 같은 기본 단가를 쓰는 인쇄소끼리 가격이 겹치지 않도록 id+이름 기반 고정 편차 (0.90~1.10)
export function priceVariance(vendor: Pick<VendorRecord, 'id' | 'name'>): number {
  const bucket = stableHash(`${vendor.id}:${vendor.name}`) % 2001;
  return VARIANCE_MIN + (bucket / 2000) * (VARIANCE_MAX - VARIANCE_MIN);
}

export function finishingOf(slots: RequirementSlots): FinishingCode {
  return normalizeFinishing(slots.finishing ?? slots.coating);
}

export function isColorPrint(slots: RequirementSlots, category: Category): boolean {
  const printing = cleanString(slots.printing).toLowerCase();
  if (printing) return printing.includes('컬러') || printing.includes('color');
  // 인쇄 방식을 묻지 않는 품목(포스터, 스티커 등)은 컬러로 본다
  return !requiredSlots(category).includes('printing');
}

export function isDuplexPrint(slots: RequirementSlots): boolean {
  const printing = cleanString(slots.printing).toLowerCase();
  return printing.includes('양면') || printing.includes('duplex');
}

function requestedQuantity(slots: RequirementSlots): number {
  const q = slots.quantity;
  return q !== undefined && Number.isFinite(q) && q > 0 ? q : 1;
}

// 총 견적가(원). 입력이 부족해도 기본값으로 계산하며 최소 1원
export function estimatePrice(vendor: VendorRecord, category: Category, slots: RequirementSlots): number {
  const rule = resolvePricingRule(vendor, category);

  let unit: number;
  if (rule.mode === 'area') {
    // 크기를 모르면 명목 면적 1.0
    const area = areaCm2(parseSize(slots.size, category)) || 1.0;
    unit = area * rule.rate_per_cm2;
  } else {
    unit = rule.base_unit_price;
  }

  if (isColorPrint(slots, category)) unit *= rule.color_multiplier;
  if (isDuplexPrint(slots)) unit *= rule.duplex_multiplier;

  const prices = rule.finishing_prices;
  unit += prices[finishingOf(slots)] ?? prices.NONE ?? 0;

  const total = unit * requestedQuantity(slots) * priceVariance(vendor);
  if (!Number.isFinite(total)) {
    throw new Error(`견적 계산 실패 (shop ${vendor.id}): ${total}`);
  }
  return Math.max(1, Math.ceil(total));
}
