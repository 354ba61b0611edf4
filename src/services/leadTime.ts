import type { Category, DeliveryMethod, LeadTimeProfile, RequirementSlots, VendorRecord } from '../types';
import { stripSpaces } from '../utils/helpers';
import { areaCm2, parseSize } from './normalizer';
import { finishingOf } from './pricing';

const BASE_LEAD_TIME: LeadTimeProfile = {
  base_hours: 24,
  per_100_units: 1.5,
  rush_multiplier: 0.85,
  finishing_add_hours: { GLOSS: 6, MATTE: 8 }
};

// 품목별 기본 납기 프로필. 현재는 모든 품목이 같은 값을 쓴다
export const DEFAULT_LEAD_TIME: Record<Category, LeadTimeProfile> = {
  card: BASE_LEAD_TIME,
  banner: BASE_LEAD_TIME,
  poster: BASE_LEAD_TIME,
  sticker: BASE_LEAD_TIME,
  banner_large: BASE_LEAD_TIME,
  brochure: BASE_LEAD_TIME
};

// 배송 방식별 추가 시간 (고정값)
export const SHIPPING_HOURS: Record<DeliveryMethod, number> = {
  pickup: 0,
  courier: 6,
  truck: 12,
  parcel: 24
};

export const REGIONAL_DISCOUNT_HOURS = 6;

// 면적 가중이 붙는 대형 출력물
const LARGE_FORMAT: readonly Category[] = ['banner', 'banner_large', 'poster'];

export function resolveLeadTimeProfile(vendor: VendorRecord, category: Category): LeadTimeProfile {
  const base = DEFAULT_LEAD_TIME[category];
  const override = vendor.config?.leadtime_profile ?? {};
  return {
    base_hours: override.base_hours ?? base.base_hours,
    per_100_units: override.per_100_units ?? base.per_100_units,
    rush_multiplier: override.rush_multiplier ?? base.rush_multiplier,
    finishing_add_hours: { ...base.finishing_add_hours, ...override.finishing_add_hours }
  };
}

// 요청 지역이 인쇄소 주소에 포함되는지 ('서울-중구'는 '서울중구'로도 비교)
export function isNearby(region: string | undefined, address: string): boolean {
  const token = stripSpaces(region || '');
  const addr = stripSpaces(address || '');
  if (!token || !addr) return false;
  return addr.includes(token) || addr.includes(token.replace(/-/g, ''));
}

// 완료 예상 시간(h)
export function estimateEtaHours(vendor: VendorRecord, category: Category, slots: RequirementSlots): number {
  const profile = resolveLeadTimeProfile(vendor, category);
  const q = slots.quantity && slots.quantity > 0 ? slots.quantity : 1;

  const qtyTerm = (q / 100) * profile.per_100_units;
  const areaTerm = LARGE_FORMAT.includes(category) ? Math.min(24, areaCm2(parseSize(slots.size, category)) / 10000) : 0;
  const finishing = finishingOf(slots);
  const finAdd = finishing === 'NONE' ? 0 : profile.finishing_add_hours[finishing] ?? 0;

  let eta = (profile.base_hours + qtyTerm + areaTerm + finAdd) * profile.rush_multiplier;
  if (slots.delivery_method) eta += SHIPPING_HOURS[slots.delivery_method];
  if (isNearby(slots.region, vendor.address)) eta = Math.max(0, eta - REGIONAL_DISCOUNT_HOURS);

  if (!Number.isFinite(eta)) {
    throw new Error(`납기 계산 실패 (shop ${vendor.id}): ${eta}`);
  }
  return eta;
}
