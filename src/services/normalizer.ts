import { CATEGORIES, CATEGORY_LABELS } from '../types';
import type { BudgetComparator, Category, DeliveryMethod, FinishingCode } from '../types';
import { cleanString } from '../utils/helpers';

// 슬롯 정규화: 어떤 입력이 와도 예외 없이 기본값으로 떨어진다 (대화가 멈추면 안 됨)

const QUANTITY_UNIT = /\s*(부|개|장|매|copies|copy|sheets|sheet|pcs|ea)\s*$/;

export function normalizeQuantity(value: unknown): number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number') return Number.isFinite(value) ? Math.trunc(value) : null;

  const s = String(value).toLowerCase().replace(/,/g, '').trim().replace(QUANTITY_UNIT, '');
  const m = s.match(/\d+/);
  return m ? parseInt(m[0], 10) : null;
}

export interface ParsedBudget {
  amount: number;
  comparator: BudgetComparator;
}

const MAX_QUALIFIER = /이하|미만|orless|under|below/;
const MIN_QUALIFIER = /이상|초과|ormore|over|above/;
const QUALIFIERS = /이하|미만|이상|초과|orless|ormore|under|below|over|above|최대|최소|대략|약|정도|까지|내외/g;

// '150000' / '15만' / '15만원' / '7만5천원' / '3천원' / '12000원'
function parseAmount(s: string): number | null {
  if (/^\d+$/.test(s)) return parseInt(s, 10);

  let m = s.match(/^(\d+(?:\.\d+)?)만(?:(\d+)천)?원?$/);
  if (m) return Math.round(parseFloat(m[1]) * 10000 + (m[2] ? parseInt(m[2], 10) * 1000 : 0));

  m = s.match(/^(\d+(?:\.\d+)?)천원?$/);
  if (m) return Math.round(parseFloat(m[1]) * 1000);

  m = s.match(/^(\d+)원$/);
  if (m) return parseInt(m[1], 10);

  // 섞여있을 때 숫자만 추출 (마지막 fallback)
  const digits = s.replace(/\D/g, '');
  return digits ? parseInt(digits, 10) : null;
}

// 예산 문자열 → 금액 + 비교 방향
export function parseBudget(value: unknown): ParsedBudget | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number') {
    return Number.isFinite(value) ? { amount: Math.round(value), comparator: 'exact' } : null;
  }

  let s = String(value).toLowerCase().replace(/[,\s]/g, '');
  let comparator: BudgetComparator = 'exact';
  if (MAX_QUALIFIER.test(s)) comparator = 'max';
  else if (MIN_QUALIFIER.test(s)) comparator = 'min';
  s = s.replace(QUALIFIERS, '');

  // 범위 표현은 상한으로 본다
  if (s.includes('~')) {
    const parts = s.split('~').filter(Boolean);
    s = parts.length > 0 ? parts[parts.length - 1] : '';
    comparator = 'max';
  }

  const amount = parseAmount(s);
  return amount === null ? null : { amount, comparator };
}

export function normalizeMoney(value: unknown, fallback = 0): number {
  const parsed = parseBudget(value);
  return parsed ? parsed.amount : fallback;
}

export function normalizeDueDays(value: unknown): number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number') return Number.isFinite(value) ? Math.trunc(value) : null;

  const s = String(value).toLowerCase().replace(/,/g, '');
  const m = s.match(/\d+/);
  if (!m) {
    if (/당일|오늘|내일|today|tomorrow/.test(s)) return 1;
    if (/모레/.test(s)) return 2;
    return null;
  }
  const n = parseInt(m[0], 10);
  return /주|week/.test(s) ? n * 7 : n;
}

// '서울 중구' → '서울-중구', '경기/성남' → '경기-성남'
export function normalizeRegion(value: unknown): string {
  let s = cleanString(value).replace(/\s+/g, ' ');
  s = s.replace(/^(\S+) (\S+)/, '$1-$2');
  s = s.replace(/[/_]/g, '-');
  return s.replace(/\s+/g, '');
}

const DELIVERY_KEYWORDS: [DeliveryMethod, string[]][] = [
  ['pickup', ['pickup', '픽업', '방문', '직접']],
  ['courier', ['courier', 'quick', '퀵', '오토바이']],
  ['truck', ['truck', '화물', '트럭', '용달']],
  ['parcel', ['parcel', '택배', '우편', '등기']]
];

export function normalizeDeliveryMethod(value: unknown): DeliveryMethod | '' {
  const s = cleanString(value).toLowerCase().replace(/\s+/g, '');
  if (!s) return '';
  for (const [method, keywords] of DELIVERY_KEYWORDS) {
    if (keywords.some(kw => s.includes(kw))) return method;
  }
  return '';
}

export function normalizeFinishing(value: unknown): FinishingCode {
  const f = cleanString(value).toLowerCase();
  if (!f) return 'NONE';
  if (f.includes('무광') || f.includes('매트') || f.includes('matte')) return 'MATTE';
  if (f.includes('유광') || f.includes('글로시') || f.includes('gloss')) return 'GLOSS';
  return 'NONE';
}

const CATEGORY_ALIASES: Record<string, Category> = {
  card: 'card',
  business_card: 'card',
  banner: 'banner',
  poster: 'poster',
  sticker: 'sticker',
  banner_large: 'banner_large',
  banner2: 'banner_large',
  brochure: 'brochure',
  리플렛: 'brochure',
  팜플렛: 'brochure'
};
for (const code of CATEGORIES) {
  CATEGORY_ALIASES[CATEGORY_LABELS[code]] = code;
}
// 긴 별칭부터 비교 ('banner_large'가 'banner'보다 먼저)
const ALIAS_KEYS = Object.keys(CATEGORY_ALIASES).sort((a, b) => b.length - a.length);

export function normalizeCategory(value: unknown): Category | null {
  const s = cleanString(value).toLowerCase();
  if (!s) return null;
  if (Object.hasOwn(CATEGORY_ALIASES, s)) return CATEGORY_ALIASES[s];
  const key = ALIAS_KEYS.find(alias => s.includes(alias));
  return key ? CATEGORY_ALIASES[key] : null;
}

export interface SizeMm {
  widthMm: number | null;
  heightMm: number | null;
}

const PAPER_SIZES_MM: Record<string, [number, number]> = {
  a0: [841, 1189],
  a1: [594, 841],
  a2: [420, 594],
  a3: [297, 420],
  a4: [210, 297],
  a5: [148, 210],
  b3: [353, 500],
  b4: [250, 353],
  b5: [176, 250],
  명함크기: [90, 50]
};

const UNKNOWN_SIZE: SizeMm = { widthMm: null, heightMm: null };

// 단위 없이 '1x3'처럼 적으면 미터로 읽는 품목
const METRIC_BY_DEFAULT: readonly Category[] = ['banner', 'banner_large'];

// '90x50mm', '600×1800mm', '1x3m', 'A4', '원형 50mm', 'Ø50mm', '지름50mm'
export function parseSize(value: unknown, category?: Category | null): SizeMm {
  const s = cleanString(value).toLowerCase().replace(/\s+/g, '').replace(/[×*]/g, 'x');
  if (!s) return UNKNOWN_SIZE;

  let m = s.match(/^(?:원형|원|지름|ø|diameter)(\d+(?:\.\d+)?)(mm|cm)?$/);
  if (m) {
    const d = Math.round(parseFloat(m[1]) * (m[2] === 'cm' ? 10 : 1));
    return { widthMm: d, heightMm: d };
  }

  m = s.match(/^(\d+(?:\.\d+)?)x(\d+(?:\.\d+)?)(mm|cm|m)?$/);
  if (m) {
    const w = parseFloat(m[1]);
    const h = parseFloat(m[2]);
    let scale = 1;
    if (m[3] === 'm') scale = 1000;
    else if (m[3] === 'cm') scale = 10;
    else if (!m[3] && category && METRIC_BY_DEFAULT.includes(category) && w < 10 && h < 10) scale = 1000;
    return { widthMm: Math.round(w * scale), heightMm: Math.round(h * scale) };
  }

  if (!Object.hasOwn(PAPER_SIZES_MM, s)) return UNKNOWN_SIZE;
  const [widthMm, heightMm] = PAPER_SIZES_MM[s];
  return { widthMm, heightMm };
}

// 크기를 모르면 0
export function areaCm2(size: SizeMm): number {
  if (!size.widthMm || !size.heightMm) return 0;
  return (size.widthMm * size.heightMm) / 100;
}
