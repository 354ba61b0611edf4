import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { CATEGORIES } from '../types';
import type { Category, CapabilityText, Logger, VendorConfig, VendorRecord } from '../types';
import { VendorPoolUnavailableError } from '../errors';
import { consoleLogger } from '../utils/helpers';
import { normalizeCategory } from './normalizer';
import { isEligible } from './oneqScore';

export const VENDOR_FILE = 'vendors.json';
export const TERM_FILE = 'terms.json';

const finishingMapSchema = z.object({
  GLOSS: z.number().nonnegative().optional(),
  MATTE: z.number().nonnegative().optional(),
  NONE: z.number().nonnegative().optional()
});

const capabilitySchema = z.object({
  material_options: z.string().optional(),
  finishing_options: z.string().optional(),
  size_options: z.string().optional(),
  quantity_price_info: z.string().optional()
});

const pricingOverrideSchema = z.object({
  mode: z.enum(['area', 'unit']).optional(),
  rate_per_cm2: z.number().nonnegative().optional(),
  base_unit_price: z.number().nonnegative().optional(),
  color_multiplier: z.number().positive().optional(),
  duplex_multiplier: z.number().positive().optional(),
  finishing_prices: finishingMapSchema.optional()
});

const leadTimeOverrideSchema = z.object({
  base_hours: z.number().nonnegative().optional(),
  per_100_units: z.number().nonnegative().optional(),
  rush_multiplier: z.number().positive().optional(),
  finishing_add_hours: finishingMapSchema.optional()
});

export const vendorSchema = z.object({
  id: z.number().int(),
  name: z.string().trim().min(1),
  phone: z.string().default(''),
  address: z.string().default(''),
  email: z.string().default(''),
  is_active: z.boolean().default(true),
  is_verified: z.boolean().default(false),
  registration_status: z.enum(['step1', 'step2', 'completed']),
  available_categories: z.array(z.string()).default([]),
  capabilities: z.record(z.string(), capabilitySchema).default({}),
  production_time: z.string().default(''),
  delivery_options: z.string().default(''),
  description: z.string().optional(),
  config: z
    .object({
      pricing_rules: z.record(z.string(), pricingOverrideSchema).optional(),
      leadtime_profile: leadTimeOverrideSchema.optional(),
      capacity_info: z.object({ daily_capacity_units: z.number().int().positive().optional() }).optional()
    })
    .optional()
});

type VendorInput = z.infer<typeof vendorSchema>;

// '명함'/'banner2' 같은 키도 카테고리 코드로 맞춘다
function byCategory<T>(entries: Record<string, T> | undefined): Partial<Record<Category, T>> {
  const out: Partial<Record<Category, T>> = {};
  for (const [key, value] of Object.entries(entries ?? {})) {
    const category = normalizeCategory(key);
    if (category) out[category] = value;
  }
  return out;
}

function toVendorRecord(input: VendorInput): VendorRecord {
  const categories = new Set<Category>();
  for (const raw of input.available_categories) {
    const category = normalizeCategory(raw);
    if (category) categories.add(category);
  }

  const capabilities: Partial<Record<Category, CapabilityText>> = byCategory(input.capabilities);
  const config: VendorConfig | undefined = input.config && {
    pricing_rules: byCategory(input.config.pricing_rules),
    leadtime_profile: input.config.leadtime_profile,
    capacity_info: input.config.capacity_info
  };

  return {
    id: input.id,
    name: input.name,
    phone: input.phone,
    address: input.address,
    email: input.email,
    is_active: input.is_active,
    is_verified: input.is_verified,
    registration_status: input.registration_status,
    available_categories: [...categories],
    capabilities,
    production_time: input.production_time,
    delivery_options: input.delivery_options,
    description: input.description,
    config
  };
}

export interface VendorSummary {
  total: number;
  active: number;
  completed: number;
  byCategory: Record<Category, number>;
}

// 인쇄소 목록 (호출자가 소유, 모듈 전역 캐시 없음)
export class VendorDirectory {
  constructor(readonly vendors: VendorRecord[]) {}

  get size(): number {
    return this.vendors.length;
  }

  eligibleFor(category: Category): VendorRecord[] {
    return this.vendors.filter(v => isEligible(v, category));
  }

  findById(id: number): VendorRecord | undefined {
    return this.vendors.find(v => v.id === id);
  }

  summary(): VendorSummary {
    const byCategory: Record<Category, number> = { card: 0, banner: 0, poster: 0, sticker: 0, banner_large: 0, brochure: 0 };
    for (const category of CATEGORIES) byCategory[category] = this.eligibleFor(category).length;
    return {
      total: this.vendors.length,
      active: this.vendors.filter(v => v.is_active).length,
      completed: this.vendors.filter(v => v.registration_status === 'completed').length,
      byCategory
    };
  }
}

export function parseVendors(raw: unknown, logger: Logger = consoleLogger): VendorRecord[] {
  if (!Array.isArray(raw)) throw new VendorPoolUnavailableError(`${VENDOR_FILE} 형식이 배열이 아닙니다`);

  const vendors: VendorRecord[] = [];
  const seen = new Set<number>();
  raw.forEach((row, index) => {
    const parsed = vendorSchema.safeParse(row);
    if (!parsed.success) {
      const detail = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ');
      logger.warn(`⚠️ 인쇄소 레코드 #${index} 건너뜀 - ${detail}`);
      return;
    }
    if (seen.has(parsed.data.id)) {
      logger.warn(`⚠️ 인쇄소 레코드 #${index} 건너뜀 - 중복된 id ${parsed.data.id}`);
      return;
    }
    seen.add(parsed.data.id);
    vendors.push(toVendorRecord(parsed.data));
  });
  return vendors;
}

// 데이터 로딩
export function loadVendorDirectory(dataDir: string, logger: Logger = consoleLogger): VendorDirectory {
  const file = path.join(dataDir, VENDOR_FILE);
  logger.info(`📁 Loading vendors from ${file}...`);

  if (!fs.existsSync(file)) throw new VendorPoolUnavailableError(`${file} 파일이 없습니다`);

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf-8'));
  } catch (error) {
    throw new VendorPoolUnavailableError(`${VENDOR_FILE} 파싱 실패 - ${String(error)}`);
  }

  const vendors = parseVendors(raw, logger);
  if (vendors.length === 0) throw new VendorPoolUnavailableError('등록된 인쇄소가 없습니다');

  const directory = new VendorDirectory(vendors);
  const summary = directory.summary();
  logger.info('✅ Vendors loaded successfully');
  logger.info(`  - 전체: ${summary.total}곳 / 활성: ${summary.active}곳 / 등록완료: ${summary.completed}곳`);
  return directory;
}

// ---------- 인쇄 용어 사전 ----------

const termSchema = z.object({
  description: z.string(),
  use_cases: z.string().default('')
});

export type TermFacts = z.infer<typeof termSchema>;
export type TermGlossary = Map<string, TermFacts>;

export function loadTermGlossary(dataDir: string, logger: Logger = consoleLogger): TermGlossary {
  const file = path.join(dataDir, TERM_FILE);
  const glossary: TermGlossary = new Map();
  if (!fs.existsSync(file)) {
    logger.warn(`⚠️ ${file} 없음 - 용어 설명은 AI 응답만 사용`);
    return glossary;
  }

  const parsed = z.record(z.string(), termSchema).safeParse(JSON.parse(fs.readFileSync(file, 'utf-8')));
  if (!parsed.success) {
    logger.warn(`⚠️ ${TERM_FILE} 형식 오류 - ${parsed.error.issues[0]?.message ?? 'unknown'}`);
    return glossary;
  }
  for (const [term, facts] of Object.entries(parsed.data)) glossary.set(term, facts);
  logger.info(`  - 인쇄 용어: ${glossary.size}건`);
  return glossary;
}

// 문장 안에서 사전에 있는 용어 찾기 (긴 용어 우선)
export function findTerm(glossary: TermGlossary, utterance: string): string | null {
  const terms = [...glossary.keys()].sort((a, b) => b.length - a.length);
  return terms.find(term => utterance.includes(term)) ?? null;
}
