// 품목 코드 (인쇄소 available_categories와 동일한 코드 체계)
export type Category = 'card' | 'banner' | 'poster' | 'sticker' | 'banner_large' | 'brochure';

export const CATEGORIES: readonly Category[] = ['card', 'banner', 'poster', 'sticker', 'banner_large', 'brochure'];

export const CATEGORY_LABELS: Record<Category, string> = {
  card: '명함',
  banner: '배너',
  poster: '포스터',
  sticker: '스티커',
  banner_large: '현수막',
  brochure: '브로슈어'
};

export type DeliveryMethod = 'pickup' | 'courier' | 'truck' | 'parcel';

export type FinishingCode = 'GLOSS' | 'MATTE' | 'NONE';

// 이하/미만 → max, 이상/초과 → min, 그 외 → exact
export type BudgetComparator = 'max' | 'min' | 'exact';

export interface RequirementSlots {
  category?: Category;
  paper?: string;
  size?: string;
  printing?: string;
  finishing?: string;
  coating?: string;
  type?: string;
  stand?: string;
  processing?: string;
  folding?: string;
  quantity?: number;
  due_days?: number;
  region?: string;
  budget?: number;
  budget_comparator?: BudgetComparator;
  delivery_method?: DeliveryMethod | '';
}

export type SlotKey = keyof RequirementSlots;

// 자유 텍스트 슬롯 (카테고리별 옵션)
export type OptionSlotKey = 'paper' | 'size' | 'printing' | 'finishing' | 'coating' | 'type' | 'stand' | 'processing' | 'folding';

export type RegistrationStatus = 'step1' | 'step2' | 'completed';

// 카테고리별 인쇄소 자유 텍스트 (정형화되지 않은 입력 그대로)
export interface CapabilityText {
  material_options?: string;
  finishing_options?: string;
  size_options?: string;
  quantity_price_info?: string;
}

export interface PricingRule {
  mode: 'area' | 'unit';
  rate_per_cm2: number;
  base_unit_price: number;
  color_multiplier: number;
  duplex_multiplier: number;
  finishing_prices: Partial<Record<FinishingCode, number>>;
}

export interface LeadTimeProfile {
  base_hours: number;
  per_100_units: number;
  rush_multiplier: number;
  finishing_add_hours: Partial<Record<FinishingCode, number>>;
}

export interface VendorConfig {
  pricing_rules?: Partial<Record<Category, Partial<PricingRule>>>;
  leadtime_profile?: Partial<LeadTimeProfile>;
  capacity_info?: { daily_capacity_units?: number };
}

export interface VendorRecord {
  id: number;
  name: string;
  phone: string;
  address: string;
  email: string;
  is_active: boolean;
  is_verified: boolean;
  registration_status: RegistrationStatus;
  available_categories: Category[];
  capabilities: Partial<Record<Category, CapabilityText>>;
  production_time: string;
  delivery_options: string;
  description?: string;
  config?: VendorConfig;
}

export interface CandidateScores {
  price: number;
  due: number;
  work: number;
  price_weighted: number;
  due_weighted: number;
  work_weighted: number;
  oneq_total: number;
}

export interface ScoredCandidate {
  shop_id: number;
  shop_name: string;
  phone: string;
  address: string;
  email: string;
  total_price: number;
  eta_hours: number;
  production_time: string;
  delivery_options: string;
  is_verified: boolean;
  scores: CandidateScores;
  reason: string;
  degraded: boolean;
}

export interface RankingResult {
  count: number;
  items: ScoredCandidate[];
  all: ScoredCandidate[];
}

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
}
