import type { Logger, VendorRecord } from '../src/types';

export function makeVendor(overrides: Partial<VendorRecord> = {}): VendorRecord {
  return {
    id: 1,
    name: '테스트 인쇄소',
    phone: '02-000-0000',
    address: '서울 중구 을지로 1',
    email: 'shop@example.com',
    is_active: true,
    is_verified: true,
    registration_status: 'completed',
    available_categories: ['card'],
    capabilities: {},
    production_time: '2일',
    delivery_options: '택배',
    ...overrides
  };
}

export interface RecordingLogger extends Logger {
  infos: string[];
  warnings: string[];
}

export function recordingLogger(): RecordingLogger {
  const infos: string[] = [];
  const warnings: string[] = [];
  return {
    infos,
    warnings,
    info: message => { infos.push(message); },
    warn: message => { warnings.push(message); }
  };
}

export const FIXED_NOW = new Date('2026-03-02T09:00:00Z');
