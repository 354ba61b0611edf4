import type { Logger } from '../types';

// 문자열 정리 헬퍼
export function cleanString(val: unknown): string {
  if (val === null || val === undefined) return '';
  return String(val).trim();
}

export function clamp(val: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(hi, val));
}

// 소수 첫째 자리 반올림
export function round1(val: number): number {
  return Math.round(val * 10) / 10;
}

export function stripSpaces(val: string): string {
  return val.replace(/\s+/g, '');
}

// FNV-1a 32bit. 인쇄소 id/이름 기반의 재현 가능한 값이 필요할 때 사용
export function stableHash(text: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < text.length; i++) {
    h ^= text.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0;
}

// 대소문자 무시 부분일치 (빈 값은 불일치)
export function containsText(haystack: string | undefined, needle: string | undefined): boolean {
  const h = (haystack || '').toLowerCase();
  const n = (needle || '').trim().toLowerCase();
  if (!h || !n) return false;
  return h.includes(n);
}

// 기본 로거 (테스트에서는 조용한 로거를 주입)
export const consoleLogger: Logger = {
  info: message => console.log(message),
  warn: message => console.warn(message)
};
