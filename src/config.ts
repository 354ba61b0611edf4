import * as path from 'path';

export interface AppConfig {
  port: number;
  dataDir: string;
  anthropicApiKey: string;
  anthropicModel: string;
  llmMaxTokens: number;
}

type Env = Record<string, string | undefined>;

function envStr(env: Env, name: string, fallback = ''): string {
  const v = env[name];
  return v === undefined || v === '' ? fallback : String(v);
}

function envInt(env: Env, name: string, fallback: number): number {
  const n = parseInt(envStr(env, name, ''), 10);
  return Number.isFinite(n) ? n : fallback;
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    port: envInt(env, 'PORT', 3000),
    dataDir: path.resolve(process.cwd(), envStr(env, 'DATA_DIR', 'data')),
    anthropicApiKey: envStr(env, 'ANTHROPIC_API_KEY'),
    anthropicModel: envStr(env, 'ANTHROPIC_MODEL', 'claude-sonnet-4-20250514'),
    llmMaxTokens: envInt(env, 'LLM_MAX_TOKENS', 300)
  };
}
