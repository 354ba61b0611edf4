import { serve } from '@hono/node-server';

import { createApp } from './app';
import { loadConfig } from './config';
import { consoleLogger } from './utils/helpers';
import { createSlotExtractor } from './services/aiService';
import { loadTermGlossary, loadVendorDirectory } from './services/dataLoader';

// 서버 시작
function main(): void {
  const config = loadConfig();
  console.log('🚀 Starting OneQ print quote service...');

  try {
    const directory = loadVendorDirectory(config.dataDir, consoleLogger);
    const glossary = loadTermGlossary(config.dataDir, consoleLogger);
    const extractor = createSlotExtractor({
      apiKey: config.anthropicApiKey,
      model: config.anthropicModel,
      maxTokens: config.llmMaxTokens,
      logger: consoleLogger
    });
    if (!config.anthropicApiKey) {
      console.log('ℹ️ ANTHROPIC_API_KEY 미설정 - 규칙 기반 데모 모드로 동작합니다');
    }

    const app = createApp({ config, directory, glossary, extractor, logger: consoleLogger });
    serve({
      fetch: app.fetch,
      port: config.port
    }, (info) => {
      console.log(`✅ Server running on http://localhost:${info.port}`);
    });
  } catch (err) {
    console.error('❌ Failed to load data:', err);
    process.exit(1);
  }
}

main();
