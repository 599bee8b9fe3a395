// ===========================================
// ASK - answer one question from the command line
// Usage: npm run ask -- "What will PM2.5 be in Thailand in 2027?"
// ===========================================

import { appConfig } from '../src/config/index.js';
import { logger } from '../src/utils/logger.js';
import { createQueryEngine } from '../src/bootstrap.js';

const question = process.argv.slice(2).join(' ').trim();

if (!question) {
  console.error('Usage: npm run ask -- "<question>"');
  process.exit(2);
}

try {
  const engine = createQueryEngine(appConfig, logger);
  const result = engine.handle(question);
  console.log(JSON.stringify(result, null, 2));
  process.exit(result.error ? 1 : 0);
} catch (error) {
  logger.error({ error }, 'Failed to start query engine');
  process.exit(1);
}
