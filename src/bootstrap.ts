// ===========================================
// ENGINE BOOTSTRAP
// Config -> reference data + model -> QueryEngine
// ===========================================

import fs from 'node:fs';
import type { AppConfig } from './types/index.js';
import { ConfigError } from './utils/errors.js';
import type { Logger } from './utils/logger.js';
import { loadReferenceData } from './data/reference-data.js';
import { loadForecastModel } from './modules/forecast/forecast-model.js';
import { QueryEngine } from './modules/query-engine.js';

export function createQueryEngine(config: Readonly<AppConfig>, log: Logger): QueryEngine {
  if (!fs.existsSync(config.data.dataDir)) {
    throw new ConfigError(`DATA_DIR ${config.data.dataDir} does not exist`, {
      dataDir: config.data.dataDir,
    });
  }

  const data = loadReferenceData(config.data, log);
  const model = loadForecastModel(config.data.modelPath);
  log.info({ kind: model.kind, version: model.version }, 'Forecast model loaded');

  return new QueryEngine({
    data,
    model,
    referenceYear: config.referenceYear,
    defaultTopN: config.defaultTopN,
    logger: log,
  });
}
