// ===========================================
// CONFIGURATION LOADER
// ===========================================

import path from 'node:path';
import { config } from 'dotenv';
import { z } from 'zod';
import type { AppConfig } from '../types/index.js';

// Load .env file
config();

// Environment validation schema
const envSchema = z.object({
  // System
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  PORT: z.coerce.number().int().positive().default(9000),

  // Reference data
  DATA_DIR: z.string().min(1).default('./data'),
  PM25_HISTORY_PATH: z.string().optional(),
  DISEASE_BASELINE_PATH: z.string().optional(),
  REGIONS_PATH: z.string().optional(),
  MODEL_PATH: z.string().optional(),
  // Extended age-stratified source - absent means the aggregated baseline path
  HEALTH_DETAIL_PATH: z.string().optional(),

  // Query resolution
  // "next year" / "in 3 years" resolve against this, never against the wall clock
  REFERENCE_YEAR: z.coerce.number().int().min(1990).max(2100).default(2026),
  DEFAULT_TOP_N: z.coerce.number().int().positive().default(5),
});

export type Env = z.infer<typeof envSchema>;

export function buildConfig(env: Env): AppConfig {
  const dataDir = path.resolve(env.DATA_DIR);
  const inData = (override: string | undefined, fallback: string): string =>
    override ? path.resolve(override) : path.join(dataDir, fallback);

  return {
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    port: env.PORT,
    referenceYear: env.REFERENCE_YEAR,
    defaultTopN: env.DEFAULT_TOP_N,

    data: {
      dataDir,
      pm25HistoryPath: inData(env.PM25_HISTORY_PATH, 'pm25-history.json'),
      diseaseBaselinePath: inData(env.DISEASE_BASELINE_PATH, 'disease-baselines.json'),
      regionsPath: inData(env.REGIONS_PATH, 'regions.json'),
      modelPath: inData(env.MODEL_PATH, path.join('model', 'pm25-forecaster.json')),
      healthDetailPath: env.HEALTH_DETAIL_PATH ? path.resolve(env.HEALTH_DETAIL_PATH) : null,
    },
  };
}

function loadConfig(): AppConfig {
  const parsed = envSchema.safeParse(process.env);

  if (!parsed.success) {
    console.error('❌ Invalid environment configuration:');
    console.error(parsed.error.format());
    process.exit(1);
  }

  return buildConfig(parsed.data);
}

export const appConfig: Readonly<AppConfig> = Object.freeze(loadConfig());
export default appConfig;
