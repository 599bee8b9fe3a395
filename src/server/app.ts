// ===========================================
// HTTP ADAPTER
// Express routes over the QueryEngine
// ===========================================

import express from 'express';
import type { Express, NextFunction, Request, Response } from 'express';
import { z } from 'zod';
import { AgeGroup } from '../types/index.js';
import { ErrorCode, isAirQueryError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import type { QueryEngine } from '../modules/query-engine.js';
import { roundNumbers } from '../modules/result-assembler.js';

// ============ REQUEST SCHEMAS ============

const yearSchema = z.coerce.number().int().min(1990).max(2100);

const chatBody = z.object({
  message: z.string().trim().min(1).max(2000),
});

const predictBody = z.object({
  country: z.string().trim().min(1),
  year: yearSchema,
});

const monthlyBody = predictBody.extend({
  month: z.coerce.number().int().min(1).max(12),
});

const healthBody = predictBody.extend({
  ageGroup: z.nativeEnum(AgeGroup).optional(),
  disease: z.string().trim().min(1).optional(),
});

// ============ ERROR MAPPING ============

const STATUS_BY_CODE: Partial<Record<ErrorCode, number>> = {
  [ErrorCode.UNKNOWN_COUNTRY]: 404,
  [ErrorCode.UNKNOWN_REGION]: 404,
  [ErrorCode.UNKNOWN_DISEASE]: 404,
  [ErrorCode.MISSING_REQUIRED_ENTITY]: 422,
  [ErrorCode.NO_DATA]: 422,
};

function badRequest(res: Response, error: z.ZodError): void {
  res.status(400).json({
    error: {
      code: 'INVALID_REQUEST',
      message: 'Request body is invalid',
      details: error.flatten().fieldErrors,
    },
  });
}

export function createApp(engine: QueryEngine, log: Logger): Express {
  const app = express();
  app.use(express.json({ limit: '16kb' }));

  // Health check endpoint
  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', uptime: process.uptime() });
  });

  app.get('/debug', (_req: Request, res: Response) => {
    res.json(engine.status());
  });

  app.get('/api/countries', (_req: Request, res: Response) => {
    const countries = engine.listCountries();
    res.json({ count: countries.length, countries });
  });

  app.post('/api/chat', (req: Request, res: Response) => {
    const body = chatBody.safeParse(req.body);
    if (!body.success) return badRequest(res, body.error);
    res.json(engine.handle(body.data.message));
  });

  app.post('/api/predict', (req: Request, res: Response) => {
    const body = predictBody.safeParse(req.body);
    if (!body.success) return badRequest(res, body.error);
    res.json(roundNumbers(engine.predict(body.data.country, body.data.year)));
  });

  app.post('/api/monthly-predict', (req: Request, res: Response) => {
    const body = monthlyBody.safeParse(req.body);
    if (!body.success) return badRequest(res, body.error);
    const { country, year, month } = body.data;
    res.json(roundNumbers(engine.predictMonthly(country, year, month)));
  });

  app.post('/api/health-risk', (req: Request, res: Response) => {
    const body = healthBody.safeParse(req.body);
    if (!body.success) return badRequest(res, body.error);
    const { country, year, ageGroup, disease } = body.data;
    res.json(roundNumbers(engine.healthRisk(country, year, { ageGroup, disease })));
  });

  app.use((req: Request, res: Response) => {
    res.status(404).json({ error: { code: 'NOT_FOUND', message: `No route for ${req.method} ${req.path}` } });
  });

  // Express recognises error middleware by its four parameters
  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof SyntaxError) {
      res.status(400).json({ error: { code: 'INVALID_REQUEST', message: 'Malformed JSON body' } });
      return;
    }

    if (isAirQueryError(error)) {
      const status = STATUS_BY_CODE[error.code] ?? 500;
      if (status >= 500) {
        log.error({ error, path: req.path }, 'Request failed');
      }
      res.status(status).json({ error: error.toJSON() });
      return;
    }

    log.error({ error, path: req.path }, 'Unexpected request error');
    res.status(500).json({ error: { code: ErrorCode.INTERNAL_ERROR, message: 'Internal server error' } });
  });

  return app;
}
