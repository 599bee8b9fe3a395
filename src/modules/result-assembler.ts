// ===========================================
// RESULT ASSEMBLER
// Intent payloads and errors -> ChatResult
// ===========================================

import { Intent } from '../types/index.js';
import type { ChatResult, ParsedQuery } from '../types/index.js';
import { ErrorCode } from '../utils/errors.js';
import type { AirQueryError } from '../utils/errors.js';

const DECIMALS = 2;

export function roundTo(value: number, decimals = DECIMALS): number {
  if (!Number.isFinite(value)) return value;
  const factor = 10 ** decimals;
  const rounded = Math.round(value * factor) / factor;
  // Avoid -0 in JSON output
  return rounded === 0 ? 0 : rounded;
}

/**
 * Copy of `value` with every number rounded. Arrays and plain objects are
 * walked; everything else passes through.
 */
export function roundNumbers(value: unknown): unknown {
  if (typeof value === 'number') {
    return roundTo(value);
  }
  if (Array.isArray(value)) {
    return value.map(roundNumbers);
  }
  if (typeof value === 'object' && value !== null) {
    return Object.fromEntries(
      Object.entries(value)
        .filter(([, v]) => v !== undefined)
        .map(([k, v]) => [k, roundNumbers(v)])
    );
  }
  return value;
}

export class ResultAssembler {
  success(requestId: string, intent: Intent, parsed: ParsedQuery, data: unknown): ChatResult {
    return {
      requestId,
      intent,
      data: roundNumbers(data),
      parsed,
    };
  }

  failure(requestId: string, intent: Intent, parsed: ParsedQuery, error: AirQueryError): ChatResult {
    return {
      requestId,
      intent,
      data: null,
      parsed,
      error: {
        code: error.code,
        message: error.message,
        ...(error.context ? { details: error.context } : {}),
      },
    };
  }

  unrecognized(requestId: string, parsed: ParsedQuery): ChatResult {
    return {
      requestId,
      intent: Intent.UNRECOGNIZED,
      data: null,
      parsed,
      error: {
        code: ErrorCode.UNRECOGNIZED_INTENT,
        message: 'The question could not be matched to a supported analysis',
        details: { message: parsed.rawMessage },
      },
    };
  }

  internal(requestId: string, intent: Intent, parsed: ParsedQuery): ChatResult {
    return {
      requestId,
      intent,
      data: null,
      parsed,
      error: {
        code: ErrorCode.INTERNAL_ERROR,
        message: 'An unexpected error occurred while answering the question',
        details: { requestId },
      },
    };
  }
}
