// ===========================================
// ERROR TYPES
// Structured errors surfaced as caller-visible results
// ===========================================

export enum ErrorCode {
  UNKNOWN_REGION = 'UNKNOWN_REGION',
  UNKNOWN_COUNTRY = 'UNKNOWN_COUNTRY',
  UNKNOWN_DISEASE = 'UNKNOWN_DISEASE',
  MISSING_REQUIRED_ENTITY = 'MISSING_REQUIRED_ENTITY',
  UNRECOGNIZED_INTENT = 'UNRECOGNIZED_INTENT',
  NO_DATA = 'NO_DATA',
  REFERENCE_DATA_ERROR = 'REFERENCE_DATA_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * Base error class for all query-engine errors
 */
export class AirQueryError extends Error {
  public readonly code: ErrorCode;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode,
    options?: {
      cause?: Error;
      context?: Record<string, unknown>;
    }
  ) {
    super(message);
    this.name = 'AirQueryError';
    this.code = code;
    this.context = options?.context;

    if (options?.cause) {
      this.cause = options.cause;
    }

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/**
 * Region alias not present in the static region table
 */
export class UnknownRegionError extends AirQueryError {
  public readonly region: string;
  public readonly supportedRegions: string[];

  constructor(region: string, supportedRegions: string[], reason?: string) {
    super(
      reason ?? `'${region}' is not a recognised region. Supported regions: ${supportedRegions.join(', ')}`,
      ErrorCode.UNKNOWN_REGION,
      { context: { region, supportedRegions } }
    );
    this.name = 'UnknownRegionError';
    this.region = region;
    this.supportedRegions = supportedRegions;
  }
}

export class UnknownCountryError extends AirQueryError {
  public readonly country: string;

  constructor(country: string) {
    super(`No data available for country '${country}'`, ErrorCode.UNKNOWN_COUNTRY, {
      context: { country },
    });
    this.name = 'UnknownCountryError';
    this.country = country;
  }
}

export class UnknownDiseaseError extends AirQueryError {
  public readonly disease: string;

  constructor(disease: string, supportedDiseases: string[]) {
    super(
      `'${disease}' is not a recognised disease. Supported diseases: ${supportedDiseases.join(', ')}`,
      ErrorCode.UNKNOWN_DISEASE,
      { context: { disease, supportedDiseases } }
    );
    this.name = 'UnknownDiseaseError';
    this.disease = disease;
  }
}

/**
 * A handler needs an entity the parser left unset
 */
export class MissingRequiredEntityError extends AirQueryError {
  public readonly missing: string[];

  constructor(intent: string, missing: string[]) {
    super(
      `${intent} needs ${missing.join(' and ')} to answer this question`,
      ErrorCode.MISSING_REQUIRED_ENTITY,
      { context: { intent, missing } }
    );
    this.name = 'MissingRequiredEntityError';
    this.missing = missing;
  }
}

export class NoDataError extends AirQueryError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.NO_DATA, { context });
    this.name = 'NoDataError';
  }
}

/**
 * Required reference data missing or malformed - fatal at startup
 */
export class ReferenceDataError extends AirQueryError {
  public readonly source: string;

  constructor(message: string, source: string, cause?: Error) {
    super(message, ErrorCode.REFERENCE_DATA_ERROR, { cause, context: { source } });
    this.name = 'ReferenceDataError';
    this.source = source;
  }
}

export class ConfigError extends AirQueryError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.CONFIG_ERROR, { context });
    this.name = 'ConfigError';
  }
}

/**
 * Type guard to check if error is a query-engine error
 */
export function isAirQueryError(error: unknown): error is AirQueryError {
  return error instanceof AirQueryError;
}

/**
 * Wrap an unknown error into a query-engine error
 */
export function wrapError(error: unknown, defaultMessage = 'Unknown error'): AirQueryError {
  if (isAirQueryError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new AirQueryError(error.message || defaultMessage, ErrorCode.INTERNAL_ERROR, {
      cause: error,
    });
  }

  return new AirQueryError(
    typeof error === 'string' ? error : defaultMessage,
    ErrorCode.INTERNAL_ERROR
  );
}
