export type ErrorDetails = Record<string, unknown>;

/**
 * Base class for every failure the engine raises. `code` is stable across releases so callers
 * (and log queries) can branch on it without matching messages.
 */
export class MarketMetricsError extends Error {
  public readonly code: string;
  public readonly details?: ErrorDetails;

  constructor(code: string, message: string, details?: ErrorDetails) {
    super(message);
    this.name = 'MarketMetricsError';
    this.code = code;
    this.details = details;
  }
}

export class DataValidationError extends MarketMetricsError {
  constructor(message: string, details?: ErrorDetails) {
    super('DATA_VALIDATION', message, details);
    this.name = 'DataValidationError';
  }
}

export class InvalidTenorError extends MarketMetricsError {
  constructor(message: string, details?: ErrorDetails) {
    super('INVALID_TENOR', message, details);
    this.name = 'InvalidTenorError';
  }
}

export class InvalidStepSizeError extends MarketMetricsError {
  constructor(message: string, details?: ErrorDetails) {
    super('INVALID_STEP_SIZE', message, details);
    this.name = 'InvalidStepSizeError';
  }
}

export class MissingMeetingError extends MarketMetricsError {
  constructor(message: string, details?: ErrorDetails) {
    super('MISSING_MEETING', message, details);
    this.name = 'MissingMeetingError';
  }
}

export class UnknownIssuerError extends MarketMetricsError {
  constructor(issuerId: string, details?: ErrorDetails) {
    super('UNKNOWN_ISSUER', `No bond quotes for issuer "${issuerId}"`, { issuerId, ...details });
    this.name = 'UnknownIssuerError';
  }
}

export class CurveLookupError extends MarketMetricsError {
  constructor(message: string, details?: ErrorDetails) {
    super('CURVE_LOOKUP', message, details);
    this.name = 'CurveLookupError';
  }
}

export class ConfigurationError extends MarketMetricsError {
  constructor(message: string, details?: ErrorDetails) {
    super('CONFIGURATION', message, details);
    this.name = 'ConfigurationError';
  }
}
