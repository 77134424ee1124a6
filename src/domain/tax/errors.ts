export type ValidationErrorCode = "INVALID_COUNTRY" | "INVALID_SUBDIVISION" | "UNEXPECTED_SUBDIVISION";
export type ConfigErrorCode = "MALFORMED_RATES" | "MALFORMED_AGREEMENTS" | "RULESET_UNREADABLE";
export type ProcessingErrorCode = "REGION_NOT_FOUND" | "RATE_NOT_FOUND" | "AGREEMENT_NOT_FOUND" | "INVALID_AMOUNT";

export type TaxEngineErrorCode = ValidationErrorCode | ConfigErrorCode | ProcessingErrorCode;

export class TaxEngineError extends Error {
  readonly code: TaxEngineErrorCode;
  readonly statusCode: number;
  readonly details: Record<string, unknown> | null;

  constructor(code: TaxEngineErrorCode, message: string, statusCode: number, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
    this.details = details ?? null;
  }
}

// Malformed region input supplied by the caller.
export class ValidationError extends TaxEngineError {
  declare readonly code: ValidationErrorCode;

  constructor(code: ValidationErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, 400, details);
  }
}

// Rate or agreement documents that fail schema validation. Fatal at startup.
export class ConfigError extends TaxEngineError {
  declare readonly code: ConfigErrorCode;

  constructor(code: ConfigErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, 500, details);
  }
}

export class ProcessingError extends TaxEngineError {
  declare readonly code: ProcessingErrorCode;

  constructor(code: ProcessingErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, 422, details);
  }
}

export function regionNotFound(regionCode: string): ProcessingError {
  return new ProcessingError("REGION_NOT_FOUND", `Region not found in rate catalog: ${regionCode}`, {
    region: regionCode
  });
}

export function rateNotFound(regionCode: string, tier: string): ProcessingError {
  return new ProcessingError("RATE_NOT_FOUND", `No ${tier} rate configured for ${regionCode}`, {
    region: regionCode,
    tier
  });
}

export function agreementNotFound(agreement: string): ProcessingError {
  return new ProcessingError("AGREEMENT_NOT_FOUND", `Trade agreement not found: ${agreement}`, {
    agreement
  });
}
