import type { EnvelopeCode, ErrorCode, ErrorEnvelope } from '@dutystack/types';

export class EngineError extends Error {
  readonly code: ErrorCode;
  readonly statusCode: number;
  readonly details?: unknown;

  constructor(code: ErrorCode, statusCode: number, message: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }
}

/** Descriptor or caller input failed validation; no partial result is produced. */
export class ValidationError extends EngineError {
  constructor(message: string, details?: unknown) {
    super('ERR_VALIDATION', 400, message, details);
  }
}

/** An applicable authority has no rate for this product/origin: a catalog fault. */
export class NoRateDefinedError extends EngineError {
  readonly authorityId: string;

  constructor(authorityId: string, hsCode: string, originCountry: string) {
    super(
      'ERR_NO_RATE_DEFINED',
      500,
      `No rate defined for authority ${authorityId} (hs=${hsCode}, origin=${originCountry})`,
      { authorityId, hsCode, originCountry }
    );
    this.authorityId = authorityId;
  }
}

export class CatalogError extends EngineError {
  constructor(message: string, details?: unknown) {
    super('ERR_CATALOG', 500, message, details);
  }
}

export function errorResponse(
  message: string,
  code: EnvelopeCode = 'ERR_REQUEST',
  details?: unknown
): ErrorEnvelope {
  return { error: { code, message, ...(details === undefined ? {} : { details }) } };
}

export function errorResponseFor(err: unknown): ErrorEnvelope {
  if (err instanceof EngineError) return errorResponse(err.message, err.code, err.details);
  if (err instanceof Error) return errorResponse(err.message || 'Internal error', 'ERR_INTERNAL');
  return errorResponse(String(err), 'ERR_INTERNAL');
}
