import { z } from 'zod/v4';

/** Codes raised by the engine itself; each maps to one error class. */
export const ERROR_CODES = ['ERR_VALIDATION', 'ERR_NO_RATE_DEFINED', 'ERR_CATALOG'] as const;
export const ErrorCodeSchema = z.enum(ERROR_CODES);

/** Envelope codes also cover bad CLI requests and unexpected failures. */
export const ENVELOPE_CODES = [...ERROR_CODES, 'ERR_REQUEST', 'ERR_INTERNAL'] as const;

export const ErrorEnvelopeSchema = z.object({
  error: z.object({
    code: z.enum(ENVELOPE_CODES),
    message: z.string().min(1),
    details: z.unknown().optional(),
  }),
});
