import { z } from 'zod/v4';
import { ENVELOPE_CODES, ErrorCodeSchema, ErrorEnvelopeSchema } from '../schemas/index.js';

export type ErrorCode = z.infer<typeof ErrorCodeSchema>;
export type EnvelopeCode = (typeof ENVELOPE_CODES)[number];
export type ErrorEnvelope = z.infer<typeof ErrorEnvelopeSchema>;
