import { z } from 'zod/v4';

export const MATERIAL_KINDS = ['steel', 'aluminum', 'copper', 'lumber'] as const;
export const ENTRY_TYPES = [
  'standard',
  'deMinimis',
  'assemblyReturn',
  'temporaryExportReturn',
] as const;

export const CountryCodeSchema = z
  .string()
  .trim()
  .regex(/^[A-Za-z]{2}$/, 'expected ISO 3166 alpha-2 country code')
  .transform((s) => s.toUpperCase());

export const IsoDateSchema = z.iso.date();

/** 4–10 digits, optionally split by dots (e.g. 7208.10.00.00). */
export const HsCodeSchema = z
  .string()
  .trim()
  .regex(/^\d{4}(?:\.?\d{1,2}){0,3}$/, 'expected 4-10 digit HS code')
  .refine((s) => {
    const digits = s.replace(/\D+/g, '').length;
    return digits >= 4 && digits <= 10;
  }, 'expected 4-10 digit HS code');

/** HS prefix as stored in the catalog: 2–10 digits, dots allowed. */
export const HsPrefixSchema = z
  .string()
  .trim()
  .regex(/^\d{2}(?:\.?\d{1,2}){0,4}$/, 'expected 2-10 digit HS prefix');

const atMostTwoDecimals = (v: number) => Math.abs(v * 100 - Math.round(v * 100)) < 1e-6;

/** Percentage of value in [0, 100], at most 2 fraction digits (basis-point exact). */
export const PercentSchema = z
  .number()
  .min(0)
  .max(100)
  .refine(atMostTwoDecimals, { message: 'percentages support at most 2 fraction digits' });

/** Ad-valorem rate as a fraction (0.25 for 25%). */
export const RateSchema = z.number().min(0).max(10);

export const MaterialKindSchema = z.enum(MATERIAL_KINDS);
export const EntryTypeSchema = z.enum(ENTRY_TYPES);
