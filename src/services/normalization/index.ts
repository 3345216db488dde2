import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../../domain/errors.js';
import type { CrossCheckConfig } from '../crosscheck/config.js';

export type NormalizerConfig = Pick<
  CrossCheckConfig,
  'dateFields' | 'identifierFields' | 'sexFields' | 'twoDigitYearPivot'
>;

export interface NormalizedField {
  normalized: string;
  /** Set when the value could not be put into canonical form. */
  warning?: string;
}

export interface DateNormalizeOptions {
  twoDigitYearPivot?: number;
}

const DEFAULT_PIVOT = 50;

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const US_SLASH_DATE = /^(\d{2})\/(\d{2})\/(\d{4})$/;
const US_DASH_DATE = /^(\d{2})-(\d{2})-(\d{4})$/;
const MRZ_DATE = /^(\d{2})(\d{2})(\d{2})$/;
const PRINTED_DATE = /^(\d{1,2})\s+([A-Za-z]{3})[A-Za-z]*\.?\s+(\d{4})$/;

const MONTHS: Record<string, number> = {
  jan: 1, feb: 2, mar: 3, apr: 4, may: 5, jun: 6,
  jul: 7, aug: 8, sep: 9, oct: 10, nov: 11, dec: 12,
};

const SEX_ALIASES: Record<string, string> = {
  m: 'm',
  male: 'm',
  f: 'f',
  female: 'f',
  x: 'x',
  '<': 'x',
  nonspecified: 'x',
  unspecified: 'x',
};

/**
 * Case-folds, strips diacritics and collapses whitespace. "José " and "JOSE"
 * both become "jose"; "ß" folds to "ss" so "STRASSE" matches "Straße".
 */
export function normalizeText(value: string): string {
  return stripMarks(stripMarks(value).toLowerCase())
    .replace(/ß/g, 'ss')
    .replace(/\s+/g, ' ')
    .trim();
}

export function normalizeIdentifier(value: string): string {
  return value.replace(/[\s<]/g, '').toUpperCase();
}

export function normalizeSex(value: string): string {
  const text = normalizeText(value);
  return Object.hasOwn(SEX_ALIASES, text) ? SEX_ALIASES[text] : text;
}

/**
 * Canonicalizes a date to YYYY-MM-DD. Accepts YYYY-MM-DD, MM/DD/YYYY,
 * MM-DD-YYYY, YYMMDD and printed "15 MAR 1985". Never guesses: anything else,
 * or a day that does not exist, is an error.
 */
export function normalizeDate(value: string, options: DateNormalizeOptions = {}): Result<string, AppError> {
  const input = value.trim();
  const pivot = options.twoDigitYearPivot ?? DEFAULT_PIVOT;

  let match = ISO_DATE.exec(input);
  if (match) return toIsoDate(input, Number(match[1]), Number(match[2]), Number(match[3]));

  match = US_SLASH_DATE.exec(input) ?? US_DASH_DATE.exec(input);
  if (match) return toIsoDate(input, Number(match[3]), Number(match[1]), Number(match[2]));

  match = MRZ_DATE.exec(input);
  if (match) {
    const yy = Number(match[1]);
    const year = yy < pivot ? 2000 + yy : 1900 + yy;
    return toIsoDate(input, year, Number(match[2]), Number(match[3]));
  }

  match = PRINTED_DATE.exec(input);
  if (match) {
    const month = MONTHS[match[2].toLowerCase()];
    if (month !== undefined) {
      return toIsoDate(input, Number(match[3]), month, Number(match[1]));
    }
  }

  return err(createAppError(ErrorCode.DATE_UNPARSEABLE, `Unrecognized date format: '${input}'`, false));
}

/**
 * Picks the normalizer for a field. An unparseable date falls back to its
 * text form so identical raw strings still compare equal.
 */
export function normalizeField(fieldName: string, value: string, config: NormalizerConfig): NormalizedField {
  if (config.dateFields.includes(fieldName)) {
    const date = normalizeDate(value, { twoDigitYearPivot: config.twoDigitYearPivot });
    if (date.ok) return { normalized: date.value };
    return { normalized: normalizeText(value), warning: date.error.message };
  }

  if (config.identifierFields.includes(fieldName)) {
    return { normalized: normalizeIdentifier(value) };
  }

  if (config.sexFields.includes(fieldName)) {
    return { normalized: normalizeSex(value) };
  }

  return { normalized: normalizeText(value) };
}

function toIsoDate(input: string, year: number, month: number, day: number): Result<string, AppError> {
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return err(createAppError(ErrorCode.DATE_UNPARSEABLE, `Invalid calendar date: '${input}'`, false));
  }
  return ok(`${String(year).padStart(4, '0')}-${pad2(month)}-${pad2(day)}`);
}

function stripMarks(value: string): string {
  return value.normalize('NFKD').replace(/\p{M}/gu, '');
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}
