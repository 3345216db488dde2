import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../../domain/errors.js';
import type { CheckDigitResult, MrzFields, ParsedMrz } from './types.js';

const TD3_LINE_LENGTH = 44;
const TD1_LINE_LENGTH = 30;
const MRZ_CHARSET = /^[A-Z0-9<]+$/;
const WEIGHTS = [7, 3, 1] as const;

/** ICAO 9303 check digit: weights 7-3-1, letters A=10..Z=35, filler '<' = 0. */
export function computeCheckDigit(value: string): number {
  let sum = 0;
  for (let i = 0; i < value.length; i++) {
    sum += charValue(value.charAt(i)) * WEIGHTS[i % 3];
  }
  return sum % 10;
}

/** Decodes TD3 (passport, 2×44) or TD1 (ID card, 3×30) machine-readable zones. */
export function parseMrz(raw: string): Result<ParsedMrz, AppError> {
  const lines = raw
    .split(/\r?\n/)
    .map((line) => line.replace(/\s+/g, '').toUpperCase())
    .filter((line) => line.length > 0);

  const malformed = lines.find((line) => !MRZ_CHARSET.test(line));
  if (malformed !== undefined) {
    return err(parseError('MRZ contains characters outside A-Z, 0-9 and <', malformed));
  }

  if (lines.length === 2 && lines.every((line) => line.length === TD3_LINE_LENGTH)) {
    return ok(parseTd3(lines[0], lines[1]));
  }
  if (lines.length === 3 && lines.every((line) => line.length === TD1_LINE_LENGTH)) {
    return ok(parseTd1(lines[0], lines[1], lines[2]));
  }

  return err(parseError(
    `Unsupported MRZ layout: ${lines.length} line(s) of length ${lines.map((l) => l.length).join('/') || 0}`,
  ));
}

function parseTd3(line1: string, line2: string): ParsedMrz {
  const { surname, givenNames } = parseNames(line1.slice(5));
  const fields: MrzFields = {
    documentCode: clean(line1.slice(0, 2)) ?? '',
    issuingState: clean(line1.slice(2, 5)) ?? '',
    surname,
    givenNames,
    documentNumber: clean(line2.slice(0, 9)),
    nationality: clean(line2.slice(10, 13)),
    birthDate: clean(line2.slice(13, 19)),
    sex: parseSex(line2.charAt(20)),
    expiryDate: clean(line2.slice(21, 27)),
    optionalData: clean(line2.slice(28, 42)),
  };

  const checkDigits: CheckDigitResult[] = [
    { field: 'document_number', valid: verify(line2.slice(0, 9), line2.charAt(9)) },
    { field: 'birth_date', valid: verify(line2.slice(13, 19), line2.charAt(19)) },
    { field: 'expiry_date', valid: verify(line2.slice(21, 27), line2.charAt(27)) },
    {
      field: 'composite',
      valid: verify(line2.slice(0, 10) + line2.slice(13, 20) + line2.slice(21, 43), line2.charAt(43)),
    },
  ];

  return { format: 'TD3', valid: checkDigits.every((c) => c.valid), fields, checkDigits };
}

function parseTd1(line1: string, line2: string, line3: string): ParsedMrz {
  const { surname, givenNames } = parseNames(line3);
  const fields: MrzFields = {
    documentCode: clean(line1.slice(0, 2)) ?? '',
    issuingState: clean(line1.slice(2, 5)) ?? '',
    surname,
    givenNames,
    documentNumber: clean(line1.slice(5, 14)),
    nationality: clean(line2.slice(15, 18)),
    birthDate: clean(line2.slice(0, 6)),
    sex: parseSex(line2.charAt(7)),
    expiryDate: clean(line2.slice(8, 14)),
    optionalData: clean(line1.slice(15, 30)),
  };

  const checkDigits: CheckDigitResult[] = [
    { field: 'document_number', valid: verify(line1.slice(5, 14), line1.charAt(14)) },
    { field: 'birth_date', valid: verify(line2.slice(0, 6), line2.charAt(6)) },
    { field: 'expiry_date', valid: verify(line2.slice(8, 14), line2.charAt(14)) },
    {
      field: 'composite',
      valid: verify(line1.slice(5, 30) + line2.slice(0, 7) + line2.slice(8, 15) + line2.slice(18, 29), line2.charAt(29)),
    },
  ];

  return { format: 'TD1', valid: checkDigits.every((c) => c.valid), fields, checkDigits };
}

function parseNames(nameZone: string): { surname: string | null; givenNames: string | null } {
  const separator = nameZone.indexOf('<<');
  if (separator === -1) {
    return { surname: clean(nameZone), givenNames: null };
  }
  return {
    surname: clean(nameZone.slice(0, separator)),
    givenNames: clean(nameZone.slice(separator + 2)),
  };
}

function parseSex(char: string): string | null {
  if (char === 'M' || char === 'F') return char;
  if (char === '<' || char === 'X') return 'X';
  return null;
}

/** Filler '<' becomes a space; an all-filler segment is absent. */
function clean(segment: string): string | null {
  const text = segment.replace(/</g, ' ').replace(/\s+/g, ' ').trim();
  return text.length > 0 ? text : null;
}

function verify(value: string, checkChar: string): boolean {
  const expected = checkChar === '<' ? 0 : Number(checkChar);
  if (!Number.isInteger(expected) || checkChar === '') return false;
  return computeCheckDigit(value) === expected;
}

function charValue(char: string): number {
  if (char === '<') return 0;
  const code = char.charCodeAt(0);
  if (code >= 48 && code <= 57) return code - 48;
  if (code >= 65 && code <= 90) return code - 55;
  return 0;
}

function parseError(message: string, details?: string): AppError {
  return createAppError(ErrorCode.MRZ_PARSE_FAILED, message, false, details);
}
