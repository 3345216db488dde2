import { describe, it, expect } from 'vitest';
import {
  normalizeDate,
  normalizeField,
  normalizeIdentifier,
  normalizeSex,
  normalizeText,
} from '../../src/services/normalization/index.js';
import { DEFAULT_CROSSCHECK_CONFIG } from '../../src/services/crosscheck/config.js';

describe('normalizeText', () => {
  it('case-folds and strips diacritics', () => {
    expect(normalizeText('José')).toBe('jose');
    expect(normalizeText('JOSE')).toBe('jose');
    expect(normalizeText('ÅSA')).toBe('asa');
  });

  it('folds sharp s to ss', () => {
    expect(normalizeText('Straße')).toBe('strasse');
    expect(normalizeText('STRASSE')).toBe('strasse');
    expect(normalizeText('GROẞ')).toBe('gross');
  });

  it('collapses and trims whitespace', () => {
    expect(normalizeText('  José   María \t')).toBe('jose maria');
  });

  it('is idempotent', () => {
    for (const value of ['  Müller-Lüdenscheidt ', 'ANNA  MARIA', 'ℌello', 'ß', '']) {
      const once = normalizeText(value);
      expect(normalizeText(once)).toBe(once);
    }
  });
});

describe('normalizeIdentifier', () => {
  it('drops spaces and filler characters and upper-cases', () => {
    expect(normalizeIdentifier('ab 123<4567')).toBe('AB1234567');
  });
});

describe('normalizeSex', () => {
  it('maps aliases to single letters', () => {
    expect(normalizeSex('Female')).toBe('f');
    expect(normalizeSex('M')).toBe('m');
    expect(normalizeSex('<')).toBe('x');
    expect(normalizeSex('unspecified')).toBe('x');
  });

  it('falls back to text normalization', () => {
    expect(normalizeSex(' Other ')).toBe('other');
  });
});

describe('normalizeDate', () => {
  it('keeps ISO dates', () => {
    expect(normalizeDate('1985-03-15')).toEqual({ ok: true, value: '1985-03-15' });
  });

  it('reads month-first slash and dash dates', () => {
    expect(normalizeDate('03/15/1985')).toEqual({ ok: true, value: '1985-03-15' });
    expect(normalizeDate('03-15-1985')).toEqual({ ok: true, value: '1985-03-15' });
  });

  it('reads printed dates with month names', () => {
    expect(normalizeDate('15 MAR 1985')).toEqual({ ok: true, value: '1985-03-15' });
    expect(normalizeDate('1 March 1985')).toEqual({ ok: true, value: '1985-03-01' });
  });

  it('expands two-digit years around the pivot', () => {
    expect(normalizeDate('850315')).toEqual({ ok: true, value: '1985-03-15' });
    expect(normalizeDate('250101')).toEqual({ ok: true, value: '2025-01-01' });
    expect(normalizeDate('250101', { twoDigitYearPivot: 20 })).toEqual({ ok: true, value: '1925-01-01' });
    expect(normalizeDate('000229')).toEqual({ ok: true, value: '2000-02-29' });
  });

  it('rejects days that do not exist', () => {
    const result = normalizeDate('2023-02-30');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('DATE_UNPARSEABLE');
      expect(result.error.message).toBe("Invalid calendar date: '2023-02-30'");
    }
  });

  it('accepts leap days', () => {
    expect(normalizeDate('2024-02-29')).toEqual({ ok: true, value: '2024-02-29' });
  });

  it('rejects unknown formats without guessing', () => {
    const result = normalizeDate(' March 15, 1985 ');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe("Unrecognized date format: 'March 15, 1985'");
    }
  });

  it('is idempotent on valid dates', () => {
    for (const value of ['1985-03-15', '03/15/1985', '850315', '15 MAR 1985']) {
      const once = normalizeDate(value);
      expect(once.ok).toBe(true);
      if (once.ok) {
        expect(normalizeDate(once.value)).toEqual(once);
      }
    }
  });
});

describe('normalizeField', () => {
  const config = DEFAULT_CROSSCHECK_CONFIG;

  it('uses the date normalizer for date fields', () => {
    expect(normalizeField('date_of_birth', '850315', config)).toEqual({ normalized: '1985-03-15' });
  });

  it('falls back to text with a warning for unparseable dates', () => {
    expect(normalizeField('date_of_birth', '15/03/1985', config)).toEqual({
      normalized: '15/03/1985',
      warning: "Invalid calendar date: '15/03/1985'",
    });
  });

  it('uses the identifier normalizer for passport numbers', () => {
    expect(normalizeField('passport_number', 'ab 1234567', config)).toEqual({ normalized: 'AB1234567' });
  });

  it('uses the sex normalizer for sex', () => {
    expect(normalizeField('sex', 'MALE', config)).toEqual({ normalized: 'm' });
  });

  it('uses text normalization for everything else', () => {
    expect(normalizeField('place_of_birth', ' São  Paulo', config)).toEqual({ normalized: 'sao paulo' });
  });
});
