import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../../domain/errors.js';
import { logger } from '../../infrastructure/logger.js';
import type { DocumentInput, FieldSet } from '../../domain/types.js';
import { normalizeDate } from '../normalization/index.js';
import { parseMrz } from './mrz-parser.js';
import type { ExtractionContext, ExtractionSource, MrzReader, ParsedMrz } from './types.js';

const log = logger.child({ module: 'mrz-source' });

/** Reads the MRZ text the caller already supplied with the document. */
export class SuppliedMrzReader implements MrzReader {
  async read(document: DocumentInput): Promise<Result<string, AppError>> {
    const text = document.mrzText?.trim();
    if (!text) {
      return err(createAppError(ErrorCode.MRZ_NOT_FOUND, 'No machine-readable zone supplied with the document', false));
    }
    return ok(text);
  }
}

export interface MrzSourceOptions {
  reader?: MrzReader;
  twoDigitYearPivot?: number;
}

/** Deterministic source: MRZ text decoded with ICAO 9303 check digits. */
export class MrzSource implements ExtractionSource {
  readonly name = 'mrz';
  readonly kind = 'deterministic' as const;
  private readonly reader: MrzReader;
  private readonly twoDigitYearPivot: number | undefined;

  constructor(options: MrzSourceOptions = {}) {
    this.reader = options.reader ?? new SuppliedMrzReader();
    this.twoDigitYearPivot = options.twoDigitYearPivot;
  }

  async extract(document: DocumentInput, context: ExtractionContext): Promise<Result<FieldSet, AppError>> {
    const ctx = { runId: context.runId, source: this.name };

    const textResult = await this.reader.read(document, context.signal);
    if (!textResult.ok) {
      log.warn({ ...ctx, errorCode: textResult.error.code }, 'MRZ could not be read');
      return textResult;
    }

    const parsed = parseMrz(textResult.value);
    if (!parsed.ok) {
      log.warn({ ...ctx, errorCode: parsed.error.code, details: parsed.error.details }, 'MRZ could not be decoded');
      return parsed;
    }

    const failedChecks = parsed.value.checkDigits.filter((c) => !c.valid).map((c) => c.field);
    if (failedChecks.length > 0) {
      log.warn({ ...ctx, format: parsed.value.format, failedChecks }, 'MRZ check digits failed');
    }

    const fields = this.toFieldSet(parsed.value, new Set(failedChecks));
    log.info({ ...ctx, format: parsed.value.format, fieldCount: Object.keys(fields).length }, 'MRZ decoded');

    return ok(fields);
  }

  /** Fields whose own check digit failed are left out rather than trusted. */
  private toFieldSet(mrz: ParsedMrz, failed: ReadonlySet<string>): FieldSet {
    const { fields } = mrz;
    const fieldSet: Record<string, string> = {};

    const put = (name: string, value: string | null) => {
      if (value !== null) fieldSet[name] = value;
    };

    put('surname', fields.surname);
    put('given_names', fields.givenNames);
    put('nationality', fields.nationality);
    put('sex', fields.sex);
    if (!failed.has('document_number')) put('passport_number', fields.documentNumber);
    if (!failed.has('birth_date')) put('date_of_birth', this.toIsoDate(fields.birthDate));
    if (!failed.has('expiry_date')) put('expiry_date', this.toIsoDate(fields.expiryDate));

    return Object.freeze(fieldSet);
  }

  private toIsoDate(yymmdd: string | null): string | null {
    if (yymmdd === null) return null;
    const date = normalizeDate(yymmdd, { twoDigitYearPivot: this.twoDigitYearPivot });
    return date.ok ? date.value : yymmdd;
  }
}
