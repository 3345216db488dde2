import type { Result } from '../../domain/result.js';
import type { AppError } from '../../domain/errors.js';
import type { DocumentInput, FieldSet, SourceKind } from '../../domain/types.js';
import type { LangfuseService } from '../../infrastructure/langfuse.js';
import type { LLMProvider } from '../../infrastructure/llm/types.js';

export interface ExtractionContext {
  /** Aborted when the orchestrator stops waiting for this source. */
  signal: AbortSignal;
  timeoutMs: number;
  runId: string;
}

/**
 * One interchangeable field extractor. The orchestrator depends only on this
 * contract, never on a concrete provider.
 */
export interface ExtractionSource {
  readonly name: string;
  readonly kind: SourceKind;
  extract(document: DocumentInput, context: ExtractionContext): Promise<Result<FieldSet, AppError>>;
}

/** OCR step that locates and reads the machine-readable zone of an image. */
export interface MrzReader {
  read(document: DocumentInput, signal: AbortSignal): Promise<Result<string, AppError>>;
}

export type MrzFormat = 'TD1' | 'TD3';

export interface CheckDigitResult {
  field: 'document_number' | 'birth_date' | 'expiry_date' | 'composite';
  valid: boolean;
}

export interface MrzFields {
  documentCode: string;
  issuingState: string;
  surname: string | null;
  givenNames: string | null;
  documentNumber: string | null;
  nationality: string | null;
  birthDate: string | null;
  sex: string | null;
  expiryDate: string | null;
  optionalData: string | null;
}

export interface ParsedMrz {
  format: MrzFormat;
  valid: boolean;
  fields: MrzFields;
  checkDigits: CheckDigitResult[];
}

export interface VisionSourceDeps {
  llm: LLMProvider;
  langfuse?: LangfuseService;
  promptName: string;
  promptLabel?: string;
}
