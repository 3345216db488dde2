import type { FieldSet, SourceError, SourceSlot } from '../../domain/types.js';
import type { ExtractionSource } from '../extraction/types.js';
import type { CrossCheckConfig } from './config.js';

/** Terminal state of one extraction call. */
export type SourceOutcome =
  | { status: 'succeeded'; fields: FieldSet; durationMs: number | null }
  | { status: 'failed'; error: SourceError; durationMs: number | null };

export interface CrossCheckServiceOptions {
  sourceA?: ExtractionSource;
  sourceB?: ExtractionSource;
  config?: Partial<CrossCheckConfig>;
}

export interface CrossCheckRunOptions {
  runId?: string;
  documentType?: string;
}

export interface AssembleInput {
  outcomeA: SourceOutcome;
  outcomeB: SourceOutcome;
  sourceNames: Partial<Record<SourceSlot, string>>;
  totalMs: number;
  runId?: string;
}
