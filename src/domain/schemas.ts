import { z } from 'zod';
import { CROSSCHECK_STATUSES, SEVERITIES, SUPPORTED_MIME_TYPES } from './types.js';

export const crossCheckStatusSchema = z.enum(CROSSCHECK_STATUSES);

export const severitySchema = z.enum(SEVERITIES);

export const mimeTypeSchema = z.enum(SUPPORTED_MIME_TYPES);

export const crossCheckRequestInput = z.object({
  imageBase64: z.string().min(1, 'Image data is required'),
  mimeType: mimeTypeSchema,
  mrzText: z.string().min(1, 'MRZ text must not be empty').optional(),
  filename: z.string().optional(),
  includeMetadata: z.boolean().optional(),
});

const confidence = z.number().min(0).max(1);
const weight = z.number().positive();
const timeoutMs = z.number().int().positive();
const fieldList = z.array(z.string().min(1));

export const crossCheckConfigSchema = z.object({
  sourceATimeoutMs: timeoutMs,
  sourceBTimeoutMs: timeoutMs,
  agreementConfidence: confidence,
  disagreementBaseConfidence: confidence,
  singleSourceDeterministicConfidence: confidence,
  singleSourceProbabilisticConfidence: confidence,
  criticalFieldWeight: weight,
  standardFieldWeight: weight,
  criticalFields: fieldList,
  severities: z.record(z.string(), severitySchema),
  deterministicPreferredFields: fieldList,
  probabilisticPreferredFields: fieldList,
  dateFields: fieldList,
  identifierFields: fieldList,
  sexFields: fieldList,
  fieldOrder: fieldList,
  twoDigitYearPivot: z.number().int().min(0).max(99),
});

export type CrossCheckRequestInput = z.infer<typeof crossCheckRequestInput>;
