export type {
  ExtractionContext,
  ExtractionSource,
  MrzReader,
  MrzFields,
  ParsedMrz,
  CheckDigitResult,
  VisionSourceDeps,
} from './types.js';
export { MrzSource, SuppliedMrzReader, type MrzSourceOptions } from './mrz-source.js';
export { parseMrz, computeCheckDigit } from './mrz-parser.js';
export {
  VisionSource,
  parseVisionResponse,
  BUILT_IN_VISION_PROMPT,
  DEFAULT_VISION_PROMPT_NAME,
} from './vision-source.js';
