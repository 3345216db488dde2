import { createLangfuseServiceFromEnv, type LangfuseService } from '../../infrastructure/langfuse.js';
import { createLLMProvider } from '../../infrastructure/llm/index.js';
import { logger } from '../../infrastructure/logger.js';
import { DEFAULT_VISION_PROMPT_NAME, MrzSource, VisionSource } from '../extraction/index.js';
import { loadCrossCheckConfigFromEnv } from './config.js';
import { CrossCheckService } from './index.js';

const log = logger.child({ module: 'crosscheck-factory' });

export interface CrossCheckRuntime {
  service: CrossCheckService;
  langfuse: LangfuseService | undefined;
  promptName: string;
  promptLabel: string | undefined;
}

/**
 * Wires the MRZ source and, when GROQ_API_KEY is set, the vision source.
 * Without a key the vision slot stays empty and every run is partial.
 *
 * @throws {ConfigurationError} When a CROSSCHECK_* variable is invalid
 */
export function createCrossCheckRuntimeFromEnv(
  env: Record<string, string | undefined> = process.env,
): CrossCheckRuntime {
  const config = loadCrossCheckConfigFromEnv(env);
  const langfuse = createLangfuseServiceFromEnv(env);
  const promptLabel = env.LANGFUSE_PROMPT_LABEL;

  const sourceA = new MrzSource({ twoDigitYearPivot: config.twoDigitYearPivot });

  const apiKey = env.GROQ_API_KEY;
  let sourceB: VisionSource | undefined;
  if (apiKey) {
    sourceB = new VisionSource({
      llm: createLLMProvider({ provider: 'groq', apiKey, model: env.GROQ_VISION_MODEL }),
      langfuse,
      promptName: DEFAULT_VISION_PROMPT_NAME,
      promptLabel,
    });
  } else {
    log.warn('GROQ_API_KEY not set, vision source disabled');
  }

  const service = new CrossCheckService({ sourceA, sourceB, config });
  log.info({ sourceA: sourceA.name, sourceB: sourceB?.name ?? null }, 'Cross-check service configured');

  return { service, langfuse, promptName: DEFAULT_VISION_PROMPT_NAME, promptLabel };
}
