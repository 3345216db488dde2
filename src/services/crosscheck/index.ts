import { randomUUID } from 'node:crypto';
import { ConfigurationError, ErrorCode } from '../../domain/errors.js';
import { createCrossCheckLogger } from '../../infrastructure/logger.js';
import type {
  CrossCheckResult,
  DocumentInput,
  FieldSet,
  SourceError,
  SourceKind,
  SourceSlot,
} from '../../domain/types.js';
import type { ExtractionSource } from '../extraction/types.js';
import { createCrossCheckConfig, type CrossCheckConfig } from './config.js';
import { assembleCrossCheckResult } from './assemble.js';
import type { CrossCheckRunOptions, CrossCheckServiceOptions, SourceOutcome } from './types.js';

export { assembleCrossCheckResult } from './assemble.js';
export {
  DEFAULT_CROSSCHECK_CONFIG,
  createCrossCheckConfig,
  loadCrossCheckConfigFromEnv,
  type CrossCheckConfig,
} from './config.js';
export { serializeCrossCheckResult, hasDiscrepancies, getCriticalDiscrepancies } from './serialize.js';
export type { SerializedCrossCheckResult } from './serialize.js';
export type { SourceOutcome, CrossCheckServiceOptions, CrossCheckRunOptions } from './types.js';

const EXPECTED_KIND: Record<SourceSlot, SourceKind> = {
  source_a: 'deterministic',
  source_b: 'probabilistic',
};

type Logger = ReturnType<typeof createCrossCheckLogger>;

/**
 * Runs the deterministic and the probabilistic source side by side, each under
 * its own timeout, and reconciles whatever comes back. Source failures end up
 * in the result; only configuration mistakes throw.
 */
export class CrossCheckService {
  readonly config: CrossCheckConfig;
  private readonly sourceA: ExtractionSource | undefined;
  private readonly sourceB: ExtractionSource | undefined;

  /** @throws {ConfigurationError} On invalid config, no sources, or a source in the wrong slot */
  constructor(options: CrossCheckServiceOptions) {
    if (!options.sourceA && !options.sourceB) {
      throw new ConfigurationError('At least one extraction source must be configured');
    }
    assertKind(options.sourceA, 'source_a');
    assertKind(options.sourceB, 'source_b');

    this.config = createCrossCheckConfig(options.config);
    this.sourceA = options.sourceA;
    this.sourceB = options.sourceB;
  }

  async crossCheck(document: DocumentInput, options: CrossCheckRunOptions = {}): Promise<CrossCheckResult> {
    const runId = options.runId ?? randomUUID();
    const log = createCrossCheckLogger(runId, options.documentType, document.filename);
    const start = Date.now();

    log.info(
      { sourceA: this.sourceA?.name, sourceB: this.sourceB?.name },
      'Starting cross-check',
    );

    const [outcomeA, outcomeB] = await Promise.all([
      this.runSource(this.sourceA, 'source_a', this.config.sourceATimeoutMs, document, runId, log),
      this.runSource(this.sourceB, 'source_b', this.config.sourceBTimeoutMs, document, runId, log),
    ]);

    const result = assembleCrossCheckResult(
      { outcomeA, outcomeB, sourceNames: this.sourceNames(), totalMs: Date.now() - start, runId },
      this.config,
    );

    log.info(
      {
        status: result.status,
        sourcesUsed: result.sourcesUsed,
        documentConfidence: result.documentConfidence,
        discrepancyCount: result.discrepancies.length,
        warningCount: result.warnings.length,
        totalMs: result.timing.totalMs,
      },
      'Cross-check completed',
    );

    return result;
  }

  /**
   * Synchronous entry point over the same pipeline, for field sets that were
   * already extracted. A missing field set counts as a failed source.
   */
  reconcile(fieldsA: FieldSet | undefined, fieldsB: FieldSet | undefined): CrossCheckResult {
    return assembleCrossCheckResult(
      {
        outcomeA: suppliedOutcome(fieldsA, 'source_a'),
        outcomeB: suppliedOutcome(fieldsB, 'source_b'),
        sourceNames: this.sourceNames(),
        totalMs: 0,
      },
      this.config,
    );
  }

  private sourceNames(): Partial<Record<SourceSlot, string>> {
    return {
      ...(this.sourceA && { source_a: this.sourceA.name }),
      ...(this.sourceB && { source_b: this.sourceB.name }),
    };
  }

  private async runSource(
    source: ExtractionSource | undefined,
    slot: SourceSlot,
    timeoutMs: number,
    document: DocumentInput,
    runId: string,
    log: Logger,
  ): Promise<SourceOutcome> {
    if (!source) {
      return failed('not_configured', ErrorCode.SOURCE_NOT_CONFIGURED, `No ${EXPECTED_KIND[slot]} source configured`, null);
    }

    const controller = new AbortController();
    const start = Date.now();
    let timer: NodeJS.Timeout | undefined;

    const timedOut = new Promise<SourceOutcome>((resolve) => {
      timer = setTimeout(() => {
        controller.abort();
        resolve(failed(
          'timed_out',
          ErrorCode.SOURCE_TIMEOUT,
          `${source.name} extraction timed out after ${timeoutMs}ms`,
          Date.now() - start,
        ));
      }, timeoutMs);
    });

    const completed = Promise.resolve()
      .then(() => source.extract(document, { signal: controller.signal, timeoutMs, runId }))
      .then((result): SourceOutcome => {
        const durationMs = Date.now() - start;
        if (result.ok) return { status: 'succeeded', fields: result.value, durationMs };
        return failed('failed', result.error.code, `${source.name} extraction failed: ${result.error.message}`, durationMs);
      })
      .catch((cause: unknown): SourceOutcome => {
        const message = cause instanceof Error ? cause.message : String(cause);
        return failed('failed', ErrorCode.SOURCE_FAILED, `${source.name} extraction failed: ${message}`, Date.now() - start);
      });

    try {
      const outcome = await Promise.race([completed, timedOut]);
      if (outcome.status === 'succeeded') {
        log.info({ slot, source: source.name, durationMs: outcome.durationMs }, 'Extraction source succeeded');
      } else {
        log.warn(
          { slot, source: source.name, durationMs: outcome.durationMs, errorCode: outcome.error.code, kind: outcome.error.kind },
          outcome.error.message,
        );
      }
      return outcome;
    } finally {
      clearTimeout(timer);
    }
  }
}

function failed(kind: SourceError['kind'], code: string, message: string, durationMs: number | null): SourceOutcome {
  return { status: 'failed', error: Object.freeze({ kind, code, message }), durationMs };
}

function suppliedOutcome(fields: FieldSet | undefined, slot: SourceSlot): SourceOutcome {
  if (fields) return { status: 'succeeded', fields, durationMs: null };
  return failed('failed', ErrorCode.SOURCE_FAILED, `No ${EXPECTED_KIND[slot]} field set supplied`, null);
}

function assertKind(source: ExtractionSource | undefined, slot: SourceSlot): void {
  if (source && source.kind !== EXPECTED_KIND[slot]) {
    throw new ConfigurationError(
      `${slot} must be a ${EXPECTED_KIND[slot]} source, got '${source.name}' (${source.kind})`,
    );
  }
}
