import { randomUUID } from 'node:crypto';
import { Router, type Request, type Response } from 'express';
import { crossCheckRequestInput } from '../../domain/schemas.js';
import { successResponse, errorResponse } from '../middleware/error-handler.js';
import { serializeCrossCheckResult, type CrossCheckService } from '../../services/crosscheck/index.js';
import { logger } from '../../infrastructure/logger.js';

const log = logger.child({ module: 'crosscheck-route' });

/** Decoded size limit for the document image. */
export const MAX_IMAGE_BYTES = 10 * 1024 * 1024;

function decodedLength(base64: string): number {
  const padding = base64.endsWith('==') ? 2 : base64.endsWith('=') ? 1 : 0;
  return Math.floor((base64.length * 3) / 4) - padding;
}

export function createCrossCheckRouter(service: CrossCheckService): Router {
  const router = Router();

  router.post('/crosscheck', async (req: Request, res: Response) => {
    const parsed = crossCheckRequestInput.safeParse(req.body);
    if (!parsed.success) {
      const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      res.status(422).json(errorResponse('VALIDATION_ERROR', 'Invalid request body', details));
      return;
    }

    const { imageBase64, mimeType, mrzText, filename, includeMetadata } = parsed.data;

    const imageBytes = decodedLength(imageBase64);
    if (imageBytes > MAX_IMAGE_BYTES) {
      res.status(413).json(errorResponse(
        'IMAGE_TOO_LARGE',
        `Image is ${imageBytes} bytes, limit is ${MAX_IMAGE_BYTES}`,
        undefined,
        false,
      ));
      return;
    }

    const runId = randomUUID();
    const result = await service.crossCheck(
      { imageBase64, mimeType, mrzText, filename },
      { runId, documentType: 'passport' },
    );
    const body = serializeCrossCheckResult(result, { includeMetadata });

    if (result.status === 'error') {
      log.warn({ runId, errors: body.errors }, 'Both extraction sources failed');
      res.status(502).json({
        success: false,
        data: body,
        error: { code: 'SOURCE_FAILED', message: result.error ?? 'Both extraction sources failed', retryable: true },
      });
      return;
    }

    res.json(successResponse(body));
  });

  return router;
}
