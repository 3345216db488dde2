import 'dotenv/config';
import { readFile } from 'node:fs/promises';
import { extname, basename, resolve } from 'node:path';
import { mimeTypeSchema } from '../src/domain/schemas.js';
import { createCrossCheckRuntimeFromEnv } from '../src/services/crosscheck/factory.js';
import { serializeCrossCheckResult } from '../src/services/crosscheck/index.js';
import { logger } from '../src/infrastructure/logger.js';

const log = logger.child({ module: 'crosscheck-cli' });

const MIME_BY_EXTENSION: Record<string, string> = {
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
  '.webp': 'image/webp',
  '.gif': 'image/gif',
};

function printUsage(): never {
  console.error('Usage: npm run crosscheck -- <image-path> [mrz-text-file]');
  console.error('Example: npm run crosscheck -- ./samples/passport.jpg ./samples/passport.mrz');
  process.exit(1);
}

async function main(): Promise<void> {
  const [imagePath, mrzPath] = process.argv.slice(2);
  if (!imagePath) printUsage();

  const mimeType = mimeTypeSchema.safeParse(MIME_BY_EXTENSION[extname(imagePath).toLowerCase()]);
  if (!mimeType.success) {
    console.error(`Unsupported image type: ${extname(imagePath) || '(none)'}`);
    console.error(`Supported: ${Object.keys(MIME_BY_EXTENSION).join(', ')}`);
    process.exit(1);
  }

  const image = await readFile(resolve(imagePath));
  const mrzText = mrzPath ? await readFile(resolve(mrzPath), 'utf-8') : undefined;
  log.info({ imagePath, sizeBytes: image.length, hasMrz: mrzText !== undefined }, 'Document loaded');

  const { service, langfuse, promptName, promptLabel } = createCrossCheckRuntimeFromEnv();
  if (langfuse) await langfuse.warm({ name: promptName, label: promptLabel });

  const result = await service.crossCheck(
    {
      imageBase64: image.toString('base64'),
      mimeType: mimeType.data,
      mrzText,
      filename: basename(imagePath),
    },
    { runId: `cli-${Date.now()}`, documentType: 'passport' },
  );

  console.log(JSON.stringify(serializeCrossCheckResult(result, { includeMetadata: true }), null, 2));
  if (result.status === 'error') process.exit(2);
}

main().catch((error: unknown) => {
  log.error({ error }, 'Unhandled error');
  console.error(error);
  process.exit(1);
});
