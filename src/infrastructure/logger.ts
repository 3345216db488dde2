import pino from 'pino';

export const logger = pino({
  name: 'document-crosscheck',
  level: process.env.LOG_LEVEL ?? 'info',
});

export function createCrossCheckLogger(
  runId: string,
  documentType?: string,
  filename?: string,
) {
  return logger.child({
    runId,
    ...(documentType !== undefined && { documentType }),
    ...(filename !== undefined && { filename }),
  });
}
