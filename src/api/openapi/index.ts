import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import swaggerUi from 'swagger-ui-express';
import YAML from 'yaml';
import type { Express } from 'express';

const currentDir = dirname(fileURLToPath(import.meta.url));
const specPath = join(currentDir, 'spec.yaml');

export function loadOpenAPIDocument(path: string = specPath): Record<string, unknown> {
  const parsed: unknown = YAML.parse(readFileSync(path, 'utf-8'));
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error(`OpenAPI document at ${path} is not a mapping`);
  }
  return { ...parsed };
}

export function setupOpenAPI(app: Express): void {
  const document = loadOpenAPIDocument();

  app.use('/docs', swaggerUi.serve, swaggerUi.setup(document, {
    customCss: '.swagger-ui .topbar { display: none }',
    customSiteTitle: 'Document Cross-Check API',
  }));

  app.get('/openapi.json', (_req, res) => {
    res.json(document);
  });
}
