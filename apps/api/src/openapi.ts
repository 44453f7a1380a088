import { readFileSync } from 'node:fs';
import { z } from 'zod';

const DOCUMENT_URL = new URL('../openapi.json', import.meta.url);

const openApiDocumentSchema = z.object({
  openapi: z.string(),
  info: z.object({ title: z.string(), version: z.string() }).passthrough(),
  paths: z.record(z.unknown()),
}).passthrough();

export type OpenApiDocument = z.infer<typeof openApiDocumentSchema>;

/** Read the OpenAPI description that ships beside the app */
export function loadOpenApiDocument(): OpenApiDocument {
  const raw: unknown = JSON.parse(readFileSync(DOCUMENT_URL, 'utf8'));
  return openApiDocumentSchema.parse(raw);
}
