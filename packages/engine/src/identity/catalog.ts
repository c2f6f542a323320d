import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { identityCatalogSchema, type IdentityCatalog } from './types.js';

const DEFAULT_CATALOG_PATH = fileURLToPath(
  new URL('../../data/identity-catalog.json', import.meta.url),
);

export function loadIdentityCatalog(path: string = DEFAULT_CATALOG_PATH): IdentityCatalog {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  return identityCatalogSchema.parse(raw);
}
