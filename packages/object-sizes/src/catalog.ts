import { readFileSync } from 'node:fs'
import { objectSizeCatalogSchema, type KnownObjectSize } from './schema.js'

/** Thrown when a size catalog cannot be read or fails validation. */
export class CatalogError extends Error {
  constructor(
    message: string,
    public readonly fields: Partial<Record<string, string[]>> = {},
  ) {
    super(message)
    this.name = 'CatalogError'
  }
}

export const DEFAULT_CATALOG_URL = new URL('../data/known-objects.json', import.meta.url)

/** Validate raw catalog JSON. Labels must be unique (case-insensitive). */
export function parseCatalog(input: unknown): KnownObjectSize[] {
  const result = objectSizeCatalogSchema.safeParse(input)
  if (!result.success) {
    throw new CatalogError('Object size catalog failed validation.', result.error.flatten().fieldErrors)
  }

  const seen = new Set<string>()
  for (const record of result.data.objects) {
    const key = record.label.trim().toLowerCase()
    if (seen.has(key)) {
      throw new CatalogError(`Duplicate object label in catalog: ${record.label}`)
    }
    seen.add(key)
  }
  return result.data.objects
}

/** Read and validate a catalog file. */
export function loadCatalog(path: string | URL): KnownObjectSize[] {
  let raw: unknown
  try {
    raw = JSON.parse(readFileSync(path, 'utf8'))
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e)
    throw new CatalogError(`Cannot read object size catalog at ${String(path)}: ${reason}`)
  }
  return parseCatalog(raw)
}

/** The catalog shipped with this package. */
export function loadDefaultCatalog(): KnownObjectSize[] {
  return loadCatalog(DEFAULT_CATALOG_URL)
}
