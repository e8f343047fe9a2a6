import type { KnownObjectSize } from './schema.js'

/**
 * Label → known real-world size. How labels are matched (exact, aliases,
 * fuzzy) is up to the implementation.
 */
export interface ObjectSizeLookup {
  lookup(label: string): KnownObjectSize | undefined
}

function normalizeLabel(label: string): string {
  return label.trim().toLowerCase()
}

/** Case-insensitive exact match on label and aliases. */
export class CatalogLookup implements ObjectSizeLookup {
  private readonly byLabel = new Map<string, KnownObjectSize>()

  constructor(records: readonly KnownObjectSize[]) {
    for (const record of records) {
      this.byLabel.set(normalizeLabel(record.label), record)
    }
    // Aliases never shadow a primary label.
    for (const record of records) {
      for (const alias of record.aliases ?? []) {
        const key = normalizeLabel(alias)
        if (!this.byLabel.has(key)) this.byLabel.set(key, record)
      }
    }
  }

  lookup(label: string): KnownObjectSize | undefined {
    return this.byLabel.get(normalizeLabel(label))
  }

  get size(): number {
    return this.byLabel.size
  }
}

/** Adapt a plain function to the lookup contract. */
export function lookupFrom(fn: (label: string) => KnownObjectSize | undefined): ObjectSizeLookup {
  return { lookup: fn }
}
