import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { CatalogSchema, formatIssue } from "./schemas/catalog.js";

// Resolves the same from src/ (tests) and dist/ (build), both one level below the package root.
const BUILTIN_CATALOG_PATH = fileURLToPath(
  new URL("../data/model-catalog.json", import.meta.url),
);

export class CatalogValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CatalogValidationError";
  }
}

function normalizeProvider(provider: string): string {
  return provider.trim().toLowerCase();
}

function mergeModels(
  existing: readonly string[],
  additions: readonly string[],
): readonly string[] {
  const merged = [...existing];
  for (const model of additions) {
    if (!merged.includes(model)) merged.push(model);
  }
  return Object.freeze(merged);
}

/**
 * Read-only mapping from provider name to its known model identifiers.
 *
 * Provider lookups are case-insensitive. Model order is preserved as given,
 * since ties during correction go to whichever model is listed first.
 */
export class ModelCatalog {
  private readonly entries: ReadonlyMap<string, readonly string[]>;

  private constructor(entries: Map<string, readonly string[]>) {
    this.entries = entries;
  }

  static fromRecord(record: Readonly<Record<string, readonly string[]>>): ModelCatalog {
    return new ModelCatalog(new Map()).withAdditions(record);
  }

  lookup(provider: string): readonly string[] {
    return this.entries.get(normalizeProvider(provider)) ?? [];
  }

  has(provider: string): boolean {
    return this.entries.has(normalizeProvider(provider));
  }

  providers(): readonly string[] {
    return [...this.entries.keys()];
  }

  withAdditions(additions: Readonly<Record<string, readonly string[]>>): ModelCatalog {
    const next = new Map(this.entries);
    for (const [provider, models] of Object.entries(additions)) {
      const key = normalizeProvider(provider);
      next.set(key, mergeModels(next.get(key) ?? [], models));
    }
    return new ModelCatalog(next);
  }
}

export function parseCatalog(raw: unknown): ModelCatalog {
  const result = CatalogSchema.safeParse(raw);
  if (!result.success) {
    throw new CatalogValidationError(`Invalid model catalog ${formatIssue(result.error)}`);
  }
  return ModelCatalog.fromRecord(result.data);
}

function loadBuiltinCatalog(): ModelCatalog {
  const text = readFileSync(BUILTIN_CATALOG_PATH, "utf-8");
  return parseCatalog(JSON.parse(text));
}

export const BUILTIN_CATALOG: ModelCatalog = loadBuiltinCatalog();
