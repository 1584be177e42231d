import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { createTTLCache, memoizeLookup } from "../cache/lru.js";
import { toErrorMessage, warnLog } from "../telemetry.js";

/**
 * Lookup authority for ontology prefixes. Both lookups return undefined for
 * prefixes they do not know; callers keep their own prefix in that case.
 */
export interface PrefixRegistry {
  /** Map any synonym or spelling of a prefix to its canonical registry key. */
  normalizePrefix(prefix: string): string | undefined;
  /** Display form the registry prefers for a prefix, when it declares one. */
  getPreferredPrefix(prefix: string): string | undefined;
}

const registryEntrySchema = z.object({
  name: z.string().optional(),
  preferred: z.string().min(1).optional(),
  synonyms: z.array(z.string().min(1)).default([]),
});

export const registryFileSchema = z.object({
  version: z.literal(1),
  prefixes: z.record(registryEntrySchema),
});

export type PrefixRegistryEntry = z.input<typeof registryEntrySchema>;

export const DEFAULT_REGISTRY_PATH = fileURLToPath(
  new URL("../../data/prefix-registry.json", import.meta.url),
);

// EntrezGene, entrez-gene, NCBI_Gene and ncbi.gene all collapse to one key
export function normKey(prefix: string): string {
  return prefix.toLowerCase().replace(/[\s._\-/]/g, "");
}

export class InMemoryPrefixRegistry implements PrefixRegistry {
  private readonly canonicalByKey = new Map<string, string>();
  private readonly preferredByCanonical = new Map<string, string>();
  readonly size: number;

  constructor(entries: Record<string, PrefixRegistryEntry>) {
    this.size = Object.keys(entries).length;
    // Canonical keys are registered before synonyms so they win collisions
    for (const [canonical, entry] of Object.entries(entries)) {
      this.canonicalByKey.set(normKey(canonical), canonical);
      if (entry.preferred) {
        this.preferredByCanonical.set(canonical, entry.preferred);
      }
    }
    for (const [canonical, entry] of Object.entries(entries)) {
      for (const synonym of entry.synonyms ?? []) {
        const key = normKey(synonym);
        if (!this.canonicalByKey.has(key)) {
          this.canonicalByKey.set(key, canonical);
        }
      }
    }
  }

  normalizePrefix(prefix: string): string | undefined {
    return this.canonicalByKey.get(normKey(prefix));
  }

  getPreferredPrefix(prefix: string): string | undefined {
    const canonical = this.normalizePrefix(prefix);
    if (!canonical) return undefined;
    return this.preferredByCanonical.get(canonical);
  }
}

export async function loadPrefixRegistry(
  registryPath: string = DEFAULT_REGISTRY_PATH,
): Promise<InMemoryPrefixRegistry> {
  const raw = await readFile(registryPath, "utf-8");
  const parsed = registryFileSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new Error(
      `Invalid prefix registry ${registryPath}: ${parsed.error.issues
        .map((issue) => `${issue.path.join(".")} ${issue.message}`)
        .join("; ")}`,
    );
  }
  return new InMemoryPrefixRegistry(parsed.data.prefixes);
}

export type PrefixCacheOptions = {
  max: number;
  ttlMs: number;
};

export function createCachedPrefixRegistry(
  registry: PrefixRegistry,
  options: PrefixCacheOptions,
): PrefixRegistry {
  const normalizeCache = createTTLCache<string, { value: string | undefined }>(
    options.ttlMs,
    options.max,
  );
  const preferredCache = createTTLCache<string, { value: string | undefined }>(
    options.ttlMs,
    options.max,
  );
  return {
    normalizePrefix: memoizeLookup(
      (prefix) => registry.normalizePrefix(prefix),
      normalizeCache,
    ),
    getPreferredPrefix: memoizeLookup(
      (prefix) => registry.getPreferredPrefix(prefix),
      preferredCache,
    ),
  };
}

/**
 * Registries backed by a remote service can fail per call. A failed lookup
 * counts as "no result" so the identifier keeps its split prefix.
 */
export function createSafePrefixRegistry(registry: PrefixRegistry): PrefixRegistry {
  const guard =
    (lookup: "normalizePrefix" | "getPreferredPrefix") =>
    (prefix: string): string | undefined => {
      try {
        return registry[lookup](prefix);
      } catch (error) {
        warnLog("registry.lookup_failed", {
          lookup,
          prefix,
          message: toErrorMessage(error),
        });
        return undefined;
      }
    };

  return {
    normalizePrefix: guard("normalizePrefix"),
    getPreferredPrefix: guard("getPreferredPrefix"),
  };
}
