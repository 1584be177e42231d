import {
  CELLOSAURUS_LOCAL_TAG,
  CELLOSAURUS_PREFIX,
  PREFIX_NORMALIZED_TYPES,
  TAXONOMY_MARKER,
  TAXONOMY_PREFIX,
} from "../constants.js";
import type { PrefixRegistry } from "../registry/prefix-registry.js";
import type { EntityType, Mention, TaggedDocument } from "../types.js";
import { resolveRawIdentifier } from "./identifiers.js";

export type ParsedIdentifier = {
  prefix: string;
  localId: string;
};

function splitOnFirst(value: string, separator: string): ParsedIdentifier | null {
  const at = value.indexOf(separator);
  if (at === -1) return null;
  return {
    prefix: value.slice(0, at),
    localId: value.slice(at + separator.length),
  };
}

/**
 * Split an atomic identifier into prefix and local id. Rules are tried in
 * order and the first match wins:
 *
 * - `NCBI:txid10095` => `ncbitaxon` / `10095`
 * - `CVCL_J260`      => `CVCL` / `J260`
 * - `MESH:C563895`   => `MESH` / `C563895`
 *
 * Returns null when no rule applies (e.g. `CUI-less`).
 */
export function parseIdentifier(id: string): ParsedIdentifier | null {
  const taxonomyAt = id.indexOf(TAXONOMY_MARKER);
  if (taxonomyAt !== -1) {
    return {
      prefix: TAXONOMY_PREFIX,
      localId: id.slice(taxonomyAt + TAXONOMY_MARKER.length),
    };
  }
  return splitOnFirst(id, "_") ?? splitOnFirst(id, ":");
}

export function shouldNormalizePrefixes(type: EntityType): boolean {
  return PREFIX_NORMALIZED_TYPES.has(type);
}

/** EntrezGene:10533 => NCBIGene:10533 */
export function normalizeIdentifier(id: string, registry: PrefixRegistry): string {
  const parsed = parseIdentifier(id);
  if (!parsed) return id;

  let { prefix, localId } = parsed;

  const normalizedPrefix = registry.normalizePrefix(prefix);
  if (normalizedPrefix) {
    prefix = normalizedPrefix;
  }

  const preferredPrefix = registry.getPreferredPrefix(prefix);
  if (preferredPrefix) {
    prefix = preferredPrefix;
  }

  // The underscore rule consumed the CVCL_ tag; cellosaurus ids keep it
  if (prefix === CELLOSAURUS_PREFIX) {
    localId = CELLOSAURUS_LOCAL_TAG + localId;
  }

  return `${prefix}:${localId}`;
}

export function standardizeMentionPrefixes(
  mention: Mention,
  type: EntityType,
  registry: PrefixRegistry,
): Mention {
  if (!shouldNormalizePrefixes(type)) return mention;
  mention.id = resolveRawIdentifier(mention.id).map((id) =>
    normalizeIdentifier(id, registry),
  );
  return mention;
}

export function standardizeDocumentPrefixes<D extends TaggedDocument>(
  doc: D,
  registry: PrefixRegistry,
): D {
  for (const [type, mentions] of Object.entries(doc.entities)) {
    if (!shouldNormalizePrefixes(type)) continue;
    for (const mention of mentions) {
      standardizeMentionPrefixes(mention, type, registry);
    }
  }
  return doc;
}
