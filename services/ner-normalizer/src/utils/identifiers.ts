import {
  ALTERNATE_IDENTIFIER_SEPARATOR,
  IDENTIFIER_SEPARATOR,
} from "../constants.js";
import type {
  Mention,
  RawIdentifier,
  ScalarIdentifier,
  TaggedDocument,
  WrappedIdentifier,
} from "../types.js";

type ScalarVariant = { kind: "scalar"; value: ScalarIdentifier };

/**
 * One element of a tagger identifier field: either the string itself or the
 * string wrapped once more in a single-element list.
 */
export type IdentifierVariant =
  | ScalarVariant
  | { kind: "wrapped"; inner: ScalarVariant };

export function toIdentifierVariant(
  element: ScalarIdentifier | WrappedIdentifier,
): IdentifierVariant {
  if (typeof element === "string") {
    return { kind: "scalar", value: element };
  }
  return { kind: "wrapped", inner: { kind: "scalar", value: element[0] } };
}

function resolveVariant(variant: IdentifierVariant): ScalarIdentifier {
  switch (variant.kind) {
    case "scalar":
      return variant.value;
    case "wrapped":
      return variant.inner.value;
  }
}

/**
 * Flatten any accepted identifier shape into its (still delimited) strings:
 * `"a"`, `["a"]` and `[["a"]]` all resolve to `["a"]`.
 */
export function resolveRawIdentifier(raw: RawIdentifier): ScalarIdentifier[] {
  const elements: Array<ScalarIdentifier | WrappedIdentifier> =
    typeof raw === "string" ? [raw] : raw;
  return elements.map((element) => resolveVariant(toIdentifierVariant(element)));
}

/**
 * "OMIM:608627,MESH:C563895" or "OMIM:608627|MESH:C563895"
 * => ["OMIM:608627", "MESH:C563895"]
 *
 * Empty tokens from stray separators are kept, and so are duplicates.
 */
export function splitIdentifiers(raw: RawIdentifier): string[] {
  return resolveRawIdentifier(raw).flatMap((value) =>
    value
      .split(ALTERNATE_IDENTIFIER_SEPARATOR)
      .join(IDENTIFIER_SEPARATOR)
      .split(IDENTIFIER_SEPARATOR),
  );
}

export function splitMentionIdentifiers(mention: Mention): string[] {
  const ids = splitIdentifiers(mention.id);
  mention.id = ids;
  return ids;
}

export function splitDocumentIdentifiers<D extends TaggedDocument>(doc: D): D {
  for (const mentions of Object.values(doc.entities)) {
    for (const mention of mentions) {
      splitMentionIdentifiers(mention);
    }
  }
  return doc;
}

export function countIdentifiers(doc: TaggedDocument): number {
  let total = 0;
  for (const mentions of Object.values(doc.entities)) {
    for (const mention of mentions) {
      total += resolveRawIdentifier(mention.id).length;
    }
  }
  return total;
}

export function countMentions(doc: TaggedDocument): number {
  return Object.values(doc.entities).reduce(
    (total, mentions) => total + mentions.length,
    0,
  );
}
