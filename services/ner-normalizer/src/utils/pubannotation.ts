import type {
  ElapseTime,
  PubAnnotationDocument,
  PubAnnotationEntry,
  TaggedDocument,
} from "../types.js";
import { resolveRawIdentifier } from "./identifiers.js";

/**
 * Copy each mention's positive-class probability onto the mention itself so
 * it survives any later filtering of the entity lists.
 */
export function attachProbabilities<D extends TaggedDocument>(doc: D): D {
  for (const [type, mentions] of Object.entries(doc.entities)) {
    const rows = doc.prob[type] ?? [];
    mentions.forEach((mention, index) => {
      const row = rows[index];
      if (row && mention.prob === undefined) {
        mention.prob = row[1];
      }
    });
  }
  return doc;
}

export function toPubAnnotation(
  doc: TaggedDocument,
  text: string,
  elapseTime?: ElapseTime,
): PubAnnotationDocument {
  const typeOrder = Object.keys(doc.entities);
  // Tagger offsets count code points, not UTF-16 units
  const chars = Array.from(text);
  const annotations: Array<PubAnnotationEntry & { typeRank: number }> = [];

  typeOrder.forEach((type, typeRank) => {
    for (const mention of doc.entities[type] ?? []) {
      annotations.push({
        id: resolveRawIdentifier(mention.id),
        is_neural_normalized: mention.is_neural_normalized,
        ...(mention.prob !== undefined ? { prob: mention.prob } : {}),
        mention: chars.slice(mention.start, mention.end).join(""),
        obj: type,
        span: { begin: mention.start, end: mention.end },
        typeRank,
      });
    }
  });

  annotations.sort(
    (a, b) =>
      a.span.begin - b.span.begin ||
      a.span.end - b.span.end ||
      a.typeRank - b.typeRank,
  );

  return {
    text,
    annotations: annotations.map(({ typeRank: _typeRank, ...entry }) => entry),
    timestamp: new Date().toISOString(),
    ...(elapseTime ? { elapse_time: elapseTime } : {}),
  };
}
