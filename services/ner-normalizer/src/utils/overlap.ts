import { CUI_LESS, MUTATION_TYPE } from "../constants.js";
import { AnnotationContractError } from "../errors.js";
import type {
  Mention,
  ProbabilityPair,
  RawIdentifier,
  SpanCandidate,
  SpanKey,
  TaggedDocument,
} from "../types.js";
import { resolveRawIdentifier } from "./identifiers.js";

export function spanKey(start: number, end: number): SpanKey {
  return `${start}-${end}`;
}

export function hasRealIdentifier(id: RawIdentifier): boolean {
  const ids = resolveRawIdentifier(id);
  return !(ids.length === 1 && ids[0] === CUI_LESS);
}

export function sameIdentifiers(a: readonly string[], b: readonly string[]): boolean {
  if (a.length !== b.length) return false;
  return a.every((value, i) => value === b[i]);
}

/**
 * Ranking for mentions that share a span: linked mentions beat CUI-less ones
 * whatever their probability, then higher positive probability wins. Returns
 * 0 for equal keys so a stable sort keeps tagger order between them.
 */
export function compareCandidates(a: SpanCandidate, b: SpanCandidate): number {
  if (a.hasIdentifier !== b.hasIdentifier) {
    return a.hasIdentifier ? -1 : 1;
  }
  if (a.prob !== b.prob) {
    return b.prob - a.prob;
  }
  return 0;
}

function probabilityFor(
  doc: TaggedDocument,
  type: string,
  index: number,
  mention: Mention,
): ProbabilityPair {
  const row = doc.prob[type]?.[index];
  if (!row) {
    throw new AnnotationContractError("Mention has no probability row", {
      type,
      index,
      span: spanKey(mention.start, mention.end),
    });
  }
  return row;
}

/** Group every mention of every type by its exact (start, end) span. */
export function buildSpanCandidates(doc: TaggedDocument): Map<SpanKey, SpanCandidate[]> {
  const spans = new Map<SpanKey, SpanCandidate[]>();
  for (const [type, mentions] of Object.entries(doc.entities)) {
    mentions.forEach((mention, index) => {
      const key = spanKey(mention.start, mention.end);
      const candidates = spans.get(key) ?? [];
      candidates.push({
        type,
        id: resolveRawIdentifier(mention.id),
        hasIdentifier: hasRealIdentifier(mention.id),
        prob: probabilityFor(doc, type, index, mention)[1],
        index,
        is_neural_normalized: mention.is_neural_normalized,
      });
      spans.set(key, candidates);
    });
  }
  return spans;
}

export function rankSpanCandidates(
  spans: Map<SpanKey, SpanCandidate[]>,
): Map<SpanKey, SpanCandidate[]> {
  for (const candidates of spans.values()) {
    candidates.sort(compareCandidates);
  }
  return spans;
}

function isSpanWinner(
  spans: Map<SpanKey, SpanCandidate[]>,
  type: string,
  mention: Mention,
): boolean {
  const key = spanKey(mention.start, mention.end);
  const winner = spans.get(key)?.[0];
  if (!winner) {
    throw new AnnotationContractError("Span was never indexed", { type, span: key });
  }
  return (
    winner.type === type &&
    sameIdentifiers(winner.id, resolveRawIdentifier(mention.id))
  );
}

/**
 * Keep one type/identifier assignment per span in the first document of the
 * batch, then take the mutation layer wholesale from the mutation tagger.
 * Documents after the first are returned untouched.
 */
export function resolveOverlap(
  taggedDocs: TaggedDocument[],
  mutationDocs: TaggedDocument[],
): TaggedDocument[] {
  const doc = taggedDocs[0];
  if (!doc) return taggedDocs;

  const mutationDoc = mutationDocs[0];
  const mutations = mutationDoc?.entities[MUTATION_TYPE];
  if (!mutationDoc || !mutations) {
    throw new AnnotationContractError("Mutation tagging result has no mutation layer", {
      mutationDocs: mutationDocs.length,
    });
  }

  const spans = rankSpanCandidates(buildSpanCandidates(doc));

  for (const [type, mentions] of Object.entries(doc.entities)) {
    const survivors: Mention[] = [];
    const survivorProbs: ProbabilityPair[] = [];
    mentions.forEach((mention, index) => {
      if (!isSpanWinner(spans, type, mention)) return;
      survivors.push(mention);
      survivorProbs.push(probabilityFor(doc, type, index, mention));
    });
    doc.entities[type] = survivors;
    // keep the table index-aligned with the filtered mentions
    doc.prob[type] = survivorProbs;
  }

  doc.entities[MUTATION_TYPE] = mutations;
  doc.prob[MUTATION_TYPE] = mutationDoc.prob[MUTATION_TYPE] ?? [];

  return taggedDocs;
}
