export * from "./types.js";
export * from "./constants.js";
export { AnnotationContractError, isAnnotationContractError } from "./errors.js";
export { loadNerConfig, nerConfig, type NerConfig } from "./config.js";
export {
  parseTaggedDocuments,
  taggedDocumentSchema,
  mentionSchema,
} from "./schemas.js";
export {
  InMemoryPrefixRegistry,
  createCachedPrefixRegistry,
  createSafePrefixRegistry,
  loadPrefixRegistry,
  normKey,
  type PrefixRegistry,
  type PrefixRegistryEntry,
} from "./registry/prefix-registry.js";
export {
  countIdentifiers,
  resolveRawIdentifier,
  splitDocumentIdentifiers,
  splitIdentifiers,
  splitMentionIdentifiers,
  type IdentifierVariant,
} from "./utils/identifiers.js";
export {
  normalizeIdentifier,
  parseIdentifier,
  standardizeDocumentPrefixes,
  standardizeMentionPrefixes,
  type ParsedIdentifier,
} from "./utils/prefixes.js";
export {
  buildSpanCandidates,
  compareCandidates,
  rankSpanCandidates,
  resolveOverlap,
  spanKey,
} from "./utils/overlap.js";
export { prepareTaggerInput, sanitizeText } from "./utils/sanitize.js";
export { attachProbabilities, toPubAnnotation } from "./utils/pubannotation.js";
export {
  NerAnnotator,
  createNerAnnotator,
  createPrefixRegistry,
  postProcessDocuments,
  type EntityTagger,
  type NerAnnotatorOptions,
} from "./annotator.js";
export { createNerServer } from "./mcp/server.js";
