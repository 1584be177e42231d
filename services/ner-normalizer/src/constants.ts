import type { EntityType } from "./types.js";

// Entity types whose identifiers carry an ontology prefix worth standardizing
export const PREFIX_NORMALIZED_TYPES: ReadonlySet<EntityType> = new Set([
  "disease",
  "gene",
  "drug",
  "species",
  "cell_line",
  "cell_type",
]);

export const MUTATION_TYPE: EntityType = "mutation";

// Sentinel the tagger emits when a span could not be linked to any concept
export const CUI_LESS = "CUI-less";

// NCBI:txid10095 => ncbitaxon:10095
export const TAXONOMY_MARKER = "NCBI:txid";
export const TAXONOMY_PREFIX = "ncbitaxon";

// CVCL_J260 => cellosaurus:CVCL_J260
export const CELLOSAURUS_PREFIX = "cellosaurus";
export const CELLOSAURUS_LOCAL_TAG = "CVCL_";

export const IDENTIFIER_SEPARATOR = ",";
export const ALTERNATE_IDENTIFIER_SEPARATOR = "|";

export const EMPTY_TEXT_PLACEHOLDER = "lorem ipsum dolor sit amet";
export const DEFAULT_MAX_WORD_LEN = 50;

// Line breaks become a zero-width non-joiner; the tagger input is single-line
export const LINE_BREAK_REPLACEMENT = "\u200c";

export const TEXT_SUBSTITUTIONS: ReadonlyArray<{
  pattern: string;
  replacement: string;
  label: string;
}> = [
  { pattern: "\r\n", replacement: LINE_BREAK_REPLACEMENT, label: "crlf" },
  { pattern: "\n", replacement: LINE_BREAK_REPLACEMENT, label: "line_break" },
  { pattern: "\t", replacement: " ", label: "tab" },
  { pattern: "\u00a0", replacement: " ", label: "nbsp" },
  { pattern: "\u000b", replacement: " ", label: "vertical_tab" },
  { pattern: "\u000c", replacement: " ", label: "form_feed" },
];

export const SERVER_NAME = "ner-normalizer";
export const SERVER_VERSION = "0.1.0";
