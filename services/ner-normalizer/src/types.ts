export type EntityType =
  | "disease"
  | "gene"
  | "drug"
  | "species"
  | "cell_line"
  | "cell_type"
  | "mutation"
  | (string & {});

export type ScalarIdentifier = string;

export type WrappedIdentifier = [ScalarIdentifier];

/**
 * Identifier field as emitted by the tagger. Usually a delimited string, but
 * some model versions wrap it in a list, and some wrap each element again
 * (`"a"`, `["a"]`, `[["a"]]`).
 */
export type RawIdentifier =
  | ScalarIdentifier
  | Array<ScalarIdentifier | WrappedIdentifier>;

export type Mention = {
  start: number;
  end: number;
  id: RawIdentifier;
  is_neural_normalized: boolean;
  prob?: number;
};

/** (negative, positive) class probabilities, index-aligned with the mentions of one type */
export type ProbabilityPair = [number, number];

export type ProbabilityTable = Record<string, ProbabilityPair[]>;

export type EntityMap<M extends Mention = Mention> = Record<string, M[]>;

export type TaggedDocument<M extends Mention = Mention> = {
  entities: EntityMap<M>;
  prob: ProbabilityTable;
  text?: string;
  num_entities?: number;
};

export type SpanKey = `${number}-${number}`;

export type SpanCandidate = {
  type: EntityType;
  id: string[];
  hasIdentifier: boolean;
  prob: number;
  index: number;
  is_neural_normalized: boolean;
};

export type PubAnnotationSpan = {
  begin: number;
  end: number;
};

export type PubAnnotationEntry = {
  id: string[];
  is_neural_normalized: boolean;
  prob?: number;
  mention: string;
  obj: EntityType;
  span: PubAnnotationSpan;
};

export type ElapseTime = {
  tagging_ms: number;
  post_process_ms: number;
};

export type PubAnnotationDocument = {
  text: string;
  annotations: PubAnnotationEntry[];
  timestamp: string;
  elapse_time?: ElapseTime;
};
