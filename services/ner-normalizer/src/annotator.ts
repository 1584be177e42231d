import { nerConfig, type NerConfig } from "./config.js";
import { AnnotationContractError } from "./errors.js";
import {
  createCachedPrefixRegistry,
  createSafePrefixRegistry,
  loadPrefixRegistry,
  type PrefixRegistry,
} from "./registry/prefix-registry.js";
import { parseTaggedDocuments } from "./schemas.js";
import {
  failRun,
  finishRun,
  logRunEvent,
  startRun,
  type AnnotationRun,
} from "./telemetry.js";
import type { PubAnnotationDocument, TaggedDocument } from "./types.js";
import {
  countIdentifiers,
  countMentions,
  splitDocumentIdentifiers,
} from "./utils/identifiers.js";
import { resolveOverlap } from "./utils/overlap.js";
import { standardizeDocumentPrefixes } from "./utils/prefixes.js";
import { attachProbabilities, toPubAnnotation } from "./utils/pubannotation.js";
import { prepareTaggerInput } from "./utils/sanitize.js";

/**
 * Handle to the tagging model, local or remote. It receives sanitized texts
 * and resolves to one tagged document per text, in order; the output is
 * validated before use.
 */
export interface EntityTagger {
  tag(texts: string[]): Promise<unknown>;
}

export type NerAnnotatorOptions = {
  tagger: EntityTagger;
  registry: PrefixRegistry;
  /** Required when `resolveOverlap` is on; supplies the mutation layer */
  mutationTagger?: EntityTagger;
  resolveOverlap?: boolean;
  maxWordLen?: number;
  emptyTextPlaceholder?: string;
};

/** Split compound identifiers, then standardize their prefixes. */
export function postProcessDocuments<D extends TaggedDocument>(
  docs: D[],
  registry: PrefixRegistry,
): D[] {
  return docs.map((doc) =>
    standardizeDocumentPrefixes(splitDocumentIdentifiers(doc), registry),
  );
}

export class NerAnnotator {
  private readonly tagger: EntityTagger;
  private readonly mutationTagger: EntityTagger | undefined;
  private readonly registry: PrefixRegistry;
  private readonly resolveOverlap: boolean;
  private readonly maxWordLen: number;
  private readonly emptyTextPlaceholder: string;

  constructor(options: NerAnnotatorOptions) {
    this.tagger = options.tagger;
    this.mutationTagger = options.mutationTagger;
    this.registry = options.registry;
    this.resolveOverlap = options.resolveOverlap ?? false;
    this.maxWordLen = options.maxWordLen ?? nerConfig.maxWordLen;
    this.emptyTextPlaceholder =
      options.emptyTextPlaceholder ?? nerConfig.emptyTextPlaceholder;

    if (this.resolveOverlap && !this.mutationTagger) {
      throw new Error("Overlap resolution requires a mutation tagger");
    }
  }

  async annotateTexts(texts: string[]): Promise<PubAnnotationDocument[]> {
    const run = startRun("annotate", texts.length);
    try {
      const results = await this.annotate(run, texts);
      finishRun(run, {
        annotations: results.reduce((total, doc) => total + doc.annotations.length, 0),
      });
      return results;
    } catch (error) {
      failRun(run, error);
      throw error;
    }
  }

  private prepareInputs(run: AnnotationRun, texts: string[]): string[] {
    return texts.map((text, index) => {
      const prepared = prepareTaggerInput(text, {
        maxWordLen: this.maxWordLen,
        emptyTextPlaceholder: this.emptyTextPlaceholder,
      });
      if (prepared.fixes.length > 0) {
        logRunEvent(run, "input.sanitized", { index, fixes: prepared.fixes }, "warn");
      }
      return prepared.text;
    });
  }

  private async tag(
    tagger: EntityTagger,
    inputs: string[],
  ): Promise<TaggedDocument[]> {
    const docs = parseTaggedDocuments(await tagger.tag(inputs));
    if (docs.length !== inputs.length) {
      throw new AnnotationContractError("Tagger returned a different number of documents", {
        expected: inputs.length,
        received: docs.length,
      });
    }
    return docs;
  }

  private async annotate(
    run: AnnotationRun,
    texts: string[],
  ): Promise<PubAnnotationDocument[]> {
    if (texts.length === 0) return [];

    const inputs = this.prepareInputs(run, texts);

    const taggingStartedAt = Date.now();
    const docs = await this.tag(this.tagger, inputs);
    const mutationDocs =
      this.resolveOverlap && this.mutationTagger
        ? await this.tag(this.mutationTagger, inputs)
        : undefined;
    const taggingMs = Date.now() - taggingStartedAt;
    logRunEvent(run, "tagger.done", {
      mentions: docs.reduce((total, doc) => total + countMentions(doc), 0),
    });

    const postStartedAt = Date.now();
    docs.forEach((doc) => attachProbabilities(doc));

    if (mutationDocs) {
      if (docs.length > 1) {
        logRunEvent(run, "overlap.first_document_only", {}, "warn");
      }
      mutationDocs.forEach((doc) => attachProbabilities(doc));
      resolveOverlap(docs, mutationDocs);
    }

    postProcessDocuments(docs, this.registry);
    const postProcessMs = Date.now() - postStartedAt;
    logRunEvent(run, "postprocess.done", {
      identifiers: docs.reduce((total, doc) => total + countIdentifiers(doc), 0),
    });

    return docs.map((doc, index) =>
      toPubAnnotation(doc, doc.text ?? inputs[index], {
        tagging_ms: taggingMs,
        post_process_ms: postProcessMs,
      }),
    );
  }
}

/**
 * Loads the prefix registry named by the configuration and wraps it with the
 * lookup cache and the failure fallback.
 */
export async function createPrefixRegistry(
  config: NerConfig = nerConfig,
): Promise<PrefixRegistry> {
  const registry = await loadPrefixRegistry(config.registry.path);
  return createSafePrefixRegistry(
    createCachedPrefixRegistry(registry, {
      max: config.registry.cacheMax,
      ttlMs: config.registry.cacheTtlMs,
    }),
  );
}

export async function createNerAnnotator(
  tagger: EntityTagger,
  options: { mutationTagger?: EntityTagger; config?: NerConfig } = {},
): Promise<NerAnnotator> {
  const config = options.config ?? nerConfig;
  return new NerAnnotator({
    tagger,
    mutationTagger: options.mutationTagger,
    registry: await createPrefixRegistry(config),
    resolveOverlap: config.resolveOverlap,
    maxWordLen: config.maxWordLen,
    emptyTextPlaceholder: config.emptyTextPlaceholder,
  });
}
