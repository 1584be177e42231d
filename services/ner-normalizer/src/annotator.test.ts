import { before, describe, it } from "node:test";
import assert from "node:assert";
import {
  createNerAnnotator,
  NerAnnotator,
  postProcessDocuments,
  type EntityTagger,
} from "./annotator.js";
import { AnnotationContractError } from "./errors.js";
import { loadNerConfig } from "./config.js";
import { parseTaggedDocuments } from "./schemas.js";
import { loadPrefixRegistry, type PrefixRegistry } from "./registry/prefix-registry.js";
import type { TaggedDocument } from "./types.js";

class FakeTagger implements EntityTagger {
  readonly calls: string[][] = [];

  constructor(private readonly respond: (texts: string[]) => unknown) {}

  async tag(texts: string[]): Promise<unknown> {
    this.calls.push(texts);
    return this.respond(texts);
  }
}

const emptyDoc = (): TaggedDocument => ({ entities: {}, prob: {} });

describe("NerAnnotator", () => {
  let registry: PrefixRegistry;

  before(async () => {
    registry = await loadPrefixRegistry();
  });

  it("should split and normalize identifiers into PubAnnotation output", async () => {
    const tagger = new FakeTagger(() => [
      {
        entities: {
          gene: [{ start: 0, end: 5, id: "EntrezGene:672", is_neural_normalized: false }],
          disease: [
            { start: 21, end: 34, id: "OMIM:114480|MESH:D001943", is_neural_normalized: false },
          ],
        },
        prob: { gene: [[0.01, 0.99]], disease: [[0.03, 0.97]] },
      },
    ]);
    const annotator = new NerAnnotator({ tagger, registry, maxWordLen: 50 });

    const [result] = await annotator.annotateTexts([
      "BRCA1 variants raise breast cancer risk",
    ]);

    assert.deepStrictEqual(result.annotations, [
      {
        id: ["NCBIGene:672"],
        is_neural_normalized: false,
        prob: 0.99,
        mention: "BRCA1",
        obj: "gene",
        span: { begin: 0, end: 5 },
      },
      {
        id: ["OMIM:114480", "MESH:D001943"],
        is_neural_normalized: false,
        prob: 0.97,
        mention: "breast cancer",
        obj: "disease",
        span: { begin: 21, end: 34 },
      },
    ]);
    assert.strictEqual(typeof result.elapse_time?.tagging_ms, "number");
    assert.strictEqual(typeof result.elapse_time?.post_process_ms, "number");
  });

  it("should sanitize inputs and substitute empty texts before tagging", async () => {
    const tagger = new FakeTagger((texts) => texts.map(() => emptyDoc()));
    const annotator = new NerAnnotator({
      tagger,
      registry,
      maxWordLen: 50,
      emptyTextPlaceholder: "empty document",
    });

    const results = await annotator.annotateTexts(["  a\tb  ", ""]);

    assert.deepStrictEqual(tagger.calls, [["a b", "empty document"]]);
    assert.deepStrictEqual(
      results.map((doc) => doc.text),
      ["a b", "empty document"],
    );
  });

  it("should resolve overlaps and merge the mutation layer when enabled", async () => {
    const tagger = new FakeTagger(() => [
      {
        entities: {
          disease: [{ start: 0, end: 4, id: "CUI-less", is_neural_normalized: false }],
          gene: [{ start: 0, end: 4, id: "NCBIGene:673", is_neural_normalized: false }],
        },
        prob: { disease: [[0.05, 0.95]], gene: [[0.6, 0.4]] },
      },
    ]);
    const mutationTagger = new FakeTagger(() => [
      {
        entities: {
          mutation: [{ start: 5, end: 10, id: "tmVar:p|SUB|V|600|E", is_neural_normalized: false }],
        },
        prob: { mutation: [[0.02, 0.98]] },
      },
    ]);
    const annotator = new NerAnnotator({
      tagger,
      mutationTagger,
      registry,
      resolveOverlap: true,
    });

    const [result] = await annotator.annotateTexts(["BRAF V600E drives melanoma"]);

    assert.deepStrictEqual(mutationTagger.calls, [["BRAF V600E drives melanoma"]]);
    assert.deepStrictEqual(result.annotations, [
      {
        id: ["NCBIGene:673"],
        is_neural_normalized: false,
        prob: 0.4,
        mention: "BRAF",
        obj: "gene",
        span: { begin: 0, end: 4 },
      },
      {
        id: ["tmVar:p", "SUB", "V", "600", "E"],
        is_neural_normalized: false,
        prob: 0.98,
        mention: "V600E",
        obj: "mutation",
        span: { begin: 5, end: 10 },
      },
    ]);
  });

  it("should require a mutation tagger for overlap resolution", () => {
    const tagger = new FakeTagger(() => []);
    assert.throws(
      () => new NerAnnotator({ tagger, registry, resolveOverlap: true }),
      /requires a mutation tagger/,
    );
  });

  it("should reject tagger output with the wrong number of documents", async () => {
    const tagger = new FakeTagger(() => [emptyDoc()]);
    const annotator = new NerAnnotator({ tagger, registry });

    await assert.rejects(annotator.annotateTexts(["one", "two"]), AnnotationContractError);
  });

  it("should propagate tagger failures", async () => {
    const tagger = new FakeTagger(() => {
      throw new Error("model endpoint unavailable");
    });
    const annotator = new NerAnnotator({ tagger, registry });

    await assert.rejects(annotator.annotateTexts(["text"]), /model endpoint unavailable/);
  });

  it("should not call the tagger for an empty batch", async () => {
    const tagger = new FakeTagger(() => []);
    const annotator = new NerAnnotator({ tagger, registry });

    assert.deepStrictEqual(await annotator.annotateTexts([]), []);
    assert.strictEqual(tagger.calls.length, 0);
  });
});

describe("postProcessDocuments", () => {
  it("should split before normalizing so every part gets a canonical prefix", async () => {
    const registry = await loadPrefixRegistry();
    const docs: TaggedDocument[] = [
      {
        entities: {
          drug: [{ start: 0, end: 7, id: "ChEBI:15365|DB:DB00945", is_neural_normalized: true }],
        },
        prob: {},
      },
    ];

    postProcessDocuments(docs, registry);

    assert.deepStrictEqual(docs[0].entities.drug[0], {
      start: 0,
      end: 7,
      id: ["CHEBI:15365", "DrugBank:DB00945"],
      is_neural_normalized: true,
    });
  });

  it("should keep tagger fields it does not read on mentions and documents", async () => {
    const registry = await loadPrefixRegistry();
    const docs = parseTaggedDocuments({
      entities: {
        gene: [
          {
            start: 0,
            end: 3,
            id: "EntrezGene:7124",
            is_neural_normalized: false,
            mention: "TNF",
            normalized_name: "tumor necrosis factor",
          },
        ],
      },
      pmid: "123",
    });

    assert.deepStrictEqual(postProcessDocuments(docs, registry), [
      {
        entities: {
          gene: [
            {
              start: 0,
              end: 3,
              id: ["NCBIGene:7124"],
              is_neural_normalized: false,
              mention: "TNF",
              normalized_name: "tumor necrosis factor",
            },
          ],
        },
        prob: {},
        pmid: "123",
      },
    ]);
  });
});

describe("createNerAnnotator", () => {
  it("should refuse overlap resolution configured without a mutation tagger", async () => {
    const tagger = new FakeTagger(() => []);
    const config = loadNerConfig({ NER_RESOLVE_OVERLAP: "true" });

    await assert.rejects(createNerAnnotator(tagger, { config }), /requires a mutation tagger/);
  });

  it("should resolve overlaps when configured with a mutation tagger", async () => {
    const tagger = new FakeTagger(() => [emptyDoc()]);
    const mutationTagger = new FakeTagger(() => [
      { entities: { mutation: [] }, prob: { mutation: [] } },
    ]);
    const config = loadNerConfig({ NER_RESOLVE_OVERLAP: "true" });

    const annotator = await createNerAnnotator(tagger, { mutationTagger, config });
    await annotator.annotateTexts(["BRAF V600E"]);

    assert.deepStrictEqual(mutationTagger.calls, [["BRAF V600E"]]);
  });
});
