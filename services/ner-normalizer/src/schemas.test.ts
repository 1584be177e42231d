import { describe, it } from "node:test";
import assert from "node:assert";
import { parseTaggedDocuments } from "./schemas.js";
import { AnnotationContractError } from "./errors.js";

describe("Tagger output validation", () => {
  it("should accept a batch of documents", () => {
    const docs = parseTaggedDocuments([
      {
        entities: {
          gene: [{ start: 0, end: 5, id: "NCBIGene:672", is_neural_normalized: false }],
        },
        prob: { gene: [[0.01, 0.99]] },
      },
    ]);

    assert.strictEqual(docs.length, 1);
    assert.deepStrictEqual(docs[0].entities.gene[0].id, "NCBIGene:672");
    assert.deepStrictEqual(docs[0].prob.gene, [[0.01, 0.99]]);
  });

  it("should wrap a single document in a batch", () => {
    const docs = parseTaggedDocuments({
      entities: { disease: [{ start: 2, end: 4, id: [["cui-less"]], is_neural_normalized: true }] },
      prob: { disease: [[0.2, 0.8]] },
    });

    assert.strictEqual(docs.length, 1);
    assert.deepStrictEqual(docs[0].entities.disease[0].id, [["cui-less"]]);
  });

  it("should default missing flags and tables", () => {
    const docs = parseTaggedDocuments([
      { entities: { drug: [{ start: 0, end: 3, id: ["CHEBI:15365"] }] } },
    ]);

    assert.strictEqual(docs[0].entities.drug[0].is_neural_normalized, false);
    assert.deepStrictEqual(docs[0].prob, {});
  });

  it("should reject spans that end before they start", () => {
    assert.throws(
      () =>
        parseTaggedDocuments([
          { entities: { gene: [{ start: 9, end: 3, id: "NCBIGene:1" }] }, prob: {} },
        ]),
      AnnotationContractError,
    );
  });

  it("should reject identifiers nested more than once", () => {
    assert.throws(
      () =>
        parseTaggedDocuments([
          { entities: { gene: [{ start: 0, end: 3, id: [[["NCBIGene:1"]]] }] }, prob: {} },
        ]),
      AnnotationContractError,
    );
  });

  it("should reject output without entities", () => {
    assert.throws(() => parseTaggedDocuments([{ prob: {} }]), AnnotationContractError);
    assert.throws(() => parseTaggedDocuments("not json"), AnnotationContractError);
  });
});
