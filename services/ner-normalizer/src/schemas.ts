import { z } from "zod";
import { AnnotationContractError } from "./errors.js";
import type { TaggedDocument } from "./types.js";

export const rawIdentifierSchema = z.union([
  z.string(),
  z.array(z.union([z.string(), z.tuple([z.string()])])),
]);

export const mentionSchema = z
  .object({
    start: z.number().int().nonnegative(),
    end: z.number().int().nonnegative(),
    id: rawIdentifierSchema,
    is_neural_normalized: z.boolean().default(false),
    prob: z.number().min(0).max(1).optional(),
  })
  // Tagger fields this service does not read (mention text, names) pass through
  .passthrough()
  .refine((mention) => mention.start <= mention.end, {
    message: "start must not exceed end",
  });

export const probabilityPairSchema = z.tuple([z.number(), z.number()]);

export const taggedDocumentSchema = z
  .object({
    entities: z.record(z.array(mentionSchema)),
    prob: z.record(z.array(probabilityPairSchema)).default({}),
    text: z.string().optional(),
    num_entities: z.number().int().nonnegative().optional(),
  })
  .passthrough();

export const taggedBatchSchema = z.union([
  z.array(taggedDocumentSchema),
  taggedDocumentSchema.transform((doc) => [doc]),
]);

/**
 * Validates raw tagger output (a single document or a batch) before any
 * post-processing touches it.
 */
export function parseTaggedDocuments(raw: unknown): TaggedDocument[] {
  const parsed = taggedBatchSchema.safeParse(raw);
  if (!parsed.success) {
    throw new AnnotationContractError("Tagger output does not match the expected shape", {
      issues: parsed.error.issues.map(
        (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
      ),
    });
  }
  return parsed.data;
}
