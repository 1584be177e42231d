import { postProcessDocuments } from "../annotator.js";
import { isAnnotationContractError } from "../errors.js";
import type { PrefixRegistry } from "../registry/prefix-registry.js";
import { parseTaggedDocuments } from "../schemas.js";
import { toErrorMessage } from "../telemetry.js";
import type { EntityType } from "../types.js";
import { splitIdentifiers } from "../utils/identifiers.js";
import { resolveOverlap } from "../utils/overlap.js";
import { normalizeIdentifier, shouldNormalizePrefixes } from "../utils/prefixes.js";

export function createMCPResponse(text: string) {
  return {
    content: [
      {
        type: "text" as const,
        text: text,
      },
    ],
  };
}

export function createErrorResponse(operation: string, error: unknown) {
  const detail = isAnnotationContractError(error)
    ? ` ${JSON.stringify(error.details)}`
    : "";
  return {
    ...createMCPResponse(`Error ${operation}: ${toErrorMessage(error)}${detail}`),
    isError: true,
  };
}

function jsonResponse(value: unknown) {
  return createMCPResponse(JSON.stringify(value, null, 2));
}

export function normalizeIdentifiersTool(
  registry: PrefixRegistry,
  args: { type: EntityType; ids: string[] },
) {
  const split = args.ids.flatMap((id) => splitIdentifiers(id));
  const ids = shouldNormalizePrefixes(args.type)
    ? split.map((id) => normalizeIdentifier(id, registry))
    : split;
  return jsonResponse({ type: args.type, ids });
}

export function postprocessDocumentsTool(
  registry: PrefixRegistry,
  args: { documents?: unknown },
) {
  const docs = parseTaggedDocuments(args.documents);
  return jsonResponse(postProcessDocuments(docs, registry));
}

export function resolveOverlapTool(args: { tagged?: unknown; mutation?: unknown }) {
  const tagged = parseTaggedDocuments(args.tagged);
  const mutation = parseTaggedDocuments(args.mutation);
  return jsonResponse(resolveOverlap(tagged, mutation));
}
