import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { SERVER_NAME, SERVER_VERSION } from "../constants.js";
import type { PrefixRegistry } from "../registry/prefix-registry.js";
import {
  createErrorResponse,
  normalizeIdentifiersTool,
  postprocessDocumentsTool,
  resolveOverlapTool,
} from "./tools.js";

export function createNerServer(registry: PrefixRegistry): McpServer {
  const server = new McpServer(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    },
  );

  server.tool(
    "normalize-identifiers",
    "Split compound identifier strings and standardize their ontology prefixes",
    {
      type: z
        .string()
        .min(1)
        .describe("Entity type of the mention (e.g., 'gene', 'species', 'mutation')"),
      ids: z
        .array(z.string())
        .min(1)
        .describe("Raw identifier strings, e.g. 'OMIM:608627|MESH:C563895'"),
    },
    async ({ type, ids }) => {
      try {
        return normalizeIdentifiersTool(registry, { type, ids });
      } catch (error) {
        return createErrorResponse("normalizing identifiers", error);
      }
    },
  );

  server.tool(
    "postprocess-documents",
    "Split and prefix-normalize the identifiers of tagged documents",
    {
      documents: z
        .unknown()
        .describe("Tagged document or array of documents: { entities, prob }"),
    },
    async ({ documents }) => {
      try {
        return postprocessDocumentsTool(registry, { documents });
      } catch (error) {
        return createErrorResponse("post-processing documents", error);
      }
    },
  );

  server.tool(
    "resolve-overlap",
    "Keep one entity type per span in the first tagged document and merge the mutation layer",
    {
      tagged: z.unknown().describe("Tagged documents with entities and prob tables"),
      mutation: z.unknown().describe("Mutation tagging result for the same documents"),
    },
    async ({ tagged, mutation }) => {
      try {
        return resolveOverlapTool({ tagged, mutation });
      } catch (error) {
        return createErrorResponse("resolving overlap", error);
      }
    },
  );

  return server;
}
