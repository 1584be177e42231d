import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import express, { type Request, type Response } from "express";
import cors from "cors";
import { createPrefixRegistry } from "./annotator.js";
import { nerConfig } from "./config.js";
import { createNerServer } from "./mcp/server.js";
import type { PrefixRegistry } from "./registry/prefix-registry.js";
import { toErrorMessage, warnLog } from "./telemetry.js";

// get arguments
function getArgValue(prefix: string): string | undefined {
  const arg = process.argv.find((a) => a.startsWith(prefix));
  if (!arg) return undefined;
  const [, value] = arg.split("=", 2);
  return value;
}

// stdio server
async function runStdio(registry: PrefixRegistry) {
  const server = createNerServer(registry);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("NER normalizer MCP server running on stdio");
}

// streamable-http server, one stateless server per request
async function runHttp(registry: PrefixRegistry) {
  const app = express();
  app.use(express.json({ limit: "10mb" }));
  app.use(cors());
  app.options("/mcp", cors());

  const host = nerConfig.http.host;
  const port = Number(getArgValue("--port") ?? nerConfig.http.port);

  app.all("/mcp", async (req: Request, res: Response) => {
    const server = createNerServer(registry);
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
    });

    res.on("close", () => {
      Promise.all([transport.close(), server.close()]).catch((error: unknown) => {
        warnLog("http.close_failed", { message: toErrorMessage(error) });
      });
    });

    try {
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      warnLog("http.request_failed", { message: toErrorMessage(error) });
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: "2.0",
          error: { code: -32603, message: "Internal server error" },
          id: null,
        });
      }
    }
  });

  app.listen(port, host, () => {
    console.error(`NER normalizer MCP server (HTTP) on http://${host}:${port}/mcp`);
  });
}

// main
async function main() {
  const registry = await createPrefixRegistry(nerConfig);
  const useHttp = process.argv.includes("--http");
  if (useHttp) return runHttp(registry);
  return runStdio(registry);
}

main().catch((error) => {
  console.error("Fatal error in main():", error);
  process.exit(1);
});
