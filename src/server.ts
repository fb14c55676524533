import { randomUUID } from "node:crypto";
import { createRequire } from "node:module";
import type { Readable, Writable } from "node:stream";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { RequestHandlerExtra } from "@modelcontextprotocol/sdk/shared/protocol.js";
import type { ServerNotification, ServerRequest } from "@modelcontextprotocol/sdk/types.js";
import { log } from "./logger.js";
import { ruleBaselineTool } from "./tools/baseline.js";
import { ruleDiscoverTool } from "./tools/discover.js";
import { ruleEvaluateTool } from "./tools/evaluate.js";
import { ruleInterpretTool } from "./tools/interpret.js";
import { rulePredictTool } from "./tools/predict.js";
import type { RegisteredTool, ToolContext } from "./tools/types.js";

// Keep server version in sync with package.json
const require = createRequire(import.meta.url);
const { version: pkgVersion } = require("../package.json") as { version: string };
export const SERVER_VERSION = pkgVersion;

export const SERVER_NAME = "mcp-one-rule";

const SERVER_INSTRUCTIONS =
  "Tools for 1R (One Rule) classification over categorical data. " +
  "Call rule_discover with a table and its classes to find the single best attribute, " +
  "rule_baseline for the 0R comparison, and rule_predict to apply the discovered cases to new rows.";

const TOOL_REGISTRY: RegisteredTool[] = [
  ruleDiscoverTool,
  ruleEvaluateTool,
  ruleInterpretTool,
  ruleBaselineTool,
  rulePredictTool,
];

type ServerRequestExtra = RequestHandlerExtra<ServerRequest, ServerNotification>;

export interface TransportStreams {
  input?: Readable;
  output?: Writable;
}

export async function buildServer(streams?: TransportStreams) {
  log({
    level: "info",
    component: "server",
    message: "Building MCP one-rule server",
    meta: { version: SERVER_VERSION, tools: TOOL_REGISTRY.map((tool) => tool.name) },
  });

  // Stateless tools only: no resources, prompts or sampling
  const server = new McpServer(
    { name: SERVER_NAME, version: SERVER_VERSION, title: SERVER_NAME },
    {
      capabilities: { tools: { listChanged: true }, logging: {} },
      instructions: SERVER_INSTRUCTIONS,
    },
  );

  TOOL_REGISTRY.forEach((tool) => registerTool(server, tool));

  const transport = new StdioServerTransport(streams?.input, streams?.output);
  return { server, transport };
}

export async function start(streams?: TransportStreams) {
  const { server, transport } = await buildServer(streams);

  await server.connect(transport);
}

function registerTool(server: McpServer, tool: RegisteredTool) {
  server.registerTool(
    tool.name,
    {
      description: tool.description,
      inputSchema: tool.inputShape,
      outputSchema: tool.outputShape,
    },
    async (args: unknown, extra: ServerRequestExtra) => {
      const context = createToolContext(tool.name, extra);
      let structuredContent: Record<string, unknown>;
      try {
        structuredContent = await tool.run(args, context);
      } catch (error) {
        context.logger?.error("Tool call failed", error);
        throw error;
      }

      return {
        content: [
          {
            type: "text" as const,
            text: JSON.stringify(structuredContent, null, 2),
          },
        ],
        structuredContent,
      };
    },
  );
}

function createToolContext(toolName: string, extra?: ServerRequestExtra): ToolContext {
  const requestId = extra?.requestId !== undefined ? String(extra.requestId) : randomUUID();

  const logger = {
    info: (message: string, meta?: unknown) => {
      log({
        level: "info",
        component: `tool:${toolName}`,
        requestId,
        message,
        meta,
      });
    },
    error: (message: string, meta?: unknown) => {
      log({
        level: "error",
        component: `tool:${toolName}`,
        requestId,
        message,
        meta,
      });
    },
  };

  return { requestId, logger };
}
