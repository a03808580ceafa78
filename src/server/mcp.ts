import { z } from "zod";
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import type { RawRequest } from "../itinera/decomposer/decomposer.js";
import { toItineraError, type ItineraError } from "../itinera/errors.js";
import { logger as rootLogger, type AppLogger } from "../itinera/logger.js";
import type { TravelOrchestrator } from "../itinera/orchestrator/orchestrator.js";
import { renderFinalResponse } from "../itinera/orchestrator/render.js";
import { CapacityExceededError, ConcurrencyLimiter } from "../itinera/utils/concurrencyLimiter.js";

export const PLAN_TRIP_TOOL = "itinera.plan_trip";

const PlanTripSchema = z.object({
  text: z.string(),
  context: z.string().optional()
});

type TextContent = { type: "text"; text: string };
type ToolResult = { content: TextContent[]; isError?: boolean };

function text(value: string): TextContent {
  return { type: "text", text: value };
}

function toErrorResult(payload: unknown): ToolResult {
  return { isError: true, content: [text(JSON.stringify(payload, null, 2))] };
}

function fromItineraError(err: ItineraError): ToolResult {
  return toErrorResult(err.toJSON());
}

export type McpServerOptions = {
  orchestrator: Pick<TravelOrchestrator, "run">;
  maxConcurrentRuns?: number;
  queueTimeoutMs?: number;
  logger?: AppLogger;
  version?: string;
};

/**
 * MCP server exposing the pipeline as one tool. Transport is up to the caller.
 */
export function createMcpServer(options: McpServerOptions): Server {
  const log = (options.logger ?? rootLogger).getSubLogger({ name: "mcp" });
  const limiter = new ConcurrencyLimiter({
    maxConcurrent: options.maxConcurrentRuns ?? 5,
    queueTimeoutMs: options.queueTimeoutMs ?? 30_000
  });

  const server = new Server(
    { name: "itinera", version: options.version ?? "0.1.0" },
    { capabilities: { tools: {} } }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: [
      {
        name: PLAN_TRIP_TOOL,
        description:
          "Plan a composite trip from a natural-language request: searches flights and hotels " +
          "independently and returns the merged result plus any missing details",
        inputSchema: {
          type: "object",
          properties: {
            text: { type: "string", description: "The travel request" },
            context: { type: "string", description: "Earlier conversation, used as background only" }
          },
          required: ["text"],
          additionalProperties: false
        }
      }
    ]
  }));

  server.setRequestHandler(CallToolRequestSchema, async (req, extra): Promise<ToolResult> => {
    const { name, arguments: args } = req.params;
    if (name !== PLAN_TRIP_TOOL) {
      return { isError: true, content: [text(`Unknown tool: ${name}`)] };
    }

    const parsed = PlanTripSchema.safeParse(args ?? {});
    if (!parsed.success) {
      return fromItineraError(toItineraError(parsed.error));
    }
    const request: RawRequest = {
      text: parsed.data.text,
      ...(parsed.data.context !== undefined && { context: parsed.data.context })
    };

    try {
      const result = await limiter.run(() => options.orchestrator.run(request, { signal: extra.signal }));
      if (result.kind === "error") {
        return toErrorResult(result);
      }
      return {
        content: [text(renderFinalResponse(result.response)), text(JSON.stringify(result.response, null, 2))]
      };
    } catch (err) {
      if (err instanceof CapacityExceededError) {
        return toErrorResult({ code: "CAPACITY_EXCEEDED", message: err.message, retryAfterMs: err.retryAfterMs });
      }
      const error = toItineraError(err);
      log.error(`handler error for ${name}`, { code: error.code, message: error.message });
      return fromItineraError(error);
    }
  });

  return server;
}
