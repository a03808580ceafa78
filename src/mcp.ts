#!/usr/bin/env node
import process from "node:process";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig } from "./itinera/config.js";
import { toItineraError } from "./itinera/errors.js";
import { createTravelOrchestrator } from "./itinera/factory.js";
import { createLoggerFromEnv } from "./itinera/logger.js";
import { createMcpServer } from "./server/mcp.js";

// stdout carries JSON-RPC frames; every log line goes to stderr.
const log = createLoggerFromEnv("stderr");

process.on("unhandledRejection", (reason) => {
  log.error("unhandled rejection (server continues)", {
    error: reason instanceof Error ? reason.message : String(reason)
  });
});

async function main(): Promise<void> {
  const config = loadConfig();
  const orchestrator = createTravelOrchestrator(config, { logger: log });
  const server = createMcpServer({
    orchestrator,
    maxConcurrentRuns: config.maxConcurrentRuns,
    queueTimeoutMs: config.queueTimeoutMs,
    logger: log
  });

  const transport = new StdioServerTransport();
  await server.connect(transport);
  log.info("MCP server connected over stdio");

  await new Promise<void>((resolve) => {
    process.stdin.on("close", resolve);
    process.stdin.on("end", resolve);
  });
  log.info("stdin closed, shutting down");
}

main().catch((err: unknown) => {
  const error = toItineraError(err);
  process.stderr.write(`[itinera-mcp] Fatal startup error: ${error.code}: ${error.message}\n`);
  process.exit(1);
});
