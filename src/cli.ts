#!/usr/bin/env node
import { Command } from "commander";
import process from "node:process";
import chalk from "chalk";
import { z } from "zod";
import { loadConfig } from "./itinera/config.js";
import { toItineraError } from "./itinera/errors.js";
import { createTravelOrchestrator } from "./itinera/factory.js";
import { createLoggerFromEnv } from "./itinera/logger.js";
import { renderFinalResponse } from "./itinera/orchestrator/render.js";
import type { PipelineEvent, PipelineResult } from "./itinera/orchestrator/types.js";
import { startHttpServer } from "./server/http.js";

/**
 * Exit codes for `itinera plan`.
 */
const EXIT_CODES = {
  OK: 0,           // every requested domain answered, nothing missing
  PARTIAL: 10,     // some domain failed, found nothing, or needs more details
  ERROR: 30,       // decomposition or configuration failure
  CANCELLED: 40,   // SIGINT/SIGTERM
} as const;

const VERSION = "0.1.0";

const PlanOptionsSchema = z.object({
  context: z.string().optional(),
  json: z.boolean().default(false),
  domainTimeout: z.coerce.number().int().positive().optional()
});

const ServeOptionsSchema = z.object({
  port: z.coerce.number().int().min(1).max(65_535)
});

const program = new Command();

program.name("itinera").description("Plan composite flight + hotel requests").version(VERSION);

program
  .command("plan")
  .description("Decompose a travel request, search every domain concurrently, print the merged result")
  .argument("<request>", "The travel request, in plain language")
  .option("--context <text>", "Earlier conversation, used as background only")
  .option("--json", "Print the full pipeline result as JSON", false)
  .option("--domain-timeout <ms>", "Per-domain timeout in ms")
  .action(async (request: string, rawOpts: unknown) => {
    const log = createLoggerFromEnv("stderr");
    const abortController = new AbortController();
    let cancelled = false;

    const handleSignal = (signal: string): void => {
      if (cancelled) {
        process.stderr.write(chalk.red(`\nForced exit on second ${signal}\n`));
        process.exit(EXIT_CODES.CANCELLED);
      }
      cancelled = true;
      process.stderr.write(chalk.yellow(`\nReceived ${signal}, cancelling...\n`));
      abortController.abort();
    };
    process.on("SIGINT", () => handleSignal("SIGINT"));
    process.on("SIGTERM", () => handleSignal("SIGTERM"));

    try {
      const opts = PlanOptionsSchema.parse(rawOpts);
      const config = loadConfig();
      if (opts.domainTimeout !== undefined) {
        config.domainTimeoutMs = opts.domainTimeout;
      }
      const orchestrator = createTravelOrchestrator(config, { logger: log });

      process.stderr.write(chalk.blue(`Planning: "${request}"\n`));
      const result = await orchestrator.run(
        { text: request, ...(opts.context !== undefined && { context: opts.context }) },
        { signal: abortController.signal, onEvent: printProgress }
      );

      if (opts.json) {
        process.stdout.write(JSON.stringify(result, null, 2) + "\n");
      } else {
        outputResultHuman(result);
      }
      process.exit(resultToExitCode(result, cancelled));
    } catch (err) {
      const error = toItineraError(err);
      process.stderr.write(chalk.red(`Error: [${error.code}] ${error.message}\n`));
      process.exit(cancelled ? EXIT_CODES.CANCELLED : EXIT_CODES.ERROR);
    }
  });

program
  .command("serve")
  .description("Run the HTTP API")
  .option("--port <port>", "Port", "8787")
  .action((rawOpts: unknown) => {
    try {
      const opts = ServeOptionsSchema.parse(rawOpts);
      const config = loadConfig();
      const log = createLoggerFromEnv();
      startHttpServer({
        orchestrator: createTravelOrchestrator(config, { logger: log }),
        port: opts.port,
        maxConcurrentRuns: config.maxConcurrentRuns,
        queueTimeoutMs: config.queueTimeoutMs,
        logger: log
      });
    } catch (err) {
      const error = toItineraError(err);
      process.stderr.write(chalk.red(`Error: [${error.code}] ${error.message}\n`));
      process.exit(EXIT_CODES.ERROR);
    }
  });

function printProgress(event: PipelineEvent): void {
  switch (event.type) {
    case "domain_started":
      process.stderr.write(chalk.dim(`  … ${event.summary}\n`));
      break;
    case "domain_completed":
      process.stderr.write(chalk.dim(`  ${event.domain}: ${event.outcome} (${event.durationMs}ms)\n`));
      break;
    default:
      break;
  }
}

function resultToExitCode(result: PipelineResult, cancelled: boolean): number {
  if (cancelled) {
    return EXIT_CODES.CANCELLED;
  }
  if (result.kind === "error") {
    return EXIT_CODES.ERROR;
  }
  return result.response.status === "complete" ? EXIT_CODES.OK : EXIT_CODES.PARTIAL;
}

function outputResultHuman(result: PipelineResult): void {
  if (result.kind === "error") {
    process.stderr.write(chalk.red(`✗ Could not understand the request: [${result.code}] ${result.message}\n`));
    return;
  }
  switch (result.response.status) {
    case "complete":
      process.stderr.write(chalk.green("✓ Every part of the request was answered\n"));
      break;
    case "partial":
      process.stderr.write(chalk.yellow("⚠ Only part of the request was answered\n"));
      break;
    case "unanswered":
      process.stderr.write(chalk.magenta("✗ Nothing could be answered yet\n"));
      break;
  }
  process.stdout.write(renderFinalResponse(result.response) + "\n");
}

await program.parseAsync(process.argv);
