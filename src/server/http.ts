import { Hono } from "hono";
import { serve, type ServerType } from "@hono/node-server";
import { z } from "zod";
import type { RawRequest } from "../itinera/decomposer/decomposer.js";
import { toItineraError } from "../itinera/errors.js";
import { logger as rootLogger, type AppLogger } from "../itinera/logger.js";
import type { TravelOrchestrator } from "../itinera/orchestrator/orchestrator.js";
import { renderFinalResponse } from "../itinera/orchestrator/render.js";
import { CapacityExceededError, ConcurrencyLimiter } from "../itinera/utils/concurrencyLimiter.js";

const PlanRequestSchema = z.object({
  text: z.string().max(4_000),
  context: z.string().max(16_000).optional()
});

export type HttpAppOptions = {
  orchestrator: Pick<TravelOrchestrator, "run">;
  /** Pipeline runs allowed in flight at once */
  maxConcurrentRuns?: number;
  /** How long a request may wait for a free slot (ms) */
  queueTimeoutMs?: number;
  logger?: AppLogger;
};

export type HttpServerOptions = HttpAppOptions & { port: number };

export function createHttpApp(options: HttpAppOptions): Hono {
  const app = new Hono();
  const log = (options.logger ?? rootLogger).getSubLogger({ name: "http" });
  const limiter = new ConcurrencyLimiter({
    maxConcurrent: options.maxConcurrentRuns ?? 5,
    queueTimeoutMs: options.queueTimeoutMs ?? 30_000
  });

  app.onError((err, c) => {
    if (err instanceof CapacityExceededError) {
      log.warn("run rejected, capacity exceeded", { queued: limiter.queued });
      return c.json({ code: "CAPACITY_EXCEEDED", message: err.message, retryAfterMs: err.retryAfterMs }, 503);
    }
    const error = toItineraError(err);
    log.error("unhandled error", { code: error.code, message: error.message });
    return c.json(error.toJSON(), 500);
  });

  app.get("/health", (c) => c.json({ ok: true, limiter: limiter.stats() }));

  app.post("/v1/plan", async (c) => {
    let json: unknown;
    try {
      json = await c.req.json();
    } catch {
      return c.json({ code: "BAD_REQUEST", message: "Invalid JSON body" }, 400);
    }

    const parsed = PlanRequestSchema.safeParse(json);
    if (!parsed.success) {
      return c.json(toItineraError(parsed.error).toJSON(), 400);
    }
    const request: RawRequest = {
      text: parsed.data.text,
      ...(parsed.data.context !== undefined && { context: parsed.data.context })
    };

    // A client disconnect aborts the run's outstanding domains
    const result = await limiter.run(() => options.orchestrator.run(request, { signal: c.req.raw.signal }));

    if (result.kind === "error") {
      return c.json(result, result.code === "DECOMPOSITION_FAILED" ? 422 : 500);
    }
    return c.json({
      runId: result.runId,
      response: result.response,
      rendered: renderFinalResponse(result.response)
    });
  });

  return app;
}

export function startHttpServer(options: HttpServerOptions): ServerType {
  const app = createHttpApp(options);
  const server = serve({ fetch: app.fetch, port: options.port });
  (options.logger ?? rootLogger).info(`HTTP server listening on http://localhost:${options.port}`);
  return server;
}
