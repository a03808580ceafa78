/**
 * TravelOrchestrator: Decompose -> Fan-Out -> Aggregate.
 *
 * A decomposition failure is the only fatal error. Once dispatching starts,
 * every domain failure is data inside the FinalResponse.
 */

import crypto from "node:crypto";
import type { DecomposedQuery } from "../domains.js";
import { toItineraError } from "../errors.js";
import { logger as rootLogger, type AppLogger } from "../logger.js";
import type { Decomposer, RawRequest } from "../decomposer/decomposer.js";
import { aggregate } from "./aggregator.js";
import type { FanOutCoordinator } from "./fanOut.js";
import { PipelineStateMachine } from "./stateMachine.js";
import type {
  PipelineEvent,
  PipelineEventHandler,
  PipelineResult,
  PipelineStage,
  RunOptions
} from "./types.js";

function isoNow(): string {
  return new Date().toISOString();
}

export type TravelOrchestratorOptions = {
  logger?: AppLogger;
  /** Run id source; defaults to random UUIDs */
  newRunId?: () => string;
};

export class TravelOrchestrator {
  private readonly decomposer: Pick<Decomposer, "decompose">;
  private readonly coordinator: Pick<FanOutCoordinator, "dispatch">;
  private readonly log: AppLogger;
  private readonly newRunId: () => string;

  constructor(
    decomposer: Pick<Decomposer, "decompose">,
    coordinator: Pick<FanOutCoordinator, "dispatch">,
    options: TravelOrchestratorOptions = {}
  ) {
    this.decomposer = decomposer;
    this.coordinator = coordinator;
    this.log = (options.logger ?? rootLogger).getSubLogger({ name: "orchestrator" });
    this.newRunId = options.newRunId ?? (() => crypto.randomUUID());
  }

  async run(request: RawRequest, options: RunOptions = {}): Promise<PipelineResult> {
    const runId = this.newRunId();
    const startedAt = Date.now();
    const machine = new PipelineStateMachine();
    const emit = (event: PipelineEvent): void => this.emitEvent(options.onEvent, event);
    const enter = (stage: PipelineStage): void => {
      machine.transition(stage);
      emit({ type: "stage_entered", timestamp: isoNow(), runId, stage });
    };

    this.log.info("run started", { runId });
    emit({ type: "run_started", timestamp: isoNow(), runId });
    emit({ type: "stage_entered", timestamp: isoNow(), runId, stage: machine.stage });

    let decomposed: DecomposedQuery;
    try {
      decomposed = await this.decomposer.decompose(request, options.signal);
    } catch (err) {
      enter("failed");
      const error = toItineraError(err);
      this.log.warn("run failed during decomposition", { runId, code: error.code, message: error.message });
      emit({ type: "run_completed", timestamp: isoNow(), runId, kind: "error", durationMs: Date.now() - startedAt });
      return {
        kind: "error",
        runId,
        code: error.code,
        message: error.message,
        ...(error.details !== undefined && { details: error.details }),
        stages: machine.stages
      };
    }

    enter("dispatching");
    const outcomes = await this.coordinator.dispatch(decomposed, {
      ...(options.signal !== undefined && { signal: options.signal }),
      onDomainStarted: (domain, summary) => {
        emit({ type: "domain_started", timestamp: isoNow(), runId, domain, summary });
      },
      onDomainCompleted: (outcome, durationMs) => {
        emit({
          type: "domain_completed",
          timestamp: isoNow(),
          runId,
          domain: outcome.domain,
          outcome: outcome.kind,
          durationMs
        });
      }
    });

    enter("aggregating");
    const response = aggregate(decomposed, outcomes);
    enter("done");

    const durationMs = Date.now() - startedAt;
    this.log.info("run completed", { runId, status: response.status, durationMs });
    emit({ type: "run_completed", timestamp: isoNow(), runId, kind: "ok", status: response.status, durationMs });

    return { kind: "ok", runId, decomposed, response, stages: machine.stages };
  }

  /**
   * Fire-and-forget: each event runs in its own microtask so a handler can
   * neither throw into the pipeline nor re-enter it synchronously.
   */
  private emitEvent(handler: PipelineEventHandler | undefined, event: PipelineEvent): void {
    if (!handler) return;
    queueMicrotask(() => {
      try {
        const result = handler(event);
        if (result instanceof Promise) {
          result.catch((err: unknown) => this.logHandlerFailure(event, err));
        }
      } catch (err) {
        this.logHandlerFailure(event, err);
      }
    });
  }

  private logHandlerFailure(event: PipelineEvent, err: unknown): void {
    this.log.warn("event handler failed", {
      event: event.type,
      error: err instanceof Error ? err.message : String(err)
    });
  }
}
