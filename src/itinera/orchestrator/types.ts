/**
 * Pipeline result envelopes and progress events.
 */

import type { DecomposedQuery, DomainName } from "../domains.js";
import type { ItineraErrorCode } from "../errors.js";
import type { AnyDomainOutcome, DomainOutcome } from "../specialists/types.js";

/** At most one outcome per domain; absent domains have no entry */
export type DomainOutcomeMap = { [D in DomainName]?: DomainOutcome<D> };

/**
 * - complete: every in-scope domain succeeded and nothing is missing
 * - partial: at least one success, but something failed or is missing
 * - unanswered: no success at all
 */
export type ResponseStatus = "complete" | "partial" | "unanswered";

export type FinalResponse = {
  status: ResponseStatus;
  /** Fixed domain order, one entry per in-scope domain */
  outcomes: AnyDomainOutcome[];
  missingFields: string[];
};

export type PipelineStage = "decomposing" | "dispatching" | "aggregating" | "done" | "failed";

export type PipelineResult =
  | {
      kind: "ok";
      runId: string;
      decomposed: DecomposedQuery;
      response: FinalResponse;
      stages: PipelineStage[];
    }
  | {
      kind: "error";
      runId: string;
      code: ItineraErrorCode;
      message: string;
      details?: unknown;
      stages: PipelineStage[];
    };

export type RunStartedEvent = {
  type: "run_started";
  timestamp: string;
  runId: string;
};

export type StageEnteredEvent = {
  type: "stage_entered";
  timestamp: string;
  runId: string;
  stage: PipelineStage;
};

export type DomainStartedEvent = {
  type: "domain_started";
  timestamp: string;
  runId: string;
  domain: DomainName;
  summary: string;
};

export type DomainCompletedEvent = {
  type: "domain_completed";
  timestamp: string;
  runId: string;
  domain: DomainName;
  outcome: AnyDomainOutcome["kind"];
  durationMs: number;
};

export type RunCompletedEvent = {
  type: "run_completed";
  timestamp: string;
  runId: string;
  kind: PipelineResult["kind"];
  status?: ResponseStatus;
  durationMs: number;
};

export type PipelineEvent =
  | RunStartedEvent
  | StageEnteredEvent
  | DomainStartedEvent
  | DomainCompletedEvent
  | RunCompletedEvent;

export type PipelineEventHandler = (event: PipelineEvent) => void | Promise<void>;

export type RunOptions = {
  /** Cancels decomposition and every outstanding domain */
  signal?: AbortSignal;
  /** Each event is delivered in its own microtask; handler errors are logged and dropped */
  onEvent?: PipelineEventHandler;
};
