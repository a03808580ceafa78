export type {
  DomainOutcomeMap,
  ResponseStatus,
  FinalResponse,
  PipelineStage,
  PipelineResult,
  PipelineEvent,
  PipelineEventHandler,
  RunOptions
} from "./types.js";

export { FanOutCoordinator, DEFAULT_DOMAIN_TIMEOUT_MS, type FanOutOptions, type DispatchOptions } from "./fanOut.js";
export { aggregate, deriveStatus, NO_OUTCOME_RECORDED } from "./aggregator.js";
export { PipelineStateMachine } from "./stateMachine.js";
export { TravelOrchestrator, type TravelOrchestratorOptions } from "./orchestrator.js";
export { renderFinalResponse } from "./render.js";
