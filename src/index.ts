export {
  DOMAIN_ORDER,
  DOMAIN_DEFINITIONS,
  FlightQuerySchema,
  HotelQuerySchema,
  definitionFor,
  subQueryFor,
  isInScope,
  describeFlightQuery,
  describeHotelQuery,
  type DomainName,
  type FlightQuery,
  type HotelQuery,
  type DomainQueryMap,
  type SubQueries,
  type DecomposedQuery
} from "./itinera/domains.js";
export { ItineraError, DecompositionError, toItineraError, type ItineraErrorCode } from "./itinera/errors.js";
export { createLogger, createLoggerFromEnv, logger, type AppLogger, type LoggerOptions } from "./itinera/logger.js";
export { loadConfig, type ItineraConfig } from "./itinera/config.js";
export {
  createTravelOrchestrator,
  createTravelOrchestratorFromEnv,
  type PipelineDependencies
} from "./itinera/factory.js";
export { Decomposer, type RawRequest, type DecomposerOptions } from "./itinera/decomposer/decomposer.js";
export * from "./itinera/llm/index.js";
export * from "./itinera/providers/index.js";
export * from "./itinera/specialists/index.js";
export * from "./itinera/orchestrator/index.js";
export { ConcurrencyLimiter, CapacityExceededError } from "./itinera/utils/concurrencyLimiter.js";
export { UpstreamError, type TransportErrorType, type UpstreamErrorOptions } from "./itinera/utils/upstream.js";
export { createHttpApp, startHttpServer, type HttpAppOptions } from "./server/http.js";
export { createMcpServer, PLAN_TRIP_TOOL } from "./server/mcp.js";
