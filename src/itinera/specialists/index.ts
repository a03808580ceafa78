export { SubQueryView } from "./subQueryView.js";
export {
  DEFAULT_RETRY_POLICY,
  abortableSleep,
  backoffDelay,
  withRetry,
  type RetryPolicy,
  type RetryResult,
  type Sleep
} from "./retry.js";
export {
  BaseSpecialist,
  INSUFFICIENT_PARAMETERS,
  NO_OFFERS_FOUND,
  type SpecialistOptions
} from "./baseSpecialist.js";
export { FlightSpecialist } from "./flightSpecialist.js";
export { HotelSpecialist } from "./hotelSpecialist.js";
export {
  success,
  noMatch,
  failure,
  type AnyDomainOutcome,
  type DomainErrorCause,
  type DomainErrorType,
  type DomainOutcome,
  type DomainPayloadMap,
  type FlightOffersPayload,
  type HotelOffersPayload,
  type SpecialistRegistry,
  type SpecialistSolver
} from "./types.js";
