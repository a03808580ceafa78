/**
 * Specialist contracts and the per-domain outcome union.
 */

import type { DomainName } from "../domains.js";
import type { FlightOffer, HotelOffer, ProviderErrorType } from "../providers/types.js";
import type { SubQueryView } from "./subQueryView.js";

export type FlightOffersPayload = {
  kind: "flight_offers";
  offers: FlightOffer[];
};

export type HotelOffersPayload = {
  kind: "hotel_offers";
  offers: HotelOffer[];
};

export type DomainPayloadMap = {
  flight: FlightOffersPayload;
  hotel: HotelOffersPayload;
};

export type DomainErrorType = ProviderErrorType;

export type DomainErrorCause = {
  type: DomainErrorType;
  message: string;
  /** Provider calls made before giving up */
  attempts?: number;
  statusCode?: number;
};

export type DomainOutcome<D extends DomainName> =
  | { kind: "success"; domain: D; payload: DomainPayloadMap[D] }
  | { kind: "no_match"; domain: D; reason: string }
  | { kind: "error"; domain: D; cause: DomainErrorCause };

/** Outcome of any domain; narrow a success through `payload.kind` */
export type AnyDomainOutcome = DomainOutcome<DomainName>;

export function success<D extends DomainName>(domain: D, payload: DomainPayloadMap[D]): DomainOutcome<D> {
  return { kind: "success", domain, payload };
}

export function noMatch<D extends DomainName>(domain: D, reason: string): DomainOutcome<D> {
  return { kind: "no_match", domain, reason };
}

export function failure<D extends DomainName>(domain: D, cause: DomainErrorCause): DomainOutcome<D> {
  return { kind: "error", domain, cause };
}

export interface SpecialistSolver<D extends DomainName> {
  readonly domain: D;
  /**
   * Never rejects: every provider failure is folded into the returned outcome.
   */
  solve(view: SubQueryView<D>, signal?: AbortSignal): Promise<DomainOutcome<D>>;
}

export type SpecialistRegistry = { readonly [D in DomainName]: SpecialistSolver<D> };
