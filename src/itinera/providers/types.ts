/**
 * Provider contracts and offer shapes shared by every flight and hotel backend.
 */

import type { FlightQuery, HotelQuery } from "../domains.js";
import { UpstreamError, type TransportErrorType, type UpstreamErrorOptions } from "../utils/upstream.js";

export type FlightSegment = {
  carrier: string;
  flightNumber: string;
  origin: string;
  destination: string;
  departAt: string;   // ISO datetime
  arriveAt: string;   // ISO datetime
};

export type FlightItinerary = {
  /** ISO-8601 duration as reported by the provider (e.g. "PT7H10M") */
  duration: string;
  /** 0 = direct */
  stops: number;
  segments: FlightSegment[];
};

export type FlightOffer = {
  id: string;
  price: number;
  currency: string;
  /** Outbound first, then return when the search was a round trip */
  itineraries: FlightItinerary[];
  validatingCarrier?: string;
};

export type HotelOffer = {
  hotelId: string;
  name: string;
  offerId: string;
  checkInDate: string;
  checkOutDate: string;
  price: number;
  currency: string;
  roomDescription?: string;
};

export interface FlightProvider {
  readonly name: string;
  searchFlights(query: FlightQuery, signal?: AbortSignal): Promise<FlightOffer[]>;
}

export interface HotelProvider {
  readonly name: string;
  searchHotels(query: HotelQuery, signal?: AbortSignal): Promise<HotelOffer[]>;
}

export type ProviderErrorType = TransportErrorType;

/**
 * Normalized provider failure. Specialists decide whether to retry from `retryable`.
 */
export class ProviderError extends UpstreamError<ProviderErrorType> {
  constructor(type: ProviderErrorType, message: string, options?: UpstreamErrorOptions) {
    super(type, message, options);
    this.name = "ProviderError";
  }
}
