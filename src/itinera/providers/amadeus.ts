/**
 * Amadeus self-service API adapters.
 *
 * Flight search: GET /v2/shopping/flight-offers.
 * Hotel search is two calls: hotel ids by city, then live offers for those ids.
 * Each adapter owns its own `AmadeusSession` (token cache), so the flight and
 * hotel specialists never share mutable state.
 */

import { z } from "zod";
import type { FlightQuery, HotelQuery } from "../domains.js";
import {
  ProviderError,
  type FlightOffer,
  type FlightProvider,
  type HotelOffer,
  type HotelProvider
} from "./types.js";
import { classifyStatus, retryAfterFrom, startDeadline } from "../utils/upstream.js";

export const AMADEUS_TEST_BASE_URL = "https://test.api.amadeus.com";

const PROVIDER = "amadeus";
/** Refresh the token this long before Amadeus says it expires */
const TOKEN_EXPIRY_MARGIN_MS = 60_000;

export type AmadeusConfig = {
  clientId: string;
  clientSecret: string;
  baseUrl?: string;
  /** Per-request timeout */
  requestTimeoutMs?: number;
};

type QueryParams = Record<string, string | number | boolean | undefined>;

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().positive()
});

const AmadeusErrorSchema = z.object({
  errors: z.array(
    z.object({
      code: z.number().optional(),
      title: z.string().optional(),
      detail: z.string().optional()
    })
  ).min(1)
});

const amount = z.string().transform(Number).pipe(z.number().finite());

const SegmentSchema = z.object({
  departure: z.object({ iataCode: z.string(), at: z.string() }),
  arrival: z.object({ iataCode: z.string(), at: z.string() }),
  carrierCode: z.string(),
  number: z.string()
});

const FlightOffersResponseSchema = z.object({
  data: z.array(
    z.object({
      id: z.string(),
      price: z.object({ total: amount, grandTotal: amount.optional(), currency: z.string() }),
      itineraries: z.array(
        z.object({
          duration: z.string().default(""),
          segments: z.array(SegmentSchema).min(1)
        })
      ),
      validatingAirlineCodes: z.array(z.string()).optional()
    })
  )
});

const HotelListResponseSchema = z.object({
  data: z.array(z.object({ hotelId: z.string(), name: z.string().optional() })).default([])
});

const HotelOffersResponseSchema = z.object({
  data: z.array(
    z.object({
      hotel: z.object({ hotelId: z.string(), name: z.string().optional() }),
      offers: z.array(
        z.object({
          id: z.string(),
          checkInDate: z.string(),
          checkOutDate: z.string(),
          price: z.object({ total: amount, currency: z.string() }),
          room: z.object({ description: z.object({ text: z.string().optional() }).optional() }).optional()
        })
      ).default([])
    })
  ).default([])
});

function cancelled(cause?: unknown): ProviderError {
  return new ProviderError("cancelled", "Request cancelled", { provider: PROVIDER, cause });
}

/** Settles with `promise`, or rejects as cancelled once `signal` aborts */
function untilAborted<T>(promise: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (!signal) {
    return promise;
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(cancelled());
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      }
    );
  });
}

/**
 * Authenticated transport for one adapter: OAuth2 client-credentials token
 * cache, per-request timeout, and HTTP error normalization.
 */
export class AmadeusSession {
  private readonly clientId: string;
  private readonly clientSecret: string;
  private readonly baseUrl: string;
  private readonly requestTimeoutMs: number;
  private readonly now: () => number;
  private token: { value: string; expiresAt: number } | undefined;
  private pendingToken: Promise<string> | undefined;

  constructor(config: AmadeusConfig, now: () => number = Date.now) {
    if (!config.clientId || !config.clientSecret) {
      throw new Error("Amadeus session requires clientId and clientSecret");
    }
    this.clientId = config.clientId;
    this.clientSecret = config.clientSecret;
    this.baseUrl = (config.baseUrl ?? AMADEUS_TEST_BASE_URL).replace(/\/+$/, "");
    this.requestTimeoutMs = config.requestTimeoutMs ?? 20_000;
    this.now = now;
  }

  async get(path: string, params: QueryParams, signal?: AbortSignal): Promise<unknown> {
    const token = await this.accessToken(signal);
    const search = new URLSearchParams();
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined) {
        search.set(key, String(value));
      }
    }
    try {
      return await this.send(
        `${this.baseUrl}${path}?${search.toString()}`,
        { method: "GET", headers: { Authorization: `Bearer ${token}` } },
        signal
      );
    } catch (err) {
      // Another caller may already have replaced the rejected token
      if (err instanceof ProviderError && err.type === "auth_error" && this.token?.value === token) {
        this.token = undefined;
      }
      throw err;
    }
  }

  /**
   * The token request is shared by every caller, so it runs under the session's
   * own timeout only; each caller stops waiting when its own signal aborts.
   */
  private async accessToken(signal: AbortSignal | undefined): Promise<string> {
    if (signal?.aborted) {
      throw cancelled();
    }
    if (this.token && this.token.expiresAt > this.now()) {
      return this.token.value;
    }
    if (!this.pendingToken) {
      this.pendingToken = this.fetchToken().finally(() => {
        this.pendingToken = undefined;
      });
    }
    return untilAborted(this.pendingToken, signal);
  }

  private async fetchToken(): Promise<string> {
    const body = await this.send(
      `${this.baseUrl}/v1/security/oauth2/token`,
      {
        method: "POST",
        headers: { "Content-Type": "application/x-www-form-urlencoded" },
        body: new URLSearchParams({
          grant_type: "client_credentials",
          client_id: this.clientId,
          client_secret: this.clientSecret
        }).toString()
      },
      undefined
    );
    const parsed = TokenResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ProviderError("auth_error", "No access_token in token response", { provider: PROVIDER });
    }
    this.token = {
      value: parsed.data.access_token,
      expiresAt: this.now() + parsed.data.expires_in * 1000 - TOKEN_EXPIRY_MARGIN_MS
    };
    return this.token.value;
  }

  private async send(url: string, init: RequestInit, signal: AbortSignal | undefined): Promise<unknown> {
    const deadline = startDeadline(this.requestTimeoutMs, signal);
    const abortError = (cause: unknown): ProviderError =>
      deadline.timedOut()
        ? new ProviderError("timeout", `Request timed out after ${this.requestTimeoutMs}ms`, { provider: PROVIDER, cause })
        : cancelled(cause);

    try {
      let response: Response;
      try {
        response = await fetch(url, { ...init, signal: deadline.signal });
      } catch (err) {
        if (deadline.signal.aborted) {
          throw abortError(err);
        }
        const message = err instanceof Error ? err.message : String(err);
        throw new ProviderError("network_error", message, { provider: PROVIDER, cause: err });
      }

      if (!response.ok) {
        throw await errorFromResponse(response);
      }

      try {
        const body: unknown = await response.json();
        return body;
      } catch (err) {
        if (deadline.signal.aborted) {
          throw abortError(err);
        }
        throw new ProviderError("invalid_response", "Response body is not JSON", {
          provider: PROVIDER,
          statusCode: response.status,
          cause: err
        });
      }
    } finally {
      deadline.dispose();
    }
  }
}

async function errorFromResponse(response: Response): Promise<ProviderError> {
  const parsed = AmadeusErrorSchema.safeParse(await response.json().catch(() => undefined));
  const first = parsed.success ? parsed.data.errors[0] : undefined;
  const message = first?.detail ?? first?.title ?? `HTTP ${response.status}`;

  return new ProviderError(classifyStatus(response.status), message, {
    provider: PROVIDER,
    statusCode: response.status,
    retryAfterMs: retryAfterFrom(response.headers)
  });
}

function invalidResponse(what: string, issues: z.ZodIssue[]): ProviderError {
  return new ProviderError("invalid_response", `Unexpected ${what} payload`, {
    provider: PROVIDER,
    cause: issues
  });
}

export type AmadeusFlightOptions = {
  /** Maximum offers requested per search */
  maxResults?: number;
  currency?: string;
};

export class AmadeusFlightProvider implements FlightProvider {
  readonly name = PROVIDER;
  private readonly session: AmadeusSession;
  private readonly maxResults: number;
  private readonly currency: string | undefined;

  constructor(session: AmadeusSession, options: AmadeusFlightOptions = {}) {
    this.session = session;
    this.maxResults = options.maxResults ?? 3;
    this.currency = options.currency;
  }

  async searchFlights(query: FlightQuery, signal?: AbortSignal): Promise<FlightOffer[]> {
    const body = await this.session.get(
      "/v2/shopping/flight-offers",
      {
        originLocationCode: query.originLocationCode,
        destinationLocationCode: query.destinationLocationCode,
        departureDate: query.departureDate,
        returnDate: query.returnDate,
        adults: query.adults,
        children: query.children ? query.children : undefined,
        infants: query.infants ? query.infants : undefined,
        travelClass: query.travelClass,
        nonStop: query.nonStop ?? false,
        currencyCode: this.currency,
        max: this.maxResults
      },
      signal
    );

    const parsed = FlightOffersResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw invalidResponse("flight-offers", parsed.error.issues);
    }

    return parsed.data.data.map((offer) => {
      const result: FlightOffer = {
        id: offer.id,
        price: offer.price.grandTotal ?? offer.price.total,
        currency: offer.price.currency,
        itineraries: offer.itineraries.map((itinerary) => ({
          duration: itinerary.duration,
          stops: itinerary.segments.length - 1,
          segments: itinerary.segments.map((segment) => ({
            carrier: segment.carrierCode,
            flightNumber: `${segment.carrierCode}${segment.number}`,
            origin: segment.departure.iataCode,
            destination: segment.arrival.iataCode,
            departAt: segment.departure.at,
            arriveAt: segment.arrival.at
          }))
        }))
      };
      const validatingCarrier = offer.validatingAirlineCodes?.[0];
      if (validatingCarrier !== undefined) {
        result.validatingCarrier = validatingCarrier;
      }
      return result;
    });
  }
}

export type AmadeusHotelOptions = {
  /** How many hotels of the city list get priced */
  maxHotels?: number;
  radiusKm?: number;
  currency?: string;
};

export class AmadeusHotelProvider implements HotelProvider {
  readonly name = PROVIDER;
  private readonly session: AmadeusSession;
  private readonly maxHotels: number;
  private readonly radiusKm: number;
  private readonly currency: string | undefined;

  constructor(session: AmadeusSession, options: AmadeusHotelOptions = {}) {
    this.session = session;
    this.maxHotels = options.maxHotels ?? 5;
    this.radiusKm = options.radiusKm ?? 20;
    this.currency = options.currency;
  }

  async searchHotels(query: HotelQuery, signal?: AbortSignal): Promise<HotelOffer[]> {
    const listBody = await this.session.get(
      "/v1/reference-data/locations/hotels/by-city",
      { cityCode: query.cityCode, radius: this.radiusKm, radiusUnit: "KM" },
      signal
    );
    const list = HotelListResponseSchema.safeParse(listBody);
    if (!list.success) {
      throw invalidResponse("hotel list", list.error.issues);
    }

    const hotelIds = list.data.data.slice(0, this.maxHotels).map((hotel) => hotel.hotelId);
    if (hotelIds.length === 0) {
      return [];
    }

    const offersBody = await this.session.get(
      "/v3/shopping/hotel-offers",
      {
        hotelIds: hotelIds.join(","),
        checkInDate: query.checkInDate,
        checkOutDate: query.checkOutDate,
        adults: query.adults,
        roomQuantity: query.roomQuantity ?? 1,
        currency: this.currency,
        bestRateOnly: true
      },
      signal
    );
    const offers = HotelOffersResponseSchema.safeParse(offersBody);
    if (!offers.success) {
      throw invalidResponse("hotel-offers", offers.error.issues);
    }

    const results: HotelOffer[] = [];
    for (const entry of offers.data.data) {
      const offer = entry.offers[0];
      if (!offer) continue;
      const result: HotelOffer = {
        hotelId: entry.hotel.hotelId,
        name: entry.hotel.name ?? entry.hotel.hotelId,
        offerId: offer.id,
        checkInDate: offer.checkInDate,
        checkOutDate: offer.checkOutDate,
        price: offer.price.total,
        currency: offer.price.currency
      };
      const description = offer.room?.description?.text;
      if (description !== undefined) {
        result.roomDescription = description;
      }
      results.push(result);
    }
    return results;
  }
}

/**
 * One session per adapter so the two specialists never share a token cache.
 */
export function createAmadeusProviders(
  config: AmadeusConfig,
  options: { flights?: AmadeusFlightOptions; hotels?: AmadeusHotelOptions } = {}
): { flights: AmadeusFlightProvider; hotels: AmadeusHotelProvider } {
  return {
    flights: new AmadeusFlightProvider(new AmadeusSession(config), options.flights),
    hotels: new AmadeusHotelProvider(new AmadeusSession(config), options.hotels)
  };
}
