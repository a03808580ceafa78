import { createLogger } from "../src/itinera/logger.js";
import type { FlightQuery, HotelQuery } from "../src/itinera/domains.js";
import type { LlmClient, LlmInput, LlmOutput } from "../src/itinera/llm/types.js";
import type { FlightOffer, FlightProvider, HotelOffer, HotelProvider } from "../src/itinera/providers/types.js";
import type { Sleep } from "../src/itinera/specialists/retry.js";

export const silentLogger = createLogger({ level: "fatal", format: "hidden" });

/** Backoff that returns at once and remembers the requested delays */
export function recordingSleep(): { sleep: Sleep; delays: number[] } {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms) => {
      delays.push(ms);
    }
  };
}

type Reply = string | Error | ((input: LlmInput) => string | Promise<string>);

export class ScriptedLlm implements LlmClient {
  readonly provider = "scripted";
  readonly model = "test-model";
  readonly calls: LlmInput[] = [];
  private readonly reply: Reply;

  constructor(reply: Reply) {
    this.reply = reply;
  }

  async generate(input: LlmInput): Promise<LlmOutput> {
    this.calls.push(input);
    if (this.reply instanceof Error) {
      throw this.reply;
    }
    const text = typeof this.reply === "function" ? await this.reply(input) : this.reply;
    return { text };
  }
}

export class FakeFlightProvider implements FlightProvider {
  readonly name = "fake-flights";
  readonly calls: FlightQuery[] = [];
  private readonly handler: (query: FlightQuery, attempt: number, signal?: AbortSignal) => Promise<FlightOffer[]>;

  constructor(handler: (query: FlightQuery, attempt: number, signal?: AbortSignal) => Promise<FlightOffer[]>) {
    this.handler = handler;
  }

  searchFlights(query: FlightQuery, signal?: AbortSignal): Promise<FlightOffer[]> {
    this.calls.push(query);
    return this.handler(query, this.calls.length, signal);
  }
}

export class FakeHotelProvider implements HotelProvider {
  readonly name = "fake-hotels";
  readonly calls: HotelQuery[] = [];
  private readonly handler: (query: HotelQuery, attempt: number, signal?: AbortSignal) => Promise<HotelOffer[]>;

  constructor(handler: (query: HotelQuery, attempt: number, signal?: AbortSignal) => Promise<HotelOffer[]>) {
    this.handler = handler;
  }

  searchHotels(query: HotelQuery, signal?: AbortSignal): Promise<HotelOffer[]> {
    this.calls.push(query);
    return this.handler(query, this.calls.length, signal);
  }
}

export const jfkToLhr: FlightQuery = {
  originLocationCode: "JFK",
  destinationLocationCode: "LHR",
  departureDate: "2026-02-15",
  adults: 1
};

export const londonStay: HotelQuery = {
  cityCode: "LON",
  checkInDate: "2026-02-15",
  checkOutDate: "2026-02-18",
  adults: 1
};

export function flightOffer(id = "1", price = 430): FlightOffer {
  return {
    id,
    price,
    currency: "EUR",
    itineraries: [
      {
        duration: "PT7H10M",
        stops: 0,
        segments: [
          {
            carrier: "BA",
            flightNumber: "BA178",
            origin: "JFK",
            destination: "LHR",
            departAt: "2026-02-15T18:00:00",
            arriveAt: "2026-02-16T06:10:00"
          }
        ]
      }
    ]
  };
}

export function hotelOffer(hotelId = "H1", price = 150): HotelOffer {
  return {
    hotelId,
    name: "Hotel One",
    offerId: `${hotelId}-OFFER`,
    checkInDate: "2026-02-15",
    checkOutDate: "2026-02-18",
    price,
    currency: "EUR"
  };
}

/** A promise plus the functions that settle it */
export function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

/** Let queued microtasks and zero-delay timers run */
export function flush(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}
