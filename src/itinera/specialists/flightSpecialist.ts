import type { FlightQuery } from "../domains.js";
import type { FlightProvider } from "../providers/types.js";
import { BaseSpecialist, type SpecialistOptions } from "./baseSpecialist.js";
import type { FlightOffersPayload } from "./types.js";

export class FlightSpecialist extends BaseSpecialist<"flight"> {
  private readonly provider: FlightProvider;

  constructor(provider: FlightProvider, options: SpecialistOptions = {}) {
    super("flight", options);
    this.provider = provider;
  }

  protected override async search(query: FlightQuery, signal?: AbortSignal): Promise<FlightOffersPayload> {
    const offers = await this.provider.searchFlights(query, signal);
    return { kind: "flight_offers", offers };
  }
}
