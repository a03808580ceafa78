import type { HotelQuery } from "../domains.js";
import type { HotelProvider } from "../providers/types.js";
import { BaseSpecialist, type SpecialistOptions } from "./baseSpecialist.js";
import type { HotelOffersPayload } from "./types.js";

export class HotelSpecialist extends BaseSpecialist<"hotel"> {
  private readonly provider: HotelProvider;

  constructor(provider: HotelProvider, options: SpecialistOptions = {}) {
    super("hotel", options);
    this.provider = provider;
  }

  protected override async search(query: HotelQuery, signal?: AbortSignal): Promise<HotelOffersPayload> {
    const offers = await this.provider.searchHotels(query, signal);
    return { kind: "hotel_offers", offers };
  }
}
