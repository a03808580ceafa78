import { describe, expect, it } from "vitest";
import type { DecomposedQuery, FlightQuery } from "../src/itinera/domains.js";
import { SubQueryView } from "../src/itinera/specialists/subQueryView.js";
import { jfkToLhr, londonStay } from "./helpers.js";

describe("SubQueryView", () => {
  const decomposed: DecomposedQuery = {
    subQueries: { flight: jfkToLhr, hotel: londonStay },
    missingFields: ["flight_return_date"]
  };

  it("returns undefined for a domain that is not in scope", () => {
    expect(SubQueryView.from({ subQueries: { flight: jfkToLhr }, missingFields: [] }, "hotel")).toBeUndefined();
  });

  it("exposes only its own domain's data", () => {
    const view = SubQueryView.from(decomposed, "hotel");

    expect(view?.toJSON()).toEqual({
      domain: "hotel",
      summary: "Hotels in LON from 2026-02-15 to 2026-02-18, 1 adult",
      query: londonStay
    });
  });

  it("holds a frozen copy detached from the decomposed record", () => {
    const source: FlightQuery = { ...jfkToLhr };
    const view = SubQueryView.from({ subQueries: { flight: source }, missingFields: [] }, "flight");

    source.adults = 4;

    expect(view?.query.adults).toBe(1);
    expect(view?.query).not.toBe(source);
    expect(Object.isFrozen(view?.query)).toBe(true);
    expect(Object.isFrozen(view)).toBe(true);
  });

  it("builds the summary from the sub-query alone", () => {
    const view = SubQueryView.from(decomposed, "flight");
    expect(view?.summary).toBe("Flights JFK -> LHR departing 2026-02-15, 1 adult");
  });
});
