import type { DomainName } from "../domains.js";
import type { FlightOffer, HotelOffer } from "../providers/types.js";
import type { AnyDomainOutcome } from "../specialists/types.js";
import type { FinalResponse } from "./types.js";

const DOMAIN_LABELS: Record<DomainName, string> = {
  flight: "Flights",
  hotel: "Hotels"
};

function money(amount: number, currency: string): string {
  return `${amount.toFixed(2)} ${currency}`;
}

function countOffers(count: number): string {
  return `${count} offer${count === 1 ? "" : "s"} found`;
}

function renderFlightOffer(offer: FlightOffer): string {
  const legs = offer.itineraries.map((itinerary) => {
    const first = itinerary.segments[0];
    const last = itinerary.segments[itinerary.segments.length - 1];
    if (!first || !last) return "no segments";
    const stops = itinerary.stops === 0 ? "direct" : `${itinerary.stops} stop${itinerary.stops === 1 ? "" : "s"}`;
    return `${first.origin} -> ${last.destination} departing ${first.departAt} (${stops})`;
  });
  return `  - ${money(offer.price, offer.currency)}: ${legs.join(" / ")}`;
}

function renderHotelOffer(offer: HotelOffer): string {
  return `  - ${offer.name}: ${money(offer.price, offer.currency)}, ${offer.checkInDate} to ${offer.checkOutDate}`;
}

function renderOffers(outcome: Extract<AnyDomainOutcome, { kind: "success" }>): string[] {
  const payload = outcome.payload;
  const lines =
    payload.kind === "flight_offers"
      ? payload.offers.map(renderFlightOffer)
      : payload.offers.map(renderHotelOffer);
  return [`${DOMAIN_LABELS[outcome.domain]}: ${countOffers(payload.offers.length)}`, ...lines];
}

function renderOutcome(outcome: AnyDomainOutcome): string[] {
  const label = DOMAIN_LABELS[outcome.domain];
  switch (outcome.kind) {
    case "success":
      return renderOffers(outcome);
    case "no_match":
      return [`${label}: no results (${outcome.reason})`];
    case "error":
      return [`${label}: failed (${outcome.cause.type}: ${outcome.cause.message})`];
  }
}

/**
 * Deterministic plain-text view of a FinalResponse, one block per domain.
 */
export function renderFinalResponse(response: FinalResponse): string {
  const lines = [`Status: ${response.status}`];
  if (response.outcomes.length === 0) {
    lines.push("No searches were run.");
  }
  for (const outcome of response.outcomes) {
    lines.push(...renderOutcome(outcome));
  }
  if (response.missingFields.length > 0) {
    lines.push(`Missing information: ${response.missingFields.join(", ")}`);
  }
  return lines.join("\n");
}
