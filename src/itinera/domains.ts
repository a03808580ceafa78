/**
 * Domain registry.
 *
 * Each travel domain contributes one sub-query schema, the list of parameters
 * it cannot be searched without, and a one-line describer. Adding a domain means
 * adding an entry here plus one specialist solver.
 */

import { z } from "zod";

export const DOMAIN_ORDER = ["flight", "hotel"] as const;

export type DomainName = (typeof DOMAIN_ORDER)[number];

const iataCode = z
  .string()
  .trim()
  .toUpperCase()
  .regex(/^[A-Z]{3}$/, "Expected a 3-letter IATA code");

const isoDate = z
  .string()
  .trim()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "Expected a YYYY-MM-DD date");

const partySize = z.number().int().min(1).max(9);
const companionCount = z.number().int().min(0).max(9);

export const TRAVEL_CLASSES = ["ECONOMY", "PREMIUM_ECONOMY", "BUSINESS", "FIRST"] as const;

export const FlightQuerySchema = z.object({
  originLocationCode: iataCode,
  destinationLocationCode: iataCode,
  departureDate: isoDate,
  returnDate: isoDate.optional(),
  adults: partySize,
  children: companionCount.optional(),
  infants: companionCount.optional(),
  travelClass: z.enum(TRAVEL_CLASSES).optional(),
  nonStop: z.boolean().optional()
});

export const HotelQuerySchema = z.object({
  cityCode: iataCode,
  checkInDate: isoDate,
  checkOutDate: isoDate,
  adults: partySize,
  roomQuantity: z.number().int().min(1).max(9).optional()
});

export type FlightQuery = z.infer<typeof FlightQuerySchema>;
export type HotelQuery = z.infer<typeof HotelQuerySchema>;

export type DomainQueryMap = {
  flight: FlightQuery;
  hotel: HotelQuery;
};

/** One optional sub-query per domain; absent means "not in scope". */
export type SubQueries = { readonly [D in DomainName]?: DomainQueryMap[D] };

export type DecomposedQuery = {
  readonly subQueries: SubQueries;
  readonly missingFields: readonly string[];
};

export type RequiredField<D extends DomainName> = {
  key: keyof DomainQueryMap[D] & string;
  /** Name reported in missingFields when the parameter is absent */
  missing: string;
};

export type DomainDefinition<D extends DomainName> = {
  domain: D;
  /** Key under which the text-understanding service reports this domain */
  outputKey: string;
  /** Human description used in the decomposition prompt */
  promptDescription: string;
  schema: z.ZodType<DomainQueryMap[D], z.ZodTypeDef, unknown>;
  /** Same fields, all optional, unknown keys stripped */
  draftSchema: z.ZodType<Partial<DomainQueryMap[D]>, z.ZodTypeDef, unknown>;
  requiredFields: ReadonlyArray<RequiredField<D>>;
  describe(query: DomainQueryMap[D]): string;
};

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}

export function describeFlightQuery(query: FlightQuery): string {
  const parts = [
    `Flights ${query.originLocationCode} -> ${query.destinationLocationCode} departing ${query.departureDate}`
  ];
  if (query.returnDate !== undefined) {
    parts.push(`returning ${query.returnDate}`);
  }
  const party = [plural(query.adults, "adult")];
  if (query.children) party.push(`${query.children} ${query.children === 1 ? "child" : "children"}`);
  if (query.infants) party.push(plural(query.infants, "infant"));
  parts.push(party.join(", "));
  if (query.travelClass !== undefined) parts.push(query.travelClass.toLowerCase().replace("_", " "));
  if (query.nonStop) parts.push("non-stop only");
  return parts.join(", ");
}

export function describeHotelQuery(query: HotelQuery): string {
  const parts = [
    `Hotels in ${query.cityCode} from ${query.checkInDate} to ${query.checkOutDate}`,
    plural(query.adults, "adult")
  ];
  if (query.roomQuantity !== undefined && query.roomQuantity > 1) {
    parts.push(plural(query.roomQuantity, "room"));
  }
  return parts.join(", ");
}

export const DOMAIN_DEFINITIONS: { [D in DomainName]: DomainDefinition<D> } = {
  flight: {
    domain: "flight",
    outputKey: "flight_query",
    promptDescription:
      "originLocationCode (IATA airport or city code), destinationLocationCode (IATA code), " +
      "departureDate (YYYY-MM-DD), returnDate (YYYY-MM-DD, optional), adults (integer), " +
      "children (integer, optional), infants (integer, optional), " +
      "travelClass (ECONOMY | PREMIUM_ECONOMY | BUSINESS | FIRST, optional), nonStop (boolean, optional)",
    schema: FlightQuerySchema,
    draftSchema: FlightQuerySchema.partial().strip(),
    requiredFields: [
      { key: "originLocationCode", missing: "flight_origin" },
      { key: "destinationLocationCode", missing: "flight_destination" },
      { key: "departureDate", missing: "flight_departure_date" },
      { key: "adults", missing: "flight_adults" }
    ],
    describe: describeFlightQuery
  },
  hotel: {
    domain: "hotel",
    outputKey: "hotel_query",
    promptDescription:
      "cityCode (IATA city code, e.g. LON, PAR), checkInDate (YYYY-MM-DD), checkOutDate (YYYY-MM-DD), " +
      "adults (integer), roomQuantity (integer, optional)",
    schema: HotelQuerySchema,
    draftSchema: HotelQuerySchema.partial().strip(),
    requiredFields: [
      { key: "cityCode", missing: "hotel_city" },
      { key: "checkInDate", missing: "hotel_check_in_date" },
      { key: "checkOutDate", missing: "hotel_check_out_date" },
      { key: "adults", missing: "hotel_adults" }
    ],
    describe: describeHotelQuery
  }
};

export function definitionFor<D extends DomainName>(domain: D): DomainDefinition<D> {
  return DOMAIN_DEFINITIONS[domain];
}

export function subQueryFor<D extends DomainName>(
  subQueries: SubQueries,
  domain: D
): DomainQueryMap[D] | undefined {
  return subQueries[domain];
}

export function isInScope(decomposed: DecomposedQuery, domain: DomainName): boolean {
  return subQueryFor(decomposed.subQueries, domain) !== undefined;
}
