export type {
  FlightSegment,
  FlightItinerary,
  FlightOffer,
  HotelOffer,
  FlightProvider,
  HotelProvider,
  ProviderErrorType
} from "./types.js";

export { ProviderError } from "./types.js";

export {
  AMADEUS_TEST_BASE_URL,
  AmadeusSession,
  AmadeusFlightProvider,
  AmadeusHotelProvider,
  createAmadeusProviders,
  type AmadeusConfig,
  type AmadeusFlightOptions,
  type AmadeusHotelOptions
} from "./amadeus.js";
