import { loadConfig, type ItineraConfig } from "./config.js";
import { Decomposer } from "./decomposer/decomposer.js";
import { ItineraError } from "./errors.js";
import { createOpenAIClient } from "./llm/openai.js";
import type { LlmClient } from "./llm/types.js";
import { logger as rootLogger, type AppLogger } from "./logger.js";
import { FanOutCoordinator } from "./orchestrator/fanOut.js";
import { TravelOrchestrator } from "./orchestrator/orchestrator.js";
import { createAmadeusProviders } from "./providers/amadeus.js";
import type { FlightProvider, HotelProvider } from "./providers/types.js";
import { FlightSpecialist } from "./specialists/flightSpecialist.js";
import { HotelSpecialist } from "./specialists/hotelSpecialist.js";

export type PipelineDependencies = {
  /** Overrides the OpenAI client built from config */
  llm?: LlmClient;
  /** Overrides the Amadeus adapters built from config */
  providers?: { flights: FlightProvider; hotels: HotelProvider };
  logger?: AppLogger;
};

function buildLlm(config: ItineraConfig): LlmClient {
  const client = createOpenAIClient(config.openai);
  if (!client) {
    throw new ItineraError("NOT_CONFIGURED", "OPENAI_API_KEY is not set");
  }
  return client;
}

function buildProviders(config: ItineraConfig): { flights: FlightProvider; hotels: HotelProvider } {
  const { apiKey, apiSecret, baseUrl, timeoutMs } = config.amadeus;
  if (apiKey === undefined || apiSecret === undefined) {
    throw new ItineraError("NOT_CONFIGURED", "AMADEUS_API_KEY and AMADEUS_API_SECRET must both be set");
  }
  const shared = config.currency !== undefined ? { currency: config.currency } : {};
  return createAmadeusProviders(
    { clientId: apiKey, clientSecret: apiSecret, baseUrl, requestTimeoutMs: timeoutMs },
    {
      flights: { maxResults: config.maxFlightOffers, ...shared },
      hotels: { maxHotels: config.maxHotels, radiusKm: config.hotelRadiusKm, ...shared }
    }
  );
}

/**
 * Wire decomposer, specialists and coordinator into one orchestrator.
 *
 * @throws ItineraError NOT_CONFIGURED when a collaborator has no credentials and no override
 */
export function createTravelOrchestrator(
  config: ItineraConfig,
  deps: PipelineDependencies = {}
): TravelOrchestrator {
  const logger = deps.logger ?? rootLogger;
  const llm = deps.llm ?? buildLlm(config);
  const providers = deps.providers ?? buildProviders(config);
  const specialistOptions = { retry: config.retry, logger };

  const coordinator = new FanOutCoordinator(
    {
      flight: new FlightSpecialist(providers.flights, specialistOptions),
      hotel: new HotelSpecialist(providers.hotels, specialistOptions)
    },
    { domainTimeoutMs: config.domainTimeoutMs, logger }
  );
  const decomposer = new Decomposer(llm, { logger });
  return new TravelOrchestrator(decomposer, coordinator, { logger });
}

export function createTravelOrchestratorFromEnv(env: NodeJS.ProcessEnv = process.env): TravelOrchestrator {
  return createTravelOrchestrator(loadConfig(env));
}
