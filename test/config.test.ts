import { describe, expect, it } from "vitest";
import { loadConfig } from "../src/itinera/config.js";
import { ItineraError } from "../src/itinera/errors.js";
import { createTravelOrchestrator } from "../src/itinera/factory.js";
import { TravelOrchestrator } from "../src/itinera/orchestrator/orchestrator.js";
import { FakeFlightProvider, FakeHotelProvider, ScriptedLlm, silentLogger } from "./helpers.js";

describe("loadConfig", () => {
  it("applies defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      domainTimeoutMs: 30_000,
      retry: { maxRetries: 2, initialDelayMs: 500, backoffFactor: 2, maxDelayMs: 5_000 },
      maxFlightOffers: 3,
      maxHotels: 5,
      hotelRadiusKm: 20,
      maxConcurrentRuns: 5,
      queueTimeoutMs: 30_000,
      amadeus: { baseUrl: "https://test.api.amadeus.com", timeoutMs: 20_000 },
      openai: { model: "gpt-4o-mini", timeoutMs: 60_000, maxTokens: 1024, temperature: 0 }
    });
  });

  it("reads overrides and credentials", () => {
    const config = loadConfig({
      ITINERA_DOMAIN_TIMEOUT_MS: "5000",
      ITINERA_PROVIDER_MAX_RETRIES: "0",
      ITINERA_CURRENCY: " eur ",
      AMADEUS_API_KEY: "test-id",
      AMADEUS_API_SECRET: "test-secret",
      OPENAI_API_KEY: "test-secret",
      OPENAI_BASE_URL: "http://localhost:11434/v1",
      OPENAI_TEMPERATURE: "0.5"
    });

    expect(config.domainTimeoutMs).toBe(5_000);
    expect(config.retry.maxRetries).toBe(0);
    expect(config.currency).toBe("EUR");
    expect(config.amadeus).toEqual({
      apiKey: "test-id",
      apiSecret: "test-secret",
      baseUrl: "https://test.api.amadeus.com",
      timeoutMs: 20_000
    });
    expect(config.openai.apiKey).toBe("test-secret");
    expect(config.openai.baseUrl).toBe("http://localhost:11434/v1");
    expect(config.openai.temperature).toBe(0.5);
  });

  it("treats blank values as unset", () => {
    const config = loadConfig({ ITINERA_MAX_HOTELS: "  ", OPENAI_API_KEY: "" });

    expect(config.maxHotels).toBe(5);
    expect("apiKey" in config.openai).toBe(false);
  });

  it("lists every invalid variable", () => {
    let caught: unknown;
    try {
      loadConfig({ ITINERA_DOMAIN_TIMEOUT_MS: "0", ITINERA_CURRENCY: "euro" });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ItineraError);
    expect(caught).toMatchObject({
      code: "INVALID_CONFIG",
      message: "Invalid configuration: ITINERA_DOMAIN_TIMEOUT_MS, ITINERA_CURRENCY"
    });
  });
});

describe("createTravelOrchestrator", () => {
  const fakes = {
    flights: new FakeFlightProvider(async () => []),
    hotels: new FakeHotelProvider(async () => [])
  };

  it("needs an OpenAI key unless a client is injected", () => {
    expect(() => createTravelOrchestrator(loadConfig({}), { providers: fakes, logger: silentLogger })).toThrow(
      "OPENAI_API_KEY is not set"
    );
  });

  it("needs both Amadeus credentials unless providers are injected", () => {
    const config = loadConfig({ AMADEUS_API_KEY: "test-id" });

    expect(() => createTravelOrchestrator(config, { llm: new ScriptedLlm("{}"), logger: silentLogger })).toThrow(
      "AMADEUS_API_KEY and AMADEUS_API_SECRET must both be set"
    );
  });

  it("builds from credentials alone", () => {
    const config = loadConfig({
      AMADEUS_API_KEY: "test-id",
      AMADEUS_API_SECRET: "test-secret",
      OPENAI_API_KEY: "test-secret"
    });

    expect(createTravelOrchestrator(config, { logger: silentLogger })).toBeInstanceOf(TravelOrchestrator);
  });
});
