/**
 * Environment-driven configuration, validated once at startup.
 */

import { z } from "zod";
import { ItineraError } from "./errors.js";
import { AMADEUS_TEST_BASE_URL } from "./providers/amadeus.js";
import type { RetryPolicy } from "./specialists/retry.js";

function blankToUndefined(value: unknown): unknown {
  return typeof value === "string" && value.trim() === "" ? undefined : value;
}

const envInt = (fallback: number, min: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().min(min).default(fallback));

const envString = () => z.preprocess(blankToUndefined, z.string().trim().optional());

const EnvSchema = z.object({
  ITINERA_DOMAIN_TIMEOUT_MS: envInt(30_000, 1),
  ITINERA_PROVIDER_MAX_RETRIES: envInt(2, 0),
  ITINERA_RETRY_INITIAL_DELAY_MS: envInt(500, 0),
  ITINERA_RETRY_MAX_DELAY_MS: envInt(5_000, 0),
  ITINERA_MAX_FLIGHT_OFFERS: envInt(3, 1),
  ITINERA_MAX_HOTELS: envInt(5, 1),
  ITINERA_HOTEL_RADIUS_KM: envInt(20, 1),
  ITINERA_CURRENCY: z.preprocess(
    blankToUndefined,
    z.string().trim().toUpperCase().regex(/^[A-Z]{3}$/, "Expected an ISO 4217 currency code").optional()
  ),
  ITINERA_MAX_CONCURRENT_RUNS: envInt(5, 1),
  ITINERA_QUEUE_TIMEOUT_MS: envInt(30_000, 0),
  AMADEUS_API_KEY: envString(),
  AMADEUS_API_SECRET: envString(),
  AMADEUS_BASE_URL: z.preprocess(blankToUndefined, z.string().url().default(AMADEUS_TEST_BASE_URL)),
  AMADEUS_TIMEOUT_MS: envInt(20_000, 1),
  OPENAI_API_KEY: envString(),
  OPENAI_MODEL: z.preprocess(blankToUndefined, z.string().default("gpt-4o-mini")),
  OPENAI_BASE_URL: z.preprocess(blankToUndefined, z.string().url().optional()),
  OPENAI_TIMEOUT_MS: envInt(60_000, 1),
  OPENAI_MAX_TOKENS: envInt(1024, 1),
  OPENAI_TEMPERATURE: z.preprocess(blankToUndefined, z.coerce.number().min(0).max(2).default(0))
});

export type AmadeusSettings = {
  apiKey?: string;
  apiSecret?: string;
  baseUrl: string;
  timeoutMs: number;
};

export type OpenAISettings = {
  apiKey?: string;
  model: string;
  baseUrl?: string;
  timeoutMs: number;
  maxTokens: number;
  temperature: number;
};

export type ItineraConfig = {
  domainTimeoutMs: number;
  retry: RetryPolicy;
  maxFlightOffers: number;
  maxHotels: number;
  hotelRadiusKm: number;
  currency?: string;
  maxConcurrentRuns: number;
  queueTimeoutMs: number;
  amadeus: AmadeusSettings;
  openai: OpenAISettings;
};

/**
 * @throws ItineraError INVALID_CONFIG listing every offending variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ItineraConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      variable: issue.path.join("."),
      message: issue.message
    }));
    throw new ItineraError(
      "INVALID_CONFIG",
      `Invalid configuration: ${issues.map((issue) => issue.variable).join(", ")}`,
      { issues }
    );
  }
  const e = parsed.data;

  return {
    domainTimeoutMs: e.ITINERA_DOMAIN_TIMEOUT_MS,
    retry: {
      maxRetries: e.ITINERA_PROVIDER_MAX_RETRIES,
      initialDelayMs: e.ITINERA_RETRY_INITIAL_DELAY_MS,
      backoffFactor: 2,
      maxDelayMs: e.ITINERA_RETRY_MAX_DELAY_MS
    },
    maxFlightOffers: e.ITINERA_MAX_FLIGHT_OFFERS,
    maxHotels: e.ITINERA_MAX_HOTELS,
    hotelRadiusKm: e.ITINERA_HOTEL_RADIUS_KM,
    ...(e.ITINERA_CURRENCY !== undefined && { currency: e.ITINERA_CURRENCY }),
    maxConcurrentRuns: e.ITINERA_MAX_CONCURRENT_RUNS,
    queueTimeoutMs: e.ITINERA_QUEUE_TIMEOUT_MS,
    amadeus: {
      ...(e.AMADEUS_API_KEY !== undefined && { apiKey: e.AMADEUS_API_KEY }),
      ...(e.AMADEUS_API_SECRET !== undefined && { apiSecret: e.AMADEUS_API_SECRET }),
      baseUrl: e.AMADEUS_BASE_URL,
      timeoutMs: e.AMADEUS_TIMEOUT_MS
    },
    openai: {
      ...(e.OPENAI_API_KEY !== undefined && { apiKey: e.OPENAI_API_KEY }),
      model: e.OPENAI_MODEL,
      ...(e.OPENAI_BASE_URL !== undefined && { baseUrl: e.OPENAI_BASE_URL }),
      timeoutMs: e.OPENAI_TIMEOUT_MS,
      maxTokens: e.OPENAI_MAX_TOKENS,
      temperature: e.OPENAI_TEMPERATURE
    }
  };
}
