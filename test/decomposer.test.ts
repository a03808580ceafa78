import { describe, expect, it } from "vitest";
import { Decomposer, extractJsonText } from "../src/itinera/decomposer/decomposer.js";
import { DecompositionError } from "../src/itinera/errors.js";
import { LlmError } from "../src/itinera/llm/types.js";
import { ScriptedLlm, silentLogger } from "./helpers.js";

const today = new Date("2026-01-10T12:00:00Z");

function decomposerFor(llm: ScriptedLlm): Decomposer {
  return new Decomposer(llm, { now: () => today, logger: silentLogger });
}

function reply(body: unknown): string {
  return JSON.stringify(body);
}

describe("extractJsonText", () => {
  it("strips a json code fence", () => {
    expect(extractJsonText("```json\n{\"a\":1}\n```")).toBe("{\"a\":1}");
  });

  it("leaves bare JSON untouched", () => {
    expect(extractJsonText("  {\"a\":1} ")).toBe("{\"a\":1}");
  });
});

describe("Decomposer", () => {
  it("returns a request flag without calling the model for empty text", async () => {
    const llm = new ScriptedLlm("{}");
    const result = await decomposerFor(llm).decompose({ text: "   " });

    expect(result).toEqual({ subQueries: {}, missingFields: ["request"] });
    expect(llm.calls).toHaveLength(0);
  });

  it("builds a flight-only sub-query", async () => {
    const llm = new ScriptedLlm(
      reply({
        flight_query: {
          originLocationCode: "JFK",
          destinationLocationCode: "LHR",
          departureDate: "2026-02-15",
          adults: 1
        },
        hotel_query: null,
        missing_fields: []
      })
    );

    const result = await decomposerFor(llm).decompose({ text: "Flights from JFK to LHR on Feb 15, one adult" });

    expect(result.subQueries).toEqual({
      flight: {
        originLocationCode: "JFK",
        destinationLocationCode: "LHR",
        departureDate: "2026-02-15",
        adults: 1
      }
    });
    expect(result.subQueries.hotel).toBeUndefined();
    expect(result.missingFields).toEqual([]);
  });

  it("keeps an incomplete hotel request out of scope and lists what is missing", async () => {
    const llm = new ScriptedLlm(
      reply({
        flight_query: null,
        hotel_query: { cityCode: "LON" },
        missing_fields: ["hotel_check_in_date", "hotel_check_out_date"]
      })
    );

    const result = await decomposerFor(llm).decompose({ text: "Book a hotel in London" });

    expect(result.subQueries).toEqual({});
    expect(result.missingFields).toEqual(["hotel_check_in_date", "hotel_check_out_date", "hotel_adults"]);
  });

  it("trims, deduplicates and drops blank missing-field names", async () => {
    const llm = new ScriptedLlm(
      reply({
        flight_query: {},
        hotel_query: null,
        missing_fields: [" flight_origin ", "flight_origin", ""]
      })
    );

    const result = await decomposerFor(llm).decompose({ text: "I need a flight" });

    expect(result.missingFields).toEqual([
      "flight_origin",
      "flight_destination",
      "flight_departure_date",
      "flight_adults"
    ]);
  });

  it("drops keys that do not belong to a domain's schema", async () => {
    const llm = new ScriptedLlm(
      reply({
        flight_query: {
          originLocationCode: "JFK",
          destinationLocationCode: "LHR",
          departureDate: "2026-02-15",
          adults: 1,
          hotelName: "Ritz, near Piccadilly"
        },
        hotel_query: {
          cityCode: "LON",
          checkInDate: "2026-02-15",
          checkOutDate: "2026-02-18",
          adults: 1,
          notes: "arriving on BA178 from JFK"
        },
        missing_fields: []
      })
    );

    const result = await decomposerFor(llm).decompose({ text: "Flight JFK-LHR and the Ritz" });

    expect(result.subQueries.flight).toEqual({
      originLocationCode: "JFK",
      destinationLocationCode: "LHR",
      departureDate: "2026-02-15",
      adults: 1
    });
    expect(result.subQueries.hotel).toEqual({
      cityCode: "LON",
      checkInDate: "2026-02-15",
      checkOutDate: "2026-02-18",
      adults: 1
    });
  });

  it("treats null fields as absent", async () => {
    const llm = new ScriptedLlm(
      reply({
        flight_query: null,
        hotel_query: {
          cityCode: "PAR",
          checkInDate: "2026-03-01",
          checkOutDate: "2026-03-03",
          adults: 2,
          roomQuantity: null
        },
        missing_fields: []
      })
    );

    const result = await decomposerFor(llm).decompose({ text: "Paris hotel for two" });

    expect(result.subQueries.hotel).toEqual({
      cityCode: "PAR",
      checkInDate: "2026-03-01",
      checkOutDate: "2026-03-03",
      adults: 2
    });
  });

  it("accepts fenced output", async () => {
    const llm = new ScriptedLlm("```json\n{\"flight_query\":null,\"hotel_query\":null,\"missing_fields\":[]}\n```");
    const result = await decomposerFor(llm).decompose({ text: "hello" });
    expect(result).toEqual({ subQueries: {}, missingFields: [] });
  });

  it("sends today's date, the context and JSON mode to the model", async () => {
    const llm = new ScriptedLlm(reply({ flight_query: null, hotel_query: null, missing_fields: [] }));

    await decomposerFor(llm).decompose({ text: "same dates, but a hotel", context: "We talked about Feb 15-18" });

    const call = llm.calls[0];
    expect(call?.system).toContain("Today's date is 2026-01-10.");
    expect(call?.context).toBe("We talked about Feb 15-18");
    expect(call?.task).toBe("same dates, but a hotel");
    expect(call?.responseFormat).toBe("json_object");
  });

  it("omits blank context", async () => {
    const llm = new ScriptedLlm(reply({ flight_query: null, hotel_query: null, missing_fields: [] }));
    await decomposerFor(llm).decompose({ text: "anything", context: "  " });
    expect(llm.calls[0]?.context).toBeUndefined();
  });

  it("fails on output that is not JSON", async () => {
    const llm = new ScriptedLlm("Sure! Here are your flights.");
    const promise = decomposerFor(llm).decompose({ text: "flights please" });

    await expect(promise).rejects.toBeInstanceOf(DecompositionError);
    await expect(promise).rejects.toThrow("Decomposition output is not valid JSON");
  });

  it("fails on a JSON array", async () => {
    const llm = new ScriptedLlm("[]");
    await expect(decomposerFor(llm).decompose({ text: "x" })).rejects.toThrow(
      "Decomposition output must be a JSON object"
    );
  });

  it("fails on a malformed field value", async () => {
    const llm = new ScriptedLlm(
      reply({ flight_query: { originLocationCode: "New York City" }, hotel_query: null, missing_fields: [] })
    );
    await expect(decomposerFor(llm).decompose({ text: "x" })).rejects.toThrow("flight_query has malformed fields");
  });

  it("fails when a domain slot is not an object", async () => {
    const llm = new ScriptedLlm(reply({ flight_query: "JFK to LHR", hotel_query: null, missing_fields: [] }));
    await expect(decomposerFor(llm).decompose({ text: "x" })).rejects.toThrow("flight_query must be an object or null");
  });

  it("fails when missing_fields is not a string list", async () => {
    const llm = new ScriptedLlm(reply({ flight_query: null, hotel_query: null, missing_fields: "dates" }));
    await expect(decomposerFor(llm).decompose({ text: "x" })).rejects.toThrow(
      "missing_fields must be an array of strings"
    );
  });

  it("turns a failed model call into a DecompositionError", async () => {
    const llm = new ScriptedLlm(new LlmError("rate_limited", "slow down", { provider: "openai", statusCode: 429 }));

    const promise = decomposerFor(llm).decompose({ text: "flights please" });

    await expect(promise).rejects.toMatchObject({
      code: "DECOMPOSITION_FAILED",
      message: "Text-understanding call failed: slow down"
    });
  });
});
