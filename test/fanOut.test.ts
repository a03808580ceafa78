import { describe, expect, it } from "vitest";
import type { DecomposedQuery } from "../src/itinera/domains.js";
import { FanOutCoordinator } from "../src/itinera/orchestrator/fanOut.js";
import type { AnyDomainOutcome, DomainOutcome, SpecialistSolver } from "../src/itinera/specialists/types.js";
import { deferred, flightOffer, hotelOffer, jfkToLhr, londonStay, silentLogger } from "./helpers.js";

const both: DecomposedQuery = { subQueries: { flight: jfkToLhr, hotel: londonStay }, missingFields: [] };

function flightSolver(solve: SpecialistSolver<"flight">["solve"]): SpecialistSolver<"flight"> {
  return { domain: "flight", solve };
}

function hotelSolver(solve: SpecialistSolver<"hotel">["solve"]): SpecialistSolver<"hotel"> {
  return { domain: "hotel", solve };
}

const okFlight = flightSolver(async () => ({
  kind: "success",
  domain: "flight",
  payload: { kind: "flight_offers", offers: [flightOffer()] }
}));

const okHotel = hotelSolver(async () => ({
  kind: "success",
  domain: "hotel",
  payload: { kind: "hotel_offers", offers: [hotelOffer()] }
}));

/** Never settles on its own; records whether it was told to stop */
function hangingFlight(aborted: { value: boolean }): SpecialistSolver<"flight"> {
  return flightSolver(
    (_view, signal) =>
      new Promise<DomainOutcome<"flight">>(() => {
        signal?.addEventListener("abort", () => {
          aborted.value = true;
        });
      })
  );
}

describe("FanOutCoordinator", () => {
  it("dispatches only in-scope domains", async () => {
    const coordinator = new FanOutCoordinator({ flight: okFlight, hotel: okHotel }, { logger: silentLogger });

    const outcomes = await coordinator.dispatch({ subQueries: { flight: jfkToLhr }, missingFields: [] });

    expect(Object.keys(outcomes)).toEqual(["flight"]);
    expect(outcomes.flight?.kind).toBe("success");
  });

  it("starts every domain before awaiting any", async () => {
    const hotelStarted = deferred<void>();
    const flight = flightSolver(async () => {
      await hotelStarted.promise;
      return { kind: "no_match", domain: "flight", reason: "no offers found" };
    });
    const hotel = hotelSolver(async () => {
      hotelStarted.resolve();
      return { kind: "no_match", domain: "hotel", reason: "no offers found" };
    });
    const coordinator = new FanOutCoordinator({ flight, hotel }, { logger: silentLogger, domainTimeoutMs: 1_000 });

    const outcomes = await coordinator.dispatch(both);

    expect(outcomes.flight).toEqual({ kind: "no_match", domain: "flight", reason: "no offers found" });
    expect(outcomes.hotel).toEqual({ kind: "no_match", domain: "hotel", reason: "no offers found" });
  });

  it("times out a slow domain without touching its sibling", async () => {
    const aborted = { value: false };
    const coordinator = new FanOutCoordinator(
      { flight: hangingFlight(aborted), hotel: okHotel },
      { logger: silentLogger, domainTimeoutMs: 30 }
    );

    const outcomes = await coordinator.dispatch(both);

    expect(outcomes.flight).toEqual({
      kind: "error",
      domain: "flight",
      cause: { type: "timeout", message: "timeout" }
    });
    expect(outcomes.hotel?.kind).toBe("success");
    expect(aborted.value).toBe(true);
  });

  it("turns a rejecting solver into an unknown error", async () => {
    const flight = flightSolver(async () => {
      throw new Error("solver crashed");
    });
    const coordinator = new FanOutCoordinator({ flight, hotel: okHotel }, { logger: silentLogger });

    const outcomes = await coordinator.dispatch(both);

    expect(outcomes.flight).toEqual({
      kind: "error",
      domain: "flight",
      cause: { type: "unknown", message: "solver crashed" }
    });
    expect(outcomes.hotel?.kind).toBe("success");
  });

  it("cancels every outstanding domain when the caller aborts", async () => {
    const aborted = { value: false };
    const controller = new AbortController();
    const hotel = hotelSolver(
      () =>
        new Promise<DomainOutcome<"hotel">>(() => {
          controller.abort();
        })
    );
    const coordinator = new FanOutCoordinator(
      { flight: hangingFlight(aborted), hotel },
      { logger: silentLogger, domainTimeoutMs: 5_000 }
    );

    const outcomes = await coordinator.dispatch(both, { signal: controller.signal });

    expect(outcomes.flight).toEqual({ kind: "error", domain: "flight", cause: { type: "cancelled", message: "cancelled" } });
    expect(outcomes.hotel).toEqual({ kind: "error", domain: "hotel", cause: { type: "cancelled", message: "cancelled" } });
    expect(aborted.value).toBe(true);
  });

  it("reports progress through the hooks", async () => {
    const started: string[] = [];
    const completed: AnyDomainOutcome["kind"][] = [];
    const coordinator = new FanOutCoordinator({ flight: okFlight, hotel: okHotel }, { logger: silentLogger });

    await coordinator.dispatch(both, {
      onDomainStarted: (domain, summary) => started.push(`${domain}: ${summary}`),
      onDomainCompleted: (outcome) => completed.push(outcome.kind)
    });

    expect(started).toEqual([
      "flight: Flights JFK -> LHR departing 2026-02-15, 1 adult",
      "hotel: Hotels in LON from 2026-02-15 to 2026-02-18, 1 adult"
    ]);
    expect(completed).toEqual(["success", "success"]);
  });

  it("keeps going when a hook throws", async () => {
    const coordinator = new FanOutCoordinator({ flight: okFlight, hotel: okHotel }, { logger: silentLogger });

    const outcomes = await coordinator.dispatch(both, {
      onDomainCompleted: () => {
        throw new Error("observer bug");
      }
    });

    expect(outcomes.flight?.kind).toBe("success");
    expect(outcomes.hotel?.kind).toBe("success");
  });
});
