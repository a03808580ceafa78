/**
 * Fan-Out Coordinator: one concurrent specialist call per in-scope domain.
 *
 * Every domain gets its own AbortController and its own timer. A timeout or a
 * crash in one domain settles only that domain's outcome.
 */

import { DOMAIN_ORDER, type DecomposedQuery, type DomainName } from "../domains.js";
import { logger as rootLogger, type AppLogger } from "../logger.js";
import { SubQueryView } from "../specialists/subQueryView.js";
import {
  failure,
  type AnyDomainOutcome,
  type DomainErrorCause,
  type DomainOutcome,
  type SpecialistRegistry,
  type SpecialistSolver
} from "../specialists/types.js";
import type { DomainOutcomeMap } from "./types.js";

export const DEFAULT_DOMAIN_TIMEOUT_MS = 30_000;

const TIMEOUT_CAUSE: DomainErrorCause = { type: "timeout", message: "timeout" };
const CANCELLED_CAUSE: DomainErrorCause = { type: "cancelled", message: "cancelled" };

export type FanOutOptions = {
  domainTimeoutMs?: number;
  logger?: AppLogger;
};

export type DispatchOptions = {
  signal?: AbortSignal;
  onDomainStarted?: (domain: DomainName, summary: string) => void;
  onDomainCompleted?: (outcome: AnyDomainOutcome, durationMs: number) => void;
};

export class FanOutCoordinator {
  private readonly specialists: SpecialistRegistry;
  private readonly domainTimeoutMs: number;
  private readonly log: AppLogger;

  constructor(specialists: SpecialistRegistry, options: FanOutOptions = {}) {
    this.specialists = specialists;
    this.domainTimeoutMs = options.domainTimeoutMs ?? DEFAULT_DOMAIN_TIMEOUT_MS;
    if (this.domainTimeoutMs <= 0) {
      throw new Error("domainTimeoutMs must be positive");
    }
    this.log = (options.logger ?? rootLogger).getSubLogger({ name: "fan-out" });
  }

  /**
   * Start every in-scope domain before awaiting any of them. Never rejects.
   */
  async dispatch(decomposed: DecomposedQuery, options: DispatchOptions = {}): Promise<DomainOutcomeMap> {
    const outcomes: DomainOutcomeMap = {};
    const running: Promise<void>[] = [];
    for (const domain of DOMAIN_ORDER) {
      const task = this.startDomain(domain, decomposed, outcomes, options);
      if (task !== undefined) {
        running.push(task);
      }
    }
    await Promise.all(running);
    return outcomes;
  }

  private startDomain<D extends DomainName>(
    domain: D,
    decomposed: DecomposedQuery,
    outcomes: DomainOutcomeMap,
    options: DispatchOptions
  ): Promise<void> | undefined {
    const view = SubQueryView.from(decomposed, domain);
    if (view === undefined) {
      return undefined;
    }
    const solver: SpecialistSolver<D> = this.specialists[domain];
    const startedAt = Date.now();
    this.notify("onDomainStarted", () => options.onDomainStarted?.(domain, view.summary));

    return this.solveWithDeadline(solver, view, options.signal).then((outcome) => {
      outcomes[domain] = outcome;
      const durationMs = Date.now() - startedAt;
      this.log.debug("domain settled", { domain, outcome: outcome.kind, durationMs });
      this.notify("onDomainCompleted", () => options.onDomainCompleted?.(outcome, durationMs));
    });
  }

  private solveWithDeadline<D extends DomainName>(
    solver: SpecialistSolver<D>,
    view: SubQueryView<D>,
    parent: AbortSignal | undefined
  ): Promise<DomainOutcome<D>> {
    const domain = view.domain;
    if (parent?.aborted) {
      return Promise.resolve(failure(domain, CANCELLED_CAUSE));
    }

    const controller = new AbortController();
    return new Promise<DomainOutcome<D>>((resolve) => {
      let settled = false;
      const settle = (outcome: DomainOutcome<D>): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        parent?.removeEventListener("abort", onParentAbort);
        resolve(outcome);
      };
      const onParentAbort = (): void => {
        settle(failure(domain, CANCELLED_CAUSE));
        controller.abort();
      };
      const timer = setTimeout(() => {
        this.log.warn("domain timed out", { domain, timeoutMs: this.domainTimeoutMs });
        settle(failure(domain, TIMEOUT_CAUSE));
        controller.abort();
      }, this.domainTimeoutMs);
      parent?.addEventListener("abort", onParentAbort, { once: true });

      solver.solve(view, controller.signal).then(settle, (err: unknown) => {
        const message = err instanceof Error ? err.message : String(err);
        this.log.error("specialist rejected", { domain, message });
        settle(failure(domain, { type: "unknown", message }));
      });
    });
  }

  private notify(hook: string, call: () => void): void {
    try {
      call();
    } catch (err) {
      this.log.warn(`${hook} hook threw`, { error: err instanceof Error ? err.message : String(err) });
    }
  }
}
