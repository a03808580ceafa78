import { definitionFor, type DomainName, type DomainQueryMap } from "../domains.js";
import { logger as rootLogger, type AppLogger } from "../logger.js";
import { ProviderError } from "../providers/types.js";
import {
  DEFAULT_RETRY_POLICY,
  withRetry,
  type RetryPolicy,
  type RetryVerdict,
  type Sleep
} from "./retry.js";
import type { SubQueryView } from "./subQueryView.js";
import {
  failure,
  noMatch,
  success,
  type DomainErrorCause,
  type DomainOutcome,
  type DomainPayloadMap,
  type SpecialistSolver
} from "./types.js";

export const INSUFFICIENT_PARAMETERS = "insufficient parameters";
export const NO_OFFERS_FOUND = "no offers found";

export type SpecialistOptions = {
  retry?: Partial<RetryPolicy>;
  logger?: AppLogger;
  /** Replaces the backoff wait; tests use it to skip real delays */
  sleep?: Sleep;
};

function classifyProviderError(error: unknown): RetryVerdict {
  if (error instanceof ProviderError) {
    return { retryable: error.retryable, retryAfterMs: error.retryAfterMs };
  }
  return { retryable: false };
}

function toErrorCause(error: unknown, attempts: number, signal: AbortSignal | undefined): DomainErrorCause {
  if (error instanceof ProviderError) {
    const cause: DomainErrorCause = { type: error.type, message: error.message, attempts };
    if (error.statusCode !== undefined) {
      cause.statusCode = error.statusCode;
    }
    return cause;
  }
  if (signal?.aborted) {
    return { type: "cancelled", message: "cancelled", attempts };
  }
  return {
    type: "unknown",
    message: error instanceof Error ? error.message : String(error),
    attempts
  };
}

/**
 * Shared solve loop: re-validate the view, call the provider with retries,
 * and fold every result into a DomainOutcome.
 */
export abstract class BaseSpecialist<D extends DomainName> implements SpecialistSolver<D> {
  readonly domain: D;
  protected readonly log: AppLogger;
  private readonly policy: RetryPolicy;
  private readonly sleep: Sleep | undefined;

  protected constructor(domain: D, options: SpecialistOptions = {}) {
    this.domain = domain;
    this.policy = { ...DEFAULT_RETRY_POLICY, ...options.retry };
    this.sleep = options.sleep;
    this.log = (options.logger ?? rootLogger).getSubLogger({ name: `${domain}-specialist` });
  }

  protected abstract search(query: DomainQueryMap[D], signal?: AbortSignal): Promise<DomainPayloadMap[D]>;

  async solve(view: SubQueryView<D>, signal?: AbortSignal): Promise<DomainOutcome<D>> {
    const parsed = definitionFor(this.domain).schema.safeParse(view.query);
    if (!parsed.success) {
      this.log.debug("sub-query incomplete, provider not contacted", { issues: parsed.error.issues });
      return noMatch(this.domain, INSUFFICIENT_PARAMETERS);
    }
    const query = parsed.data;

    const result = await withRetry(() => this.search(query, signal), {
      policy: this.policy,
      classify: classifyProviderError,
      signal,
      ...(this.sleep !== undefined && { sleep: this.sleep }),
      onRetry: ({ attempt, delayMs, error }) => {
        this.log.info("retrying provider call", {
          attempt,
          delayMs,
          error: error instanceof Error ? error.message : String(error)
        });
      }
    });

    if (!result.ok) {
      const cause = toErrorCause(result.error, result.attempts, signal);
      this.log.warn("provider call failed", { summary: view.summary, ...cause });
      return failure(this.domain, cause);
    }

    if (result.value.offers.length === 0) {
      return noMatch(this.domain, NO_OFFERS_FOUND);
    }
    this.log.debug("provider returned offers", { count: result.value.offers.length, attempts: result.attempts });
    return success(this.domain, result.value);
  }
}
