/**
 * Plumbing shared by every outbound HTTP client: the text-understanding
 * service and the travel providers normalize failures the same way.
 */

export type TransportErrorType =
  | "timeout"
  | "cancelled"
  | "rate_limited"
  | "provider_error"
  | "network_error"
  | "auth_error"
  | "invalid_request"
  | "invalid_response"
  | "unknown";

export type UpstreamErrorOptions = {
  /** Overrides the per-type default */
  retryable?: boolean;
  retryAfterMs?: number | undefined;
  provider?: string;
  statusCode?: number;
  cause?: unknown;
};

const RETRYABLE_TYPES: ReadonlySet<string> = new Set(["timeout", "rate_limited", "provider_error", "network_error"]);

export abstract class UpstreamError<T extends string> extends Error {
  readonly type: T;
  readonly retryable: boolean;
  readonly retryAfterMs?: number;
  readonly provider?: string;
  readonly statusCode?: number;

  protected constructor(type: T, message: string, options: UpstreamErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.type = type;
    this.retryable = options.retryable ?? RETRYABLE_TYPES.has(type);
    if (options.retryAfterMs !== undefined) {
      this.retryAfterMs = options.retryAfterMs;
    }
    if (options.provider !== undefined) {
      this.provider = options.provider;
    }
    if (options.statusCode !== undefined) {
      this.statusCode = options.statusCode;
    }
  }

  toJSON(): {
    type: T;
    message: string;
    retryable: boolean;
    retryAfterMs?: number;
    provider?: string;
    statusCode?: number;
  } {
    return {
      type: this.type,
      message: this.message,
      retryable: this.retryable,
      ...(this.retryAfterMs !== undefined && { retryAfterMs: this.retryAfterMs }),
      ...(this.provider !== undefined && { provider: this.provider }),
      ...(this.statusCode !== undefined && { statusCode: this.statusCode })
    };
  }
}

export function classifyStatus(status: number): TransportErrorType {
  switch (status) {
    case 400:
    case 404:
    case 422:
      return "invalid_request";
    case 401:
    case 403:
      return "auth_error";
    case 429:
      return "rate_limited";
    default:
      return status >= 500 ? "provider_error" : "unknown";
  }
}

/** Retry-After in seconds, as milliseconds; HTTP-date values are ignored */
export function retryAfterFrom(headers: Headers): number | undefined {
  const value = headers.get("Retry-After");
  if (!value) {
    return undefined;
  }
  const seconds = Number.parseInt(value, 10);
  return Number.isNaN(seconds) ? undefined : seconds * 1000;
}

export type Deadline = {
  /** Aborts on timeout or when the caller's signal aborts */
  readonly signal: AbortSignal;
  /** True when the timer, not the caller, caused the abort */
  timedOut(): boolean;
  dispose(): void;
};

export function startDeadline(timeoutMs: number, parent?: AbortSignal): Deadline {
  const controller = new AbortController();
  let expired = false;
  const onParentAbort = (): void => controller.abort();

  if (parent?.aborted) {
    controller.abort();
  } else {
    parent?.addEventListener("abort", onParentAbort, { once: true });
  }
  const timer = setTimeout(() => {
    expired = true;
    controller.abort();
  }, timeoutMs);

  return {
    signal: controller.signal,
    timedOut: () => expired,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    }
  };
}
