/**
 * Contract between the decomposer and a text-understanding service.
 */

import { UpstreamError, type TransportErrorType, type UpstreamErrorOptions } from "../utils/upstream.js";

/** Transport failures plus the one only a model reports */
export type LlmErrorType = TransportErrorType | "context_length";

export class LlmError extends UpstreamError<LlmErrorType> {
  constructor(type: LlmErrorType, message: string, options?: UpstreamErrorOptions) {
    super(type, message, options);
    this.name = "LlmError";
  }
}

/**
 * Token accounting reported by the provider.
 */
export type TokenUsage = {
  /** Prompt tokens */
  inputTokens: number;
  /** Completion tokens */
  outputTokens: number;
  totalTokens?: number;
};

/**
 * One completion request.
 */
export type LlmInput = {
  /** Sent as the system message */
  system: string;
  /** Earlier conversation; background only */
  context?: string;
  /** The request to decompose */
  task: string;
  /** Maximum tokens to generate; the client default applies when absent */
  maxTokens?: number;
  /** 0-2 */
  temperature?: number;
  /** "json_object" asks the service for a single JSON object */
  responseFormat?: "text" | "json_object";
  /** Aborts the call with a `cancelled` LlmError */
  abortSignal?: AbortSignal;
  /** Per-call timeout in ms */
  timeoutMs?: number;
};

export type LlmOutput = {
  /** Raw completion text */
  text: string;
  usage?: TokenUsage;
  /** Model that actually answered, when the service reports it */
  model?: string;
  finishReason?: "stop" | "length" | "content_filter" | "tool_calls";
};

export type LlmClientConfig = {
  apiKey: string;
  /** Proxy or self-hosted endpoint */
  baseUrl?: string;
  model: string;
  /** Used when LlmInput.timeoutMs is absent */
  defaultTimeoutMs?: number;
  /** Used when LlmInput.maxTokens is absent */
  defaultMaxTokens?: number;
  /** Used when LlmInput.temperature is absent */
  defaultTemperature?: number;
};

/**
 * Text-understanding client. Failures reject with LlmError.
 */
export interface LlmClient {
  /** Provider identifier, e.g. "openai" */
  readonly provider: string;
  /** Model requested on every call */
  readonly model: string;
  /** Single completion for one request */
  generate(input: LlmInput): Promise<LlmOutput>;
}
