/**
 * Chat-completions client for OpenAI and API-compatible servers (Azure OpenAI,
 * Ollama, vLLM) reached through `baseUrl`.
 */

import { z } from "zod";
import type { OpenAISettings } from "../config.js";
import { classifyStatus, retryAfterFrom, startDeadline } from "../utils/upstream.js";
import { LlmError, type LlmClient, type LlmClientConfig, type LlmInput, type LlmOutput } from "./types.js";

const PROVIDER = "openai";
const DEFAULT_BASE_URL = "https://api.openai.com/v1";
/** Back-off suggested for a 429 without Retry-After */
const RATE_LIMIT_BACKOFF_MS = 5_000;

const CompletionSchema = z.object({
  model: z.string().optional(),
  choices: z.array(
    z.object({
      message: z.object({ content: z.string().nullable() }),
      finish_reason: z.string().nullable().optional()
    })
  ),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
      total_tokens: z.number()
    })
    .optional()
});

type Completion = z.infer<typeof CompletionSchema>;

const ErrorBodySchema = z.object({
  error: z.object({ message: z.string() })
});

type ChatMessage = { role: "system" | "user"; content: string };

const FINISH_REASONS = new Map<string, NonNullable<LlmOutput["finishReason"]>>([
  ["stop", "stop"],
  ["length", "length"],
  ["content_filter", "content_filter"],
  ["tool_calls", "tool_calls"],
  ["function_call", "tool_calls"]
]);

function chatMessages(input: LlmInput): ChatMessage[] {
  const messages: ChatMessage[] = [{ role: "system", content: input.system }];
  if (input.context) {
    messages.push({ role: "user", content: `Context from earlier in the conversation:\n${input.context}` });
  }
  messages.push({ role: "user", content: input.task });
  return messages;
}

async function errorFromResponse(response: Response): Promise<LlmError> {
  const body = ErrorBodySchema.safeParse(await response.json().catch(() => undefined));
  const message = body.success ? body.data.error.message : `HTTP ${response.status}`;
  const classified = classifyStatus(response.status);
  const type =
    classified === "invalid_request" && /context length|maximum context/i.test(message) ? "context_length" : classified;
  const retryAfterMs = retryAfterFrom(response.headers) ?? (type === "rate_limited" ? RATE_LIMIT_BACKOFF_MS : undefined);

  return new LlmError(type, message, { provider: PROVIDER, statusCode: response.status, retryAfterMs });
}

function toOutput(completion: Completion): LlmOutput {
  const choice = completion.choices[0];
  const output: LlmOutput = { text: choice?.message.content ?? "" };

  const finishReason = FINISH_REASONS.get(choice?.finish_reason ?? "");
  if (finishReason !== undefined) {
    output.finishReason = finishReason;
  }
  if (completion.model !== undefined) {
    output.model = completion.model;
  }
  if (completion.usage) {
    output.usage = {
      inputTokens: completion.usage.prompt_tokens,
      outputTokens: completion.usage.completion_tokens,
      totalTokens: completion.usage.total_tokens
    };
  }
  return output;
}

export class OpenAIClient implements LlmClient {
  readonly provider = PROVIDER;
  readonly model: string;

  private readonly apiKey: string;
  private readonly endpoint: string;
  private readonly defaults: { timeoutMs: number; maxTokens: number; temperature: number };

  constructor(config: LlmClientConfig) {
    if (!config.apiKey) {
      throw new Error("OpenAI client requires apiKey");
    }
    this.apiKey = config.apiKey;
    this.model = config.model;
    this.endpoint = `${(config.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, "")}/chat/completions`;
    this.defaults = {
      timeoutMs: config.defaultTimeoutMs ?? 60_000,
      maxTokens: config.defaultMaxTokens ?? 1024,
      temperature: config.defaultTemperature ?? 0
    };
  }

  async generate(input: LlmInput): Promise<LlmOutput> {
    const timeoutMs = input.timeoutMs ?? this.defaults.timeoutMs;
    const deadline = startDeadline(timeoutMs, input.abortSignal);

    try {
      const response = await fetch(this.endpoint, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${this.apiKey}`
        },
        body: JSON.stringify({
          model: this.model,
          messages: chatMessages(input),
          max_tokens: input.maxTokens ?? this.defaults.maxTokens,
          temperature: input.temperature ?? this.defaults.temperature,
          ...(input.responseFormat === "json_object" && { response_format: { type: "json_object" } })
        }),
        signal: deadline.signal
      });

      if (!response.ok) {
        throw await errorFromResponse(response);
      }

      // A body cut short by the deadline surfaces below as timeout or cancelled
      const body: unknown = await response.json().catch((err: unknown) => {
        if (deadline.signal.aborted) throw err;
        return undefined;
      });
      const completion = CompletionSchema.safeParse(body);
      if (!completion.success) {
        throw new LlmError("invalid_response", "Unexpected chat completion payload", {
          provider: PROVIDER,
          statusCode: response.status
        });
      }
      return toOutput(completion.data);
    } catch (err) {
      if (err instanceof LlmError) {
        throw err;
      }
      if (deadline.signal.aborted) {
        throw deadline.timedOut()
          ? new LlmError("timeout", `Request timed out after ${timeoutMs}ms`, { provider: PROVIDER, cause: err })
          : new LlmError("cancelled", "Request cancelled", { provider: PROVIDER, cause: err });
      }
      const message = err instanceof Error ? err.message : String(err);
      throw new LlmError("network_error", message, { provider: PROVIDER, cause: err });
    } finally {
      deadline.dispose();
    }
  }
}

/**
 * Returns null when no API key is configured.
 */
export function createOpenAIClient(settings: OpenAISettings): OpenAIClient | null {
  if (settings.apiKey === undefined) {
    return null;
  }
  return new OpenAIClient({
    apiKey: settings.apiKey,
    model: settings.model,
    defaultTimeoutMs: settings.timeoutMs,
    defaultMaxTokens: settings.maxTokens,
    defaultTemperature: settings.temperature,
    ...(settings.baseUrl !== undefined && { baseUrl: settings.baseUrl })
  });
}
