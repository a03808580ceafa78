/**
 * Decomposer: one free-form travel request -> one isolated sub-query per domain.
 *
 * The model's answer is validated immediately after the call. Sub-queries are
 * rebuilt field by field from each domain's own schema, so nothing the model
 * writes outside a domain's known fields can reach that domain's specialist.
 */

import { z } from "zod";
import { DecompositionError } from "../errors.js";
import {
  DOMAIN_ORDER,
  definitionFor,
  type DecomposedQuery,
  type DomainName,
  type DomainQueryMap
} from "../domains.js";
import { LlmError, type LlmClient, type LlmInput } from "../llm/types.js";
import { logger as rootLogger, type AppLogger } from "../logger.js";
import { buildDecompositionPrompt } from "./prompt.js";

export type RawRequest = {
  readonly text: string;
  /** Prior-turn context, passed to the model as background only */
  readonly context?: string;
};

export type DecomposerOptions = {
  /** Clock used to resolve relative dates */
  now?: () => Date;
  /** Per-call overrides; the client's defaults apply otherwise */
  maxTokens?: number;
  temperature?: number;
  timeoutMs?: number;
  logger?: AppLogger;
};

type MutableSubQueries = { [D in DomainName]?: DomainQueryMap[D] };

const MissingFieldsSchema = z.array(z.string()).optional();

/** Missing-field entry emitted for an empty request */
export const MISSING_REQUEST = "request";

/**
 * Strip a surrounding markdown code fence, if any.
 */
export function extractJsonText(raw: string): string {
  const text = raw.trim();
  if (!text.startsWith("```")) {
    return text;
  }
  const firstNewline = text.indexOf("\n");
  const lastFence = text.lastIndexOf("```");
  if (firstNewline !== -1 && lastFence > firstNewline) {
    return text.slice(firstNewline + 1, lastFence).trim();
  }
  return text.replace(/^```\w*\n?/, "").replace(/\n?```$/, "").trim();
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function withoutNulls(value: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(value).filter(([, v]) => v !== null));
}

export class Decomposer {
  private readonly llm: LlmClient;
  private readonly now: () => Date;
  private readonly maxTokens: number | undefined;
  private readonly temperature: number | undefined;
  private readonly timeoutMs: number | undefined;
  private readonly log: AppLogger;

  constructor(llm: LlmClient, options: DecomposerOptions = {}) {
    this.llm = llm;
    this.now = options.now ?? (() => new Date());
    this.maxTokens = options.maxTokens;
    this.temperature = options.temperature;
    this.timeoutMs = options.timeoutMs;
    this.log = (options.logger ?? rootLogger).getSubLogger({ name: "decomposer" });
  }

  /**
   * @throws DecompositionError when the model call fails or its output is not a well-formed record
   */
  async decompose(request: RawRequest, signal?: AbortSignal): Promise<DecomposedQuery> {
    if (request.text.trim() === "") {
      return { subQueries: {}, missingFields: [MISSING_REQUEST] };
    }

    const raw = await this.callModel(request, signal);
    const record = this.parseRecord(raw);

    const subQueries: MutableSubQueries = {};
    const computedMissing: string[] = [];
    for (const domain of DOMAIN_ORDER) {
      this.assembleDomain(domain, record, subQueries, computedMissing);
    }

    const reported = MissingFieldsSchema.safeParse(record.missing_fields ?? undefined);
    if (!reported.success) {
      throw new DecompositionError("missing_fields must be an array of strings", {
        issues: reported.error.issues
      });
    }

    const missingFields: string[] = [];
    for (const entry of [...(reported.data ?? []), ...computedMissing]) {
      const name = entry.trim();
      if (name !== "" && !missingFields.includes(name)) {
        missingFields.push(name);
      }
    }

    const result: DecomposedQuery = { subQueries, missingFields };
    this.log.debug("decomposed request", {
      domains: DOMAIN_ORDER.filter((domain) => subQueries[domain] !== undefined),
      missingFields
    });
    return result;
  }

  private async callModel(request: RawRequest, signal: AbortSignal | undefined): Promise<string> {
    const input: LlmInput = {
      system: buildDecompositionPrompt(this.now()),
      task: request.text,
      responseFormat: "json_object"
    };
    if (this.maxTokens !== undefined) {
      input.maxTokens = this.maxTokens;
    }
    if (this.temperature !== undefined) {
      input.temperature = this.temperature;
    }
    if (request.context !== undefined && request.context.trim() !== "") {
      input.context = request.context;
    }
    if (signal !== undefined) {
      input.abortSignal = signal;
    }
    if (this.timeoutMs !== undefined) {
      input.timeoutMs = this.timeoutMs;
    }

    try {
      const output = await this.llm.generate(input);
      return output.text;
    } catch (err) {
      const details = err instanceof LlmError
        ? { llmError: err.toJSON() }
        : { cause: err instanceof Error ? err.message : String(err) };
      const message = err instanceof Error ? err.message : "unknown failure";
      this.log.warn("text-understanding call failed", details);
      throw new DecompositionError(`Text-understanding call failed: ${message}`, details);
    }
  }

  private parseRecord(raw: string): Record<string, unknown> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(extractJsonText(raw));
    } catch {
      this.log.warn("unparseable decomposition output", { raw: raw.slice(0, 200) });
      throw new DecompositionError("Decomposition output is not valid JSON", { raw: raw.slice(0, 200) });
    }
    if (!isPlainObject(parsed)) {
      throw new DecompositionError("Decomposition output must be a JSON object", { raw: raw.slice(0, 200) });
    }
    return parsed;
  }

  /**
   * Rebuild one domain's sub-query from its own slot in the model output.
   * A complete draft becomes a sub-query; an incomplete one only reports its gaps.
   */
  private assembleDomain<D extends DomainName>(
    domain: D,
    record: Record<string, unknown>,
    subQueries: MutableSubQueries,
    missing: string[]
  ): void {
    const definition = definitionFor(domain);
    const slot = record[definition.outputKey];
    if (slot === undefined || slot === null) {
      return;
    }
    if (!isPlainObject(slot)) {
      throw new DecompositionError(`${definition.outputKey} must be an object or null`, {
        domain,
        received: typeof slot
      });
    }

    const draft = definition.draftSchema.safeParse(withoutNulls(slot));
    if (!draft.success) {
      throw new DecompositionError(`${definition.outputKey} has malformed fields`, {
        domain,
        issues: draft.error.issues
      });
    }

    const absent = definition.requiredFields.filter((field) => draft.data[field.key] === undefined);
    if (absent.length > 0) {
      missing.push(...absent.map((field) => field.missing));
      return;
    }

    const complete = definition.schema.safeParse(draft.data);
    if (!complete.success) {
      throw new DecompositionError(`${definition.outputKey} is incomplete`, {
        domain,
        issues: complete.error.issues
      });
    }
    subQueries[domain] = complete.data;
  }
}
