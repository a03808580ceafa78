export type {
  LlmErrorType,
  TokenUsage,
  LlmInput,
  LlmOutput,
  LlmClientConfig,
  LlmClient
} from "./types.js";

export { LlmError } from "./types.js";

export { OpenAIClient, createOpenAIClient } from "./openai.js";
