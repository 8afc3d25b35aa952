import Anthropic from "@anthropic-ai/sdk";

import type { EnrichmentConfig, EnrichmentProvider } from "../config/types.js";
import type { AnalyzeRequest, WordAnalyzer } from "../enrichment/types.js";
import { stripCodeFences } from "../enrichment/decode.js";
import { describeUnknownError, errorCodeFromStatus, LexiconError } from "../errors/index.js";
import { type FetchLike, openAiLikeChatCompletion, parseJsonSafe, toClaudeBase } from "./clients.js";
import { buildAnalysisPrompt } from "./prompt.js";

export interface CompletionRequest {
  system: string;
  user: string;
  signal: AbortSignal;
}

/** One system+user exchange with a chat model; resolves to the reply text. */
export type CompletionFn = (request: CompletionRequest) => Promise<string>;

export interface ProviderRuntime {
  apiKey: string;
  baseURL: string;
  model: string;
  maxTokens: number;
}

/**
 * Analyzer over any chat model that answers in JSON. Returns the parsed body,
 * or the reply text as-is when it does not parse.
 */
export class ChatJsonAnalyzer implements WordAnalyzer {
  public readonly name: string;
  private readonly complete: CompletionFn;

  constructor(name: string, complete: CompletionFn) {
    this.name = name;
    this.complete = complete;
  }

  public async analyze(request: AnalyzeRequest, signal: AbortSignal): Promise<unknown> {
    const prompt = buildAnalysisPrompt(request.word, request.languageHint);
    const text = await this.complete({ system: prompt.system, user: prompt.user, signal });
    const parsed = parseJsonSafe(stripCodeFences(text));
    return parsed === undefined ? text : parsed;
  }
}

export function openAiCompatibleCompletion(runtime: ProviderRuntime, fetchImpl?: FetchLike): CompletionFn {
  return ({ system, user, signal }) =>
    openAiLikeChatCompletion({
      apiKey: runtime.apiKey,
      baseURL: runtime.baseURL,
      model: runtime.model,
      messages: [
        { role: "system", content: system },
        { role: "user", content: user },
      ],
      maxCompletionTokens: runtime.maxTokens,
      temperature: 0,
      jsonMode: true,
      signal,
      fetchImpl,
    });
}

function extractTextFromMessage(message: Anthropic.Messages.Message): string {
  return message.content
    .filter((block): block is Anthropic.Messages.TextBlock => block.type === "text")
    .map((block) => block.text)
    .join("\n")
    .trim();
}

function fromAnthropicError(err: unknown): LexiconError {
  if (err instanceof Anthropic.APIUserAbortError) {
    return new LexiconError({ code: "CANCELLED", message: "Claude request was aborted", cause: err });
  }
  if (err instanceof Anthropic.APIConnectionTimeoutError) {
    return new LexiconError({ code: "TIMEOUT", message: "Claude request timed out", cause: err });
  }
  if (err instanceof Anthropic.APIConnectionError) {
    return new LexiconError({ code: "NETWORK", message: `Claude request failed: ${err.message}`, cause: err });
  }
  if (err instanceof Anthropic.APIError && typeof err.status === "number") {
    return new LexiconError({
      code: errorCodeFromStatus(err.status),
      message: err.message,
      statusCode: err.status,
      cause: err,
    });
  }
  return new LexiconError({ code: "UPSTREAM_UNAVAILABLE", message: describeUnknownError(err), cause: err });
}

export function anthropicCompletion(runtime: ProviderRuntime, client?: Anthropic): CompletionFn {
  // Retries would run past the enrichment deadline.
  const anthropic = client ?? new Anthropic({ apiKey: runtime.apiKey, baseURL: toClaudeBase(runtime.baseURL), maxRetries: 0 });
  return async ({ system, user, signal }) => {
    try {
      const message = await anthropic.messages.create(
        {
          model: runtime.model,
          max_tokens: runtime.maxTokens,
          temperature: 0,
          system,
          messages: [{ role: "user", content: user }],
        },
        { signal },
      );
      return extractTextFromMessage(message);
    } catch (err) {
      throw fromAnthropicError(err);
    }
  };
}

function completionFor(provider: EnrichmentProvider, runtime: ProviderRuntime, fetchImpl?: FetchLike): CompletionFn {
  switch (provider) {
    case "claude":
      return anthropicCompletion(runtime);
    case "openai":
      return openAiCompatibleCompletion(runtime, fetchImpl);
  }
}

/** `null` when enrichment is switched off or no credentials are configured. */
export function createWordAnalyzer(config: EnrichmentConfig, deps: { fetchImpl?: FetchLike } = {}): WordAnalyzer | null {
  if (!config.enabled || !config.apiKey.trim()) return null;
  const runtime: ProviderRuntime = {
    apiKey: config.apiKey.trim(),
    baseURL: config.baseURL,
    model: config.model,
    maxTokens: config.maxTokens,
  };
  return new ChatJsonAnalyzer(`${config.provider}:${config.model}`, completionFor(config.provider, runtime, deps.fetchImpl));
}
