import { z } from "zod";

import { describeUnknownError, errorCodeFromStatus, LexiconError } from "../errors/index.js";

export interface OpenAiChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

const DEFAULT_OPENAI_BASE_URL = "https://api.openai.com/v1";
const DEFAULT_CLAUDE_BASE_URL = "https://api.anthropic.com";

const contentPartSchema = z.object({ type: z.string().optional(), text: z.string().optional() });

const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z
          .object({ content: z.union([z.string(), z.array(contentPartSchema), z.null()]).optional() })
          .optional(),
      }),
    )
    .optional(),
  error: z.object({ message: z.string().optional() }).optional(),
});

export type OpenAiChatCompletion = z.infer<typeof chatCompletionSchema>;

export function normalizeOpenAiBase(baseURL: string): string {
  const trimmed = String(baseURL || "").trim().replace(/\/+$/, "");
  if (!trimmed) return DEFAULT_OPENAI_BASE_URL;
  if (trimmed.endsWith("/v1") || trimmed.includes("/v1beta/openai")) return trimmed;
  return `${trimmed}/v1`;
}

export function toClaudeBase(baseURL: string): string {
  const trimmed = String(baseURL || "").trim().replace(/\/+$/, "");
  if (!trimmed) return DEFAULT_CLAUDE_BASE_URL;
  return trimmed.endsWith("/v1") ? trimmed.slice(0, -3) : trimmed;
}

/** `undefined` when the text is not JSON. */
export function parseJsonSafe(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

export function extractOpenAiChatText(completion: OpenAiChatCompletion): string {
  const raw = completion.choices?.[0]?.message?.content;
  if (typeof raw === "string") return raw.trim();
  if (!Array.isArray(raw)) return "";
  return raw
    .map((part) => (part.type === "text" ? String(part.text || "") : ""))
    .join("\n")
    .trim();
}

export async function openAiLikeChatCompletion(params: {
  apiKey: string;
  baseURL: string;
  model: string;
  messages: OpenAiChatMessage[];
  maxCompletionTokens?: number;
  temperature?: number;
  jsonMode?: boolean;
  signal?: AbortSignal;
  fetchImpl?: FetchLike;
}): Promise<string> {
  const endpoint = `${normalizeOpenAiBase(params.baseURL)}/chat/completions`;
  const requestBody: Record<string, unknown> = {
    model: params.model,
    messages: params.messages,
  };
  if (params.temperature !== undefined) requestBody.temperature = params.temperature;
  if (params.jsonMode) requestBody.response_format = { type: "json_object" };
  if (Number.isFinite(params.maxCompletionTokens) && (params.maxCompletionTokens || 0) > 0) {
    requestBody.max_completion_tokens = Number(params.maxCompletionTokens);
  }

  const fetchImpl = params.fetchImpl ?? fetch;
  let res: Response;
  try {
    res = await fetchImpl(endpoint, {
      method: "POST",
      headers: {
        "content-type": "application/json",
        Authorization: `Bearer ${params.apiKey}`,
      },
      body: JSON.stringify(requestBody),
      signal: params.signal,
    });
  } catch (err) {
    if (params.signal?.aborted) {
      throw new LexiconError({ code: "CANCELLED", message: "OpenAI-compatible request was aborted", cause: err });
    }
    throw new LexiconError({
      code: "NETWORK",
      message: `OpenAI-compatible request failed: ${describeUnknownError(err)}`,
      cause: err,
    });
  }

  const text = await res.text();
  const parsed = chatCompletionSchema.safeParse(parseJsonSafe(text));
  if (!res.ok) {
    const detail = parsed.success ? parsed.data.error?.message : undefined;
    throw new LexiconError({
      code: errorCodeFromStatus(res.status),
      message: detail || text || `OpenAI-compatible request failed (${res.status})`,
      statusCode: res.status,
    });
  }
  if (!parsed.success) {
    throw new LexiconError({
      code: "INVALID_RESPONSE",
      message: "OpenAI-compatible response is not a chat completion",
      statusCode: res.status,
    });
  }
  return extractOpenAiChatText(parsed.data);
}
