export type LexiconErrorCode =
  | "BAD_INPUT"
  | "TIMEOUT"
  | "CANCELLED"
  | "NETWORK"
  | "RATE_LIMITED"
  | "UPSTREAM_UNAVAILABLE"
  | "INVALID_RESPONSE"
  | "STORE_UNAVAILABLE"
  | "UNKNOWN";

export interface LexiconErrorOptions {
  code: LexiconErrorCode;
  message: string;
  retryable?: boolean;
  statusCode?: number;
  cause?: unknown;
}

const RETRYABLE_BY_DEFAULT: ReadonlySet<LexiconErrorCode> = new Set([
  "TIMEOUT",
  "NETWORK",
  "RATE_LIMITED",
  "UPSTREAM_UNAVAILABLE",
  "INVALID_RESPONSE",
  "STORE_UNAVAILABLE",
]);

export class LexiconError extends Error {
  public readonly code: LexiconErrorCode;
  public readonly retryable: boolean;
  public readonly statusCode?: number;

  constructor(options: LexiconErrorOptions) {
    super(options.message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "LexiconError";
    this.code = options.code;
    this.retryable = options.retryable ?? RETRYABLE_BY_DEFAULT.has(options.code);
    this.statusCode = options.statusCode;
  }
}

export function isLexiconError(value: unknown): value is LexiconError {
  return value instanceof LexiconError;
}

export function asLexiconError(
  value: unknown,
  fallback: Omit<LexiconErrorOptions, "message"> & { message?: string } = { code: "UNKNOWN" },
): LexiconError {
  if (value instanceof LexiconError) return value;
  const message = value instanceof Error ? value.message : String(value ?? fallback.message ?? "Unknown lexicon error");
  return new LexiconError({
    code: fallback.code,
    message,
    retryable: fallback.retryable,
    statusCode: fallback.statusCode,
    cause: value,
  });
}

export function errorCodeFromStatus(status: number): LexiconErrorCode {
  if (status === 429) return "RATE_LIMITED";
  if (status === 408) return "TIMEOUT";
  if (status >= 500) return "UPSTREAM_UNAVAILABLE";
  if (status >= 400) return "BAD_INPUT";
  return "UNKNOWN";
}

export function describeUnknownError(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  try {
    return JSON.stringify(err);
  } catch {
    return String(err);
  }
}
