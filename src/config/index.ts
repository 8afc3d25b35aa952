import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { Config, EnrichmentProvider } from "./types.js";

const DEFAULT_CONFIG_PATH = path.join(os.homedir(), ".lexeme", "config.json");

const DEFAULT_MODELS: Record<EnrichmentProvider, string> = {
  openai: "gpt-4o-mini",
  claude: "claude-3-5-haiku-latest",
};

const DEFAULT_CONFIG: Config = {
  store: {
    dbPath: path.join(process.cwd(), ".lexeme", "lexicon.db"),
  },
  resolver: {
    autoAcceptThreshold: 0.85,
    displayThreshold: 0.3,
    fuzzyMinLength: 4,
    compoundMinLength: 6,
    lengthWindow: 2,
    candidateLimit: 50,
    maxSuggestions: 5,
  },
  enrichment: {
    enabled: true,
    provider: "openai",
    model: "",
    apiKey: "",
    baseURL: "",
    timeoutMs: 20_000,
    maxTokens: 1_024,
    cacheTtlMs: 10 * 60_000,
    cacheMaxEntries: 500,
  },
  logging: {
    console: true,
    structuredLogPath: "",
  },
};

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function readJsonFile(filePath: string): PlainObject | null {
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
    return isPlainObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

function toNumber(value: unknown, fallback: number): number {
  if (value === undefined || value === null || value === "") return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toIntInRange(value: unknown, fallback: number, minValue: number, maxValue: number): number {
  const parsed = Math.floor(toNumber(value, fallback));
  return Math.max(minValue, Math.min(maxValue, parsed));
}

function toFloatInRange(value: unknown, fallback: number, minValue: number, maxValue: number): number {
  const parsed = toNumber(value, fallback);
  return Math.max(minValue, Math.min(maxValue, parsed));
}

function toBoolean(value: unknown, fallback: boolean): boolean {
  if (typeof value === "boolean") return value;
  if (typeof value !== "string" || !value) return fallback;
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes" || normalized === "on") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no" || normalized === "off") {
    return false;
  }
  return fallback;
}

function toText(value: unknown, fallback: string): string {
  return typeof value === "string" ? value : fallback;
}

function pickEnum<T extends string>(value: unknown, allowed: readonly T[], fallback: T): T {
  if (typeof value !== "string") return fallback;
  const normalized = value.trim();
  return allowed.find((item) => item === normalized) ?? fallback;
}

function section(source: PlainObject, key: string): PlainObject {
  const value = source[key];
  return isPlainObject(value) ? value : {};
}

// File values arrive untyped; every field is coerced against its default.
function coerceConfig(raw: PlainObject): Config {
  const store = section(raw, "store");
  const resolver = section(raw, "resolver");
  const enrichment = section(raw, "enrichment");
  const logging = section(raw, "logging");
  const base = DEFAULT_CONFIG;
  return {
    store: {
      dbPath: toText(store.dbPath, base.store.dbPath),
    },
    resolver: {
      autoAcceptThreshold: toFloatInRange(resolver.autoAcceptThreshold, base.resolver.autoAcceptThreshold, 0, 1),
      displayThreshold: toFloatInRange(resolver.displayThreshold, base.resolver.displayThreshold, 0, 1),
      fuzzyMinLength: toIntInRange(resolver.fuzzyMinLength, base.resolver.fuzzyMinLength, 1, 64),
      compoundMinLength: toIntInRange(resolver.compoundMinLength, base.resolver.compoundMinLength, 1, 64),
      lengthWindow: toIntInRange(resolver.lengthWindow, base.resolver.lengthWindow, 0, 16),
      candidateLimit: toIntInRange(resolver.candidateLimit, base.resolver.candidateLimit, 1, 1_000),
      maxSuggestions: toIntInRange(resolver.maxSuggestions, base.resolver.maxSuggestions, 0, 50),
    },
    enrichment: {
      enabled: toBoolean(enrichment.enabled, base.enrichment.enabled),
      provider: pickEnum(enrichment.provider, ["openai", "claude"], base.enrichment.provider),
      model: toText(enrichment.model, base.enrichment.model),
      apiKey: toText(enrichment.apiKey, base.enrichment.apiKey),
      baseURL: toText(enrichment.baseURL, base.enrichment.baseURL),
      timeoutMs: toIntInRange(enrichment.timeoutMs, base.enrichment.timeoutMs, 100, 300_000),
      maxTokens: toIntInRange(enrichment.maxTokens, base.enrichment.maxTokens, 64, 32_000),
      cacheTtlMs: toIntInRange(enrichment.cacheTtlMs, base.enrichment.cacheTtlMs, 1, 24 * 60 * 60_000),
      cacheMaxEntries: toIntInRange(enrichment.cacheMaxEntries, base.enrichment.cacheMaxEntries, 1, 100_000),
    },
    logging: {
      console: toBoolean(logging.console, base.logging.console),
      structuredLogPath: toText(logging.structuredLogPath, base.logging.structuredLogPath),
    },
  };
}

function resolveEnvOverrides(base: Config, env: NodeJS.ProcessEnv): Config {
  const provider = pickEnum(env.LEXEME_ENRICHMENT_PROVIDER, ["openai", "claude"], base.enrichment.provider);
  const providerKey = provider === "claude" ? env.ANTHROPIC_API_KEY : env.OPENAI_API_KEY;
  return {
    store: {
      dbPath: env.LEXEME_DB_PATH ?? base.store.dbPath,
    },
    resolver: {
      autoAcceptThreshold: toFloatInRange(env.LEXEME_AUTO_ACCEPT_THRESHOLD, base.resolver.autoAcceptThreshold, 0, 1),
      displayThreshold: toFloatInRange(env.LEXEME_DISPLAY_THRESHOLD, base.resolver.displayThreshold, 0, 1),
      fuzzyMinLength: toIntInRange(env.LEXEME_FUZZY_MIN_LENGTH, base.resolver.fuzzyMinLength, 1, 64),
      compoundMinLength: toIntInRange(env.LEXEME_COMPOUND_MIN_LENGTH, base.resolver.compoundMinLength, 1, 64),
      lengthWindow: toIntInRange(env.LEXEME_LENGTH_WINDOW, base.resolver.lengthWindow, 0, 16),
      candidateLimit: toIntInRange(env.LEXEME_CANDIDATE_LIMIT, base.resolver.candidateLimit, 1, 1_000),
      maxSuggestions: toIntInRange(env.LEXEME_MAX_SUGGESTIONS, base.resolver.maxSuggestions, 0, 50),
    },
    enrichment: {
      enabled: toBoolean(env.LEXEME_ENRICHMENT_ENABLED, base.enrichment.enabled),
      provider,
      model: env.LEXEME_ENRICHMENT_MODEL ?? base.enrichment.model,
      apiKey: env.LEXEME_ENRICHMENT_API_KEY ?? providerKey ?? base.enrichment.apiKey,
      baseURL: env.LEXEME_ENRICHMENT_BASE_URL ?? base.enrichment.baseURL,
      timeoutMs: toIntInRange(env.LEXEME_ENRICHMENT_TIMEOUT_MS, base.enrichment.timeoutMs, 100, 300_000),
      maxTokens: toIntInRange(env.LEXEME_ENRICHMENT_MAX_TOKENS, base.enrichment.maxTokens, 64, 32_000),
      cacheTtlMs: toIntInRange(env.LEXEME_CACHE_TTL_MS, base.enrichment.cacheTtlMs, 1, 24 * 60 * 60_000),
      cacheMaxEntries: toIntInRange(env.LEXEME_CACHE_MAX_ENTRIES, base.enrichment.cacheMaxEntries, 1, 100_000),
    },
    logging: {
      console: toBoolean(env.LEXEME_LOG_CONSOLE, base.logging.console),
      structuredLogPath: env.LEXEME_STRUCTURED_LOG_PATH ?? base.logging.structuredLogPath,
    },
  };
}

function normalizePaths(config: Config): Config {
  const dbPath = config.store.dbPath === ":memory:" ? ":memory:" : path.resolve(config.store.dbPath);
  const structuredLogPath = config.logging.structuredLogPath.trim()
    ? path.resolve(config.logging.structuredLogPath)
    : "";
  return {
    ...config,
    store: { ...config.store, dbPath },
    enrichment: {
      ...config.enrichment,
      model: config.enrichment.model.trim() || DEFAULT_MODELS[config.enrichment.provider],
    },
    logging: { ...config.logging, structuredLogPath },
  };
}

export function loadConfig(configPath = DEFAULT_CONFIG_PATH, env: NodeJS.ProcessEnv = process.env): Config {
  const fileConfig = readJsonFile(configPath) ?? {};
  const mergedFromFile = coerceConfig(fileConfig);
  const merged = resolveEnvOverrides(mergedFromFile, env);
  return normalizePaths(merged);
}

export { DEFAULT_CONFIG, DEFAULT_CONFIG_PATH, DEFAULT_MODELS };
export type * from "./types.js";
