export interface StoreConfig {
  dbPath: string;
}

export interface ResolverConfig {
  autoAcceptThreshold: number;
  displayThreshold: number;
  fuzzyMinLength: number;
  /** Shortest query the compound tier matches against lemma starts and ends. */
  compoundMinLength: number;
  lengthWindow: number;
  candidateLimit: number;
  maxSuggestions: number;
}

export type EnrichmentProvider = "openai" | "claude";

export interface EnrichmentConfig {
  enabled: boolean;
  provider: EnrichmentProvider;
  model: string;
  apiKey: string;
  baseURL: string;
  timeoutMs: number;
  maxTokens: number;
  cacheTtlMs: number;
  cacheMaxEntries: number;
}

export interface LoggingConfig {
  console: boolean;
  structuredLogPath: string;
}

export interface Config {
  store: StoreConfig;
  resolver: ResolverConfig;
  enrichment: EnrichmentConfig;
  logging: LoggingConfig;
}
