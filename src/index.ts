import type { Config } from "./config/index.js";
import { EnrichmentGateway } from "./enrichment/gateway.js";
import type { WordAnalyzer } from "./enrichment/types.js";
import { ResolutionEngine } from "./engine/index.js";
import { SqliteLexiconStore } from "./lexicon/store.js";
import type { LexiconStore } from "./lexicon/types.js";
import { QueryNormalizer } from "./nlp/normalize/index.js";
import { type LanguageTables, loadLanguageTables } from "./nlp/tables.js";
import { LexiconObserver } from "./observability/index.js";
import { createWordAnalyzer } from "./providers/analyzers.js";

export interface ResolutionEngineOverrides {
  /** Caller-owned store; the engine does not close it. */
  store?: LexiconStore;
  /** `null` disables enrichment regardless of config. */
  analyzer?: WordAnalyzer | null;
  tables?: LanguageTables;
  observer?: LexiconObserver;
  now?: () => number;
}

export function createResolutionEngine(config: Config, overrides: ResolutionEngineOverrides = {}): ResolutionEngine {
  const now = overrides.now ?? Date.now;
  const tables = overrides.tables ?? loadLanguageTables();
  const observer =
    overrides.observer ??
    new LexiconObserver({ console: config.logging.console, structuredLogPath: config.logging.structuredLogPath, now });

  let onClose: (() => void) | undefined;
  let store: LexiconStore;
  if (overrides.store) {
    store = overrides.store;
  } else {
    const owned = new SqliteLexiconStore(config.store.dbPath, { now });
    store = owned;
    onClose = () => owned.close();
  }

  let analyzer: WordAnalyzer | null = null;
  if (config.enrichment.enabled) {
    analyzer = overrides.analyzer !== undefined ? overrides.analyzer : createWordAnalyzer(config.enrichment);
  }
  const gateway = analyzer
    ? new EnrichmentGateway({
        store,
        analyzer,
        observer,
        options: {
          timeoutMs: config.enrichment.timeoutMs,
          cacheTtlMs: config.enrichment.cacheTtlMs,
          cacheMaxEntries: config.enrichment.cacheMaxEntries,
          maxSuggestions: config.resolver.maxSuggestions,
          now,
        },
      })
    : null;

  return new ResolutionEngine({
    normalizer: new QueryNormalizer(tables),
    store,
    thresholds: config.resolver,
    gateway,
    observer,
    now,
    onClose,
  });
}

export { loadConfig, DEFAULT_CONFIG, DEFAULT_CONFIG_PATH } from "./config/index.js";
export type * from "./config/types.js";
export { ResolutionEngine } from "./engine/index.js";
export type { NotFoundReason, ResolutionResult, ResolveOptions } from "./engine/index.js";
export { EnrichmentGateway } from "./enrichment/gateway.js";
export { decodeAnalysis } from "./enrichment/decode.js";
export type * from "./enrichment/types.js";
export { LexiconError, isLexiconError, asLexiconError } from "./errors/index.js";
export type { LexiconErrorCode } from "./errors/index.js";
export { SqliteLexiconStore } from "./lexicon/store.js";
export { parseSeed, readSeedFile } from "./lexicon/seed.js";
export type * from "./lexicon/types.js";
export { QueryNormalizer, normalizeText, caseFold } from "./nlp/normalize/index.js";
export type { DetectedLanguage, NormalizedQuery } from "./nlp/normalize/index.js";
export { variants, MAX_VARIANTS } from "./nlp/variants.js";
export { similarity, confidenceLabel } from "./nlp/similarity.js";
export { loadLanguageTables, parseLanguageTables } from "./nlp/tables.js";
export type { LanguageTables } from "./nlp/tables.js";
export { LexiconObserver } from "./observability/index.js";
export { TieredResolver } from "./resolver/tiered.js";
export { aggregate, canAutoAccept } from "./resolver/aggregate.js";
export type * from "./resolver/types.js";
export { TIER_RANK } from "./resolver/types.js";
export { ChatJsonAnalyzer, createWordAnalyzer } from "./providers/analyzers.js";
