#!/usr/bin/env node
import { loadConfig } from "./config/index.js";
import { describeUnknownError } from "./errors/index.js";
import { readSeedFile } from "./lexicon/seed.js";
import { SqliteLexiconStore } from "./lexicon/store.js";
import { createResolutionEngine } from "./index.js";

const USAGE = `Usage:
  lexeme resolve <word...> [--timeout=<ms>]
  lexeme seed <file>`;

interface CliOptions {
  command: string;
  positional: string[];
  timeoutMs?: number;
}

function parseArgs(args: string[]): CliOptions {
  const [command = "", ...rest] = args;
  const options: CliOptions = { command, positional: [] };
  for (let index = 0; index < rest.length; index += 1) {
    const arg = rest[index] ?? "";
    if (arg === "--timeout") {
      options.timeoutMs = Number(rest[index + 1]);
      index += 1;
      continue;
    }
    if (arg.startsWith("--timeout=")) {
      options.timeoutMs = Number(arg.slice("--timeout=".length));
      continue;
    }
    options.positional.push(arg);
  }
  return options;
}

async function runResolve(options: CliOptions): Promise<number> {
  const word = options.positional.join(" ");
  if (!word.trim()) {
    console.error(USAGE);
    return 2;
  }
  if (options.timeoutMs !== undefined && (!Number.isFinite(options.timeoutMs) || options.timeoutMs <= 0)) {
    console.error("[lexeme] --timeout must be a positive number of milliseconds");
    return 2;
  }
  const config = loadConfig(process.env.LEXEME_CONFIG_PATH || undefined);
  const engine = createResolutionEngine({ ...config, logging: { ...config.logging, console: false } });
  try {
    const result = await engine.resolve(word, { timeoutMs: options.timeoutMs });
    console.log(JSON.stringify(result, null, 2));
    return result.kind === "transient_failure" ? 1 : 0;
  } finally {
    engine.close();
  }
}

async function runSeed(options: CliOptions): Promise<number> {
  const [file] = options.positional;
  if (!file) {
    console.error(USAGE);
    return 2;
  }
  const config = loadConfig(process.env.LEXEME_CONFIG_PATH || undefined);
  const store = new SqliteLexiconStore(config.store.dbPath);
  try {
    const imported = await store.importSeed(readSeedFile(file));
    console.log(`[lexeme] Imported into ${store.getPath()}:`, imported);
    return 0;
  } finally {
    store.close();
  }
}

async function main(): Promise<number> {
  const options = parseArgs(process.argv.slice(2));
  switch (options.command) {
    case "resolve":
      return runResolve(options);
    case "seed":
      return runSeed(options);
    default:
      console.error(USAGE);
      return 2;
  }
}

void main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error("[lexeme]", describeUnknownError(error));
    process.exitCode = 1;
  });
