import fs from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";

import { LexiconError } from "../errors/index.js";

const DEFAULT_TABLES_PATH = fileURLToPath(new URL("../../data/language-tables.json", import.meta.url));

const languageTablesSchema = z.object({
  targetLanguage: z.string().min(1),
  articles: z.array(z.string().min(1)).min(1),
  diacritics: z.string().min(1),
  functionWords: z.record(z.string(), z.array(z.string().min(1))),
});

export type LanguageTables = Readonly<z.infer<typeof languageTablesSchema>>;

export function parseLanguageTables(raw: unknown): LanguageTables {
  const parsed = languageTablesSchema.safeParse(raw);
  if (!parsed.success) {
    throw new LexiconError({
      code: "BAD_INPUT",
      message: `Invalid language tables: ${parsed.error.issues.map((issue) => issue.path.join(".") || issue.message).join(", ")}`,
      cause: parsed.error,
    });
  }
  return Object.freeze(parsed.data);
}

export function loadLanguageTables(filePath = DEFAULT_TABLES_PATH): LanguageTables {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (err) {
    throw new LexiconError({
      code: "BAD_INPUT",
      message: `Unable to read language tables at ${filePath}`,
      cause: err,
    });
  }
  return parseLanguageTables(raw);
}

export { DEFAULT_TABLES_PATH };
