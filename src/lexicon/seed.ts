import fs from "node:fs";
import { z } from "zod";

import { LexiconError } from "../errors/index.js";
import type { SeedLemmaInput } from "./types.js";

const nonEmpty = z.string().trim().min(1);

const formSchema = z.object({
  form: nonEmpty,
  feature_key: nonEmpty,
  feature_value: nonEmpty,
});

const exampleSchema = z.object({
  text: nonEmpty,
  renderings: z.record(z.string(), z.string()).default({}),
});

const senseSchema = z.object({
  pos: nonEmpty.optional(),
  gender: nonEmpty.nullable().optional(),
  gloss: z.record(z.string(), z.string()).default({}),
  translations: z.record(z.string(), z.array(nonEmpty)).default({}),
  examples: z.array(exampleSchema).default([]),
  forms: z.array(formSchema).default([]),
});

const seedEntrySchema = z.object({
  lemma: nonEmpty,
  pos: nonEmpty,
  cefr: nonEmpty.nullable().optional(),
  frequency: z.number().int().nonnegative().default(0),
  notes: z.string().nullable().optional(),
  senses: z.array(senseSchema).min(1),
});

const seedFileSchema = z.array(seedEntrySchema);

export type SeedFileEntry = z.input<typeof seedEntrySchema>;

export function parseSeed(raw: unknown): SeedLemmaInput[] {
  const parsed = seedFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? issue.path.join(".") : "";
    throw new LexiconError({
      code: "BAD_INPUT",
      message: `Invalid seed data${where ? ` at ${where}` : ""}: ${issue?.message ?? "unknown issue"}`,
      cause: parsed.error,
    });
  }
  return parsed.data.map((entry) => ({
    lemma: entry.lemma.normalize("NFC"),
    pos: entry.pos,
    cefr: entry.cefr ?? null,
    frequency: entry.frequency,
    notes: entry.notes ?? null,
    senses: entry.senses.map((sense) => ({
      pos: sense.pos ?? null,
      gender: sense.gender ?? null,
      gloss: sense.gloss,
      translations: sense.translations,
      examples: sense.examples.map((example) => ({ text: example.text, renderings: example.renderings })),
      forms: sense.forms.map((form) => ({
        form: form.form.normalize("NFC"),
        featureKey: form.feature_key,
        featureValue: form.feature_value,
      })),
    })),
  }));
}

export function readSeedFile(filePath: string): SeedLemmaInput[] {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (err) {
    throw new LexiconError({ code: "BAD_INPUT", message: `Unable to read seed file ${filePath}`, cause: err });
  }
  return parseSeed(raw);
}
