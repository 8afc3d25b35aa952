import { distance } from "fastest-levenshtein";

export type ConfidenceLabel = "very_high" | "high" | "medium" | "low" | "very_low";

/** 1 - editDistance / max(len(a), len(b)), over code units, rounded to 4 places. */
export function similarity(a: string, b: string): number {
  const longest = Math.max(a.length, b.length);
  if (longest === 0) return 1;
  const score = 1 - distance(a, b) / longest;
  return Math.round(score * 10_000) / 10_000;
}

export function confidenceLabel(score: number): ConfidenceLabel {
  if (score >= 0.9) return "very_high";
  if (score >= 0.8) return "high";
  if (score >= 0.6) return "medium";
  if (score >= 0.4) return "low";
  return "very_low";
}
