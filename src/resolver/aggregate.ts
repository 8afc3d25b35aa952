import { identityKey } from "../lexicon/types.js";
import { confidenceLabel } from "../nlp/similarity.js";
import { TIER_RANK, type RankedEntry, type RankedResultSet, type ResolutionCandidate } from "./types.js";

interface Group {
  order: number;
  best: ResolutionCandidate;
  tiers: ResolutionCandidate["matchType"][];
  features: ResolutionCandidate["features"];
}

function outranks(a: ResolutionCandidate, b: ResolutionCandidate): boolean {
  const tierDelta = TIER_RANK[a.matchType] - TIER_RANK[b.matchType];
  if (tierDelta !== 0) return tierDelta < 0;
  return a.similarity > b.similarity;
}

/**
 * Groups candidates by lemma/sense identity and ranks the groups. Distinct
 * senses of one spelling stay separate entries.
 */
export function aggregate(candidates: readonly ResolutionCandidate[], query: string): RankedResultSet {
  const groups = new Map<string, Group>();
  candidates.forEach((candidate, index) => {
    const key = identityKey(candidate.ref);
    const group = groups.get(key);
    if (!group) {
      groups.set(key, {
        order: index,
        best: candidate,
        tiers: [candidate.matchType],
        features: [...candidate.features],
      });
      return;
    }
    if (!group.tiers.includes(candidate.matchType)) group.tiers.push(candidate.matchType);
    for (const feature of candidate.features) {
      if (!group.features.some((known) => known.key === feature.key && known.value === feature.value)) {
        group.features.push(feature);
      }
    }
    if (outranks(candidate, group.best)) group.best = candidate;
  });

  const entries: RankedEntry[] = [...groups.values()]
    .sort(
      (a, b) =>
        TIER_RANK[a.best.matchType] - TIER_RANK[b.best.matchType] ||
        b.best.similarity - a.best.similarity ||
        b.best.ref.lemma.frequency - a.best.ref.lemma.frequency ||
        a.order - b.order,
    )
    .map((group, index) => ({
      rank: index + 1,
      ref: group.best.ref,
      matchType: group.best.matchType,
      matchedTiers: group.tiers,
      matchedText: group.best.matchedText,
      similarity: group.best.similarity,
      confidence: confidenceLabel(group.best.similarity),
      features: group.features,
      explanation: group.best.explanation,
    }));

  const result: RankedResultSet = { query, entries, autoSelectable: false };
  result.autoSelectable = canAutoAccept(result);
  return result;
}

export function canAutoAccept(result: Pick<RankedResultSet, "entries">): boolean {
  const [only] = result.entries;
  return result.entries.length === 1 && only?.matchType === "direct";
}
