import { totalScore } from './scores'
import type { PreliminaryPrediction } from './types'

// Value identity of a candidate. Scores follow from the positions so they are left out.
export function predictionKey(p: PreliminaryPrediction): string {
  return `${p.featureIndex}|${p.startIndexCause}|${p.endIndexCause}|${p.startIndexEffect}|${p.endIndexEffect}`
}

/** Drops value-equal candidates and orders the rest by total score, best first. Ties keep input order. */
export function dedupeAndRank(raw: Iterable<PreliminaryPrediction>): PreliminaryPrediction[] {
  const unique = new Map<string, PreliminaryPrediction>()
  for (const p of raw) {
    const key = predictionKey(p)
    if (!unique.has(key)) unique.set(key, p)
  }
  return Array.from(unique.values()).sort((a, b) => totalScore(b) - totalScore(a))
}
