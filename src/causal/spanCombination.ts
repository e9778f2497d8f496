import type { NBestPrediction } from './types'

export interface SpanCombination {
  startCause: number
  endCause: number
  startEffect: number
  endEffect: number
}

export function spanCombinationOf(p: NBestPrediction): SpanCombination {
  return {
    startCause: p.startIndexCause,
    endCause: p.endIndexCause,
    startEffect: p.startIndexEffect,
    endEffect: p.endIndexEffect
  }
}

const within = (pos: number, start: number, end: number) => start <= pos && pos <= end

/**
 * Overlap-based sameness used for novelty flags only, never for deduplication.
 * An endpoint of `other`'s cause may land in either of `self`'s spans, and likewise for the effect,
 * so a pair with cause and effect swapped counts as the same answer.
 */
export function sameSpanCombination(self: SpanCombination, other: SpanCombination): boolean {
  const overlappingCause =
    within(other.startCause, self.startCause, self.endCause) ||
    within(other.endCause, self.startCause, self.endCause) ||
    within(other.startCause, self.startEffect, self.endEffect) ||
    within(other.endCause, self.startEffect, self.endEffect)
  const overlappingEffect =
    within(other.startEffect, self.startEffect, self.endEffect) ||
    within(other.endEffect, self.startEffect, self.endEffect) ||
    within(other.startEffect, self.startCause, self.endCause) ||
    within(other.endEffect, self.startCause, self.endCause)
  return overlappingCause && overlappingEffect
}

/** `is_new` per entry: true unless it overlaps an earlier entry of the same list. */
export function flagNovelty(combinations: readonly SpanCombination[]): boolean[] {
  return combinations.map((span, i) => combinations.slice(0, i).every((other) => !sameSpanCombination(span, other)))
}
