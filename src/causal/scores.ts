import type { PreliminaryPrediction } from './types'

type Scored = Pick<PreliminaryPrediction, 'startScoreCause' | 'endScoreCause' | 'startScoreEffect' | 'endScoreEffect'>

/**
 * Positions of the `n` highest scores, best first.
 * Equal scores keep their original order.
 */
export function bestIndexes(scores: readonly number[], n: number): number[] {
  return scores
    .map((score, index) => ({ score, index }))
    .sort((a, b) => b.score - a.score)
    .slice(0, Math.max(0, n))
    .map((x) => x.index)
}

export function softmax(scores: readonly number[]): number[] {
  if (scores.length === 0) return []
  const max = Math.max(...scores)
  const exps = scores.map((s) => Math.exp(s - max))
  const total = exps.reduce((acc, x) => acc + x, 0)
  return exps.map((x) => x / total)
}

export function totalScore(x: Scored): number {
  return x.startScoreCause + x.endScoreCause + x.startScoreEffect + x.endScoreEffect
}
