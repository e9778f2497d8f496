import { softmax, totalScore } from './scores'
import { flagNovelty, spanCombinationOf } from './spanCombination'
import type { Example, ExtractionConfig, NBestEntry, NBestPrediction, PredictionReport, SelectedAnswer } from './types'

export class AnswerSelectionError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'AnswerSelectionError'
  }
}

/**
 * Ordinal suffix of ids shaped `<document>.<sentence>.<ordinal>`, undefined for any other shape.
 */
export function ordinalFromId(id: string): number | undefined {
  const parts = id.split('.')
  if (parts.length !== 3) return undefined
  const suffix = parts[2].trim()
  if (!/^\d+$/.test(suffix)) throw new AnswerSelectionError(`Invalid ordinal suffix "${parts[2]}" in example id ${id}`)
  return Number(suffix)
}

// Ordinals are 1-based, 0 and missing both select the top answer
export function answerIndex(id: string, cfg: Pick<ExtractionConfig, 'topNSentences'>): number {
  if (!cfg.topNSentences) return 0
  const ordinal = ordinalFromId(id) ?? 0
  return ordinal > 0 ? ordinal - 1 : 0
}

export function toNBestEntries(example: Example, nbest: readonly NBestPrediction[]): NBestEntry[] {
  const probabilities = softmax(nbest.map(totalScore))
  const isNew = flagNovelty(nbest.map(spanCombinationOf))
  return nbest.map((p, i) => ({
    text: example.text,
    probability: probabilities[i],
    cause_text: p.textCause,
    cause_start_index: p.startIndexCause,
    cause_end_index: p.endIndexCause,
    cause_start_score: p.startScoreCause,
    cause_end_score: p.endScoreCause,
    effect_text: p.textEffect,
    effect_start_score: p.startScoreEffect,
    effect_end_score: p.endScoreEffect,
    effect_start_index: p.startIndexEffect,
    effect_end_index: p.endIndexEffect,
    is_new: isNew[i]
  }))
}

export function selectAnswer(exampleId: string, entries: readonly NBestEntry[], cfg: Pick<ExtractionConfig, 'topNSentences'>): SelectedAnswer {
  const index = answerIndex(exampleId, cfg)
  if (index >= entries.length) {
    throw new AnswerSelectionError(
      `Example ${exampleId} asks for answer #${index + 1} but only ${entries.length} candidate(s) exist`
    )
  }
  const entry = entries[index]
  return { text: entry.text, cause_text: entry.cause_text, effect_text: entry.effect_text }
}

export function buildReport(example: Example, nbest: readonly NBestPrediction[], cfg: ExtractionConfig): PredictionReport {
  const entries = toNBestEntries(example, nbest)
  return { exampleId: example.id, answer: selectAnswer(example.id, entries, cfg), nbest: entries }
}
