// Data model for cause/effect span decoding

export interface Example {
  id: string
  text: string
  // reference spans, only present when evaluating
  cause?: string
  effect?: string
  // character offset of each whitespace word in `text`
  wordOffsets: number[]
}

/** One tokenized window over an example's text. */
export interface DocumentChunk {
  uniqueId: string
  exampleIndex: number
  tokens: string[]
  // chunk position -> original word index, only content tokens are mapped
  tokenToOrigMap: ReadonlyMap<number, number>
  // true when this chunk is the authoritative window for the token
  tokenIsMaxContext: ReadonlyMap<number, boolean>
  // positions of the last token of each sentence but the final one (0-2 entries)
  sentenceOffsets: number[]
}

export interface ScoreResult {
  uniqueId: string
  causeStart: number[]
  causeEnd: number[]
  effectStart: number[]
  effectEnd: number[]
}

export interface Span {
  start: number
  end: number
}

export interface SpanPair {
  cause: Span
  effect: Span
}

export interface PreliminaryPrediction {
  readonly featureIndex: number
  readonly startIndexCause: number
  readonly endIndexCause: number
  readonly startScoreCause: number
  readonly endScoreCause: number
  readonly startIndexEffect: number
  readonly endIndexEffect: number
  readonly startScoreEffect: number
  readonly endScoreEffect: number
}

export interface NBestPrediction {
  readonly textCause: string
  readonly startIndexCause: number
  readonly endIndexCause: number
  readonly startScoreCause: number
  readonly endScoreCause: number
  readonly textEffect: string
  readonly startIndexEffect: number
  readonly endIndexEffect: number
  readonly startScoreEffect: number
  readonly endScoreEffect: number
}

// Field names are part of the nbest_predictions.json format
export interface NBestEntry {
  text: string
  probability: number
  cause_text: string
  cause_start_index: number
  cause_end_index: number
  cause_start_score: number
  cause_end_score: number
  effect_text: string
  effect_start_score: number
  effect_end_score: number
  effect_start_index: number
  effect_end_index: number
  is_new: boolean
}

export interface SelectedAnswer {
  text: string
  cause_text: string
  effect_text: string
}

export interface PredictionReport {
  exampleId: string
  answer: SelectedAnswer
  nbest: NBestEntry[]
}

export interface PredictionRun {
  predictions: Map<string, SelectedAnswer>
  nbest: Map<string, NBestEntry[]>
}

export interface ExtractionConfig {
  nBestSize: number
  maxAnswerLength: number
  sentenceBoundaryHeuristic: boolean
  fullSentenceHeuristic: boolean
  sharedSentenceHeuristic: boolean
  // pick the answer by the ordinal suffix of `<doc>.<sentence>.<n>` ids
  topNSentences: boolean
  // position of the first content token, start of the first sentence
  contentStartOffset: number
}

export type CausalLabel = '-' | 'C' | 'E'

export interface CausalRecord {
  id: string
  text: string
  cause: string
  effect: string
}

export interface MetricScores {
  precision: number
  recall: number
  f1: number
  exactMatch: number
}

export type ReferenceMetric = (
  truth: CausalRecord[],
  predicted: CausalRecord[],
  labels: readonly CausalLabel[]
) => MetricScores

export interface ComparedPrediction {
  text: string
  cause_true: string
  effect_true: string
  cause_pred: string
  effect_pred: string
}

export interface EvaluationResult {
  scores: MetricScores
  correct: ComparedPrediction[]
  wrong: ComparedPrediction[]
}

export interface PredictionInput {
  examples: Example[]
  chunks: DocumentChunk[]
  scores: ScoreResult[]
}

export interface ExportBundle {
  predictionsJsonPath: string
  predictionsCsvPath: string
  nbestJsonPath: string
}
