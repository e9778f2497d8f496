export { cartesian, generateCandidates, rejectReason, splitAtBoundary } from './candidates'
export type { RejectReason } from './candidates'
export { configFromEnv, defaultConfig, mergeConfig } from './config'
export { computeMetrics, EvaluationError, partitionPredictions } from './evaluate'
export { exportEvaluation, exportPredictions, orderedJson, predictionsCsv } from './export'
export { BundleSchema, loadBundle, parseBundle } from './input'
export { emptyPrediction, materializeNBest, sliceWords } from './materialize'
export { CAUSAL_LABELS, encodeCausalTokens, tokenLabelMetric } from './metric'
export { predictExample, runEvaluation, runPrediction } from './pipeline'
export type { PipelineOptions } from './pipeline'
export { dedupeAndRank, predictionKey } from './ranking'
export { bestIndexes, softmax, totalScore } from './scores'
export { AnswerSelectionError, answerIndex, buildReport, ordinalFromId, selectAnswer } from './select'
export { extendSpans, sentenceAt, sentenceExtent, sentenceStarts } from './sentences'
export { flagNovelty, sameSpanCombination, spanCombinationOf } from './spanCombination'
export type { SpanCombination } from './spanCombination'
export type * from './types'
export { splitWords, wordIndexAtChar, wordOffsetsOf } from './words'
