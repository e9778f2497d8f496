import { debug, info, warn } from '../logger'
import { generateCandidates } from './candidates'
import { mergeConfig } from './config'
import { computeMetrics } from './evaluate'
import { exportEvaluation, exportPredictions } from './export'
import { materializeNBest } from './materialize'
import { dedupeAndRank } from './ranking'
import { buildReport } from './select'
import type {
  DocumentChunk,
  EvaluationResult,
  Example,
  ExportBundle,
  ExtractionConfig,
  PredictionInput,
  PredictionReport,
  PredictionRun,
  ReferenceMetric,
  ScoreResult
} from './types'

export interface PipelineOptions {
  config?: Partial<ExtractionConfig>
  exportDir?: string
}

export function predictExample(
  example: Example,
  chunks: readonly DocumentChunk[],
  resultsById: ReadonlyMap<string, ScoreResult>,
  cfg: ExtractionConfig
): PredictionReport {
  const raw = chunks.flatMap((chunk, featureIndex) => {
    const result = resultsById.get(chunk.uniqueId)
    if (!result) throw new Error(`No scores for chunk ${chunk.uniqueId} of example ${example.id}`)
    return generateCandidates(chunk, featureIndex, result, cfg)
  })
  const ranked = dedupeAndRank(raw)
  const nbest = materializeNBest(ranked, chunks, example, cfg.nBestSize)
  debug('example', example.id, 'candidates', raw.length, 'unique', ranked.length, 'nbest', nbest.length)
  if (ranked.length === 0) debug('no valid candidates for', example.id, '- using empty answer')
  return buildReport(example, nbest, cfg)
}

function chunksByExample(examples: readonly Example[], chunks: readonly DocumentChunk[]) {
  const grouped: DocumentChunk[][] = examples.map(() => [])
  for (const chunk of chunks) {
    const group = grouped[chunk.exampleIndex]
    if (!group) throw new Error(`Chunk ${chunk.uniqueId} references unknown example #${chunk.exampleIndex}`)
    group.push(chunk)
  }
  return grouped
}

export async function runPrediction(
  input: PredictionInput,
  opts: PipelineOptions = {}
): Promise<PredictionRun & { reports: PredictionReport[]; exports?: ExportBundle }> {
  const cfg = mergeConfig(opts.config)
  if (cfg.fullSentenceHeuristic && cfg.sharedSentenceHeuristic) {
    warn('full-sentence and shared-sentence heuristics are both enabled; full-sentence is applied first')
  }
  info('Predicting', input.examples.length, 'examples from', input.chunks.length, 'chunks')

  const resultsById = new Map(input.scores.map((r) => [r.uniqueId, r]))
  const grouped = chunksByExample(input.examples, input.chunks)
  const reports = input.examples.map((example, i) => predictExample(example, grouped[i], resultsById, cfg))

  const predictions = new Map(reports.map((r) => [r.exampleId, r.answer]))
  const nbest = new Map(reports.map((r) => [r.exampleId, r.nbest]))

  let exports: ExportBundle | undefined
  if (opts.exportDir) {
    exports = await exportPredictions(opts.exportDir, { predictions, nbest })
  }
  return { reports, predictions, nbest, exports }
}

export async function runEvaluation(
  input: PredictionInput,
  opts: PipelineOptions & { metric?: ReferenceMetric } = {}
): Promise<EvaluationResult> {
  const run = await runPrediction(input, opts)
  const result = computeMetrics(input.examples, run.predictions, opts.metric)
  if (opts.exportDir) {
    await exportEvaluation(opts.exportDir, result)
  }
  return result
}
