import path from 'path'
import { writeJson, atomicWrite } from '../interfaces/atomicWrite'
import { info } from '../logger'
import type { EvaluationResult, ExportBundle, PredictionRun, SelectedAnswer } from './types'

export const PREDICTIONS_JSON = 'predictions.json'
export const PREDICTIONS_CSV = 'predictions.csv'
export const NBEST_JSON = 'nbest_predictions.json'
export const CORRECT_JSON = 'predictions_correct.json'
export const WRONG_JSON = 'predictions_wrong.json'

function csvCell(s: string) {
  return /[;"\r\n]/.test(s) ? '"' + s.replace(/"/g, '""') + '"' : s
}

/**
 * JSON object text for a map, keeping insertion order.
 * A plain object would move integer-like ids such as "12" ahead of the others.
 */
export function orderedJson(map: ReadonlyMap<string, unknown>): string {
  if (map.size === 0) return '{}'
  const body = Array.from(map, ([k, v]) => `    ${JSON.stringify(k)}: ${JSON.stringify(v, null, 4).replace(/\n/g, '\n    ')}`)
  return `{\n${body.join(',\n')}\n}`
}

export function predictionsCsv(predictions: ReadonlyMap<string, SelectedAnswer>): string {
  const rows = ['Index;Text;Cause;Effect']
  for (const [id, p] of predictions) {
    rows.push([id, p.text, p.cause_text, p.effect_text].map(csvCell).join(';'))
  }
  return rows.join('\r\n') + '\r\n'
}

export async function exportPredictions(dir: string, run: PredictionRun): Promise<ExportBundle> {
  const predictionsJsonPath = path.join(dir, PREDICTIONS_JSON)
  const predictionsCsvPath = path.join(dir, PREDICTIONS_CSV)
  const nbestJsonPath = path.join(dir, NBEST_JSON)

  info('Writing predictions to:', predictionsJsonPath)
  await atomicWrite(predictionsJsonPath, orderedJson(run.predictions) + '\n')
  await atomicWrite(predictionsCsvPath, predictionsCsv(run.predictions))
  info('Writing nbest to:', nbestJsonPath)
  await atomicWrite(nbestJsonPath, orderedJson(run.nbest) + '\n')

  return { predictionsJsonPath, predictionsCsvPath, nbestJsonPath }
}

export async function exportEvaluation(dir: string, result: EvaluationResult) {
  const correctPath = path.join(dir, CORRECT_JSON)
  const wrongPath = path.join(dir, WRONG_JSON)
  await writeJson(correctPath, result.correct)
  await writeJson(wrongPath, result.wrong)
  return { correctPath, wrongPath }
}
