import { info } from '../logger'
import { CAUSAL_LABELS, tokenLabelMetric } from './metric'
import type {
  CausalRecord,
  ComparedPrediction,
  EvaluationResult,
  Example,
  ReferenceMetric,
  SelectedAnswer
} from './types'

export class EvaluationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'EvaluationError'
  }
}

/** Pairs each example's reference spans with its selected prediction. */
export function pairWithReference(examples: readonly Example[], predictions: ReadonlyMap<string, SelectedAnswer>) {
  const truth: CausalRecord[] = []
  const predicted: CausalRecord[] = []
  for (const example of examples) {
    const prediction = predictions.get(example.id)
    if (!prediction) throw new EvaluationError(`Missing prediction for example ${example.id}`)
    truth.push({ id: example.id, text: example.text, cause: example.cause ?? '', effect: example.effect ?? '' })
    predicted.push({ id: example.id, text: example.text, cause: prediction.cause_text, effect: prediction.effect_text })
  }
  return { truth, predicted }
}

export function partitionPredictions(truth: readonly CausalRecord[], predicted: readonly CausalRecord[]) {
  const correct: ComparedPrediction[] = []
  const wrong: ComparedPrediction[] = []
  truth.forEach((t, i) => {
    const p = predicted[i]
    const entry = { text: t.text, cause_true: t.cause, effect_true: t.effect, cause_pred: p.cause, effect_pred: p.effect }
    if (t.cause === p.cause && t.effect === p.effect) correct.push(entry)
    else wrong.push(entry)
  })
  return { correct, wrong }
}

const leftTrimmed = (r: CausalRecord): CausalRecord => ({
  id: r.id,
  text: r.text.trimStart(),
  cause: r.cause.trimStart(),
  effect: r.effect.trimStart()
})

export function computeMetrics(
  examples: readonly Example[],
  predictions: ReadonlyMap<string, SelectedAnswer>,
  metric: ReferenceMetric = tokenLabelMetric
): EvaluationResult {
  if (predictions.size !== examples.length) {
    throw new EvaluationError(`Got ${predictions.size} predictions for ${examples.length} examples`)
  }
  const paired = pairWithReference(examples, predictions)
  const { correct, wrong } = partitionPredictions(paired.truth, paired.predicted)

  const truth = paired.truth.map(leftTrimmed)
  const predicted = paired.predicted.map(leftTrimmed)
  if (truth.length !== predicted.length) {
    throw new EvaluationError(`Reference has ${truth.length} records but predictions have ${predicted.length}`)
  }
  const mismatch = truth.findIndex((t, i) => t.text !== predicted[i].text)
  if (mismatch !== -1) {
    throw new EvaluationError(`Reference text differs from prediction text for ${truth[mismatch].id}`)
  }

  const scores = metric(truth, predicted, CAUSAL_LABELS)
  info(`F1: ${scores.f1.toFixed(6)}`)
  info(`Recall: ${scores.recall.toFixed(6)}`)
  info(`Precision: ${scores.precision.toFixed(6)}`)
  info(`ExactMatch: ${scores.exactMatch.toFixed(6)}`)
  return { scores, correct, wrong }
}
