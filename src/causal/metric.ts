import type { CausalLabel, CausalRecord, MetricScores, ReferenceMetric } from './types'
import { splitWords, wordIndexAtChar } from './words'

export const CAUSAL_LABELS: readonly CausalLabel[] = ['-', 'C', 'E']

function markSpan(labels: CausalLabel[], wordOffsets: number[], text: string, span: string, label: CausalLabel) {
  if (!span) return
  const startChar = text.indexOf(span)
  if (startChar === -1) return
  const first = Math.max(0, wordIndexAtChar(wordOffsets, startChar))
  const last = wordIndexAtChar(wordOffsets, startChar + span.length - 1)
  for (let i = first; i <= last; i++) labels[i] = label
}

/**
 * One label per whitespace word of `text`: `C` inside the first occurrence of the cause,
 * `E` inside the first occurrence of the effect, `-` elsewhere. Effect wins where both match.
 */
export function encodeCausalTokens(text: string, cause: string, effect: string): Array<[string, CausalLabel]> {
  const words = splitWords(text)
  const offsets = words.map((w) => w.start)
  const labels: CausalLabel[] = words.map(() => '-')
  markSpan(labels, offsets, text, cause, 'C')
  markSpan(labels, offsets, text, effect, 'E')
  return words.map((w, i) => [w.text, labels[i]])
}

const ratio = (num: number, den: number) => (den === 0 ? 0 : num / den)

/**
 * Support-weighted precision, recall and F1 over the word labels of all records,
 * plus the share of records whose label sequence matches exactly.
 */
export const tokenLabelMetric: ReferenceMetric = (truth, predicted, labels) => {
  const encode = (r: CausalRecord) => encodeCausalTokens(r.text, r.cause, r.effect).map(([, label]) => label)
  const yTrue: CausalLabel[] = []
  const yPred: CausalLabel[] = []
  let exact = 0

  truth.forEach((t, i) => {
    const a = encode(t)
    const b = encode(predicted[i])
    if (a.length === b.length && a.every((label, j) => label === b[j])) exact++
    for (const label of a) yTrue.push(label)
    for (const label of b) yPred.push(label)
  })

  let precision = 0
  let recall = 0
  let f1 = 0
  let support = 0
  for (const label of labels) {
    let tp = 0
    let fp = 0
    let fn = 0
    yTrue.forEach((t, i) => {
      const p = yPred[i]
      if (t === label && p === label) tp++
      else if (p === label) fp++
      else if (t === label) fn++
    })
    const weight = tp + fn
    const pr = ratio(tp, tp + fp)
    const rc = ratio(tp, tp + fn)
    precision += weight * pr
    recall += weight * rc
    f1 += weight * ratio(2 * pr * rc, pr + rc)
    support += weight
  }

  const scores: MetricScores = {
    precision: ratio(precision, support),
    recall: ratio(recall, support),
    f1: ratio(f1, support),
    exactMatch: ratio(exact, truth.length)
  }
  return scores
}
