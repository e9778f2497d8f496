import { describe, it, expect, vi } from 'vitest'
import { computeMetrics, EvaluationError, partitionPredictions } from './evaluate'
import { CAUSAL_LABELS } from './metric'
import type { SelectedAnswer } from './types'
import { exampleOf } from './__fixtures__/documents'

const answer = (text: string, cause_text: string, effect_text: string): SelectedAnswer => ({ text, cause_text, effect_text })

describe('computeMetrics', () => {
  const examples = [
    exampleOf('ex1', '  Rain fell', { cause: ' Rain', effect: 'fell' }),
    exampleOf('ex2', 'Roads flooded', { cause: 'Roads', effect: 'flooded' })
  ]

  it('rejects a prediction count that differs from the examples', () => {
    const predictions = new Map([['ex1', answer('  Rain fell', 'Rain', 'fell')]])
    expect(() => computeMetrics(examples, predictions)).toThrow('Got 1 predictions for 2 examples')
  })

  it('rejects an example without a prediction', () => {
    const predictions = new Map([
      ['ex1', answer('  Rain fell', 'Rain', 'fell')],
      ['ex3', answer('Roads flooded', 'Roads', 'flooded')]
    ])
    expect(() => computeMetrics(examples, predictions)).toThrow(EvaluationError)
  })

  it('hands left-trimmed records to the metric', () => {
    const scores = { precision: 0.5, recall: 0.5, f1: 0.5, exactMatch: 0.5 }
    const metric = vi.fn().mockReturnValue(scores)
    const predictions = new Map([
      ['ex1', answer('  Rain fell', '  Rain', 'fell')],
      ['ex2', answer('Roads flooded', 'flooded', 'Roads')]
    ])
    const result = computeMetrics(examples, predictions, metric)

    expect(result.scores).toEqual(scores)
    expect(metric).toHaveBeenCalledWith(
      [
        { id: 'ex1', text: 'Rain fell', cause: 'Rain', effect: 'fell' },
        { id: 'ex2', text: 'Roads flooded', cause: 'Roads', effect: 'flooded' }
      ],
      [
        { id: 'ex1', text: 'Rain fell', cause: 'Rain', effect: 'fell' },
        { id: 'ex2', text: 'Roads flooded', cause: 'flooded', effect: 'Roads' }
      ],
      CAUSAL_LABELS
    )
  })

  it('splits predictions into correct and wrong on untrimmed text', () => {
    const predictions = new Map([
      ['ex1', answer('  Rain fell', ' Rain', 'fell')],
      ['ex2', answer('Roads flooded', 'flooded', 'Roads')]
    ])
    const { correct, wrong } = computeMetrics(examples, predictions)
    expect(correct).toEqual([{ text: '  Rain fell', cause_true: ' Rain', effect_true: 'fell', cause_pred: ' Rain', effect_pred: 'fell' }])
    expect(wrong).toEqual([
      { text: 'Roads flooded', cause_true: 'Roads', effect_true: 'flooded', cause_pred: 'flooded', effect_pred: 'Roads' }
    ])
  })
})

describe('partitionPredictions', () => {
  it('compares cause and effect text exactly', () => {
    const truth = [{ id: 'a', text: 't', cause: '', effect: '' }]
    const predicted = [{ id: 'a', text: 't', cause: ' ', effect: '' }]
    expect(partitionPredictions(truth, truth).correct).toHaveLength(1)
    expect(partitionPredictions(truth, predicted).wrong).toHaveLength(1)
  })
})
