import { describe, it, expect } from 'vitest'
import { cartesian, generateCandidates, rejectReason, splitAtBoundary } from './candidates'
import { mergeConfig } from './config'
import { chunkOf, DROUGHT_TEXT, droughtScores, peaks, scoresOf } from './__fixtures__/documents'

describe('cartesian', () => {
  it('yields pairs lazily, outer-major', () => {
    const pairs = cartesian([1, 2], ['a', 'b'])
    expect(pairs.next().value).toEqual([1, 'a'])
    expect([...pairs]).toEqual([
      [1, 'b'],
      [2, 'a'],
      [2, 'b']
    ])
  })
})

describe('splitAtBoundary', () => {
  it('splits a span crossing a boundary', () => {
    expect(splitAtBoundary({ start: 1, end: 5 }, [3])).toEqual([
      { start: 1, end: 3 },
      { start: 4, end: 5 }
    ])
  })

  it('keeps the last boundary when several fall inside', () => {
    expect(splitAtBoundary({ start: 1, end: 6 }, [2, 4])).toEqual([
      { start: 1, end: 4 },
      { start: 5, end: 6 }
    ])
  })

  it('ignores boundaries on the span edges', () => {
    expect(splitAtBoundary({ start: 3, end: 5 }, [3, 5])).toEqual([{ start: 3, end: 5 }])
  })
})

describe('rejectReason', () => {
  const chunk = chunkOf('c1', DROUGHT_TEXT)

  it('accepts a valid pair', () => {
    expect(rejectReason(chunk, { cause: { start: 1, end: 2 }, effect: { start: 4, end: 4 } }, 5)).toBeNull()
  })

  it('rejects a start falling inside the other span', () => {
    expect(rejectReason(chunk, { cause: { start: 1, end: 3 }, effect: { start: 2, end: 4 } }, 5)).toBe('overlap')
    expect(rejectReason(chunk, { cause: { start: 3, end: 4 }, effect: { start: 1, end: 3 } }, 5)).toBe('overlap')
  })

  it('rejects positions past the chunk', () => {
    expect(rejectReason(chunk, { cause: { start: 1, end: 2 }, effect: { start: 4, end: 6 } }, 5)).toBe('out-of-range')
  })

  it('rejects special tokens', () => {
    expect(rejectReason(chunk, { cause: { start: 1, end: 2 }, effect: { start: 5, end: 5 } }, 5)).toBe('unmapped')
  })

  it('rejects starts outside the max-context window', () => {
    const windowed = chunkOf('c2', DROUGHT_TEXT, { notMaxContext: [4] })
    expect(rejectReason(windowed, { cause: { start: 1, end: 2 }, effect: { start: 4, end: 4 } }, 5)).toBe('not-max-context')
  })

  it('rejects reversed spans', () => {
    expect(rejectReason(chunk, { cause: { start: 2, end: 1 }, effect: { start: 4, end: 4 } }, 5)).toBe('reversed')
  })

  it('rejects spans longer than the limit', () => {
    expect(rejectReason(chunk, { cause: { start: 1, end: 2 }, effect: { start: 4, end: 4 } }, 1)).toBe('too-long')
  })
})

describe('generateCandidates', () => {
  it('finds the single valid pair of a short sentence', () => {
    const chunk = chunkOf('c1', DROUGHT_TEXT)
    const out = generateCandidates(chunk, 0, droughtScores(), mergeConfig({ nBestSize: 1, maxAnswerLength: 5 }))
    expect(out).toEqual([
      {
        featureIndex: 0,
        startIndexCause: 1,
        endIndexCause: 2,
        startScoreCause: 5,
        endScoreCause: 5,
        startIndexEffect: 4,
        endIndexEffect: 4,
        startScoreEffect: 5,
        endScoreEffect: 5
      }
    ])
  })

  it('yields nothing for empty score arrays', () => {
    const chunk = chunkOf('c1', DROUGHT_TEXT)
    const empty = { uniqueId: 'c1', causeStart: [], causeEnd: [], effectStart: [], effectEnd: [] }
    expect(generateCandidates(chunk, 0, empty, mergeConfig({ nBestSize: 3 }))).toEqual([])
  })

  it('keeps every candidate disjoint and within the length limit', () => {
    const text = 'a b c d e f g h i j'
    const chunk = chunkOf('c1', text)
    const wave = (k: number) => Array.from({ length: 12 }, (_, i) => Math.sin(i * k))
    const result = { uniqueId: 'c1', causeStart: wave(1), causeEnd: wave(2), effectStart: wave(3), effectEnd: wave(5) }
    const out = generateCandidates(chunk, 0, result, mergeConfig({ nBestSize: 6, maxAnswerLength: 3 }))
    for (const p of out) {
      expect(p.startIndexCause <= p.startIndexEffect && p.endIndexCause >= p.startIndexEffect).toBe(false)
      expect(p.startIndexEffect <= p.startIndexCause && p.endIndexEffect >= p.startIndexCause).toBe(false)
      expect(p.endIndexCause - p.startIndexCause + 1).toBeLessThanOrEqual(3)
      expect(p.endIndexEffect - p.startIndexEffect + 1).toBeLessThanOrEqual(3)
    }
  })

  describe('sentence boundaries', () => {
    // [CLS] Rain fell . Roads flooded . [SEP]
    const text = 'Rain fell . Roads flooded .'
    const chunk = chunkOf('c1', text, { sentenceOffsets: [3] })
    const result = {
      uniqueId: 'c1',
      causeStart: peaks(8, { 1: 4, 4: 1 }),
      causeEnd: peaks(8, { 3: 2, 5: 3 }),
      effectStart: peaks(8, { 6: 5 }),
      effectEnd: peaks(8, { 6: 5 })
    }

    it('splits a cause crossing a boundary and scores each half at its own edges', () => {
      const out = generateCandidates(chunk, 0, result, mergeConfig({ nBestSize: 1, sentenceBoundaryHeuristic: true }))
      expect(out.map((p) => [p.startIndexCause, p.endIndexCause, p.startScoreCause, p.endScoreCause])).toEqual([
        [1, 3, 4, 2],
        [4, 5, 1, 3]
      ])
    })

    it('leaves the span whole when the heuristic is off', () => {
      const out = generateCandidates(chunk, 0, result, mergeConfig({ nBestSize: 1 }))
      expect(out.map((p) => [p.startIndexCause, p.endIndexCause])).toEqual([[1, 5]])
    })
  })

  describe('sentence extension', () => {
    // [CLS] Heavy rain caused severe floods . Schools closed . [SEP]
    const text = 'Heavy rain caused severe floods . Schools closed .'
    const chunk = chunkOf('c1', text, { sentenceOffsets: [6] })
    const result = scoresOf('c1', 11, {
      causeStart: { 1: 0.5, 2: 3 },
      causeEnd: { 2: 3, 6: 0.25 },
      effectStart: { 7: 3 },
      effectEnd: { 7: 3, 9: 0.75 }
    })

    it('widens both spans to their sentences and reads scores at the new edges', () => {
      const cfg = mergeConfig({ nBestSize: 1, sentenceBoundaryHeuristic: true, fullSentenceHeuristic: true })
      expect(generateCandidates(chunk, 0, result, cfg)).toEqual([
        {
          featureIndex: 0,
          startIndexCause: 1,
          endIndexCause: 6,
          startScoreCause: 0.5,
          endScoreCause: 0.25,
          startIndexEffect: 7,
          endIndexEffect: 9,
          startScoreEffect: 3,
          endScoreEffect: 0.75
        }
      ])
    })

    it('does not extend without the sentence boundary heuristic', () => {
      const cfg = mergeConfig({ nBestSize: 1, fullSentenceHeuristic: true })
      const [p] = generateCandidates(chunk, 0, result, cfg)
      expect([p.startIndexCause, p.endIndexCause, p.startIndexEffect, p.endIndexEffect]).toEqual([2, 2, 7, 7])
    })
  })
})
