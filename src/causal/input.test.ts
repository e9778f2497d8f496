import { describe, it, expect } from 'vitest'
import { ZodError } from 'zod'
import { parseBundle } from './input'

const chunk = {
  uniqueId: 'c1',
  exampleIndex: 0,
  tokens: ['[CLS]', 'Rain', 'fell', '[SEP]'],
  tokenToOrigMap: { '1': 0, '2': 1 },
  tokenIsMaxContext: { '1': true, '2': false }
}
const scores = { uniqueId: 'c1', causeStart: [0, 1, 0, 0], causeEnd: [0, 1, 0, 0], effectStart: [0, 0, 1, 0], effectEnd: [0, 0, 1, 0] }
const bundle = { examples: [{ id: 7, text: 'Rain  fell', cause: 'Rain' }], chunks: [chunk], scores: [scores] }

describe('parseBundle', () => {
  it('builds examples and chunk maps', () => {
    const input = parseBundle(bundle)
    expect(input.examples).toEqual([{ id: '7', text: 'Rain  fell', cause: 'Rain', effect: undefined, wordOffsets: [0, 6] }])
    expect(input.chunks[0].tokenToOrigMap.get(2)).toBe(1)
    expect(input.chunks[0].tokenIsMaxContext.get(2)).toBe(false)
    expect(input.chunks[0].sentenceOffsets).toEqual([])
  })

  it('replaces the bundle examples with the ones given', () => {
    const input = parseBundle(bundle, [{ id: 'csv1', text: 'Snow fell' }])
    expect(input.examples.map((e) => e.id)).toEqual(['csv1'])
  })

  it('needs examples from somewhere', () => {
    expect(() => parseBundle({ chunks: [chunk], scores: [scores] })).toThrow('Bundle has no examples and none were supplied')
  })

  it('rejects score arrays of different lengths', () => {
    const bad = { ...bundle, scores: [{ ...scores, effectEnd: [0] }] }
    expect(() => parseBundle(bad)).toThrow(ZodError)
  })

  it('rejects non-numeric position keys', () => {
    const bad = { ...bundle, chunks: [{ ...chunk, tokenToOrigMap: { first: 0 } }] }
    expect(() => parseBundle(bad)).toThrow(ZodError)
  })

  it('rejects a chunk pointing past the examples', () => {
    const bad = { ...bundle, chunks: [{ ...chunk, exampleIndex: 1 }] }
    expect(() => parseBundle(bad)).toThrow('Chunk c1 references example #1 but only 1 exist')
  })

  it('rejects word indexes past the end of the example', () => {
    const bad = { ...bundle, chunks: [{ ...chunk, tokenToOrigMap: { '1': 7, '2': 8 } }] }
    expect(() => parseBundle(bad)).toThrow('Chunk c1 maps token 1 to word 7 but example #0 has 2 words')
  })

  it('checks word indexes against examples given separately', () => {
    expect(() => parseBundle(bundle, [{ id: 'csv1', text: 'Snow' }])).toThrow('Chunk c1 maps token 2 to word 1 but example #0 has 1 words')
  })

  it('rejects scores for an unknown chunk', () => {
    const bad = { ...bundle, scores: [scores, { ...scores, uniqueId: 'c9' }] }
    expect(() => parseBundle(bad)).toThrow('Scores reference unknown chunk c9')
  })

  it('rejects scores shorter than the chunk', () => {
    const short = { uniqueId: 'c1', causeStart: [0], causeEnd: [0], effectStart: [0], effectEnd: [0] }
    expect(() => parseBundle({ ...bundle, scores: [short] })).toThrow('Chunk c1 has 4 tokens but only 1 scores')
  })

  it('accepts empty score arrays', () => {
    const empty = { uniqueId: 'c1', causeStart: [], causeEnd: [], effectStart: [], effectEnd: [] }
    expect(parseBundle({ ...bundle, scores: [empty] }).scores[0].causeStart).toEqual([])
  })

  it('rejects a chunk without scores', () => {
    expect(() => parseBundle({ ...bundle, scores: [] })).toThrow('No scores for chunk c1')
  })
})
