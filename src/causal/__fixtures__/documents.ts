import type { DocumentChunk, Example, ScoreResult } from '../types'
import { wordOffsetsOf } from '../words'

export function exampleOf(id: string, text: string, reference: { cause?: string; effect?: string } = {}): Example {
  return { id, text, wordOffsets: wordOffsetsOf(text), ...reference }
}

/**
 * `[CLS] w0 w1 ... [SEP]` over whitespace words, every word mapped and max-context.
 */
export function chunkOf(
  uniqueId: string,
  text: string,
  opts: { exampleIndex?: number; sentenceOffsets?: number[]; notMaxContext?: number[] } = {}
): DocumentChunk {
  const words = text.split(/\s+/).filter(Boolean)
  const tokenToOrigMap = new Map<number, number>()
  const tokenIsMaxContext = new Map<number, boolean>()
  words.forEach((_, i) => {
    tokenToOrigMap.set(i + 1, i)
    tokenIsMaxContext.set(i + 1, !(opts.notMaxContext ?? []).includes(i + 1))
  })
  return {
    uniqueId,
    exampleIndex: opts.exampleIndex ?? 0,
    tokens: ['[CLS]', ...words, '[SEP]'],
    tokenToOrigMap,
    tokenIsMaxContext,
    sentenceOffsets: opts.sentenceOffsets ?? []
  }
}

/** Score array of `length` zeros with the given position -> score overrides. */
export function peaks(length: number, values: Record<number, number>): number[] {
  const out = new Array<number>(length).fill(0)
  for (const [pos, score] of Object.entries(values)) out[Number(pos)] = score
  return out
}

export function scoresOf(
  uniqueId: string,
  length: number,
  p: { causeStart: Record<number, number>; causeEnd: Record<number, number>; effectStart: Record<number, number>; effectEnd: Record<number, number> }
): ScoreResult {
  return {
    uniqueId,
    causeStart: peaks(length, p.causeStart),
    causeEnd: peaks(length, p.causeEnd),
    effectStart: peaks(length, p.effectStart),
    effectEnd: peaks(length, p.effectEnd)
  }
}

export const DROUGHT_TEXT = 'The drought caused famine'

// [CLS] The drought caused famine [SEP]
export const droughtScores = (uniqueId = 'c1') =>
  scoresOf(uniqueId, 6, {
    causeStart: { 1: 5 },
    causeEnd: { 2: 5 },
    effectStart: { 4: 5 },
    effectEnd: { 4: 5 }
  })
