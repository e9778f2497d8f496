import type { DocumentChunk, Example, NBestPrediction, PreliminaryPrediction } from './types'

export const EMPTY_TEXT = 'empty'

/** Placeholder answer for examples where no candidate survives. */
export function emptyPrediction(): NBestPrediction {
  return {
    textCause: EMPTY_TEXT,
    startIndexCause: 0,
    endIndexCause: 0,
    startScoreCause: 0,
    endScoreCause: 0,
    textEffect: EMPTY_TEXT,
    startIndexEffect: 0,
    endIndexEffect: 0,
    startScoreEffect: 0,
    endScoreEffect: 0
  }
}

function origWord(chunk: DocumentChunk, position: number): number {
  const word = chunk.tokenToOrigMap.get(position)
  if (word === undefined) throw new Error(`Token ${position} of chunk ${chunk.uniqueId} has no word mapping`)
  return word
}

/** Original text from the first character of `startWord` up to the next word after `endWord`, trimmed. */
export function sliceWords(example: Example, startWord: number, endWord: number): string {
  const words = example.wordOffsets.length
  if (startWord < 0 || startWord >= words || endWord >= words) {
    throw new RangeError(`Words ${startWord}..${endWord} are outside example ${example.id} with ${words} words`)
  }
  const startChar = example.wordOffsets[startWord]
  const endChar = endWord < example.wordOffsets.length - 1 ? example.wordOffsets[endWord + 1] : example.text.length
  return example.text.slice(startChar, endChar).trim()
}

/**
 * Turns ranked candidates into at most `nBestSize` text answers.
 * Candidates whose cause and effect texts were both produced before are skipped.
 * `chunks` is indexed by the candidates' `featureIndex`.
 */
export function materializeNBest(
  ranked: readonly PreliminaryPrediction[],
  chunks: readonly DocumentChunk[],
  example: Example,
  nBestSize: number
): NBestPrediction[] {
  const seenCause = new Set<string>()
  const seenEffect = new Set<string>()
  const nbest: NBestPrediction[] = []

  for (const p of ranked) {
    if (nbest.length >= nBestSize) break
    const scores = {
      startScoreCause: p.startScoreCause,
      endScoreCause: p.endScoreCause,
      startScoreEffect: p.startScoreEffect,
      endScoreEffect: p.endScoreEffect
    }

    // position 0 is the leading special token: the null answer
    if (p.startIndexCause === 0) {
      seenCause.add('')
      seenEffect.add('')
      nbest.push({
        ...scores,
        textCause: '',
        startIndexCause: p.startIndexCause,
        endIndexCause: p.endIndexCause,
        textEffect: '',
        startIndexEffect: p.startIndexEffect,
        endIndexEffect: p.endIndexEffect
      })
      continue
    }

    const chunk = chunks[p.featureIndex]
    const startCause = origWord(chunk, p.startIndexCause)
    const endCause = origWord(chunk, p.endIndexCause)
    const startEffect = origWord(chunk, p.startIndexEffect)
    const endEffect = origWord(chunk, p.endIndexEffect)
    const textCause = sliceWords(example, startCause, endCause)
    const textEffect = sliceWords(example, startEffect, endEffect)

    if (seenCause.has(textCause) && seenEffect.has(textEffect)) continue
    seenCause.add(textCause)
    seenEffect.add(textEffect)

    nbest.push({
      ...scores,
      textCause,
      startIndexCause: startCause,
      endIndexCause: endCause,
      textEffect,
      startIndexEffect: startEffect,
      endIndexEffect: endEffect
    })
  }

  if (nbest.length === 0) nbest.push(emptyPrediction())
  return nbest
}
