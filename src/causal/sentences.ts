import type { DocumentChunk, ExtractionConfig, Span, SpanPair } from './types'

/**
 * Start position of every sentence in the chunk, followed by the chunk length.
 * Sentence `i` covers `[starts[i], starts[i + 1] - 1]`.
 */
export function sentenceStarts(chunk: DocumentChunk, contentStartOffset: number): number[] {
  const boundaries = [...chunk.sentenceOffsets].sort((a, b) => a - b).map((o) => o + 1)
  return [contentStartOffset, ...boundaries, chunk.tokens.length]
}

// A span belongs to the sentence holding its start position
export function sentenceAt(starts: readonly number[], position: number): number | undefined {
  for (let i = 0; i < starts.length - 1; i++) {
    if (starts[i] <= position && position < starts[i + 1]) return i
  }
  return undefined
}

/**
 * Full extent of a sentence, trimmed inwards to positions accepted by `isAnchor`
 * so that trailing special tokens never end up inside a span.
 */
export function sentenceExtent(starts: readonly number[], sentence: number, isAnchor: (pos: number) => boolean): Span {
  let start = starts[sentence]
  let end = starts[sentence + 1] - 1
  while (start < end && !isAnchor(start)) start++
  while (end > start && !isAnchor(end)) end--
  return { start, end }
}

/**
 * Widens a candidate pair to sentence boundaries.
 *
 * Full-sentence: cause and effect start in different sentences, each span becomes its whole sentence.
 * Shared-sentence: both start in the same sentence, the earlier span is pulled back to the sentence
 * start and the later span pushed out to the sentence end, so the pair splits the sentence between them.
 */
export function extendSpans(
  pair: SpanPair,
  starts: readonly number[],
  cfg: Pick<ExtractionConfig, 'fullSentenceHeuristic' | 'sharedSentenceHeuristic'>,
  isAnchor: (pos: number) => boolean
): SpanPair {
  let { cause, effect } = pair
  const causeSentence = sentenceAt(starts, cause.start)
  const effectSentence = sentenceAt(starts, effect.start)
  if (causeSentence === undefined || effectSentence === undefined) return pair

  if (cfg.fullSentenceHeuristic && causeSentence !== effectSentence) {
    cause = sentenceExtent(starts, causeSentence, isAnchor)
    effect = sentenceExtent(starts, effectSentence, isAnchor)
  }

  if (cfg.sharedSentenceHeuristic && causeSentence === effectSentence) {
    const sentence = sentenceExtent(starts, causeSentence, isAnchor)
    if (cause.start < effect.start) {
      cause = { start: sentence.start, end: cause.end }
      effect = { start: effect.start, end: sentence.end }
    } else {
      effect = { start: sentence.start, end: effect.end }
      cause = { start: cause.start, end: sentence.end }
    }
  }

  return { cause, effect }
}
