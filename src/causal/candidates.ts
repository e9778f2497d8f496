import { bestIndexes } from './scores'
import { extendSpans, sentenceStarts } from './sentences'
import type { DocumentChunk, ExtractionConfig, PreliminaryPrediction, ScoreResult, Span, SpanPair } from './types'

export type RejectReason = 'overlap' | 'out-of-range' | 'unmapped' | 'not-max-context' | 'reversed' | 'too-long'

export function* cartesian<A, B>(outer: Iterable<A>, inner: readonly B[]): Generator<[A, B]> {
  for (const a of outer) {
    for (const b of inner) yield [a, b]
  }
}

/**
 * A span crossing a sentence boundary is replaced by its two halves.
 * When several boundaries fall inside the span the last one wins.
 */
export function splitAtBoundary(span: Span, sentenceOffsets: readonly number[]): Span[] {
  let pieces = [span]
  for (const offset of sentenceOffsets) {
    if (span.start < offset && offset < span.end) {
      pieces = [
        { start: span.start, end: offset },
        { start: offset + 1, end: span.end }
      ]
    }
  }
  return pieces
}

function* spansFrom(starts: readonly number[], ends: readonly number[], sentenceOffsets: readonly number[]): Generator<Span> {
  for (const [start, end] of cartesian(starts, ends)) {
    yield* splitAtBoundary({ start, end }, sentenceOffsets)
  }
}

function startsInside(a: Span, b: Span) {
  return a.start <= b.start && a.end >= b.start
}

/** First check a candidate pair fails, or null when it is a valid answer. */
export function rejectReason(chunk: DocumentChunk, { cause, effect }: SpanPair, maxAnswerLength: number): RejectReason | null {
  if (startsInside(cause, effect) || startsInside(effect, cause)) return 'overlap'

  const n = chunk.tokens.length
  if (cause.start >= n || cause.end >= n || effect.start >= n || effect.end >= n) return 'out-of-range'

  const mapped = (pos: number) => chunk.tokenToOrigMap.has(pos)
  if (!mapped(cause.start) || !mapped(cause.end) || !mapped(effect.start) || !mapped(effect.end)) return 'unmapped'

  const maxContext = (pos: number) => chunk.tokenIsMaxContext.get(pos) ?? false
  if (!maxContext(cause.start) || !maxContext(effect.start)) return 'not-max-context'

  if (cause.end < cause.start || effect.end < effect.start) return 'reversed'

  if (cause.end - cause.start + 1 > maxAnswerLength) return 'too-long'
  if (effect.end - effect.start + 1 > maxAnswerLength) return 'too-long'

  return null
}

/**
 * Every valid cause/effect pair built from the top-`nBestSize` positions of the four score arrays.
 * Scores are read at the reported (possibly split or widened) positions.
 */
export function generateCandidates(
  chunk: DocumentChunk,
  featureIndex: number,
  result: ScoreResult,
  cfg: ExtractionConfig
): PreliminaryPrediction[] {
  const offsets = cfg.sentenceBoundaryHeuristic ? chunk.sentenceOffsets : []
  const extend = offsets.length > 0 && (cfg.fullSentenceHeuristic || cfg.sharedSentenceHeuristic)
  const starts = extend ? sentenceStarts(chunk, cfg.contentStartOffset) : []
  const isAnchor = (pos: number) => chunk.tokenToOrigMap.has(pos)

  const n = cfg.nBestSize
  const causeSpans = spansFrom(bestIndexes(result.causeStart, n), bestIndexes(result.causeEnd, n), offsets)
  const effectSpans = [...spansFrom(bestIndexes(result.effectStart, n), bestIndexes(result.effectEnd, n), offsets)]

  const out: PreliminaryPrediction[] = []
  for (const [cause, effect] of cartesian(causeSpans, effectSpans)) {
    const sampled = { cause, effect }
    if (rejectReason(chunk, sampled, cfg.maxAnswerLength)) continue
    const pair = extend ? extendSpans(sampled, starts, cfg, isAnchor) : sampled
    out.push({
      featureIndex,
      startIndexCause: pair.cause.start,
      endIndexCause: pair.cause.end,
      startScoreCause: result.causeStart[pair.cause.start],
      endScoreCause: result.causeEnd[pair.cause.end],
      startIndexEffect: pair.effect.start,
      endIndexEffect: pair.effect.end,
      startScoreEffect: result.effectStart[pair.effect.start],
      endScoreEffect: result.effectEnd[pair.effect.end]
    })
  }
  return out
}
