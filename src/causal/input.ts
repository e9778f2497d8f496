import fs from 'fs/promises'
import { z } from 'zod'
import { loadExamplesCsv, resolveFromRoot } from '../csv'
import { debug } from '../logger'
import type { DocumentChunk, Example, PredictionInput } from './types'
import { wordOffsetsOf } from './words'

const position = z.number().int().nonnegative()
const positionKey = z.string().regex(/^\d+$/, 'position keys must be non-negative integers')

function toPositionMap<V>(record: Record<string, V>): Map<number, V> {
  return new Map(Object.entries(record).map(([k, v]): [number, V] => [Number(k), v]))
}

const uniqueId = z.union([z.string(), z.number()]).transform(String)

export const ExampleSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  text: z.string(),
  cause: z.string().optional(),
  effect: z.string().optional(),
  wordOffsets: z.array(position).optional()
})

export const ChunkSchema = z.object({
  uniqueId,
  exampleIndex: position,
  tokens: z.array(z.string()),
  tokenToOrigMap: z.record(positionKey, position).transform(toPositionMap),
  tokenIsMaxContext: z.record(positionKey, z.boolean()).transform(toPositionMap),
  sentenceOffsets: z.array(position).default([])
})

export const ScoreSchema = z
  .object({
    uniqueId,
    causeStart: z.array(z.number()),
    causeEnd: z.array(z.number()),
    effectStart: z.array(z.number()),
    effectEnd: z.array(z.number())
  })
  .refine(
    (r) => [r.causeEnd, r.effectStart, r.effectEnd].every((a) => a.length === r.causeStart.length),
    { message: 'all four score arrays must have the same length' }
  )

export const BundleSchema = z.object({
  examples: z.array(ExampleSchema).optional(),
  chunks: z.array(ChunkSchema),
  scores: z.array(ScoreSchema)
})

export type RawExample = z.input<typeof ExampleSchema>

function toExample(raw: z.output<typeof ExampleSchema>): Example {
  return {
    id: raw.id,
    text: raw.text,
    cause: raw.cause,
    effect: raw.effect,
    wordOffsets: raw.wordOffsets ?? wordOffsetsOf(raw.text)
  }
}

/**
 * Validates a prediction bundle. Examples given separately (e.g. from a CSV) replace the bundle's own.
 */
export function parseBundle(raw: unknown, examples?: RawExample[]): PredictionInput {
  const bundle = BundleSchema.parse(raw)
  const rawExamples = examples ? z.array(ExampleSchema).parse(examples) : bundle.examples
  if (!rawExamples) throw new Error('Bundle has no examples and none were supplied')

  const resolved = rawExamples.map(toExample)
  const chunks: DocumentChunk[] = bundle.chunks
  const chunkById = new Map(chunks.map((c) => [c.uniqueId, c]))

  for (const chunk of chunks) {
    if (chunk.exampleIndex >= resolved.length) {
      throw new Error(`Chunk ${chunk.uniqueId} references example #${chunk.exampleIndex} but only ${resolved.length} exist`)
    }
    const words = resolved[chunk.exampleIndex].wordOffsets.length
    for (const [pos, word] of chunk.tokenToOrigMap) {
      if (word >= words) {
        throw new Error(`Chunk ${chunk.uniqueId} maps token ${pos} to word ${word} but example #${chunk.exampleIndex} has ${words} words`)
      }
    }
  }
  const scored = new Set<string>()
  for (const result of bundle.scores) {
    const chunk = chunkById.get(result.uniqueId)
    if (!chunk) throw new Error(`Scores reference unknown chunk ${result.uniqueId}`)
    const n = result.causeStart.length
    if (n > 0 && n < chunk.tokens.length) {
      throw new Error(`Chunk ${chunk.uniqueId} has ${chunk.tokens.length} tokens but only ${n} scores`)
    }
    scored.add(result.uniqueId)
  }
  const unscored = chunks.find((c) => !scored.has(c.uniqueId))
  if (unscored) throw new Error(`No scores for chunk ${unscored.uniqueId}`)

  debug('bundle', resolved.length, 'examples', chunks.length, 'chunks')
  return { examples: resolved, chunks, scores: bundle.scores }
}

export async function loadBundle(filePath: string, examplesCsv?: string): Promise<PredictionInput> {
  const text = await fs.readFile(resolveFromRoot(filePath), 'utf8')
  const examples = examplesCsv ? await loadExamplesCsv(examplesCsv) : undefined
  return parseBundle(JSON.parse(text), examples)
}
