import type { ExtractionConfig } from './types'

export const defaultConfig: ExtractionConfig = {
  nBestSize: 20,
  maxAnswerLength: 300,
  sentenceBoundaryHeuristic: false,
  fullSentenceHeuristic: false,
  sharedSentenceHeuristic: false,
  topNSentences: false,
  contentStartOffset: 1
}

export function mergeConfig(partial?: Partial<ExtractionConfig>): ExtractionConfig {
  if (!partial) return defaultConfig
  return {
    nBestSize: partial.nBestSize ?? defaultConfig.nBestSize,
    maxAnswerLength: partial.maxAnswerLength ?? defaultConfig.maxAnswerLength,
    sentenceBoundaryHeuristic: partial.sentenceBoundaryHeuristic ?? defaultConfig.sentenceBoundaryHeuristic,
    fullSentenceHeuristic: partial.fullSentenceHeuristic ?? defaultConfig.fullSentenceHeuristic,
    sharedSentenceHeuristic: partial.sharedSentenceHeuristic ?? defaultConfig.sharedSentenceHeuristic,
    topNSentences: partial.topNSentences ?? defaultConfig.topNSentences,
    contentStartOffset: partial.contentStartOffset ?? defaultConfig.contentStartOffset
  }
}

function envInt(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const v = env[name]?.trim()
  if (!v) return undefined
  const n = Number(v)
  if (!Number.isInteger(n) || n < 0) throw new Error(`Invalid integer for ${name}: ${v}`)
  return n
}

function envBool(env: NodeJS.ProcessEnv, name: string): boolean | undefined {
  const v = env[name]?.trim().toLowerCase()
  if (!v) return undefined
  if (['1', 'true', 'yes', 'on'].includes(v)) return true
  if (['0', 'false', 'no', 'off'].includes(v)) return false
  throw new Error(`Invalid boolean for ${name}: ${v}`)
}

export function configFromEnv(env: NodeJS.ProcessEnv = process.env): ExtractionConfig {
  return mergeConfig({
    nBestSize: envInt(env, 'EXTRACT_N_BEST_SIZE'),
    maxAnswerLength: envInt(env, 'EXTRACT_MAX_ANSWER_LENGTH'),
    sentenceBoundaryHeuristic: envBool(env, 'EXTRACT_SENTENCE_BOUNDARY'),
    fullSentenceHeuristic: envBool(env, 'EXTRACT_FULL_SENTENCE'),
    sharedSentenceHeuristic: envBool(env, 'EXTRACT_SHARED_SENTENCE'),
    topNSentences: envBool(env, 'EXTRACT_TOP_N_SENTENCES'),
    contentStartOffset: envInt(env, 'EXTRACT_CONTENT_OFFSET')
  })
}

export default defaultConfig
