#!/usr/bin/env node
import appRootPath from 'app-root-path'
import dotenv from 'dotenv-flow'
import { configFromEnv } from './causal/config'
import { loadBundle } from './causal/input'
import { runEvaluation, runPrediction } from './causal/pipeline'
import { resolveFromRoot } from './csv'
import { error, info } from './logger'

interface CommandArgs {
  input?: string
  outputDir?: string
  examples?: string
}

export function parseArgs(argv: string[]): CommandArgs {
  const positional: string[] = []
  let examples: string | undefined
  for (let i = 0; i < argv.length; i++) {
    if (argv[i] === '--examples') {
      examples = argv[++i]
      if (!examples) throw new Error('--examples needs a CSV path')
    } else {
      positional.push(argv[i])
    }
  }
  return { input: positional[0], outputDir: positional[1] ?? process.env.EXTRACT_OUTPUT_DIR, examples }
}

async function cmdPredict(args: CommandArgs) {
  if (!args.input || !args.outputDir) throw new Error('Usage: predict <bundle.json> <outputDir> [--examples <file.csv>]')
  const input = await loadBundle(args.input, args.examples)
  const run = await runPrediction(input, { config: configFromEnv(), exportDir: resolveFromRoot(args.outputDir) })
  info('Predicted', run.predictions.size, 'examples')
}

async function cmdEvaluate(args: CommandArgs) {
  if (!args.input || !args.outputDir) throw new Error('Usage: evaluate <bundle.json> <outputDir> [--examples <file.csv>]')
  const input = await loadBundle(args.input, args.examples)
  const { scores, correct, wrong } = await runEvaluation(input, {
    config: configFromEnv(),
    exportDir: resolveFromRoot(args.outputDir)
  })
  console.log(`F1: ${scores.f1.toFixed(6)}`)
  console.log(`Recall: ${scores.recall.toFixed(6)}`)
  console.log(`Precision: ${scores.precision.toFixed(6)}`)
  console.log(`ExactMatch: ${scores.exactMatch.toFixed(6)}`)
  info(correct.length, 'correct,', wrong.length, 'wrong')
}

async function main(argv: string[]) {
  const cmd = argv[0]
  try {
    dotenv.config({ path: appRootPath.path, silent: true })
    if (cmd === 'predict') await cmdPredict(parseArgs(argv.slice(1)))
    else if (cmd === 'evaluate') await cmdEvaluate(parseArgs(argv.slice(1)))
    else {
      console.log('Usage: causal-spans <command> [args]')
      console.log('Commands:')
      console.log('  predict <bundle.json> <outputDir> [--examples <file.csv>]')
      console.log('  evaluate <bundle.json> <outputDir> [--examples <file.csv>]')
      process.exit(1)
    }
  } catch (err: unknown) {
    error('Error:', err instanceof Error ? err.message : err)
    process.exit(1)
  }
}

if (require.main === module) {
  void main(process.argv.slice(2))
}

export { cmdEvaluate, cmdPredict }
