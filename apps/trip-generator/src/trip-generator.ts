/* eslint-disable no-console */
import { isValid, parse } from 'date-fns'
import { createLogger, parseIntegerArg, requireValue } from '@trip-insights/trip-common'
import { DEFECT_KINDS, generateTrips, type GeneratorConfig } from './generator'

const logger = createLogger('generator')

const usage = `Usage: trip-generator [options]

Options:
  --count <number>         Number of trips to generate (default: 10000)
  --output <file>          Output CSV file (default: data/raw/train.csv)
  --seed <number>          RNG seed for reproducible output
  --defect-rate <ratio>    Share of defective rows, 0..1 (default: 0.05)
  --start <yyyy-MM-dd>     First pickup day (default: 2016-01-01)
  --days <number>          Days the pickups are spread over (default: 7)
  -h, --help               Show this help message
`

const parseDate = (value: string, flag: string): Date => {
  const parsed = parse(value, 'yyyy-MM-dd', new Date(2000, 0, 1))
  if (!isValid(parsed)) {
    throw new Error(`Invalid date for ${flag}: ${value}`)
  }
  return parsed
}

const parseRatio = (value: string, flag: string): number => {
  const parsed = Number(value)
  if (!Number.isFinite(parsed)) {
    throw new Error(`Invalid numeric value for ${flag}: ${value}`)
  }
  return parsed
}

const parseArgs = (argv: string[]): GeneratorConfig | null => {
  const config: GeneratorConfig = {
    tripCount: 10000,
    outputFile: 'data/raw/train.csv',
  }

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i]
    const value = argv[i + 1]
    if (arg === '--help' || arg === '-h') {
      return null
    }

    if (arg === '--count') {
      config.tripCount = parseIntegerArg(requireValue(value, arg), arg)
    } else if (arg === '--output') {
      config.outputFile = requireValue(value, arg)
    } else if (arg === '--seed') {
      config.seed = parseIntegerArg(requireValue(value, arg), arg)
    } else if (arg === '--defect-rate') {
      config.defectRate = parseRatio(requireValue(value, arg), arg)
    } else if (arg === '--start') {
      config.startDate = parseDate(requireValue(value, arg), arg)
    } else if (arg === '--days') {
      config.days = parseIntegerArg(requireValue(value, arg), arg)
    } else {
      throw new Error(`Unknown argument: ${arg}`)
    }
    i += 1
  }

  return config
}

const run = async (): Promise<void> => {
  const config = parseArgs(process.argv.slice(2))
  if (!config) {
    console.log(usage)
    return
  }
  const summary = await generateTrips(config)
  logger.info(`Generated ${summary.rows} trips to ${config.outputFile}`)
  logger.info(`Defective rows: ${DEFECT_KINDS.map((kind) => `${kind}=${summary.defects[kind]}`).join(', ')}`)
}

run().catch((error: unknown) => {
  logger.error('Generation failed', error)
  console.error('Use --help to see valid options.')
  process.exitCode = 1
})
