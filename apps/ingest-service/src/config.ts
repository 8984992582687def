import { z } from 'zod'
import { loadYamlConfig, parseIntegerArg, requireValue } from '@trip-insights/trip-common'
import { DEFAULT_DATABASE_URL } from '@trip-insights/trip-store'
import { DEFAULT_BATCH_SIZE } from './chunk-ingestor'

/**
 * Configuration for one ingestion run.
 */
export interface IngestConfig {
  /** Raw trip file (.csv, .ndjson or .jsonl). */
  input: string
  /** sqlite:/// URL or plain file path of the trips database. */
  database: string
  /** Anomaly log file, created only when an anomaly is logged. */
  anomalyLog: string
  /** Records per batch. */
  batchSize: number
  /** When set, print this many raw records and exit without ingesting. */
  preview: number | null
  help: boolean
}

export const DEFAULT_INGEST_CONFIG: IngestConfig = {
  input: 'data/raw/train.csv',
  database: DEFAULT_DATABASE_URL,
  anomalyLog: 'logs/cleaning.log',
  batchSize: DEFAULT_BATCH_SIZE,
  preview: null,
  help: false,
}

const DEFAULT_PREVIEW_ROWS = 5

export const usage = `Usage: ingest-service [options]

Options:
  --input <file>         Raw trip file, .csv or .ndjson (default: ${DEFAULT_INGEST_CONFIG.input})
  --database <url>       sqlite:/// URL or file path (default: $DATABASE_URL or ${DEFAULT_INGEST_CONFIG.database})
  --anomaly-log <file>   Anomaly log file (default: ${DEFAULT_INGEST_CONFIG.anomalyLog})
  --batch-size <number>  Records per batch (default: ${DEFAULT_INGEST_CONFIG.batchSize})
  --config <file>        YAML file with any of: input, database, anomalyLog, batchSize
  --preview [rows]       Print the first rows (default: ${DEFAULT_PREVIEW_ROWS}) and exit
  -h, --help             Show this help message
`

const ingestFileSchema = z
  .object({
    input: z.string().min(1),
    database: z.string().min(1),
    anomalyLog: z.string().min(1),
    batchSize: z.number().int().positive(),
  })
  .partial()
  .strict()

type IngestOverrides = z.infer<typeof ingestFileSchema>

const parsePositive = (value: string, flag: string): number => {
  const parsed = parseIntegerArg(value, flag)
  if (parsed <= 0) {
    throw new Error(`${flag} must be a positive integer: ${value}`)
  }
  return parsed
}

/**
 * Parses CLI arguments into an ingestion configuration.
 * Precedence: defaults, then the YAML file, then DATABASE_URL, then flags.
 * @param argv CLI arguments (excluding node and script path).
 * @param env Environment used for DATABASE_URL.
 * @throws When a flag is unknown, is missing its value, or has an invalid number.
 */
export const parseIngestArgs = (
  argv: string[],
  env: NodeJS.ProcessEnv = process.env
): IngestConfig => {
  const flags: IngestOverrides = {}
  let configFile: string | undefined
  let preview: number | null = null
  let help = false

  for (let i = 0; i < argv.length; i += 1) {
    const flag = argv[i]
    const value = argv[i + 1]

    if (flag === '--help' || flag === '-h') {
      help = true
    } else if (flag === '--input') {
      flags.input = requireValue(value, flag)
      i += 1
    } else if (flag === '--database') {
      flags.database = requireValue(value, flag)
      i += 1
    } else if (flag === '--anomaly-log') {
      flags.anomalyLog = requireValue(value, flag)
      i += 1
    } else if (flag === '--batch-size') {
      flags.batchSize = parsePositive(requireValue(value, flag), flag)
      i += 1
    } else if (flag === '--config') {
      configFile = requireValue(value, flag)
      i += 1
    } else if (flag === '--preview') {
      if (value != null && /^\d+$/.test(value)) {
        preview = parsePositive(value, flag)
        i += 1
      } else {
        preview = DEFAULT_PREVIEW_ROWS
      }
    } else {
      throw new Error(`Unknown argument: ${flag}`)
    }
  }

  const fromFile: IngestOverrides = configFile ? loadYamlConfig(configFile, ingestFileSchema) : {}
  const fromEnv: IngestOverrides = env.DATABASE_URL ? { database: env.DATABASE_URL } : {}

  return {
    ...DEFAULT_INGEST_CONFIG,
    ...fromFile,
    ...fromEnv,
    ...flags,
    preview,
    help,
  }
}
