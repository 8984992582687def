import { z } from 'zod'
import { loadYamlConfig, parseIntegerArg, requireValue } from '@trip-insights/trip-common'
import { DEFAULT_DATABASE_URL } from '@trip-insights/trip-store'

/**
 * Configuration for the analytics service.
 */
export interface AnalyticsConfig {
  /** sqlite:/// URL or plain file path of the trips database. */
  database: string
  /** Host the HTTP API binds to. */
  httpHost: string
  httpPort: number
  /** gRPC bind address (e.g. "127.0.0.1:6101"). */
  grpcAddress: string
  /** Serve the JSON API. */
  http: boolean
  /** Serve the gRPC API. */
  grpc: boolean
  help: boolean
}

export const DEFAULT_ANALYTICS_CONFIG: AnalyticsConfig = {
  database: DEFAULT_DATABASE_URL,
  httpHost: '127.0.0.1',
  httpPort: 5000,
  grpcAddress: '127.0.0.1:6101',
  http: true,
  grpc: true,
  help: false,
}

export const usage = `Usage: analytics-service [options]

Options:
  --database <url>        sqlite:/// URL or file path (default: $DATABASE_URL or ${DEFAULT_ANALYTICS_CONFIG.database})
  --http-host <host>      HTTP bind host (default: ${DEFAULT_ANALYTICS_CONFIG.httpHost})
  --http-port <port>      HTTP port (default: ${DEFAULT_ANALYTICS_CONFIG.httpPort})
  --grpc-address <addr>   gRPC bind address (default: ${DEFAULT_ANALYTICS_CONFIG.grpcAddress})
  --no-http               Do not start the HTTP API
  --no-grpc               Do not start the gRPC API
  --config <file>         YAML file with any of: database, httpHost, httpPort, grpcAddress, http, grpc
  -h, --help              Show this help message
`

const analyticsFileSchema = z
  .object({
    database: z.string().min(1),
    httpHost: z.string().min(1),
    httpPort: z.number().int().min(0).max(65535),
    grpcAddress: z.string().min(1),
    http: z.boolean(),
    grpc: z.boolean(),
  })
  .partial()
  .strict()

type AnalyticsOverrides = z.infer<typeof analyticsFileSchema>

const parsePort = (value: string, flag: string): number => {
  const parsed = parseIntegerArg(value, flag)
  if (parsed < 0 || parsed > 65535) {
    throw new Error(`${flag} must be between 0 and 65535: ${value}`)
  }
  return parsed
}

/**
 * Parses CLI arguments into the analytics service configuration.
 * Precedence: defaults, then the YAML file, then DATABASE_URL, then flags.
 * @param argv CLI arguments (excluding node and script path).
 * @param env Environment used for DATABASE_URL.
 * @throws When a flag is invalid or both APIs end up disabled.
 */
export const parseAnalyticsArgs = (
  argv: string[],
  env: NodeJS.ProcessEnv = process.env
): AnalyticsConfig => {
  const flags: AnalyticsOverrides = {}
  let configFile: string | undefined
  let help = false

  for (let i = 0; i < argv.length; i += 1) {
    const flag = argv[i]
    const value = argv[i + 1]

    if (flag === '--help' || flag === '-h') {
      help = true
    } else if (flag === '--database') {
      flags.database = requireValue(value, flag)
      i += 1
    } else if (flag === '--http-host') {
      flags.httpHost = requireValue(value, flag)
      i += 1
    } else if (flag === '--http-port') {
      flags.httpPort = parsePort(requireValue(value, flag), flag)
      i += 1
    } else if (flag === '--grpc-address') {
      flags.grpcAddress = requireValue(value, flag)
      i += 1
    } else if (flag === '--no-http') {
      flags.http = false
    } else if (flag === '--no-grpc') {
      flags.grpc = false
    } else if (flag === '--config') {
      configFile = requireValue(value, flag)
      i += 1
    } else {
      throw new Error(`Unknown argument: ${flag}`)
    }
  }

  const fromFile: AnalyticsOverrides = configFile ? loadYamlConfig(configFile, analyticsFileSchema) : {}
  const fromEnv: AnalyticsOverrides = env.DATABASE_URL ? { database: env.DATABASE_URL } : {}

  const config: AnalyticsConfig = {
    ...DEFAULT_ANALYTICS_CONFIG,
    ...fromFile,
    ...fromEnv,
    ...flags,
    help,
  }
  if (!config.help && !config.http && !config.grpc) {
    throw new Error('Nothing to start: both the HTTP and the gRPC API are disabled')
  }
  return config
}
