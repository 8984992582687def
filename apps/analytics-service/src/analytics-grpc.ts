import { fileURLToPath } from 'node:url'
import * as grpc from '@grpc/grpc-js'
import { loadSync } from '@grpc/proto-loader'
import {
  silentLogger,
  type BusiestHour,
  type HistogramBin,
  type Logger,
  type TripSummary,
} from '@trip-insights/trip-common'
import type { AggregationEngine } from './aggregation'
import {
  ParameterError,
  parseBusiestHoursParams,
  parseDistributionParams,
  parseSpeedHistogramParams,
  parseSummaryParams,
} from './query-params'

export const ANALYTICS_PROTO_PATH = fileURLToPath(new URL('../proto/analytics.proto', import.meta.url))
export const ANALYTICS_SERVICE_NAME = 'analytics.v1.TripAnalytics'

type GrpcNode = grpc.GrpcObject[string]

/**
 * Loads the TripAnalytics service definition from the .proto file at run time.
 */
export const loadAnalyticsServiceDefinition = (
  protoPath: string = ANALYTICS_PROTO_PATH
): grpc.ServiceDefinition => {
  const packageDefinition = loadSync(protoPath, {
    keepCase: true,
    longs: Number,
    enums: String,
    defaults: false,
    oneofs: true,
  })
  let node: GrpcNode | undefined = grpc.loadPackageDefinition(packageDefinition)
  for (const segment of ANALYTICS_SERVICE_NAME.split('.')) {
    if (node === undefined || typeof node === 'function' || 'format' in node) {
      break
    }
    node = node[segment]
  }
  if (typeof node !== 'function') {
    throw new Error(`Service ${ANALYTICS_SERVICE_NAME} not found in ${protoPath}`)
  }
  return node.service
}

export interface SummaryResponse {
  trips: number
  avg_duration_s: number
  avg_km: number
  avg_kmh: number
}

export interface BusiestHoursResponse {
  top: BusiestHour[]
}

export interface DistributionResponse {
  counts: Record<string, number>
}

export interface SpeedHistogramResponse {
  bins: HistogramBin[]
}

/**
 * Plain request handlers behind the gRPC methods, keyed by rpc name.
 */
export interface AnalyticsHandlers {
  GetSummary: (request: unknown) => Promise<SummaryResponse>
  GetBusiestHours: (request: unknown) => Promise<BusiestHoursResponse>
  GetDistribution: (request: unknown) => Promise<DistributionResponse>
  GetSpeedHistogram: (request: unknown) => Promise<SpeedHistogramResponse>
}

const isRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === 'object' && value !== null
}

const readRequest = (request: unknown): Record<string, unknown> => (isRecord(request) ? request : {})

const toSummaryResponse = (summary: TripSummary): SummaryResponse => ({ ...summary })

export const createAnalyticsHandlers = (engine: AggregationEngine): AnalyticsHandlers => ({
  GetSummary: async (request) =>
    toSummaryResponse(await engine.summary(parseSummaryParams(readRequest(request)))),
  GetBusiestHours: async (request) => {
    const { k, filter } = parseBusiestHoursParams(readRequest(request))
    return { top: await engine.busiestHours(k, filter) }
  },
  GetDistribution: async (request) => {
    const counts: Record<string, number> = {}
    const distribution = await engine.distribution(parseDistributionParams(readRequest(request)))
    for (const [category, count] of Object.entries(distribution)) {
      if (count !== undefined) {
        counts[category] = count
      }
    }
    return { counts }
  },
  GetSpeedHistogram: async (request) => {
    const { binSize, filter } = parseSpeedHistogramParams(readRequest(request))
    return { bins: await engine.speedHistogram(binSize, filter) }
  },
})

/**
 * Maps a handler failure to a gRPC status.
 */
export const toServiceError = (error: unknown): Partial<grpc.StatusObject> => {
  if (error instanceof ParameterError) {
    return { code: grpc.status.INVALID_ARGUMENT, details: error.issues.join('; ') }
  }
  return {
    code: grpc.status.INTERNAL,
    details: error instanceof Error ? error.message : 'Internal error',
  }
}

const unary = <Response>(
  name: string,
  handler: (request: unknown) => Promise<Response>,
  logger: Logger
): grpc.handleUnaryCall<unknown, Response> => {
  return (call, callback) => {
    void handler(call.request).then(
      (response) => callback(null, response),
      (error: unknown) => {
        const status = toServiceError(error)
        if (status.code === grpc.status.INTERNAL) {
          logger.error(`${name} failed`, error)
        }
        callback(status)
      }
    )
  }
}

export interface AnalyticsGrpcConfig {
  /** Bind address, e.g. "127.0.0.1:6101". */
  address: string
  /** Grace period before a forced shutdown. */
  shutdownTimeoutMs?: number
}

/**
 * Runtime handle for the gRPC service.
 */
export interface AnalyticsGrpcHandle {
  port: number
  stop: () => Promise<void>
}

/**
 * Starts the TripAnalytics gRPC service.
 * @returns Handle for shutting down the service.
 */
export const startAnalyticsGrpcService = async (
  config: AnalyticsGrpcConfig,
  engine: AggregationEngine,
  logger: Logger = silentLogger
): Promise<AnalyticsGrpcHandle> => {
  const handlers = createAnalyticsHandlers(engine)
  const implementation: grpc.UntypedServiceImplementation = {
    GetSummary: unary('GetSummary', handlers.GetSummary, logger),
    GetBusiestHours: unary('GetBusiestHours', handlers.GetBusiestHours, logger),
    GetDistribution: unary('GetDistribution', handlers.GetDistribution, logger),
    GetSpeedHistogram: unary('GetSpeedHistogram', handlers.GetSpeedHistogram, logger),
  }

  const server = new grpc.Server()
  server.addService(loadAnalyticsServiceDefinition(), implementation)

  const port = await new Promise<number>((resolve, reject) => {
    server.bindAsync(config.address, grpc.ServerCredentials.createInsecure(), (error, boundPort) => {
      if (error) {
        reject(error)
        return
      }
      resolve(boundPort)
    })
  })
  logger.info(`gRPC service ${ANALYTICS_SERVICE_NAME} running at ${config.address}`)

  const stop = async (): Promise<void> => {
    const shutdownTimeoutMs = config.shutdownTimeoutMs ?? 5000

    await new Promise<void>((resolve, reject) => {
      let settled = false
      const timeout = setTimeout(() => {
        if (settled) {
          return
        }
        settled = true
        logger.warn('gRPC shutdown timed out; forcing shutdown.')
        server.forceShutdown()
        resolve()
      }, shutdownTimeoutMs)

      server.tryShutdown((error) => {
        if (settled) {
          return
        }
        settled = true
        clearTimeout(timeout)
        if (error) {
          server.forceShutdown()
          reject(error)
          return
        }
        resolve()
      })
    })
  }

  return { port, stop }
}
