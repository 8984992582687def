import { existsSync } from 'node:fs'
import { createServer, type IncomingMessage, type ServerResponse } from 'node:http'
import { silentLogger, type Logger } from '@trip-insights/trip-common'
import type { AggregationEngine } from './aggregation'
import {
  ParameterError,
  parseBusiestHoursParams,
  parseDistributionParams,
  parseSpeedHistogramParams,
  parseSummaryParams,
} from './query-params'

export interface AnalyticsHttpContext {
  engine: AggregationEngine
  /** Database URL as configured, reported by /health. */
  databaseUrl: string
  /** Resolved SQLite file path. */
  databasePath: string
  fileExists?: (path: string) => boolean
  logger?: Logger
}

export interface AnalyticsHttpResponse {
  status: number
  body: unknown
}

type RouteHandler = (
  context: AnalyticsHttpContext,
  params: Record<string, unknown>
) => Promise<unknown>

const routes: Record<string, RouteHandler> = {
  '/health': async (context) => ({
    status: 'ok',
    database_url: context.databaseUrl,
    sqlite_file_path: context.databasePath,
    sqlite_file_exists: (context.fileExists ?? existsSync)(context.databasePath),
  }),
  '/api/summary': async (context, params) => context.engine.summary(parseSummaryParams(params)),
  '/api/busiest_hours': async (context, params) => {
    const { k, filter } = parseBusiestHoursParams(params)
    return { top: await context.engine.busiestHours(k, filter) }
  },
  '/api/distribution': async (context, params) =>
    context.engine.distribution(parseDistributionParams(params)),
  '/api/speeds_hist': async (context, params) => {
    const { binSize, filter } = parseSpeedHistogramParams(params)
    return { bins: await context.engine.speedHistogram(binSize, filter) }
  },
}

/**
 * Routes one request to the aggregation engine without touching a socket.
 * @param context Engine and database details.
 * @param method HTTP method.
 * @param rawUrl Request path with query string.
 */
export const handleAnalyticsRequest = async (
  context: AnalyticsHttpContext,
  method: string,
  rawUrl: string
): Promise<AnalyticsHttpResponse> => {
  const url = new URL(rawUrl, 'http://localhost')
  const route = Object.hasOwn(routes, url.pathname) ? routes[url.pathname] : undefined
  if (!route) {
    return { status: 404, body: { error: 'not_found', path: url.pathname } }
  }
  if (method !== 'GET') {
    return { status: 405, body: { error: 'method_not_allowed', method } }
  }

  try {
    return { status: 200, body: await route(context, Object.fromEntries(url.searchParams)) }
  } catch (error) {
    if (error instanceof ParameterError) {
      return { status: 400, body: { error: 'invalid_parameters', issues: error.issues } }
    }
    const logger = context.logger ?? silentLogger
    logger.error(`${method} ${url.pathname} failed`, error)
    return { status: 500, body: { error: 'internal_error' } }
  }
}

export interface AnalyticsHttpConfig {
  host: string
  port: number
}

/**
 * Runtime handle for the HTTP API.
 */
export interface AnalyticsHttpHandle {
  /** Port actually bound (useful when 0 was requested). */
  port: number
  stop: () => Promise<void>
}

const writeJson = (res: ServerResponse, response: AnalyticsHttpResponse): void => {
  const headers: Record<string, string> = { 'Content-Type': 'application/json; charset=utf-8' }
  if (response.status === 405) {
    headers.Allow = 'GET'
  }
  res.writeHead(response.status, headers)
  res.end(JSON.stringify(response.body))
}

/**
 * Starts the JSON API on node:http.
 * @returns Handle for shutting down the server.
 */
export const startAnalyticsHttpServer = async (
  config: AnalyticsHttpConfig,
  context: AnalyticsHttpContext
): Promise<AnalyticsHttpHandle> => {
  const logger = context.logger ?? silentLogger

  const handle = async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    const response = await handleAnalyticsRequest(context, req.method ?? 'GET', req.url ?? '/')
    writeJson(res, response)
  }

  const server = createServer((req, res) => {
    handle(req, res).catch((error: unknown) => {
      logger.error('Failed to write HTTP response', error)
      if (!res.headersSent) {
        res.writeHead(500)
      }
      res.end()
    })
  })

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject)
    server.listen(config.port, config.host, () => {
      server.off('error', reject)
      resolve()
    })
  })

  const address = server.address()
  const port = typeof address === 'object' && address !== null ? address.port : config.port
  logger.info(`HTTP API listening on http://${config.host}:${port}`)

  const stop = async (): Promise<void> => {
    await new Promise<void>((resolve, reject) => {
      server.close((error) => {
        if (error) {
          reject(error)
          return
        }
        resolve()
      })
      server.closeAllConnections()
    })
  }

  return { port, stop }
}
