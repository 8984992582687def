import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { DEFAULT_ANALYTICS_CONFIG, parseAnalyticsArgs } from './config'

describe('parseAnalyticsArgs', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'analytics-config-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('returns defaults without arguments', () => {
    expect(parseAnalyticsArgs([], {})).toEqual(DEFAULT_ANALYTICS_CONFIG)
  })

  it('reads flags', () => {
    expect(
      parseAnalyticsArgs(['--http-port', '8080', '--grpc-address', '0.0.0.0:7000', '--no-grpc'], {})
    ).toMatchObject({ httpPort: 8080, grpcAddress: '0.0.0.0:7000', grpc: false, http: true })
  })

  it('layers the config file, DATABASE_URL and flags', async () => {
    const file = join(dir, 'analytics.yaml')
    await writeFile(file, 'database: sqlite:///file.db\nhttpPort: 6000\nhttp: false\n')

    const config = parseAnalyticsArgs(['--config', file, '--http-port', '7000'], {
      DATABASE_URL: 'sqlite:///env.db',
    })

    expect(config).toMatchObject({
      database: 'sqlite:///env.db',
      httpPort: 7000,
      http: false,
      grpc: true,
    })
  })

  it('rejects invalid values', () => {
    expect(() => parseAnalyticsArgs(['--http-port', '70000'], {})).toThrow(
      '--http-port must be between 0 and 65535: 70000'
    )
    expect(() => parseAnalyticsArgs(['--grpc-address'], {})).toThrow('Missing value for --grpc-address')
    expect(() => parseAnalyticsArgs(['--port', '1'], {})).toThrow('Unknown argument: --port')
  })

  it('refuses to start with both APIs disabled', () => {
    expect(() => parseAnalyticsArgs(['--no-http', '--no-grpc'], {})).toThrow(
      'Nothing to start: both the HTTP and the gRPC API are disabled'
    )
  })
})
