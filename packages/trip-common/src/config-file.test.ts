import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { z } from 'zod'
import { loadYamlConfig, parseIntegerArg, requireValue } from './config-file'

const schema = z.object({ name: z.string(), size: z.number().int() }).partial().strict()

describe('loadYamlConfig', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'config-file-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('parses and validates YAML', async () => {
    const path = join(dir, 'ok.yaml')
    await writeFile(path, 'name: trips\nsize: 3\n')
    expect(loadYamlConfig(path, schema)).toEqual({ name: 'trips', size: 3 })
  })

  it('treats an empty file as an empty object', async () => {
    const path = join(dir, 'empty.yaml')
    await writeFile(path, '')
    expect(loadYamlConfig(path, schema)).toEqual({})
  })

  it('lists validation issues with their paths', async () => {
    const path = join(dir, 'bad.yaml')
    await writeFile(path, 'size: many\n')
    expect(() => loadYamlConfig(path, schema)).toThrow(
      `Invalid config file ${path}: size: Expected number, received string`
    )
  })
})

describe('parseIntegerArg', () => {
  it('parses integers and rejects anything else', () => {
    expect(parseIntegerArg('42', '--count')).toBe(42)
    expect(() => parseIntegerArg('4.2', '--count')).toThrow('Invalid numeric value for --count: 4.2')
  })
})

describe('requireValue', () => {
  it('rejects a missing value or a following flag', () => {
    expect(requireValue('x', '--input')).toBe('x')
    expect(() => requireValue(undefined, '--input')).toThrow('Missing value for --input')
    expect(() => requireValue('--other', '--input')).toThrow('Missing value for --input')
  })
})
