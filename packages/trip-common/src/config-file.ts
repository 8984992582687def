import { readFileSync } from 'node:fs'
import * as yaml from 'js-yaml'
import type { z } from 'zod'

/**
 * Reads a YAML config file and validates it against a schema.
 * An empty file yields an empty object.
 * @param path YAML file path.
 * @param schema Schema describing the accepted keys.
 * @throws When the file cannot be read, is not valid YAML, or fails validation.
 */
export const loadYamlConfig = <T extends z.ZodTypeAny>(path: string, schema: T): z.infer<T> => {
  const content = readFileSync(path, 'utf8')
  const parsed: unknown = yaml.load(content) ?? {}
  const result = schema.safeParse(parsed)
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    throw new Error(`Invalid config file ${path}: ${issues}`)
  }
  return result.data
}

/**
 * Parses a flag value as an integer.
 * @throws When the value is not an integer.
 */
export const parseIntegerArg = (value: string, flag: string): number => {
  const parsed = Number(value)
  if (!Number.isInteger(parsed)) {
    throw new Error(`Invalid numeric value for ${flag}: ${value}`)
  }
  return parsed
}

export const requireValue = (value: string | undefined, flag: string): string => {
  if (value == null || value.startsWith('--')) {
    throw new Error(`Missing value for ${flag}`)
  }
  return value
}
