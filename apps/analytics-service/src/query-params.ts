import { isValid, parse } from 'date-fns'
import { z } from 'zod'
import type { DistributionFilter, TripFilter } from '@trip-insights/trip-common'

export const DEFAULT_TOP_HOURS = 5
export const DEFAULT_BIN_SIZE = 5

/**
 * Raised when query parameters fail validation. `issues` holds one
 * `<param>: <message>` entry per problem.
 */
export class ParameterError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid parameters: ${issues.join('; ')}`)
    this.name = 'ParameterError'
  }
}

const blankToUndefined = (value: unknown): unknown => {
  if (value === null || (typeof value === 'string' && value.trim().length === 0)) {
    return undefined
  }
  return value
}

const toNumber = (value: unknown): unknown => {
  const present = blankToUndefined(value)
  return typeof present === 'string' ? Number(present.trim()) : present
}

const isCalendarDate = (value: string): boolean =>
  isValid(parse(value, 'yyyy-MM-dd', new Date(2000, 0, 1)))

const dateParam = z.preprocess(
  blankToUndefined,
  z
    .string()
    .trim()
    .regex(/^\d{4}-\d{2}-\d{2}$/, 'expected a date as YYYY-MM-DD')
    .refine(isCalendarDate, 'not a calendar date')
    .optional()
)

const integerParam = z.number({ invalid_type_error: 'expected an integer' }).int('expected an integer')

const positiveParam = (fallback: number) =>
  z.preprocess(toNumber, integerParam.positive('must be a positive integer').default(fallback))

const passengersParam = z.preprocess(toNumber, integerParam.nonnegative('must not be negative').optional())

const rushParam = z.preprocess(
  toNumber,
  z.union([z.literal(0), z.literal(1)], { errorMap: () => ({ message: 'expected 0 or 1' }) }).optional()
)

const filterShape = {
  start: dateParam,
  end: dateParam,
}

const summarySchema = z.object(filterShape)

const busiestHoursSchema = z.object({
  ...filterShape,
  k: positiveParam(DEFAULT_TOP_HOURS),
})

const distributionSchema = z.object({
  ...filterShape,
  rush: rushParam,
  min_passengers: passengersParam,
  max_passengers: passengersParam,
})

const speedHistogramSchema = z.object({
  ...filterShape,
  bin_size: positiveParam(DEFAULT_BIN_SIZE),
})

const validate = <T extends z.ZodTypeAny>(schema: T, input: Record<string, unknown>): z.infer<T> => {
  const result = schema.safeParse(input)
  if (!result.success) {
    throw new ParameterError(
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    )
  }
  return result.data
}

const toFilter = (params: { start?: string; end?: string }): TripFilter => {
  const filter: TripFilter = {}
  if (params.start !== undefined) {
    filter.start = params.start
  }
  if (params.end !== undefined) {
    filter.end = params.end
  }
  return filter
}

/**
 * @param input Raw parameters (strings from a query string or numbers from gRPC).
 * @throws ParameterError
 */
export const parseSummaryParams = (input: Record<string, unknown>): TripFilter =>
  toFilter(validate(summarySchema, input))

export const parseBusiestHoursParams = (
  input: Record<string, unknown>
): { k: number; filter: TripFilter } => {
  const params = validate(busiestHoursSchema, input)
  return { k: params.k, filter: toFilter(params) }
}

export const parseDistributionParams = (input: Record<string, unknown>): DistributionFilter => {
  const params = validate(distributionSchema, input)
  const filter: DistributionFilter = toFilter(params)
  if (params.rush !== undefined) {
    filter.rush = params.rush
  }
  if (params.min_passengers !== undefined) {
    filter.minPassengers = params.min_passengers
  }
  if (params.max_passengers !== undefined) {
    filter.maxPassengers = params.max_passengers
  }
  return filter
}

export const parseSpeedHistogramParams = (
  input: Record<string, unknown>
): { binSize: number; filter: TripFilter } => {
  const params = validate(speedHistogramSchema, input)
  return { binSize: params.bin_size, filter: toFilter(params) }
}
