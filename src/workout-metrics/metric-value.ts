export type UndefinedReason = 'missing-data' | 'division-by-zero' | 'insufficient-samples'

export type Metric<T = number> =
  | { status: 'ok'; value: T }
  | { status: 'undefined'; reason: UndefinedReason }

export const defined = <T>(value: T): Metric<T> => ({ status: 'ok', value })

export const undefinedMetric = <T = number>(reason: UndefinedReason): Metric<T> => ({
  status: 'undefined',
  reason,
})

export const metricValueOrNull = <T>(metric: Metric<T>): T | null =>
  metric.status === 'ok' ? metric.value : null

export const isFiniteNumber = (value: unknown): value is number =>
  typeof value === 'number' && Number.isFinite(value)

export const fromOptional = (value: number | null | undefined): Metric =>
  isFiniteNumber(value) ? defined(value) : undefinedMetric('missing-data')

/** Division where a zero or missing denominator is reported, never coerced to 0 or Infinity. */
export const safeDivide = (
  numerator: number | null | undefined,
  denominator: number | null | undefined,
): Metric => {
  if (!isFiniteNumber(numerator) || !isFiniteNumber(denominator)) {
    return undefinedMetric('missing-data')
  }
  if (denominator === 0) return undefinedMetric('division-by-zero')
  return defined(numerator / denominator)
}
