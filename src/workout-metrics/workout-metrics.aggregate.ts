import { type Metric, defined, undefinedMetric } from './metric-value'
import type { DerivedMetrics, PeriodAggregate } from './workout-metrics.types'

type AggregateInput = Pick<
  DerivedMetrics,
  'durationSec' | 'avgHeartRate' | 'maxHeartRate' | 'activeEnergyKj' | 'distanceKm' | 'trimp' | 'totalSteps'
>

const sumDefined = (metrics: Metric[]): number =>
  metrics.reduce((sum, m) => (m.status === 'ok' ? sum + m.value : sum), 0)

/**
 * Combines per-workout metrics for a day or any other period. Undefined
 * per-workout values contribute nothing; the weighted average only weighs
 * workouts that carry an average heart rate.
 */
export function aggregateWorkoutMetrics(items: readonly AggregateInput[]): PeriodAggregate {
  let weightedHr = 0
  let weightSec = 0
  let peak: number | null = null

  for (const item of items) {
    if (item.avgHeartRate.status === 'ok') {
      weightedHr += item.avgHeartRate.value * item.durationSec
      weightSec += item.durationSec
    }
    if (item.maxHeartRate.status === 'ok') {
      peak = peak === null ? item.maxHeartRate.value : Math.max(peak, item.maxHeartRate.value)
    }
  }

  return {
    workoutCount: items.length,
    totalDurationSec: items.reduce((sum, item) => sum + item.durationSec, 0),
    weightedAvgHeartRate: weightSec > 0 ? defined(weightedHr / weightSec) : undefinedMetric('division-by-zero'),
    peakHeartRate: peak === null ? undefinedMetric('missing-data') : defined(peak),
    totalActiveEnergyKj: sumDefined(items.map((item) => item.activeEnergyKj)),
    totalDistanceKm: sumDefined(items.map((item) => item.distanceKm)),
    totalTrimp: sumDefined(items.map((item) => item.trimp)),
    totalSteps: sumDefined(items.map((item) => item.totalSteps)),
  }
}
