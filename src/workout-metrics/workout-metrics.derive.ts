import type { HeartRateSample, QuantitySample, Workout } from '../health-export/health-export.types'
import { parseExportDate } from '../utils/export-date'
import {
  type Metric,
  defined,
  fromOptional,
  isFiniteNumber,
  safeDivide,
  undefinedMetric,
} from './metric-value'
import type {
  DataQuality,
  DerivedMetrics,
  HalvesComparison,
  HrZoneDistribution,
  MinutePoint,
} from './workout-metrics.types'

export const ZONE2_LOWER_PCT = 0.7
export const ZONE3_LOWER_PCT = 0.85
export const HRR_WINDOW_SEC = 60
export const MIN_ANALYZABLE_DURATION_SEC = 600
export const MIN_ANALYZABLE_AVG_HR = 70

const sampleAvgs = (samples: HeartRateSample[] | undefined): number[] =>
  (samples ?? []).map((s) => s.Avg).filter(isFiniteNumber)

const sampleQtys = (samples: QuantitySample[] | undefined): number[] =>
  (samples ?? []).map((s) => s.qty).filter(isFiniteNumber)

export function computeTrimp(durationSec: number, avgHr: Metric, maxHr: Metric): Metric {
  if (avgHr.status !== 'ok') return avgHr
  if (maxHr.status !== 'ok') return maxHr
  const ratio = safeDivide(avgHr.value, maxHr.value)
  if (ratio.status !== 'ok') return ratio
  return defined((durationSec / 60) * ratio.value)
}

export function computeHrZones(
  heartRateData: HeartRateSample[] | undefined,
  maxHr: Metric,
): Metric<HrZoneDistribution> {
  if (maxHr.status !== 'ok') return maxHr
  if (maxHr.value <= 0) return undefinedMetric('division-by-zero')

  const samples = sampleAvgs(heartRateData)
  if (samples.length === 0) return undefinedMetric('missing-data')

  let zone1 = 0
  let zone2 = 0
  let zone3 = 0
  for (const hr of samples) {
    const pct = hr / maxHr.value
    if (pct < ZONE2_LOWER_PCT) zone1++
    else if (pct <= ZONE3_LOWER_PCT) zone2++
    else zone3++
  }

  const n = samples.length
  return defined({ zone1: zone1 / n, zone2: zone2 / n, zone3: zone3 / n, sampledMinutes: n })
}

/**
 * Heart rate at the end of play minus the first recovery sample taken at
 * least a minute after the workout ended. The end rate is the first recovery
 * sample inside that minute, else the last per-minute average of the session.
 */
export function computeHrr1(workout: Pick<Workout, 'end' | 'heartRateData' | 'heartRateRecovery'>): Metric {
  const end = parseExportDate(workout.end)
  if (!end) return undefinedMetric('missing-data')
  const endMs = end.getTime()
  const target = endMs + HRR_WINDOW_SEC * 1000

  let endHr: number | undefined
  let recoveryHr: number | undefined
  for (const sample of workout.heartRateRecovery ?? []) {
    const at = parseExportDate(sample.date)
    if (!at || !isFiniteNumber(sample.Avg) || at.getTime() < endMs) continue
    if (at.getTime() >= target) {
      recoveryHr = sample.Avg
      break
    }
    if (endHr === undefined) endHr = sample.Avg
  }

  if (endHr === undefined) {
    const minuteAvgs = sampleAvgs(workout.heartRateData)
    if (minuteAvgs.length > 0) endHr = minuteAvgs[minuteAvgs.length - 1]
  }
  if (endHr === undefined) return undefinedMetric('missing-data')
  if (recoveryHr === undefined) return undefinedMetric('insufficient-samples')
  return defined(endHr - recoveryHr)
}

/** Index-aligned per-minute ratio; minutes beyond the shorter series are not reported. */
export function alignedRatio(
  numerators: Array<number | null | undefined>,
  denominators: Array<number | null | undefined>,
): MinutePoint[] {
  const length = Math.min(numerators.length, denominators.length)
  const points: MinutePoint[] = []
  for (let minute = 0; minute < length; minute++) {
    points.push({ minute, value: safeDivide(numerators[minute], denominators[minute]) })
  }
  return points
}

export function computeHalves(values: number[]): Metric<HalvesComparison> {
  if (values.length < 2) return undefinedMetric('insufficient-samples')
  const mid = Math.floor(values.length / 2)
  const mean = (xs: number[]) => xs.reduce((sum, x) => sum + x, 0) / xs.length
  const firstHalf = mean(values.slice(0, mid))
  const secondHalf = mean(values.slice(mid))
  return defined({ firstHalf, secondHalf, change: secondHalf - firstHalf })
}

export function computeCardiacDrift(heartRateData: HeartRateSample[] | undefined): Metric {
  const points: Array<{ x: number; y: number }> = []
  ;(heartRateData ?? []).forEach((s, minute) => {
    if (isFiniteNumber(s.Avg)) points.push({ x: minute, y: s.Avg })
  })
  if (points.length < 2) return undefinedMetric('insufficient-samples')

  const n = points.length
  const xMean = points.reduce((sum, p) => sum + p.x, 0) / n
  const yMean = points.reduce((sum, p) => sum + p.y, 0) / n
  let num = 0
  let den = 0
  for (const p of points) {
    num += (p.x - xMean) * (p.y - yMean)
    den += (p.x - xMean) ** 2
  }
  return safeDivide(num, den)
}

export function computeHrRange(workout: Pick<Workout, 'heartRate' | 'maxHeartRate' | 'heartRateData'>): Metric {
  const max = workout.heartRate?.max?.qty ?? workout.maxHeartRate?.qty
  let min = workout.heartRate?.min?.qty
  if (!isFiniteNumber(min)) {
    const mins = (workout.heartRateData ?? []).map((s) => s.Min).filter(isFiniteNumber)
    min = mins.length > 0 ? Math.min(...mins) : undefined
  }
  if (!isFiniteNumber(max) || !isFiniteNumber(min)) return undefinedMetric('missing-data')
  return defined(max - min)
}

export function assessDataQuality(durationSec: number, avgHr: Metric): DataQuality {
  const reasons: DataQuality['reasons'] = []
  if (durationSec < MIN_ANALYZABLE_DURATION_SEC) reasons.push('short-duration')
  if (avgHr.status !== 'ok') reasons.push('missing-heart-rate')
  else if (avgHr.value < MIN_ANALYZABLE_AVG_HR) reasons.push('low-heart-rate')
  return { sufficient: reasons.length === 0, reasons }
}

export function deriveWorkoutMetrics(workout: Workout): DerivedMetrics {
  const durationSec = workout.duration
  const avgHeartRate = fromOptional(workout.avgHeartRate?.qty)
  const maxHeartRate = fromOptional(workout.maxHeartRate?.qty)

  const hrSeries = (workout.heartRateData ?? []).map((s) => s.Avg)
  const stepSeries = (workout.stepCount ?? []).map((s) => s.qty)
  const energySeries = (workout.activeEnergy ?? []).map((s) => s.qty)
  const steps = sampleQtys(workout.stepCount)

  return {
    workoutId: workout.id,
    durationSec,
    durationMin: durationSec / 60,
    avgHeartRate,
    maxHeartRate,
    activeEnergyKj: fromOptional(workout.activeEnergyBurned?.qty),
    distanceKm: fromOptional(workout.distance?.qty),
    stepCadence: fromOptional(workout.stepCadence?.qty),
    trimp: computeTrimp(durationSec, avgHeartRate, maxHeartRate),
    hrZones: computeHrZones(workout.heartRateData, maxHeartRate),
    hrr1: computeHrr1(workout),
    hrRange: computeHrRange(workout),
    cardiacDrift: computeCardiacDrift(workout.heartRateData),
    totalSteps: steps.length > 0 ? defined(steps.reduce((sum, s) => sum + s, 0)) : undefinedMetric('missing-data'),
    hrCadenceRatio: alignedRatio(hrSeries, stepSeries),
    energyPerStep: alignedRatio(energySeries, stepSeries),
    spmHalves: computeHalves(steps),
    energyHalves: computeHalves(sampleQtys(workout.activeEnergy)),
    dataQuality: assessDataQuality(durationSec, avgHeartRate),
  }
}
