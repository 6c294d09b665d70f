import type { Metric } from './metric-value'

export type HrZoneDistribution = {
  /** < 70% of max HR */
  zone1: number
  /** 70-85% of max HR */
  zone2: number
  /** > 85% of max HR */
  zone3: number
  sampledMinutes: number
}

export type MinutePoint = {
  /** offset from the first sample of the series */
  minute: number
  value: Metric
}

export type HalvesComparison = {
  firstHalf: number
  secondHalf: number
  change: number
}

export type DataQuality = {
  sufficient: boolean
  reasons: Array<'short-duration' | 'low-heart-rate' | 'missing-heart-rate'>
}

export type DerivedMetrics = {
  workoutId: string
  durationSec: number
  durationMin: number
  avgHeartRate: Metric
  maxHeartRate: Metric
  /** kJ, as exported */
  activeEnergyKj: Metric
  distanceKm: Metric
  stepCadence: Metric
  trimp: Metric
  hrZones: Metric<HrZoneDistribution>
  hrr1: Metric
  hrRange: Metric
  /** bpm per minute, least-squares slope of the per-minute average */
  cardiacDrift: Metric
  totalSteps: Metric
  hrCadenceRatio: MinutePoint[]
  energyPerStep: MinutePoint[]
  spmHalves: Metric<HalvesComparison>
  energyHalves: Metric<HalvesComparison>
  dataQuality: DataQuality
}

export type PeriodAggregate = {
  workoutCount: number
  totalDurationSec: number
  weightedAvgHeartRate: Metric
  peakHeartRate: Metric
  totalActiveEnergyKj: number
  totalDistanceKm: number
  totalTrimp: number
  totalSteps: number
}
