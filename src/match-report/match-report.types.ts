import type { PlayerProfile } from '../config/tennis-config'
import type { Workout } from '../health-export/health-export.types'
import type { DerivedMetrics, PeriodAggregate } from '../workout-metrics/workout-metrics.types'

export type MatchPresentation = {
  durationMin: number
  activeEnergyKcal: number | null
  trimp: number | null
  hrr1: number | null
}

export type MatchReportPayload = {
  kind: 'match'
  player: PlayerProfile
  workout: Workout
  metrics: DerivedMetrics
  presentation: MatchPresentation
}

export type PeriodSession = {
  workout: Workout
  metrics: DerivedMetrics
}

export type PeriodReportPayload = {
  kind: 'period'
  date: string
  player: PlayerProfile
  sessions: PeriodSession[]
  aggregate: PeriodAggregate
  presentation: {
    totalDurationMin: number
    totalActiveEnergyKcal: number
    weightedAvgHeartRate: number | null
    sessionTrimp: Array<{ workoutId: string; trimp: number | null; hrr1: number | null }>
  }
}

export type ReportPayload = MatchReportPayload | PeriodReportPayload

export type ReportPrompt<P extends ReportPayload = ReportPayload> = {
  system: string
  user: string
  payload: P
}
