import type { PlayerProfile } from '../config/tennis-config'
import type { Workout } from '../health-export/health-export.types'
import { metricValueOrNull } from '../workout-metrics/metric-value'
import type { DerivedMetrics, PeriodAggregate } from '../workout-metrics/workout-metrics.types'
import type { MatchReportPayload, PeriodReportPayload, PeriodSession } from './match-report.types'

export const KJ_PER_KCAL = 4.184

export const kjToKcal = (kj: number): number => kj / KJ_PER_KCAL

export function buildMatchReportPayload(
  workout: Workout,
  metrics: DerivedMetrics,
  player: PlayerProfile,
): MatchReportPayload {
  const energyKj = metricValueOrNull(metrics.activeEnergyKj)
  return {
    kind: 'match',
    player,
    workout,
    metrics,
    presentation: {
      durationMin: metrics.durationMin,
      activeEnergyKcal: energyKj === null ? null : kjToKcal(energyKj),
      trimp: metricValueOrNull(metrics.trimp),
      hrr1: metricValueOrNull(metrics.hrr1),
    },
  }
}

export function buildPeriodReportPayload(
  date: string,
  sessions: PeriodSession[],
  aggregate: PeriodAggregate,
  player: PlayerProfile,
): PeriodReportPayload {
  return {
    kind: 'period',
    date,
    player,
    sessions,
    aggregate,
    presentation: {
      totalDurationMin: aggregate.totalDurationSec / 60,
      totalActiveEnergyKcal: kjToKcal(aggregate.totalActiveEnergyKj),
      weightedAvgHeartRate: metricValueOrNull(aggregate.weightedAvgHeartRate),
      sessionTrimp: sessions.map(({ metrics }) => ({
        workoutId: metrics.workoutId,
        trimp: metricValueOrNull(metrics.trimp),
        hrr1: metricValueOrNull(metrics.hrr1),
      })),
    },
  }
}
