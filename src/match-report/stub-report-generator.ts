import { Injectable } from '@nestjs/common'
import { metricValueOrNull } from '../workout-metrics/metric-value'
import type { MatchReportPayload, PeriodReportPayload, ReportPrompt } from './match-report.types'
import type { ReportGenerator } from './report-generator'

const fmt = (value: number | null, digits: number, unit = ''): string =>
  value === null ? 'n/a' : `${value.toFixed(digits)}${unit}`

const pct = (share: number): string => `${Math.round(share * 100)}%`

/**
 * Deterministic report built from the payload numbers alone. Used when no
 * language model is wired in, and in tests.
 */
@Injectable()
export class StubReportGenerator implements ReportGenerator {
  readonly name = 'stub'

  async generate(prompt: ReportPrompt): Promise<string> {
    const payload = prompt.payload
    return payload.kind === 'match' ? this.matchReport(payload) : this.periodReport(payload)
  }

  private matchReport({ workout, metrics, presentation }: MatchReportPayload): string {
    if (!metrics.dataQuality.sufficient) {
      return `Data insufficient (${metrics.dataQuality.reasons.join(', ')}): ${workout.name}, ${workout.start}.`
    }

    const zones = metrics.hrZones
    const zoneText =
      zones.status === 'ok'
        ? `Z1 ${pct(zones.value.zone1)} / Z2 ${pct(zones.value.zone2)} / Z3 ${pct(zones.value.zone3)}`
        : 'n/a'

    return [
      `${workout.name}, ${workout.start}: ${fmt(presentation.durationMin, 0, ' min')}, TRIMP ${fmt(presentation.trimp, 1)}.`,
      `Heart rate: avg ${fmt(metricValueOrNull(metrics.avgHeartRate), 0, ' bpm')}, max ${fmt(metricValueOrNull(metrics.maxHeartRate), 0, ' bpm')}, range ${fmt(metricValueOrNull(metrics.hrRange), 0, ' bpm')}.`,
      `Zones: ${zoneText}.`,
      `Energy: ${fmt(presentation.activeEnergyKcal, 0, ' kcal')}; distance ${fmt(metricValueOrNull(metrics.distanceKm), 2, ' km')}.`,
      `Recovery: HRR1 ${fmt(presentation.hrr1, 0, ' bpm')}.`,
    ].join('\n')
  }

  private periodReport({ date, aggregate, presentation }: PeriodReportPayload): string {
    if (aggregate.workoutCount === 0) return `${date}: no tennis sessions.`

    const perSession = presentation.sessionTrimp
      .map((s) => `${s.workoutId} ${fmt(s.trimp, 1)}`)
      .join(', ')

    return [
      `${date}: ${aggregate.workoutCount} sessions, ${fmt(presentation.totalDurationMin, 0, ' min')}, ${fmt(presentation.totalActiveEnergyKcal, 0, ' kcal')}.`,
      `Weighted avg HR ${fmt(presentation.weightedAvgHeartRate, 1, ' bpm')}, peak ${fmt(metricValueOrNull(aggregate.peakHeartRate), 0, ' bpm')}.`,
      `TRIMP total ${fmt(aggregate.totalTrimp, 1)}: ${perSession}.`,
    ].join('\n')
  }
}
