import { Inject, Injectable, Logger } from '@nestjs/common'
import { CLOCK, type Clock } from '../common/clock'
import { TENNIS_CONFIG, type TennisConfig } from '../config/tennis-config'
import { HealthExportService } from '../health-export/health-export.service'
import type { Workout } from '../health-export/health-export.types'
import { MatchReportService } from '../match-report/match-report.service'
import { ProcessedStateStore } from '../processed-state/processed-state.store'
import { isProcessed, markProcessed } from '../processed-state/processed-state.tracker'
import { filterTennisWorkouts } from '../tennis-workouts/tennis-workouts.filter'
import type { TennisFilterResult } from '../tennis-workouts/tennis-workouts.types'
import { aggregateWorkoutMetrics } from '../workout-metrics/workout-metrics.aggregate'
import { deriveWorkoutMetrics } from '../workout-metrics/workout-metrics.derive'
import type { DateProcessingOutcome, DateReview, WorkoutProcessingResult } from './tennis-sessions.types'

type LoadedDate =
  | { status: 'missing-file'; date: string }
  | { status: 'unreadable-file'; date: string; filePath: string; reason: string }
  | { status: 'loaded'; filtered: TennisFilterResult }

@Injectable()
export class TennisSessionsService {
  private readonly logger = new Logger(TennisSessionsService.name)

  constructor(
    @Inject(TENNIS_CONFIG) private readonly config: TennisConfig,
    @Inject(CLOCK) private readonly clock: Clock,
    private readonly healthExportService: HealthExportService,
    private readonly processedStateStore: ProcessedStateStore,
    private readonly matchReportService: MatchReportService,
  ) {}

  private async loadDate(date: string): Promise<LoadedDate> {
    const read = await this.healthExportService.readForDate(date)
    if (read.status === 'missing') return { status: 'missing-file', date }
    if (read.status === 'unreadable') {
      return { status: 'unreadable-file', date, filePath: read.filePath, reason: read.reason }
    }

    const filtered = filterTennisWorkouts(read.entries, {
      marker: this.config.workoutMarker,
      minDurationSec: this.config.minDurationSec,
    })
    for (const r of filtered.rejected) {
      this.logger.warn(`Skipping malformed workout record #${r.index}${r.id ? ` (${r.id})` : ''}: ${r.reason}`)
    }

    // overlapping exports of the same day repeat workouts
    const seen = new Set<string>()
    const workouts = filtered.workouts.filter((workout) => {
      if (seen.has(workout.id)) return false
      seen.add(workout.id)
      return true
    })
    if (workouts.length < filtered.workouts.length) {
      this.logger.log(`Dropped ${filtered.workouts.length - workouts.length} repeated workout(s) for ${date}`)
    }

    return { status: 'loaded', filtered: { ...filtered, workouts } }
  }

  /**
   * Reports every tennis session of the day that has not been reported yet.
   * A session whose report fails stays unmarked and is retried next run.
   */
  async processDate(date: string): Promise<DateProcessingOutcome> {
    const loaded = await this.loadDate(date)
    if (loaded.status !== 'loaded') return loaded

    const { workouts, rejected } = loaded.filtered
    if (workouts.length === 0) {
      this.logger.log(`No valid tennis workouts for ${date}`)
      return { status: 'no-valid-workouts', date, rejected }
    }

    let marker = await this.processedStateStore.load()
    const skipped: string[] = []
    const fresh: Workout[] = []
    for (const workout of workouts) {
      if (isProcessed(workout.id, marker)) skipped.push(workout.id)
      else fresh.push(workout)
    }

    if (fresh.length === 0) {
      this.logger.log(`No new tennis workouts for ${date} (${skipped.length} already processed)`)
      return { status: 'no-new-workouts', date, rejected, skipped }
    }

    const results: WorkoutProcessingResult[] = []
    for (const workout of fresh) {
      const metrics = deriveWorkoutMetrics(workout)

      let report: string
      try {
        report = await this.matchReportService.generateMatchReport(workout, metrics)
      } catch (err) {
        const error = err instanceof Error ? err.message : String(err)
        this.logger.error(`Report failed for workout ${workout.id}: ${error}`)
        results.push({ status: 'report-failed', workoutId: workout.id, metrics, error })
        continue
      }

      marker = markProcessed(
        marker,
        { workoutId: workout.id, aiReport: report, metrics },
        this.clock.now(),
        this.config.maxProcessedIds,
      )
      await this.processedStateStore.save(marker)
      this.logger.log(`Processed workout ${workout.id}`)
      results.push({ status: 'reported', workoutId: workout.id, metrics, report })
    }

    return { status: 'processed', date, rejected, skipped, results }
  }

  /** Day-level view over every valid session, processed or not. */
  async reviewDate(date: string, opts?: { minSessionsForReport?: number }): Promise<DateReview> {
    const loaded = await this.loadDate(date)
    if (loaded.status !== 'loaded') return loaded

    const { workouts, rejected } = loaded.filtered
    if (workouts.length === 0) return { status: 'no-valid-workouts', date, rejected }

    const sessions = workouts.map((workout) => ({ workout, metrics: deriveWorkoutMetrics(workout) }))
    const metrics = sessions.map((s) => s.metrics)
    const aggregate = aggregateWorkoutMetrics(metrics)

    let report: string | null = null
    if (workouts.length >= (opts?.minSessionsForReport ?? 1)) {
      try {
        report = await this.matchReportService.generatePeriodReport(date, sessions, aggregate)
      } catch (err) {
        this.logger.error(`Period report failed for ${date}: ${err instanceof Error ? err.message : String(err)}`)
      }
    }

    return { status: 'reviewed', date, metrics, aggregate, report }
  }
}
