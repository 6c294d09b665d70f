import type { RejectedRecord } from '../tennis-workouts/tennis-workouts.types'
import type { DerivedMetrics, PeriodAggregate } from '../workout-metrics/workout-metrics.types'

export type WorkoutProcessingResult =
  | { status: 'reported'; workoutId: string; metrics: DerivedMetrics; report: string }
  | { status: 'report-failed'; workoutId: string; metrics: DerivedMetrics; error: string }

export type DateProcessingOutcome =
  | { status: 'missing-file'; date: string }
  | { status: 'unreadable-file'; date: string; filePath: string; reason: string }
  | { status: 'no-valid-workouts'; date: string; rejected: RejectedRecord[] }
  | { status: 'no-new-workouts'; date: string; rejected: RejectedRecord[]; skipped: string[] }
  | {
      status: 'processed'
      date: string
      rejected: RejectedRecord[]
      skipped: string[]
      results: WorkoutProcessingResult[]
    }

export type DateReview =
  | { status: 'missing-file'; date: string }
  | { status: 'unreadable-file'; date: string; filePath: string; reason: string }
  | { status: 'no-valid-workouts'; date: string; rejected: RejectedRecord[] }
  | {
      status: 'reviewed'
      date: string
      metrics: DerivedMetrics[]
      aggregate: PeriodAggregate
      report: string | null
    }
