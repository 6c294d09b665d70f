import type { DerivedMetrics } from '../workout-metrics/workout-metrics.types'

export type ProcessedMarker = {
  /** ISO time the marker was written */
  timestamp: string
  workoutId: string
  aiReport: string
  /** newest last, bounded */
  processedWorkoutIds: string[]
  metrics?: DerivedMetrics
}

export type ProcessedEntry = {
  workoutId: string
  aiReport: string
  metrics?: DerivedMetrics
}
