import { z } from 'zod'
import type { DerivedMetrics } from '../workout-metrics/workout-metrics.types'

// Persisted keys stay snake_case; metrics are written for readers of the file and not read back.
export const processedStateFileSchema = z
  .object({
    timestamp: z.string(),
    workout_id: z.string().min(1),
    ai_report: z.string(),
    processed_workout_ids: z.array(z.string()).default([]),
  })
  .passthrough()

export type ProcessedStateFile = {
  timestamp: string
  workout_id: string
  ai_report: string
  processed_workout_ids: string[]
  metrics?: DerivedMetrics
}
