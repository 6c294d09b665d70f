import type { ProcessedEntry, ProcessedMarker } from './processed-state.types'

export const DEFAULT_MAX_PROCESSED_IDS = 200

export function isProcessed(workoutId: string, marker: ProcessedMarker | null): boolean {
  if (!marker) return false
  return marker.workoutId === workoutId || marker.processedWorkoutIds.includes(workoutId)
}

export function markProcessed(
  marker: ProcessedMarker | null,
  entry: ProcessedEntry,
  now: Date,
  maxIds: number = DEFAULT_MAX_PROCESSED_IDS,
): ProcessedMarker {
  const seen = marker?.processedWorkoutIds ?? []
  // a state file without the history still names its latest workout
  const carried = marker && !seen.includes(marker.workoutId) ? [...seen, marker.workoutId] : seen
  const history = carried.filter((id) => id !== entry.workoutId)
  history.push(entry.workoutId)

  return {
    timestamp: now.toISOString(),
    workoutId: entry.workoutId,
    aiReport: entry.aiReport,
    processedWorkoutIds: history.slice(-maxIds),
    ...(entry.metrics ? { metrics: entry.metrics } : {}),
  }
}
