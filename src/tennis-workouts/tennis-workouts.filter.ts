import { workoutSchema } from '../health-export/health-export.schema'
import type { Workout } from '../health-export/health-export.types'
import type { RejectedRecord, TennisFilterOptions, TennisFilterResult } from './tennis-workouts.types'

export const DEFAULT_TENNIS_FILTER: TennisFilterOptions = {
  marker: 'Tennis',
  minDurationSec: 180,
}

export const isValidTennisWorkout = (
  workout: Pick<Workout, 'name' | 'duration'>,
  options: TennisFilterOptions = DEFAULT_TENNIS_FILTER,
): boolean => workout.name.includes(options.marker) && workout.duration > options.minDurationSec

const idOf = (entry: unknown): string | null => {
  if (typeof entry !== 'object' || entry === null || !('id' in entry)) return null
  return typeof entry.id === 'string' ? entry.id : null
}

/**
 * Keeps the well-formed tennis sessions of an export, in input order.
 * Malformed entries are reported in `rejected` instead of failing the batch;
 * well-formed workouts of other sports or too short are simply dropped.
 */
export function filterTennisWorkouts(
  entries: readonly unknown[],
  options: TennisFilterOptions = DEFAULT_TENNIS_FILTER,
): TennisFilterResult {
  const workouts: Workout[] = []
  const rejected: RejectedRecord[] = []

  entries.forEach((entry, index) => {
    const parsed = workoutSchema.safeParse(entry)
    if (!parsed.success) {
      rejected.push({
        index,
        id: idOf(entry),
        reason: parsed.error.issues
          .map((issue) => `${issue.path.join('.') || '(record)'}: ${issue.message}`)
          .join('; '),
      })
      return
    }

    const workout: Workout = parsed.data
    if (isValidTennisWorkout(workout, options)) workouts.push(workout)
  })

  return { workouts, rejected }
}
