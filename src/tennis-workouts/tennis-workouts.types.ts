import type { Workout } from '../health-export/health-export.types'

export type TennisFilterOptions = {
  /** substring the workout name must contain, case-sensitive */
  marker: string
  /** exclusive lower bound, seconds */
  minDurationSec: number
}

export type RejectedRecord = {
  index: number
  id: string | null
  reason: string
}

export type TennisFilterResult = {
  workouts: Workout[]
  rejected: RejectedRecord[]
}
