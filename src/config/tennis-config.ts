import { z } from 'zod'

export const TENNIS_CONFIG = Symbol('TENNIS_CONFIG')

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((v) => v === 'true' || v === '1')

const tennisEnvSchema = z.object({
  TENNIS_EXPORT_DIR: z.string().min(1).default('./exports'),
  TENNIS_STATE_FILE: z.string().min(1).default('./state/latest_match.json'),
  TENNIS_WORKOUT_MARKER: z.string().min(1).default('Tennis'),
  TENNIS_MIN_DURATION_SEC: z.coerce.number().int().nonnegative().default(180),
  TENNIS_MAX_PROCESSED_IDS: z.coerce.number().int().positive().default(200),
  TENNIS_PLAYER_HANDEDNESS: z.enum(['left', 'right']).default('left'),
  TENNIS_PLAYER_BACKHAND: z.enum(['one-handed', 'two-handed']).default('one-handed'),
  TENNIS_PLAYER_LEVEL: z.string().min(1).default('NTRP 4.0'),
  TENNIS_DATE: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD')
    .optional(),
  TENNIS_PERIOD_REVIEW: booleanFlag,
})

export type PlayerProfile = {
  handedness: 'left' | 'right'
  backhand: 'one-handed' | 'two-handed'
  level: string
}

export type TennisConfig = {
  exportDir: string
  stateFile: string
  workoutMarker: string
  minDurationSec: number
  maxProcessedIds: number
  player: PlayerProfile
  date: string | null
  periodReview: boolean
}

export class TennisConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`)
    this.name = 'TennisConfigError'
  }
}

export const loadTennisConfig = (env: NodeJS.ProcessEnv = process.env): TennisConfig => {
  const parsed = tennisEnvSchema.safeParse(env)
  if (!parsed.success) {
    throw new TennisConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    )
  }

  const e = parsed.data
  return {
    exportDir: e.TENNIS_EXPORT_DIR,
    stateFile: e.TENNIS_STATE_FILE,
    workoutMarker: e.TENNIS_WORKOUT_MARKER,
    minDurationSec: e.TENNIS_MIN_DURATION_SEC,
    maxProcessedIds: e.TENNIS_MAX_PROCESSED_IDS,
    player: {
      handedness: e.TENNIS_PLAYER_HANDEDNESS,
      backhand: e.TENNIS_PLAYER_BACKHAND,
      level: e.TENNIS_PLAYER_LEVEL,
    },
    date: e.TENNIS_DATE ?? null,
    periodReview: e.TENNIS_PERIOD_REVIEW,
  }
}
