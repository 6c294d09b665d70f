import { TennisConfigError, loadTennisConfig } from './tennis-config'

describe('loadTennisConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = loadTennisConfig({})

    expect(config).toEqual({
      exportDir: './exports',
      stateFile: './state/latest_match.json',
      workoutMarker: 'Tennis',
      minDurationSec: 180,
      maxProcessedIds: 200,
      player: { handedness: 'left', backhand: 'one-handed', level: 'NTRP 4.0' },
      date: null,
      periodReview: false,
    })
  })

  it('reads overrides and coerces numbers and flags', () => {
    const config = loadTennisConfig({
      TENNIS_EXPORT_DIR: '/data/exports',
      TENNIS_WORKOUT_MARKER: '网球',
      TENNIS_MIN_DURATION_SEC: '300',
      TENNIS_MAX_PROCESSED_IDS: '50',
      TENNIS_PLAYER_HANDEDNESS: 'right',
      TENNIS_DATE: '2026-10-18',
      TENNIS_PERIOD_REVIEW: 'true',
    })

    expect(config.exportDir).toBe('/data/exports')
    expect(config.workoutMarker).toBe('网球')
    expect(config.minDurationSec).toBe(300)
    expect(config.maxProcessedIds).toBe(50)
    expect(config.player.handedness).toBe('right')
    expect(config.date).toBe('2026-10-18')
    expect(config.periodReview).toBe(true)
  })

  it('rejects a malformed date with the offending variable named', () => {
    expect(() => loadTennisConfig({ TENNIS_DATE: '18.10.2026' })).toThrow(TennisConfigError)
    expect(() => loadTennisConfig({ TENNIS_DATE: '18.10.2026' })).toThrow(
      'Invalid configuration: TENNIS_DATE: expected YYYY-MM-DD',
    )
  })

  it('rejects a non-numeric minimum duration', () => {
    expect(() => loadTennisConfig({ TENNIS_MIN_DURATION_SEC: 'three' })).toThrow(TennisConfigError)
  })
})
