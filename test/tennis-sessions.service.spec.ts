import { Test } from '@nestjs/testing'
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import { CLOCK, type Clock } from '../src/common/clock'
import { TENNIS_CONFIG, loadTennisConfig } from '../src/config/tennis-config'
import { TennisConfigModule } from '../src/config/tennis-config.module'
import type { ReportPrompt } from '../src/match-report/match-report.types'
import { REPORT_GENERATOR } from '../src/match-report/report-generator'
import { TennisSessionsModule } from '../src/tennis-sessions/tennis-sessions.module'
import { TennisSessionsService } from '../src/tennis-sessions/tennis-sessions.service'
import { exportDocument, makeWorkout } from './fixtures/workout.fixture'

describe('TennisSessionsService', () => {
  const date = '2026-10-18'
  let dir: string
  let exportDir: string
  let stateFile: string
  let now: Date
  let generate: jest.Mock<Promise<string>, [ReportPrompt]>
  let service: TennisSessionsService

  const reportFor = async (prompt: ReportPrompt): Promise<string> =>
    prompt.payload.kind === 'match' ? `report ${prompt.payload.workout.id}` : `period ${prompt.payload.date}`

  const writeExport = async (entries: unknown[], day = date) => {
    await writeFile(join(exportDir, `HealthAutoExport-${day}.json`), JSON.stringify(exportDocument(entries)))
  }

  const readState = async () => JSON.parse(await readFile(stateFile, 'utf-8'))

  const dayEntries = () => [
    makeWorkout({ id: 'A', start: '2026-10-18 09:00:00 +0800', end: '2026-10-18 10:00:00 +0800' }),
    makeWorkout({ id: 'run', name: 'Outdoor Run' }),
    makeWorkout({ id: 'warmup', duration: 120 }),
    { id: 'broken', name: 'Outdoor Tennis' },
    makeWorkout({
      id: 'B',
      start: '2026-10-18 17:00:00 +0800',
      end: '2026-10-18 17:30:00 +0800',
      duration: 1800,
      avgHeartRate: { qty: 160 },
      maxHeartRate: { qty: 182 },
    }),
  ]

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'tennis-sessions-'))
    exportDir = join(dir, 'exports')
    stateFile = join(dir, 'state', 'latest_match.json')
    await mkdir(exportDir)

    now = new Date('2026-10-18T12:00:00.000Z')
    const clock: Clock = { now: () => now }
    generate = jest.fn(reportFor)

    const mod = await Test.createTestingModule({
      imports: [TennisConfigModule, TennisSessionsModule],
    })
      .overrideProvider(TENNIS_CONFIG)
      .useValue(loadTennisConfig({ TENNIS_EXPORT_DIR: exportDir, TENNIS_STATE_FILE: stateFile }))
      .overrideProvider(CLOCK)
      .useValue(clock)
      .overrideProvider(REPORT_GENERATOR)
      .useValue({ name: 'fake', generate })
      .compile()

    service = mod.get(TennisSessionsService)
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('skips a date without an export file', async () => {
    await expect(service.processDate(date)).resolves.toEqual({ status: 'missing-file', date })
    expect(generate).not.toHaveBeenCalled()
  })

  it('skips a date whose export cannot be parsed', async () => {
    await writeFile(join(exportDir, `HealthAutoExport-${date}.json`), 'not json')

    const outcome = await service.processDate(date)

    expect(outcome.status).toBe('unreadable-file')
  })

  it('is a no-op when the day has no valid tennis session', async () => {
    await writeExport([makeWorkout({ id: 'run', name: 'Outdoor Run' }), makeWorkout({ id: 'short', duration: 180 })])

    await expect(service.processDate(date)).resolves.toEqual({ status: 'no-valid-workouts', date, rejected: [] })
  })

  it('reports each new session and persists the marker', async () => {
    await writeExport(dayEntries())

    const outcome = await service.processDate(date)

    expect(outcome.status).toBe('processed')
    if (outcome.status !== 'processed') return
    expect(outcome.results.map((r) => [r.workoutId, r.status])).toEqual([
      ['A', 'reported'],
      ['B', 'reported'],
    ])
    expect(outcome.rejected.map((r) => [r.index, r.id])).toEqual([[3, 'broken']])
    expect(outcome.skipped).toEqual([])

    const state = await readState()
    expect(state.timestamp).toBe('2026-10-18T12:00:00.000Z')
    expect(state.workout_id).toBe('B')
    expect(state.ai_report).toBe('report B')
    expect(state.processed_workout_ids).toEqual(['A', 'B'])
  })

  it('does not report the same session twice across runs', async () => {
    await writeExport(dayEntries())
    await service.processDate(date)

    const second = await service.processDate(date)

    expect(second.status).toBe('no-new-workouts')
    if (second.status === 'no-new-workouts') expect(second.skipped).toEqual(['A', 'B'])
    expect(generate).toHaveBeenCalledTimes(2)
  })

  it('only processes sessions added since the last run', async () => {
    await writeExport(dayEntries().slice(0, 1))
    await service.processDate(date)

    await writeExport(dayEntries())
    now = new Date('2026-10-18T18:00:00.000Z')
    const outcome = await service.processDate(date)

    expect(outcome.status).toBe('processed')
    if (outcome.status !== 'processed') return
    expect(outcome.skipped).toEqual(['A'])
    expect(outcome.results.map((r) => r.workoutId)).toEqual(['B'])
    expect((await readState()).timestamp).toBe('2026-10-18T18:00:00.000Z')
  })

  it('leaves a session unmarked when its report fails, and retries it next run', async () => {
    await writeExport(dayEntries())
    generate.mockImplementation(async (prompt) => {
      if (prompt.payload.kind === 'match' && prompt.payload.workout.id === 'A') throw new Error('model unavailable')
      return reportFor(prompt)
    })

    const first = await service.processDate(date)

    expect(first.status).toBe('processed')
    if (first.status !== 'processed') return
    expect(first.results.map((r) => [r.workoutId, r.status])).toEqual([
      ['A', 'report-failed'],
      ['B', 'reported'],
    ])
    expect((await readState()).processed_workout_ids).toEqual(['B'])

    generate.mockImplementation(reportFor)
    const second = await service.processDate(date)

    expect(second.status).toBe('processed')
    if (second.status !== 'processed') return
    expect(second.skipped).toEqual(['B'])
    expect(second.results.map((r) => [r.workoutId, r.status])).toEqual([['A', 'reported']])
    expect((await readState()).processed_workout_ids).toEqual(['B', 'A'])
  })

  it('reviews the whole day regardless of what was processed', async () => {
    await writeExport(dayEntries())
    await service.processDate(date)

    const review = await service.reviewDate(date)

    expect(review.status).toBe('reviewed')
    if (review.status !== 'reviewed') return
    expect(review.metrics.map((m) => m.workoutId)).toEqual(['A', 'B'])
    expect(review.aggregate.workoutCount).toBe(2)
    expect(review.aggregate.totalDurationSec).toBe(5400)
    expect(review.aggregate.weightedAvgHeartRate.status).toBe('ok')
    if (review.aggregate.weightedAvgHeartRate.status === 'ok') {
      expect(review.aggregate.weightedAvgHeartRate.value).toBeCloseTo(146.67, 2)
    }
    expect(review.report).toBe('period 2026-10-18')
  })

  it('skips the period report below the session threshold', async () => {
    await writeExport(dayEntries().slice(0, 1))

    const review = await service.reviewDate(date, { minSessionsForReport: 2 })

    expect(review.status).toBe('reviewed')
    if (review.status === 'reviewed') expect(review.report).toBeNull()
    expect(generate).not.toHaveBeenCalled()
  })

  it('reports a session repeated across overlapping exports once', async () => {
    const same = makeWorkout({ id: 'SAME' })
    await writeFile(join(exportDir, `HealthAutoExport-${date}-a.json`), JSON.stringify(exportDocument([same])))
    await writeFile(join(exportDir, `HealthAutoExport-${date}-b.json`), JSON.stringify(exportDocument([same])))

    const outcome = await service.processDate(date)

    expect(outcome.status).toBe('processed')
    if (outcome.status !== 'processed') return
    expect(outcome.results.map((r) => [r.workoutId, r.status])).toEqual([['SAME', 'reported']])
    expect(generate).toHaveBeenCalledTimes(1)
    expect((await readState()).processed_workout_ids).toEqual(['SAME'])

    const review = await service.reviewDate(date)

    expect(review.status).toBe('reviewed')
    if (review.status !== 'reviewed') return
    expect(review.aggregate.workoutCount).toBe(1)
    expect(review.aggregate.totalDurationSec).toBe(3600)
    expect(review.aggregate.totalTrimp).toBeCloseTo(48, 10)
  })

  it('treats a state file holding only the latest workout as already processed', async () => {
    await writeExport(dayEntries())
    await mkdir(join(dir, 'state'))
    await writeFile(stateFile, JSON.stringify({ timestamp: '2026-10-17 20:00:00', workout_id: 'A', ai_report: 'old' }))

    const outcome = await service.processDate(date)

    expect(outcome.status).toBe('processed')
    if (outcome.status !== 'processed') return
    expect(outcome.skipped).toEqual(['A'])
    expect(outcome.results.map((r) => r.workoutId)).toEqual(['B'])
    expect((await readState()).processed_workout_ids).toEqual(['A', 'B'])
  })
})
