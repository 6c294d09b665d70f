import { Inject, Injectable, Logger } from '@nestjs/common'
import { mkdir, readFile, rename, rm, writeFile } from 'fs/promises'
import { basename, dirname, join } from 'path'
import { errorCode, errorMessage } from '../common/fs-errors'
import { TENNIS_CONFIG, type TennisConfig } from '../config/tennis-config'
import { processedStateFileSchema, type ProcessedStateFile } from './processed-state.schema'
import type { ProcessedMarker } from './processed-state.types'

@Injectable()
export class ProcessedStateStore {
  private readonly logger = new Logger(ProcessedStateStore.name)

  constructor(@Inject(TENNIS_CONFIG) private readonly config: TennisConfig) {}

  get filePath(): string {
    return this.config.stateFile
  }

  /** Missing file is a first run; a file that cannot be understood is treated the same way. */
  async load(): Promise<ProcessedMarker | null> {
    let text: string
    try {
      text = await readFile(this.filePath, 'utf-8')
    } catch (err) {
      if (errorCode(err) === 'ENOENT') return null
      throw err
    }

    let raw: unknown
    try {
      raw = JSON.parse(text)
    } catch (err) {
      this.logger.warn(
        `Ignoring unparseable state file ${this.filePath}: ${errorMessage(err)}`,
      )
      return null
    }

    const parsed = processedStateFileSchema.safeParse(raw)
    if (!parsed.success) {
      this.logger.warn(`Ignoring state file with unexpected shape: ${this.filePath}`)
      return null
    }

    return {
      timestamp: parsed.data.timestamp,
      workoutId: parsed.data.workout_id,
      aiReport: parsed.data.ai_report,
      processedWorkoutIds: parsed.data.processed_workout_ids,
    }
  }

  /** Whole-document write through a sibling temp file, so readers never see a partial state. */
  async save(marker: ProcessedMarker): Promise<void> {
    const doc: ProcessedStateFile = {
      timestamp: marker.timestamp,
      workout_id: marker.workoutId,
      ai_report: marker.aiReport,
      processed_workout_ids: marker.processedWorkoutIds,
      ...(marker.metrics ? { metrics: marker.metrics } : {}),
    }

    const dir = dirname(this.filePath)
    const tmpPath = join(dir, `.${basename(this.filePath)}.${process.pid}.tmp`)

    await mkdir(dir, { recursive: true })
    try {
      await writeFile(tmpPath, `${JSON.stringify(doc, null, 2)}\n`, 'utf-8')
      await rename(tmpPath, this.filePath)
    } catch (err) {
      await rm(tmpPath, { force: true })
      this.logger.error(`Could not write state file ${this.filePath}: ${errorMessage(err)}`)
      throw err
    }
  }
}
