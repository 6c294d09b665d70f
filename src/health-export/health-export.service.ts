import { Inject, Injectable, Logger } from '@nestjs/common'
import { readFile, readdir } from 'fs/promises'
import { join } from 'path'
import { errorMessage, isMissingPathError } from '../common/fs-errors'
import { TENNIS_CONFIG, type TennisConfig } from '../config/tennis-config'
import { exportDocumentSchema } from './health-export.schema'
import type { ExportReadResult } from './health-export.types'

@Injectable()
export class HealthExportService {
  private readonly logger = new Logger(HealthExportService.name)

  constructor(@Inject(TENNIS_CONFIG) private readonly config: TennisConfig) {}

  async findFilesForDate(date: string): Promise<string[]> {
    let names: string[]
    try {
      names = await readdir(this.config.exportDir)
    } catch (err) {
      if (isMissingPathError(err)) return []
      throw err
    }

    return names
      .filter((name) => name.endsWith('.json') && name.includes(date))
      .sort()
      .map((name) => join(this.config.exportDir, name))
  }

  /**
   * Reads every export document of the given day and concatenates their
   * workout entries. Entries are returned unvalidated; record-level checks
   * belong to the tennis filter.
   */
  async readForDate(date: string): Promise<ExportReadResult> {
    let files: string[]
    try {
      files = await this.findFilesForDate(date)
    } catch (err) {
      this.logger.warn(`Export directory is not readable: ${this.config.exportDir} (${errorMessage(err)})`)
      return { status: 'unreadable', filePath: this.config.exportDir, reason: errorMessage(err) }
    }
    if (files.length === 0) {
      this.logger.warn(`No export file for ${date} in ${this.config.exportDir}`)
      return { status: 'missing', date, exportDir: this.config.exportDir }
    }

    const entries: unknown[] = []
    const readFiles: string[] = []
    for (const filePath of files) {
      let raw: unknown
      try {
        raw = JSON.parse(await readFile(filePath, 'utf-8'))
      } catch (err) {
        if (isMissingPathError(err)) {
          this.logger.warn(`Export file disappeared before it could be read: ${filePath}`)
          continue
        }
        this.logger.warn(`Export file is not readable JSON: ${filePath} (${errorMessage(err)})`)
        return { status: 'unreadable', filePath, reason: errorMessage(err) }
      }

      const parsed = exportDocumentSchema.safeParse(raw)
      if (!parsed.success) {
        const reason = parsed.error.issues
          .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
          .join('; ')
        this.logger.warn(`Export file has no workout envelope: ${filePath} (${reason})`)
        return { status: 'unreadable', filePath, reason }
      }

      readFiles.push(filePath)
      entries.push(...parsed.data.data.workouts)
    }

    if (readFiles.length === 0) {
      return { status: 'missing', date, exportDir: this.config.exportDir }
    }

    return { status: 'ok', files: readFiles, entries }
  }
}
