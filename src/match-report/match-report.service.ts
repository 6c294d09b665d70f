import { Inject, Injectable, Logger } from '@nestjs/common'
import { TENNIS_CONFIG, type TennisConfig } from '../config/tennis-config'
import type { Workout } from '../health-export/health-export.types'
import type { DerivedMetrics, PeriodAggregate } from '../workout-metrics/workout-metrics.types'
import { buildMatchReportPayload, buildPeriodReportPayload } from './match-report.payload'
import { buildMatchReportPrompt, buildPeriodReportPrompt } from './match-report.prompts'
import type { PeriodSession, ReportPrompt } from './match-report.types'
import { REPORT_GENERATOR, ReportGenerationError, type ReportGenerator } from './report-generator'

@Injectable()
export class MatchReportService {
  private readonly logger = new Logger(MatchReportService.name)

  constructor(
    @Inject(TENNIS_CONFIG) private readonly config: TennisConfig,
    @Inject(REPORT_GENERATOR) private readonly generator: ReportGenerator,
  ) {}

  async generateMatchReport(workout: Workout, metrics: DerivedMetrics): Promise<string> {
    const payload = buildMatchReportPayload(workout, metrics, this.config.player)
    return this.run(buildMatchReportPrompt(payload), `workout ${workout.id}`)
  }

  async generatePeriodReport(date: string, sessions: PeriodSession[], aggregate: PeriodAggregate): Promise<string> {
    const payload = buildPeriodReportPayload(date, sessions, aggregate, this.config.player)
    return this.run(buildPeriodReportPrompt(payload), `period ${date}`)
  }

  private async run(prompt: ReportPrompt, subject: string): Promise<string> {
    let text: string
    try {
      text = await this.generator.generate(prompt)
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err)
      throw new ReportGenerationError(`Report generation failed for ${subject}: ${reason}`, this.generator.name, err)
    }

    const trimmed = text.trim()
    if (trimmed.length === 0) {
      throw new ReportGenerationError(`Report generator returned no text for ${subject}`, this.generator.name)
    }

    this.logger.log(`Report ready for ${subject} (${this.generator.name}, ${trimmed.length} chars)`)
    return trimmed
  }
}
