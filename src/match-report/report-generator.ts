import type { ReportPrompt } from './match-report.types'

export const REPORT_GENERATOR = Symbol('REPORT_GENERATOR')

/** Language-model collaborator: prompt in, free-text report out. */
export interface ReportGenerator {
  readonly name: string
  generate(prompt: ReportPrompt): Promise<string>
}

export class ReportGenerationError extends Error {
  constructor(
    message: string,
    readonly generator: string,
    readonly cause?: unknown,
  ) {
    super(message)
    this.name = 'ReportGenerationError'
  }
}
