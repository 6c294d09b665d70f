import { Module } from '@nestjs/common'
import { MatchReportService } from './match-report.service'
import { REPORT_GENERATOR } from './report-generator'
import { StubReportGenerator } from './stub-report-generator'

@Module({
  providers: [MatchReportService, { provide: REPORT_GENERATOR, useClass: StubReportGenerator }],
  exports: [MatchReportService],
})
export class MatchReportModule {}
