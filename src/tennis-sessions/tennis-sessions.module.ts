import { Module } from '@nestjs/common'
import { HealthExportModule } from '../health-export/health-export.module'
import { MatchReportModule } from '../match-report/match-report.module'
import { ProcessedStateModule } from '../processed-state/processed-state.module'
import { TennisSessionsService } from './tennis-sessions.service'

@Module({
  imports: [HealthExportModule, ProcessedStateModule, MatchReportModule],
  providers: [TennisSessionsService],
  exports: [TennisSessionsService],
})
export class TennisSessionsModule {}
