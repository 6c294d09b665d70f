import { Module } from '@nestjs/common'
import { HealthExportService } from './health-export.service'

@Module({
  providers: [HealthExportService],
  exports: [HealthExportService],
})
export class HealthExportModule {}
