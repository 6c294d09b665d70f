import { Module } from '@nestjs/common'
import { ProcessedStateStore } from './processed-state.store'

@Module({
  providers: [ProcessedStateStore],
  exports: [ProcessedStateStore],
})
export class ProcessedStateModule {}
