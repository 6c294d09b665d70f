import { Module } from '@nestjs/common'
import { TennisConfigModule } from './config/tennis-config.module'
import { TennisSessionsModule } from './tennis-sessions/tennis-sessions.module'

@Module({
  imports: [TennisConfigModule, TennisSessionsModule],
})
export class AppModule {}
