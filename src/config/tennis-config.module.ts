import { Global, Module } from '@nestjs/common'
import { CLOCK, SystemClock } from '../common/clock'
import { TENNIS_CONFIG, loadTennisConfig } from './tennis-config'

@Global()
@Module({
  providers: [
    { provide: TENNIS_CONFIG, useFactory: () => loadTennisConfig() },
    { provide: CLOCK, useClass: SystemClock },
  ],
  exports: [TENNIS_CONFIG, CLOCK],
})
export class TennisConfigModule {}
