import 'reflect-metadata'
import { Logger } from '@nestjs/common'
import { NestFactory } from '@nestjs/core'
import { AppModule } from './app.module'
import { CLOCK, type Clock, localDateKey } from './common/clock'
import { TENNIS_CONFIG, type TennisConfig } from './config/tennis-config'
import { TennisSessionsService } from './tennis-sessions/tennis-sessions.service'

async function bootstrap() {
  const app = await NestFactory.createApplicationContext(AppModule, { abortOnError: false })
  const logger = new Logger('TennisSessions')

  try {
    const config = app.get<TennisConfig>(TENNIS_CONFIG)
    const clock = app.get<Clock>(CLOCK)
    const sessions = app.get(TennisSessionsService)
    const date = config.date ?? localDateKey(clock.now())

    const outcome = await sessions.processDate(date)
    logger.log(`${date}: ${outcome.status}`)

    if (config.periodReview) {
      const review = await sessions.reviewDate(date, { minSessionsForReport: 2 })
      if (review.status === 'reviewed' && review.report) {
        logger.log(`Period review for ${date}:\n${review.report}`)
      }
    }
  } finally {
    await app.close()
  }
}

bootstrap().catch((err: unknown) => {
  new Logger('TennisSessions').error(err instanceof Error ? (err.stack ?? err.message) : String(err))
  process.exitCode = 1
})
