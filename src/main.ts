import 'reflect-metadata'
import { Logger } from '@nestjs/common'
import { NestFactory } from '@nestjs/core'
import { AppModule } from './app.module'
import { ActivityMetricsService } from './activity-metrics/activity-metrics.service'
import { SAMPLE_PACKAGES } from './activity-metrics/sample-packages'
import { loadAppConfig } from './config/app.config'

async function bootstrap() {
  const config = loadAppConfig()
  const app = await NestFactory.createApplicationContext(AppModule, { logger: config.logLevels })

  const results = app.get(ActivityMetricsService).processPackages(SAMPLE_PACKAGES)
  for (const result of results) {
    if (result.ok) process.stdout.write(`${result.message}\n`)
  }
  if (results.some((r) => !r.ok)) process.exitCode = 1

  await app.close()
}

bootstrap().catch((err: unknown) => {
  new Logger('Bootstrap').error(err instanceof Error ? (err.stack ?? err.message) : String(err))
  process.exitCode = 1
})
