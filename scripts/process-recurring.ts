import 'dotenv/config'
import 'reflect-metadata'
import { Logger } from '@nestjs/common'
import { NestFactory } from '@nestjs/core'
import { AppModule } from '../src/app.module'
import { RecurringService } from '../src/recurring/recurring.service'

// Uso: npm run recurring:run -- [YYYY-MM-DD]
async function run() {
  const logger = new Logger('process-recurring')
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: ['error', 'warn', 'log'],
  })

  try {
    const recurring = app.get(RecurringService)
    const today = process.argv[2]
    const result = await recurring.processDue(today)

    for (const f of result.failures) {
      logger.error(`#${f.scheduleId} (${f.ownerId}): ${f.error}`)
    }
    logger.log(
      `due=${result.due} generated=${result.generated} deactivated=${result.deactivated} failed=${result.failures.length}`,
    )
    process.exitCode = result.failures.length ? 1 : 0
  } finally {
    await app.close()
  }
}

run().catch((e: unknown) => {
  new Logger('process-recurring').error(e instanceof Error ? e.stack ?? e.message : String(e))
  process.exit(1)
})
