import promClient from 'prom-client'
import { createApp } from './api/routes'
import { loadConfig, validateEnv } from './config/config'
import { errorMessage } from './domain/errors'
import { NotificationHandler } from './handlers/NotificationHandler'
import { createLogger } from './logging/logger'
import { RedditAdapter } from './platforms/RedditAdapter'
import { PostTracker } from './tracking/PostTracker'
import { RefreshScheduler } from './tracking/RefreshScheduler'

async function bootstrap(): Promise<void> {
  const config = loadConfig()
  const logger = createLogger('server', config.logLevel)
  validateEnv(logger)

  const reddit = new RedditAdapter()
  await reddit.initialize(config.fetch)

  const tracker = PostTracker.create(config, reddit)
  promClient.collectDefaultMetrics({ register: tracker.telemetry.register })

  const notifications = new NotificationHandler(createLogger('notifications', config.logLevel))
  notifications.register(tracker.eventBus)

  let scheduler: RefreshScheduler | undefined
  if (config.refresh.redisUrl) {
    scheduler = new RefreshScheduler(
      { redisUrl: config.refresh.redisUrl, intervalMs: config.refresh.intervalMs },
      { refresh: options => tracker.refreshMetrics(options) },
      createLogger('refresh-scheduler', config.logLevel),
    )
    await scheduler.start()
  } else {
    logger.info('REDIS_URL not set; scheduled refresh disabled, use POST /refresh')
  }

  const app = createApp(tracker, createLogger('http', config.logLevel))
  const server = app.listen(config.port, () => {
    logger.info(`Server is running on port ${config.port}`, {
      nodeEnv: process.env.NODE_ENV,
      memoryDir: config.memoryDir,
    })
  })

  const shutdown = async (signal: string): Promise<void> => {
    logger.info(`${signal} received. Starting graceful shutdown...`)

    server.close(() => {
      logger.info('HTTP server closed')
    })

    try {
      if (scheduler) await scheduler.stop()
      notifications.unregister(tracker.eventBus)
      await tracker.stop()
      logger.info('Cleanup completed, exiting process')
      process.exit(0)
    } catch (error) {
      logger.error('Error during shutdown:', { error: errorMessage(error) })
      process.exit(1)
    }
  }

  process.on('SIGTERM', () => void shutdown('SIGTERM'))
  process.on('SIGINT', () => void shutdown('SIGINT'))
}

bootstrap().catch(error => {
  createLogger('server').error('Failed to bootstrap application:', {
    error: errorMessage(error),
    stack: error instanceof Error ? error.stack : undefined,
  })
  process.exit(1)
})
