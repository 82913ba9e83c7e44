import Bull from 'bull'
import winston from 'winston'
import { errorMessage } from '../domain/errors'
import { RefreshSummary } from '../domain/types'
import { createLogger } from '../logging/logger'
import { RefreshOrchestrator } from './RefreshOrchestrator'

export const REFRESH_QUEUE = 'metrics-refresh'
export const REFRESH_JOB = 'refresh-metrics'

export interface RefreshSchedulerConfig {
  redisUrl: string
  intervalMs: number
}

export interface RefreshJobData {
  force: boolean
}

/**
 * Runs refresh passes from a repeating bull job. Only one job is processed
 * at a time, and the orchestrator itself tolerates passes started elsewhere.
 */
export class RefreshScheduler {
  private queue: Bull.Queue<RefreshJobData>
  private logger: winston.Logger

  constructor(
    private config: RefreshSchedulerConfig,
    private orchestrator: Pick<RefreshOrchestrator, 'refresh'>,
    logger?: winston.Logger,
  ) {
    this.logger = logger ?? createLogger('refresh-scheduler')
    this.queue = new Bull<RefreshJobData>(REFRESH_QUEUE, config.redisUrl)
  }

  async start(): Promise<void> {
    this.queue
      .process(REFRESH_JOB, 1, job => this.run(job))
      .catch(error => {
        this.logger.error('Refresh queue processing stopped', {
          error: errorMessage(error),
        })
      })

    await this.queue.add(
      REFRESH_JOB,
      { force: false },
      {
        repeat: { every: this.config.intervalMs },
        removeOnComplete: true,
      },
    )
    await this.queue.resume()
    this.logger.info('Scheduled metrics refresh', {
      everyMs: this.config.intervalMs,
    })
  }

  async trigger(force = false): Promise<void> {
    await this.queue.add(REFRESH_JOB, { force }, { removeOnComplete: true })
  }

  async stop(): Promise<void> {
    this.logger.info('Stopping refresh scheduler...')
    await this.queue.pause()
    await this.queue.close()
  }

  private async run(job: Bull.Job<RefreshJobData>): Promise<void> {
    try {
      const summary: RefreshSummary = await this.orchestrator.refresh({
        force: job.data.force,
      })
      this.logger.info('Scheduled refresh completed', { jobId: job.id, ...summary })
    } catch (error) {
      this.logger.error('Scheduled refresh failed', { error: errorMessage(error) })
      throw error
    }
  }
}
