import winston from 'winston'
import { NotFoundError } from '../domain/errors'
import { parseInput, periodSchema } from '../domain/schemas'
import { StoredReport } from '../domain/types'
import { EventBus, EventType } from '../events/EventBus'
import { createLogger } from '../logging/logger'
import { RecordStore } from '../store/RecordStore'
import { TrackerMetrics } from '../telemetry/TrackerMetrics'
import { aggregateReport, periodOf } from './aggregate'
import { renderReport } from './renderReport'

export interface ReportBuilderOptions {
  clock?: () => Date
  logger?: winston.Logger
  eventBus?: EventBus
  telemetry?: TrackerMetrics
}

export class ReportBuilder {
  private clock: () => Date
  private logger: winston.Logger
  private eventBus?: EventBus
  private telemetry?: TrackerMetrics

  constructor(
    private store: RecordStore,
    options: ReportBuilderOptions = {},
  ) {
    this.clock = options.clock ?? (() => new Date())
    this.logger = options.logger ?? createLogger('reports')
    this.eventBus = options.eventBus
    this.telemetry = options.telemetry
  }

  /**
   * Builds and stores the report for a calendar month (YYYY-MM, UTC).
   * Regenerating a month overwrites its earlier report.
   */
  async build(period: string): Promise<StoredReport> {
    const month = parseInput(periodSchema, period, 'period')

    const records = (await this.store.list()).filter(
      record => periodOf(record.postedAt) === month,
    )
    if (records.length === 0) {
      throw new NotFoundError(`No posts logged in ${month}`, 'period')
    }

    const report = aggregateReport(month, records)
    const stored = await this.store.saveReport(report, renderReport(report), this.clock())

    this.telemetry?.reportsCounter.inc()
    this.logger.info('Report generated', {
      period: month,
      posts: report.insights.postCount,
      pending: report.insights.pendingCount,
    })
    await this.eventBus?.emit({ type: EventType.REPORT_GENERATED, payload: report })
    return stored
  }

  async read(period: string): Promise<StoredReport> {
    return this.store.readReport(parseInput(periodSchema, period, 'period'))
  }
}
