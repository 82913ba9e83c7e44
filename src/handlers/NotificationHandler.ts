import winston from 'winston'
import { Event, EventBus, EventType } from '../events/EventBus'
import { createLogger } from '../logging/logger'

export interface Notification {
  level: 'info' | 'warn'
  title: string
  message: string
}

/**
 * Turns lifecycle events into operator notifications. The notifications
 * go to the log; anything that tails it can forward them.
 */
export class NotificationHandler {
  private readonly handle = async (event: Event): Promise<void> => {
    const notification = this.describe(event)
    this.logger.log(notification.level, `${notification.title}: ${notification.message}`, {
      eventId: event.id,
      eventType: event.type,
    })
  }

  constructor(private logger: winston.Logger = createLogger('notifications')) {}

  register(eventBus: EventBus): void {
    for (const type of Object.values(EventType)) {
      eventBus.subscribe(type, this.handle)
    }
  }

  unregister(eventBus: EventBus): void {
    for (const type of Object.values(EventType)) {
      eventBus.unsubscribe(type, this.handle)
    }
  }

  describe(event: Event): Notification {
    switch (event.type) {
      case EventType.POST_LOGGED:
        return {
          level: 'info',
          title: 'Post logged',
          message: `r/${event.payload.subreddit} ${event.payload.id} (${event.payload.angle})`,
        }
      case EventType.POST_UNREACHABLE:
        return {
          level: 'warn',
          title: 'Post unreachable',
          message: `r/${event.payload.subreddit} ${event.payload.id} was removed upstream and will no longer be refreshed`,
        }
      case EventType.METRICS_REFRESHED: {
        const summary = event.payload
        return {
          level: 'info',
          title: 'Metrics refreshed',
          message: `${summary.updated}/${summary.due} updated, ${summary.skippedTransient} skipped, ${summary.markedUnreachable} unreachable`,
        }
      }
      case EventType.REFRESH_ABORTED: {
        const summary = event.payload
        return {
          level: 'warn',
          title: 'Refresh halted by rate limit',
          message: `${summary.updated} updated before the limit, ${summary.rateLimitAborted} left for the next pass`,
        }
      }
      case EventType.REPORT_GENERATED:
        return {
          level: 'info',
          title: 'Report generated',
          message: `${event.payload.period} with ${event.payload.insights.postCount} posts`,
        }
      case EventType.PROFILE_UPDATED:
        return {
          level: 'info',
          title: 'Profile updated',
          message: `r/${event.payload.name}`,
        }
      case EventType.DRAFT_SAVED:
        return {
          level: 'info',
          title: 'Draft saved',
          message: `${event.payload.path} for r/${event.payload.subreddit}`,
        }
      case EventType.STORE_REPAIRED:
        return {
          level: 'warn',
          title: 'Store repaired',
          message: event.payload.backupPath
            ? `${event.payload.file}: kept ${event.payload.kept}, dropped ${event.payload.dropped}, backup at ${event.payload.backupPath}`
            : `${event.payload.file}: nothing to repair`,
        }
    }
  }
}
