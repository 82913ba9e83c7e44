import { v4 as uuidv4 } from 'uuid'
import winston from 'winston'
import {
  PostRecord,
  RefreshSummary,
  Report,
  SubredditProfile,
} from '../domain/types'
import { createLogger } from '../logging/logger'
import { RepairResult } from '../store/JsonCollection'

export enum EventType {
  POST_LOGGED = 'post.logged',
  POST_UNREACHABLE = 'post.unreachable',
  METRICS_REFRESHED = 'metrics.refreshed',
  REFRESH_ABORTED = 'refresh.aborted',
  REPORT_GENERATED = 'report.generated',
  PROFILE_UPDATED = 'profile.updated',
  DRAFT_SAVED = 'draft.saved',
  STORE_REPAIRED = 'store.repaired',
}

export interface EventPayloads {
  [EventType.POST_LOGGED]: PostRecord
  [EventType.POST_UNREACHABLE]: PostRecord
  [EventType.METRICS_REFRESHED]: RefreshSummary
  [EventType.REFRESH_ABORTED]: RefreshSummary
  [EventType.REPORT_GENERATED]: Report
  [EventType.PROFILE_UPDATED]: SubredditProfile
  [EventType.DRAFT_SAVED]: { path: string; subreddit: string }
  [EventType.STORE_REPAIRED]: RepairResult
}

export type Event = {
  [T in EventType]: {
    id: string
    type: T
    timestamp: Date
    payload: EventPayloads[T]
  }
}[EventType]

export type EventInput = {
  [T in EventType]: { type: T; payload: EventPayloads[T] }
}[EventType]

type EventHandler = (event: Event) => Promise<void>

export class EventBus {
  private static instance: EventBus | undefined
  private handlers: Map<EventType, Set<EventHandler>> = new Map()
  private logger: winston.Logger

  constructor(logger?: winston.Logger) {
    this.logger = logger ?? createLogger('event-bus')
  }

  public static getInstance(): EventBus {
    if (!EventBus.instance) {
      EventBus.instance = new EventBus()
    }
    return EventBus.instance
  }

  async emit(input: EventInput): Promise<void> {
    await this.publish({ ...input, id: uuidv4(), timestamp: new Date() })
  }

  async publish(event: Event): Promise<void> {
    const handlers = this.handlers.get(event.type) || new Set()

    // Handlers run concurrently; one failing handler never fails the publisher
    await Promise.all(
      Array.from(handlers).map(async handler => {
        try {
          await handler(event)
        } catch (error) {
          this.logger.error(`Error in event handler for ${event.type}`, {
            error: error instanceof Error ? error.message : String(error),
          })
        }
      }),
    )
  }

  subscribe(eventType: EventType, handler: EventHandler): void {
    let handlers = this.handlers.get(eventType)
    if (!handlers) {
      handlers = new Set()
      this.handlers.set(eventType, handlers)
    }
    handlers.add(handler)
  }

  unsubscribe(eventType: EventType, handler: EventHandler): void {
    const handlers = this.handlers.get(eventType)
    if (handlers) {
      handlers.delete(handler)
      if (handlers.size === 0) {
        this.handlers.delete(eventType)
      }
    }
  }

  listenerCount(eventType: EventType): number {
    return this.handlers.get(eventType)?.size ?? 0
  }
}
