import express, { NextFunction, Request, Response } from 'express'
import winston from 'winston'
import { z } from 'zod'
import {
  CorruptStoreError,
  ErrorCode,
  TrackerError,
  ValidationError,
} from '../domain/errors'
import { parseInput } from '../domain/schemas'
import { createLogger } from '../logging/logger'
import { POSTS_FILE } from '../store/RecordStore'
import { PostTracker } from '../tracking/PostTracker'

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  VALIDATION: 400,
  NOT_FOUND: 404,
  DUPLICATE_URL: 409,
  RATE_LIMITED: 429,
  TRANSIENT_NETWORK: 502,
  CORRUPT_STORE: 500,
}

const refreshBodySchema = z
  .object({ force: z.boolean().optional() })
  .default({})

const planQuerySchema = z.object({
  date: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, 'date must look like YYYY-MM-DD')
    .optional(),
})

type AsyncHandler = (req: Request, res: Response) => Promise<void>

function route(handler: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next)
  }
}

export function createApp(
  tracker: PostTracker,
  logger: winston.Logger = createLogger('http'),
): express.Express {
  const app = express()
  app.use(express.json())

  app.post(
    '/posts',
    route(async (req, res) => {
      res.status(201).json(await tracker.logPost(req.body))
    }),
  )

  app.get(
    '/posts',
    route(async (_req, res) => {
      res.json(await tracker.listPosts())
    }),
  )

  app.post(
    '/refresh',
    route(async (req, res) => {
      const body = parseInput(refreshBodySchema, req.body, 'refresh request')
      res.json(await tracker.refreshMetrics({ force: body.force }))
    }),
  )

  app.post(
    '/reports/:period',
    route(async (req, res) => {
      res.status(201).json(await tracker.buildReport(req.params.period))
    }),
  )

  app.get(
    '/reports/:period',
    route(async (req, res) => {
      const stored = await tracker.readReport(req.params.period)
      if (req.query.format === 'markdown') {
        res.type('text/markdown').send(stored.markdown)
        return
      }
      res.json(stored)
    }),
  )

  app.get(
    '/profiles',
    route(async (_req, res) => {
      res.json(await tracker.listProfiles())
    }),
  )

  app.put(
    '/profiles/:name',
    route(async (req, res) => {
      const body: unknown = req.body
      const fields = typeof body === 'object' && body !== null ? body : {}
      res.json(await tracker.upsertProfile({ ...fields, name: req.params.name }))
    }),
  )

  app.post(
    '/profiles/:name/research',
    route(async (req, res) => {
      res.json(await tracker.researchSubreddit(req.params.name))
    }),
  )

  app.post(
    '/drafts',
    route(async (req, res) => {
      res.status(201).json(await tracker.saveDraft(req.body))
    }),
  )

  app.get(
    '/plan',
    route(async (req, res) => {
      const query = parseInput(planQuerySchema, req.query, 'plan query')
      const today = query.date ? new Date(`${query.date}T12:00:00Z`) : undefined
      if (today && Number.isNaN(today.getTime())) {
        throw new ValidationError('Invalid plan query: date is not a calendar day')
      }
      res.json(await tracker.planTargets(today))
    }),
  )

  app.post(
    '/admin/repair/:collection',
    route(async (req, res) => {
      res.json(await tracker.repairStore(req.params.collection))
    }),
  )

  app.get('/health', (_req, res) => {
    res.status(200).json({
      status: 'healthy',
      uptime: process.uptime(),
      timestamp: new Date().toISOString(),
    })
  })

  app.get(
    '/metrics',
    route(async (_req, res) => {
      res.set('Content-Type', tracker.telemetry.register.contentType)
      res.end(await tracker.telemetry.register.metrics())
    }),
  )

  app.use(errorHandler(logger))
  return app
}

function errorHandler(logger: winston.Logger) {
  return (error: unknown, _req: Request, res: Response, _next: NextFunction): void => {
    if (error instanceof TrackerError) {
      const status = STATUS_BY_CODE[error.code]
      const body: Record<string, unknown> = { error: error.code, message: error.message }

      if (error instanceof ValidationError) body.issues = error.issues
      if (error instanceof CorruptStoreError) {
        const collection = error.filePath.endsWith(POSTS_FILE) ? 'posts' : 'profiles'
        body.hint = `POST /admin/repair/${collection} backs up the file and rebuilds it`
        logger.error('Store is corrupt', { file: error.filePath, reason: error.reason })
      }

      res.status(status).json(body)
      return
    }

    if (error instanceof SyntaxError) {
      res.status(400).json({ error: 'VALIDATION', message: 'Malformed JSON body' })
      return
    }

    logger.error('Unhandled request error', {
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    })
    res.status(500).json({ error: 'INTERNAL', message: 'Internal server error' })
  }
}
