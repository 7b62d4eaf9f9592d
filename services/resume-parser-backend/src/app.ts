import { randomUUID } from 'node:crypto'
import express, { type NextFunction, type Request, type Response } from 'express'
import cors from 'cors'
import type { ServiceConfig } from './config.js'
import type { DocumentAiClient } from './services/documentAiClient.js'
import {
  createHealthHandler,
  createOcrHandler,
  createParseResumeHandler,
  getServiceInfo,
  sendApiError
} from './routes/resume.js'

export type AppDeps = {
  client: DocumentAiClient
  config: Pick<ServiceConfig, 'apiKey' | 'uploadMaxBytes' | 'signedUrlExpiryHours' | 'corsOrigins'>
}

function asyncRoute(handler: (req: Request, res: Response) => Promise<unknown>) {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next)
  }
}

export function createApp(deps: AppDeps) {
  const app = express()
  const corsOrigins = deps.config.corsOrigins

  app.use(cors({
    origin: (origin, callback) => {
      if (!origin) return callback(null, true)
      if (corsOrigins.includes('*') || corsOrigins.includes(origin)) return callback(null, true)
      return callback(new Error('Not allowed by CORS'))
    },
    methods: ['GET', 'POST', 'OPTIONS'],
    optionsSuccessStatus: 204
  }))

  app.use((req, res, next) => {
    const requestId = req.header('x-request-id') || randomUUID()
    res.setHeader('x-request-id', requestId)
    next()
  })

  app.get('/', getServiceInfo)
  app.get('/health', createHealthHandler(deps))
  app.post('/parse-resume', asyncRoute(createParseResumeHandler(deps)))
  app.post('/ocr', asyncRoute(createOcrHandler(deps)))

  app.use((error: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) return next(error)
    const message = error instanceof Error ? error.message : String(error)
    console.error('[resume-api] unhandled error', message)
    return sendApiError(res, 500, 'INTERNAL_ERROR', message)
  })

  return app
}
