/**
 * Liveness and version endpoints. Process-up only: no job state, no transport check.
 */
import express, { Router, type Request, type Response } from 'express'

const release = process.env.RELEASE || 'dev'
const env = process.env.NODE_ENV || 'development'

const router = Router()

/** GET /healthz — process up, no dependency check */
router.get('/healthz', (_req: Request, res: Response) => {
  res.status(200).json({ status: 'ok' })
})

// Legacy path used by container health checks
router.get('/health', (_req: Request, res: Response) => {
  res.status(200).json({ status: 'ok' })
})

/** GET /version — service, release, env */
router.get('/version', (_req: Request, res: Response) => {
  res.json({ service: 'bot', release, env })
})

export function createHealthApp(): express.Express {
  const app = express()
  app.disable('etag')
  app.disable('x-powered-by')
  app.use(router)
  app.use((_req: Request, res: Response) => {
    res.status(404).json({ message: 'Not found' })
  })
  return app
}
