import express, { Express } from 'express'
import cors from 'cors'
import helmet from 'helmet'
import compression from 'compression'
import morgan from 'morgan'
import rateLimit from 'express-rate-limit'
import type { Server } from 'http'
import type { AppConfig } from '../config'
import type { Logger } from '../utils/logger'
import type { CatalogStore } from '../features/catalog/catalogStore'
import type { SaleLedger } from '../features/sales/saleLedger'
import type { TerminalRegistry } from '../features/checkout/terminalRegistry'
import { createProductsRouter } from './routes/products'
import { createSalesRouter } from './routes/sales'
import { createTerminalsRouter } from './routes/terminals'
import { errorHandler } from './errorHandler'

export type DashboardDeps = {
  config: AppConfig
  logger: Logger
  catalog: CatalogStore
  ledger: SaleLedger
  terminals: TerminalRegistry
}

export function createApp({ config, logger, catalog, ledger, terminals }: DashboardDeps): Express {
  const app = express()

  // ─── Security Middleware ───────────────────────────────
  app.use(helmet())
  app.use(cors({ origin: '*' }))
  app.use(express.json({ limit: '1mb' }))

  // ─── Compression & Logging ────────────────────────────
  app.use(compression())
  app.use(morgan('combined', {
    stream: { write: (msg) => logger.http(msg.trim()) },
    skip: (req) => req.url === '/health',
  }))

  app.use('/api', rateLimit({
    windowMs: config.rateLimit.windowMs,
    limit: config.rateLimit.maxRequests,
    message: { success: false, message: 'Too many requests' },
  }))

  // ─── Public endpoints ─────────────────────────────────
  app.get('/health', (_req, res) => {
    res.json({ success: true, status: 'ok', store: config.store.name, currency: config.store.currency, time: new Date().toISOString() })
  })

  // ─── API routes ───────────────────────────────────────
  app.use('/api/products', createProductsRouter(catalog, config.store.lowStockThreshold))
  app.use('/api/terminals', createTerminalsRouter(terminals))
  app.use('/api/sales', createSalesRouter(ledger))

  app.use((_req, res) => {
    res.status(404).json({ success: false, message: 'Not found' })
  })
  app.use(errorHandler(logger))

  return app
}

export function startDashboard(app: Express, port: number, logger: Logger): Server {
  return app.listen(port, () => {
    logger.info(`POS API running on http://localhost:${port}`)
  })
}
