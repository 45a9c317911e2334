/**
 * Point of Sale — Entry Point
 *
 * Starts:
 *  1. SQLite database (applies schema on open)
 *  2. Catalog, sale ledger and terminal registry
 *  3. REST API for tills and back office
 */

import { config } from './config'
import { openDatabase } from './database/db'
import { createLogger } from './utils/logger'
import { createMonotonicClock } from './utils/clock'
import { CatalogStore } from './features/catalog/catalogStore'
import { SaleLedger } from './features/sales/saleLedger'
import { TerminalRegistry } from './features/checkout/terminalRegistry'
import { createApp, startDashboard } from './dashboard/server'

const logger = createLogger({ level: config.log.level, dir: config.log.dir, nodeEnv: config.server.nodeEnv })

function main() {
  logger.info('Starting POS service...', { store: config.store.name })

  const db = openDatabase(config.db.path, logger)
  const catalog = new CatalogStore(db, logger.child({ component: 'catalog' }))
  const ledger = new SaleLedger(db, catalog, createMonotonicClock(), logger.child({ component: 'ledger' }))
  const terminals = new TerminalRegistry(catalog, ledger, logger.child({ component: 'checkout' }))

  const app = createApp({ config, logger, catalog, ledger, terminals })
  const server = startDashboard(app, config.server.port, logger)

  // Reclaim terminals whose client went away without closing them
  const idleSweep = setInterval(() => {
    terminals.closeIdle(config.terminals.idleTimeoutMinutes * 60_000)
  }, 60_000)

  const shutdown = (signal: string) => {
    logger.info('Shutting down...', { signal })
    clearInterval(idleSweep)
    server.close(() => {
      db.close()
      process.exit(0)
    })
  }
  process.on('SIGINT', () => shutdown('SIGINT'))
  process.on('SIGTERM', () => shutdown('SIGTERM'))
}

process.on('uncaughtException', (err) => {
  logger.error('Uncaught exception', { err })
  process.exit(1)
})

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection', { reason })
  process.exit(1)
})

try {
  main()
} catch (err) {
  logger.error('Fatal startup error', { err })
  process.exit(1)
}
