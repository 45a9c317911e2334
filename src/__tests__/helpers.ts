import { openDatabase } from '../database/db'
import { createLogger } from '../utils/logger'
import type { Clock } from '../utils/clock'
import { CatalogStore } from '../features/catalog/catalogStore'
import { SaleLedger } from '../features/sales/saleLedger'

export function silentLogger() {
  return createLogger({ level: 'error', dir: 'logs', nodeEnv: 'test', silent: true })
}

export type SettableClock = Clock & { set(iso: string): void }

export function settableClock(iso: string): SettableClock {
  let current = new Date(iso)
  return {
    now: () => current,
    set(next: string) {
      current = new Date(next)
    },
  }
}

/** Fresh in-memory store with catalog and ledger wired together */
export function createTestStore(clock: Clock = settableClock('2026-03-14T09:26:53.000Z')) {
  const logger = silentLogger()
  const db = openDatabase(':memory:', logger)
  const catalog = new CatalogStore(db, logger)
  const ledger = new SaleLedger(db, catalog, clock, logger)
  return { db, logger, catalog, ledger }
}

export function countRows(db: ReturnType<typeof openDatabase>, table: 'sales' | 'sale_items' | 'products'): number {
  const row = db.prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM ${table}`).get()
  return row ? row.n : 0
}
