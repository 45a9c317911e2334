import Database from 'better-sqlite3'
import path from 'path'
import fs from 'fs'
import { SCHEMA_SQL } from './schema'
import type { Logger } from '../utils/logger'

export type Db = Database.Database

/**
 * Opens (creating if needed) the store database and applies the schema.
 * Pass ':memory:' for a throwaway database.
 */
export function openDatabase(dbPath: string, logger: Logger): Db {
  const inMemory = dbPath === ':memory:'
  const resolved = inMemory ? dbPath : path.resolve(dbPath)

  if (!inMemory) {
    const dbDir = path.dirname(resolved)
    if (!fs.existsSync(dbDir)) {
      fs.mkdirSync(dbDir, { recursive: true })
    }
  }

  const db = new Database(resolved)
  db.pragma('journal_mode = WAL')
  db.pragma('foreign_keys = ON')
  db.pragma('busy_timeout = 5000')

  db.exec(SCHEMA_SQL)

  logger.info('Database initialized', { path: resolved })
  return db
}

// ---- Row shapes as stored ----

export type ProductRow = {
  id: number
  barcode: string
  name: string
  price: number
  stock: number
}

export type SaleRow = {
  id: number
  timestamp: string
  total: number
}

export type SaleItemRow = {
  id: number
  sale_id: number
  product_id: number
  product_name: string
  quantity: number
  unit_price: number
  line_total: number
}

export function isUniqueViolation(err: unknown): boolean {
  return err instanceof Database.SqliteError && err.code === 'SQLITE_CONSTRAINT_UNIQUE'
}
