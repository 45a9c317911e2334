import type { Statement } from 'better-sqlite3'
import { Db, ProductRow, isUniqueViolation } from '../../database/db'
import type { Logger } from '../../utils/logger'
import {
  DuplicateBarcodeError,
  InsufficientStockError,
  InvalidQuantityError,
  NotFoundError,
  ValidationError,
} from '../../utils/errors'
import { isValidAmount, roundMoney, sumMoney, lineTotal } from '../../utils/money'

export type Product = ProductRow

/** Mutable fields of a product */
export type ProductFields = {
  name: string
  price: number
  stock: number
}

export type NewProduct = ProductFields & { barcode: string }

export type ImportResult = { created: number; updated: number }

export type InventorySummary = {
  totalProducts: number
  totalUnits: number
  totalValue: number
  lowStockCount: number
}

type Statements = {
  insert: Statement<[NewProduct], { id: number }>
  byId: Statement<[number], ProductRow>
  byBarcode: Statement<[string], ProductRow>
  search: Statement<[{ pattern: string }], ProductRow>
  update: Statement<[ProductFields & { id: number }], ProductRow>
  remove: Statement<[number]>
  adjust: Statement<[{ id: number; delta: number }], { stock: number }>
  all: Statement<[], ProductRow>
  lowStock: Statement<[number], ProductRow>
}

/**
 * Single source of truth for product identity, pricing and stock.
 *
 * Stock only ever changes through {@link CatalogStore.adjustStock}, a single
 * conditional UPDATE, so concurrent writers on the same database file cannot
 * push a count below zero.
 */
export class CatalogStore {
  private readonly stmts: Statements

  constructor(private readonly db: Db, private readonly logger: Logger) {
    this.stmts = {
      insert: db.prepare<NewProduct, { id: number }>(`
        INSERT INTO products (barcode, name, price, stock)
        VALUES (@barcode, @name, @price, @stock)
        RETURNING id
      `),
      byId: db.prepare<[number], ProductRow>(`SELECT * FROM products WHERE id = ?`),
      byBarcode: db.prepare<[string], ProductRow>(`SELECT * FROM products WHERE barcode = ?`),
      search: db.prepare<{ pattern: string }, ProductRow>(`
        SELECT * FROM products
        WHERE name LIKE @pattern ESCAPE '\\' OR barcode LIKE @pattern ESCAPE '\\'
        ORDER BY id
      `),
      update: db.prepare<ProductFields & { id: number }, ProductRow>(`
        UPDATE products SET name = @name, price = @price, stock = @stock
        WHERE id = @id
        RETURNING *
      `),
      remove: db.prepare<[number]>(`DELETE FROM products WHERE id = ?`),
      adjust: db.prepare<{ id: number; delta: number }, { stock: number }>(`
        UPDATE products SET stock = stock + @delta
        WHERE id = @id AND stock + @delta >= 0
        RETURNING stock
      `),
      all: db.prepare<[], ProductRow>(`SELECT * FROM products ORDER BY id`),
      lowStock: db.prepare<[number], ProductRow>(`SELECT * FROM products WHERE stock <= ? ORDER BY stock ASC, id ASC`),
    }
  }

  /** Create a product; returns its id */
  addProduct(input: NewProduct): number {
    const product = normalizeNewProduct(input)
    if (this.stmts.byBarcode.get(product.barcode)) {
      throw new DuplicateBarcodeError(product.barcode)
    }

    let row: { id: number } | undefined
    try {
      row = this.stmts.insert.get(product)
    } catch (err) {
      // another connection inserted the same barcode since the lookup above
      if (isUniqueViolation(err)) throw new DuplicateBarcodeError(product.barcode)
      throw err
    }
    if (!row) throw new Error(`Insert of product ${product.barcode} returned no id`)

    this.logger.info('Product added', { id: row.id, barcode: product.barcode, stock: product.stock })
    return row.id
  }

  getById(id: number): Product | undefined {
    return this.stmts.byId.get(id)
  }

  getByBarcode(barcode: string): Product | undefined {
    return this.stmts.byBarcode.get(barcode)
  }

  requireById(id: number): Product {
    const product = this.getById(id)
    if (!product) throw new NotFoundError('product', id)
    return product
  }

  /** Case-insensitive substring match on name or barcode */
  searchByKeyword(text: string): Product[] {
    const escaped = text.replace(/[\\%_]/g, (ch) => `\\${ch}`)
    return this.stmts.search.all({ pattern: `%${escaped}%` })
  }

  /** Full replace of name, price and stock. The barcode is immutable here. */
  updateProduct(id: number, fields: ProductFields): Product {
    const normalized = normalizeFields(fields)
    const row = this.stmts.update.get({ id, ...normalized })
    if (!row) throw new NotFoundError('product', id)

    this.logger.info('Product updated', { id, ...normalized })
    return row
  }

  /** Returns whether a row was actually removed */
  deleteProduct(id: number): boolean {
    const removed = this.stmts.remove.run(id).changes > 0
    if (removed) this.logger.info('Product deleted', { id })
    return removed
  }

  /**
   * Apply `stock += delta` only if the result stays non-negative.
   * Check and write happen in one statement; returns the new stock level.
   */
  adjustStock(id: number, delta: number): number {
    if (!Number.isInteger(delta) || delta === 0) {
      throw new InvalidQuantityError(delta, 'stock adjustment must be a non-zero integer')
    }

    const row = this.stmts.adjust.get({ id, delta })
    if (row) {
      this.logger.debug('Stock adjusted', { id, delta, stock: row.stock })
      return row.stock
    }

    // Nothing changed; read back only to explain why
    const current = this.getById(id)
    if (!current) throw new NotFoundError('product', id)
    throw new InsufficientStockError({
      productId: id,
      name: current.name,
      requested: -delta,
      available: current.stock,
    })
  }

  /** Receive goods into stock */
  restock(id: number, quantity: number): number {
    if (!Number.isInteger(quantity) || quantity < 1) {
      throw new InvalidQuantityError(quantity)
    }
    return this.adjustStock(id, quantity)
  }

  listAll(): Product[] {
    return this.stmts.all.all()
  }

  /** Products at or below the threshold, emptiest first */
  lowStock(threshold: number): Product[] {
    if (!Number.isInteger(threshold) || threshold < 0) {
      throw new ValidationError(`Low-stock threshold must be a non-negative integer, got ${threshold}`)
    }
    return this.stmts.lowStock.all(threshold)
  }

  /**
   * Upsert rows by barcode in one transaction. A bad row aborts the whole
   * import.
   */
  importProducts(rows: readonly NewProduct[]): ImportResult {
    const run = this.db.transaction((items: readonly NewProduct[]) => {
      const result: ImportResult = { created: 0, updated: 0 }
      for (const item of items) {
        const existing = this.getByBarcode(item.barcode.trim())
        if (existing) {
          this.updateProduct(existing.id, item)
          result.updated++
        } else {
          this.addProduct(item)
          result.created++
        }
      }
      return result
    })

    const result = run(rows)
    this.logger.info('Inventory imported', { ...result })
    return result
  }

  inventorySummary(threshold: number): InventorySummary {
    const products = this.listAll()
    return {
      totalProducts: products.length,
      totalUnits: products.reduce((sum, p) => sum + p.stock, 0),
      totalValue: sumMoney(products.map((p) => lineTotal(p.price, p.stock))),
      lowStockCount: this.lowStock(threshold).length,
    }
  }
}

function normalizeFields(fields: ProductFields): ProductFields {
  const name = fields.name.trim()
  if (!name) throw new ValidationError('Product name is required')
  if (!isValidAmount(fields.price)) {
    throw new ValidationError(`Price must be a non-negative amount, got ${fields.price}`)
  }
  if (!Number.isInteger(fields.stock) || fields.stock < 0) {
    throw new InvalidQuantityError(fields.stock, 'stock must be a non-negative integer')
  }
  return { name, price: roundMoney(fields.price), stock: fields.stock }
}

function normalizeNewProduct(input: NewProduct): NewProduct {
  const barcode = input.barcode.trim()
  if (!barcode) throw new ValidationError('Barcode is required')
  return { barcode, ...normalizeFields(input) }
}
