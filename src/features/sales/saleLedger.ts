import type { Statement } from 'better-sqlite3'
import { Db, SaleRow } from '../../database/db'
import type { Logger } from '../../utils/logger'
import type { CatalogStore } from '../catalog/catalogStore'
import { Clock, formatTimestamp, isCalendarDay } from '../../utils/clock'
import {
  CommitFailureError,
  InvalidQuantityError,
  ValidationError,
  isPosError,
} from '../../utils/errors'
import { fromCents, isValidAmount, roundMoney, toCents } from '../../utils/money'

export type Sale = SaleRow

/** One line handed to {@link SaleLedger.recordSale} */
export type SaleLineInput = {
  productId: number
  quantity: number
  unitPrice: number
  lineTotal: number
}

/** A recorded line joined with whatever the catalog holds for the product today */
export type SaleLineView = {
  productId: number
  name: string
  barcode: string | null
  currentPrice: number | null
  quantity: number
  unitPrice: number
  lineTotal: number
}

export type SaleDetails = {
  sale: Sale
  items: SaleLineView[]
}

/** Inclusive range of UTC calendar days, YYYY-MM-DD */
export type DateRange = {
  from?: string
  to?: string
}

export type DailySales = {
  date: string
  transactions: number
  revenue: number
}

export type SalesSummary = {
  transactions: number
  totalSales: number
  averageSale: number
}

type SaleLineRow = {
  product_id: number
  name: string
  barcode: string | null
  current_price: number | null
  quantity: number
  unit_price: number
  line_total: number
}

type RangeParams = { from: string; to: string }

const IN_RANGE = 'date(timestamp) BETWEEN @from AND @to'

type Statements = {
  insertSale: Statement<[{ timestamp: string; total: number }], { id: number }>
  insertItem: Statement<[{
    saleId: number
    productId: number
    productName: string
    quantity: number
    unitPrice: number
    lineTotal: number
  }]>
  saleById: Statement<[number], SaleRow>
  saleLines: Statement<[number], SaleLineRow>
  salesInRange: Statement<[RangeParams], SaleRow>
  dailyTotals: Statement<[RangeParams], { sale_date: string; transactions: number; revenue: number }>
}

/**
 * Append-only history of completed sales.
 *
 * {@link SaleLedger.recordSale} is the only way in: the header, every line
 * item and every stock decrement commit together or not at all.
 */
export class SaleLedger {
  private readonly stmts: Statements

  constructor(
    private readonly db: Db,
    private readonly catalog: CatalogStore,
    private readonly clock: Clock,
    private readonly logger: Logger,
  ) {
    this.stmts = {
      insertSale: db.prepare<{ timestamp: string; total: number }, { id: number }>(`
        INSERT INTO sales (timestamp, total) VALUES (@timestamp, @total)
        RETURNING id
      `),
      insertItem: db.prepare<{
        saleId: number
        productId: number
        productName: string
        quantity: number
        unitPrice: number
        lineTotal: number
      }>(`
        INSERT INTO sale_items (sale_id, product_id, product_name, quantity, unit_price, line_total)
        VALUES (@saleId, @productId, @productName, @quantity, @unitPrice, @lineTotal)
      `),
      saleById: db.prepare<[number], SaleRow>(`SELECT * FROM sales WHERE id = ?`),
      saleLines: db.prepare<[number], SaleLineRow>(`
        SELECT si.product_id,
               COALESCE(p.name, si.product_name) AS name,
               p.barcode,
               p.price AS current_price,
               si.quantity,
               si.unit_price,
               si.line_total
        FROM sale_items si
        LEFT JOIN products p ON p.id = si.product_id
        WHERE si.sale_id = ?
        ORDER BY si.id
      `),
      salesInRange: db.prepare<RangeParams, SaleRow>(`
        SELECT * FROM sales WHERE ${IN_RANGE} ORDER BY timestamp DESC, id DESC
      `),
      dailyTotals: db.prepare<RangeParams, { sale_date: string; transactions: number; revenue: number }>(`
        SELECT date(timestamp) AS sale_date,
               COUNT(*) AS transactions,
               SUM(total) AS revenue
        FROM sales
        WHERE ${IN_RANGE}
        GROUP BY date(timestamp)
        ORDER BY sale_date DESC
      `),
    }
  }

  /**
   * Insert a sale and decrement stock for each line, in one IMMEDIATE
   * transaction. Stock and lookup errors propagate as-is; anything else is
   * rolled back and reported as a {@link CommitFailureError}.
   */
  recordSale(lines: readonly SaleLineInput[], total: number): Sale {
    validateLines(lines, total)
    const saleTotal = roundMoney(total)

    const commit = this.db.transaction((): Sale => {
      const timestamp = formatTimestamp(this.clock.now())
      const header = this.stmts.insertSale.get({ timestamp, total: saleTotal })
      if (!header) throw new Error('Sale insert returned no id')

      for (const line of lines) {
        const product = this.catalog.requireById(line.productId)
        const remaining = this.catalog.adjustStock(line.productId, -line.quantity)
        if (remaining < 0) {
          throw new Error(`Stock for product ${line.productId} went negative (${remaining})`)
        }
        this.stmts.insertItem.run({
          saleId: header.id,
          productId: line.productId,
          productName: product.name,
          quantity: line.quantity,
          unitPrice: roundMoney(line.unitPrice),
          lineTotal: roundMoney(line.lineTotal),
        })
      }

      return { id: header.id, timestamp, total: saleTotal }
    })

    let sale: Sale
    try {
      sale = commit.immediate()
    } catch (err) {
      if (isPosError(err)) {
        this.logger.warn('Sale rejected', { code: err.code, ...err.details })
        throw err
      }
      this.logger.error('Sale commit failed, transaction rolled back', { err })
      throw new CommitFailureError('Sale could not be committed', { cause: err })
    }

    this.logger.info('Sale recorded', { saleId: sale.id, total: sale.total, lines: lines.length })
    return sale
  }

  /** Sales in the range, newest first */
  listSales(range: DateRange = {}): Sale[] {
    return this.stmts.salesInRange.all(rangeParams(range))
  }

  getSaleDetails(saleId: number): SaleDetails | undefined {
    const sale = this.stmts.saleById.get(saleId)
    if (!sale) return undefined

    const items = this.stmts.saleLines.all(saleId).map((row) => ({
      productId: row.product_id,
      name: row.name,
      barcode: row.barcode,
      currentPrice: row.current_price,
      quantity: row.quantity,
      unitPrice: row.unit_price,
      lineTotal: row.line_total,
    }))
    return { sale, items }
  }

  /** Transaction count and revenue per day, most recent day first */
  aggregateByDate(range: DateRange = {}): DailySales[] {
    const rows = this.stmts.dailyTotals.all(rangeParams(range))

    return rows.map((row) => ({
      date: row.sale_date,
      transactions: row.transactions,
      revenue: roundMoney(row.revenue),
    }))
  }

  salesSummary(range: DateRange = {}): SalesSummary {
    const sales = this.listSales(range)
    const totalCents = sales.reduce((sum, sale) => sum + toCents(sale.total), 0)
    return {
      transactions: sales.length,
      totalSales: fromCents(totalCents),
      averageSale: sales.length ? fromCents(Math.round(totalCents / sales.length)) : 0,
    }
  }
}

function validateLines(lines: readonly SaleLineInput[], total: number): void {
  if (lines.length === 0) throw new ValidationError('A sale needs at least one line item')
  if (!isValidAmount(total)) throw new ValidationError(`Sale total must be a non-negative amount, got ${total}`)
  for (const line of lines) {
    if (!Number.isInteger(line.quantity) || line.quantity < 1) {
      throw new InvalidQuantityError(line.quantity)
    }
    if (!isValidAmount(line.unitPrice) || !isValidAmount(line.lineTotal)) {
      throw new ValidationError(`Line for product ${line.productId} has an invalid amount`)
    }
  }
}

const EARLIEST_DAY = '0000-01-01'
const LATEST_DAY = '9999-12-31'

function rangeParams(range: DateRange): RangeParams {
  for (const key of ['from', 'to'] as const) {
    const value = range[key]
    if (value !== undefined && !isCalendarDay(value)) {
      throw new ValidationError(`"${key}" must be a calendar day (YYYY-MM-DD), got "${value}"`)
    }
  }
  return { from: range.from ?? EARLIEST_DAY, to: range.to ?? LATEST_DAY }
}
