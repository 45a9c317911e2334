import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import fs from 'fs'
import os from 'os'
import path from 'path'
import { createTestStore, settableClock, silentLogger } from '../../../__tests__/helpers'
import { CheckoutEngine } from '../checkoutEngine'
import { CatalogStore } from '../../catalog/catalogStore'
import { SaleLedger } from '../../sales/saleLedger'
import { Db, openDatabase } from '../../../database/db'
import type { Logger } from '../../../utils/logger'
import {
  CommitFailureError,
  EmptyCartError,
  InsufficientStockError,
  InvalidQuantityError,
  NotFoundError,
  ValidationError,
} from '../../../utils/errors'

describe('CheckoutEngine', () => {
  let catalog: CatalogStore
  let ledger: SaleLedger
  let logger: Logger
  let engine: CheckoutEngine
  let widgetId: number

  beforeEach(() => {
    ;({ catalog, ledger, logger } = createTestStore())
    engine = new CheckoutEngine({ catalog, ledger, logger })
    widgetId = catalog.addProduct({ barcode: 'A1', name: 'Widget', price: 9.99, stock: 5 })
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('scans, discounts and checks out a sale', () => {
    engine.scanAndAdd('A1', 3)
    expect(engine.cart.subtotal()).toBe(29.97)
    expect(engine.computeTotals(5)).toEqual({ subtotal: 29.97, discount: 5, total: 24.97 })

    const receipt = engine.checkout(5)

    expect(receipt).toEqual({
      saleId: 1,
      items: [{ productId: widgetId, name: 'Widget', quantity: 3, unitPrice: 9.99, lineTotal: 29.97 }],
      subtotal: 29.97,
      discount: 5,
      total: 24.97,
      timestamp: '2026-03-14T09:26:53Z',
    })
    expect(ledger.listSales()).toEqual([{ id: 1, timestamp: '2026-03-14T09:26:53Z', total: 24.97 }])
    expect(ledger.getSaleDetails(1)?.items.map((i) => [i.productId, i.quantity, i.lineTotal])).toEqual([
      [widgetId, 3, 29.97],
    ])
    expect(catalog.getById(widgetId)?.stock).toBe(2)
    expect(engine.state).toBe('done')
  })

  it('empties the cart after a successful checkout', () => {
    engine.scanAndAdd('A1', 1)
    engine.checkout()

    expect(engine.cart.items()).toEqual([])
    expect(engine.cart.subtotal()).toBe(0)
  })

  describe('scanAndAdd', () => {
    it('refuses more than the shelf holds and leaves the cart unchanged', () => {
      catalog.updateProduct(widgetId, { name: 'Widget', price: 9.99, stock: 2 })

      expect(() => engine.scanAndAdd('A1', 3)).toThrow(InsufficientStockError)
      expect(engine.cart.isEmpty()).toBe(true)
    })

    it('counts what is already in the cart', () => {
      engine.scanAndAdd('A1', 3)

      expect(() => engine.scanAndAdd('A1', 3)).toThrow(InsufficientStockError)
      expect(engine.cart.quantityOf(widgetId)).toBe(3)
    })

    it('fails for an unknown barcode', () => {
      expect(() => engine.scanAndAdd('NOPE', 1)).toThrow(NotFoundError)
    })

    it('rejects a non-positive quantity', () => {
      expect(() => engine.scanAndAdd('A1', 0)).toThrow(InvalidQuantityError)
      expect(engine.cart.isEmpty()).toBe(true)
    })
  })

  describe('changeQuantity', () => {
    it('checks stock against the new quantity', () => {
      engine.scanAndAdd('A1', 2)

      expect(() => engine.changeQuantity(widgetId, 6)).toThrow(InsufficientStockError)
      expect(engine.changeQuantity(widgetId, 4).quantity).toBe(4)
      expect(() => engine.changeQuantity(widgetId, 0)).toThrow(InvalidQuantityError)
      expect(engine.cart.quantityOf(widgetId)).toBe(4)
    })

    it('fails for a product not in the cart', () => {
      expect(() => engine.changeQuantity(widgetId, 1)).toThrow(NotFoundError)
    })
  })

  describe('computeTotals', () => {
    it('prices 0.10 x 3 at exactly 0.30', () => {
      catalog.addProduct({ barcode: 'C3', name: 'Candy', price: 0.1, stock: 10 })
      engine.scanAndAdd('C3', 1)
      engine.scanAndAdd('C3', 1)
      engine.scanAndAdd('C3', 1)

      expect(engine.computeTotals()).toEqual({ subtotal: 0.3, discount: 0, total: 0.3 })
    })

    it('clamps the total at zero when the discount exceeds the subtotal', () => {
      engine.scanAndAdd('A1', 1)

      expect(engine.computeTotals(50)).toEqual({ subtotal: 9.99, discount: 50, total: 0 })
    })

    it('rejects negative or non-finite discounts', () => {
      engine.scanAndAdd('A1', 1)

      expect(() => engine.computeTotals(-1)).toThrow(ValidationError)
      expect(() => engine.computeTotals(Number.NaN)).toThrow(ValidationError)
    })

    it('rejects a discount too large to count in cents', () => {
      engine.scanAndAdd('A1', 1)

      expect(() => engine.computeTotals(1e308)).toThrow(ValidationError)
      expect(() => engine.checkout(1e308)).toThrow(ValidationError)
      expect(engine.state).toBe('failed')
      expect(engine.cart.quantityOf(widgetId)).toBe(1)
    })
  })

  describe('checkout failures', () => {
    it('refuses an empty cart', () => {
      expect(() => engine.checkout()).toThrow(EmptyCartError)
      expect(engine.state).toBe('failed')
      expect(ledger.listSales()).toEqual([])
    })

    it('refuses a checkout once another terminal sold the last unit', () => {
      const lastId = catalog.addProduct({ barcode: 'L1', name: 'Last one', price: 4, stock: 1 })
      const other = new CheckoutEngine({ catalog, ledger, logger })
      engine.scanAndAdd('L1', 1)
      other.scanAndAdd('L1', 1)

      expect(engine.checkout().total).toBe(4)
      expect(() => other.checkout()).toThrow(InsufficientStockError)

      expect(other.state).toBe('failed')
      expect(other.cart.quantityOf(lastId)).toBe(1)
      expect(ledger.listSales()).toHaveLength(1)
      expect(catalog.getById(lastId)?.stock).toBe(0)
    })

    it('keeps the cart when the ledger rejects the sale at commit time', () => {
      engine.scanAndAdd('A1', 2)
      vi.spyOn(ledger, 'recordSale').mockImplementation(() => {
        throw new InsufficientStockError({ productId: widgetId, name: 'Widget', requested: 2, available: 1 })
      })

      expect(() => engine.checkout()).toThrow(InsufficientStockError)
      expect(engine.state).toBe('failed')
      expect(engine.cart.items().map((l) => [l.productId, l.quantity])).toEqual([[widgetId, 2]])
    })

    it('keeps the cart and stock intact when storage fails', () => {
      engine.scanAndAdd('A1', 2)
      vi.spyOn(catalog, 'adjustStock').mockImplementation(() => {
        throw new Error('disk I/O error')
      })

      expect(() => engine.checkout()).toThrow(CommitFailureError)
      expect(engine.cart.quantityOf(widgetId)).toBe(2)
      expect(catalog.getById(widgetId)?.stock).toBe(5)
      expect(ledger.listSales()).toEqual([])
    })

    it('can retry after the cashier fixes the cart', () => {
      engine.scanAndAdd('A1', 4)
      catalog.adjustStock(widgetId, -2)

      expect(() => engine.checkout()).toThrow(InsufficientStockError)
      engine.changeQuantity(widgetId, 3)

      expect(engine.checkout().items[0]).toEqual({
        productId: widgetId,
        name: 'Widget',
        quantity: 3,
        unitPrice: 9.99,
        lineTotal: 29.97,
      })
      expect(engine.state).toBe('done')
      expect(catalog.getById(widgetId)?.stock).toBe(0)
    })
  })

  it('charges the price frozen when the item was scanned', () => {
    engine.scanAndAdd('A1', 1)
    catalog.updateProduct(widgetId, { name: 'Widget', price: 12, stock: 5 })

    const receipt = engine.checkout()

    expect(receipt.total).toBe(9.99)
    expect(ledger.getSaleDetails(receipt.saleId)?.items[0]).toMatchObject({ unitPrice: 9.99, currentPrice: 12 })
  })

  it('cancel empties the cart without recording anything', () => {
    engine.scanAndAdd('A1', 2)
    engine.cancel()

    expect(engine.cart.isEmpty()).toBe(true)
    expect(engine.state).toBe('idle')
    expect(catalog.getById(widgetId)?.stock).toBe(5)
  })
})

describe('CheckoutEngine on two connections to one database file', () => {
  let dir: string
  let dbs: Db[]

  function connect() {
    const logger = silentLogger()
    const db = openDatabase(path.join(dir, 'pos.db'), logger)
    dbs.push(db)
    const catalog = new CatalogStore(db, logger)
    const ledger = new SaleLedger(db, catalog, settableClock('2026-03-14T09:26:53.000Z'), logger)
    return { catalog, ledger, engine: new CheckoutEngine({ catalog, ledger, logger }) }
  }

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'till-race-'))
    dbs = []
  })

  afterEach(() => {
    vi.restoreAllMocks()
    for (const db of dbs) db.close()
    fs.rmSync(dir, { recursive: true, force: true })
  })

  it('rejects the loser at commit when the other till sells the last unit in between', () => {
    const first = connect()
    const second = connect()
    const productId = first.catalog.addProduct({ barcode: 'L1', name: 'Last one', price: 4, stock: 1 })

    first.engine.scanAndAdd('L1', 1)
    second.engine.scanAndAdd('L1', 1)

    // the first till commits while the second is past its stock pre-check
    const lookup = second.catalog.requireById.bind(second.catalog)
    vi.spyOn(second.catalog, 'requireById').mockImplementationOnce((id) => {
      const product = lookup(id)
      first.engine.checkout()
      return product
    })
    const adjust = vi.spyOn(second.catalog, 'adjustStock')

    expect(() => second.engine.checkout()).toThrow(InsufficientStockError)

    expect(adjust).toHaveBeenCalledTimes(1)
    expect(first.engine.state).toBe('done')
    expect(second.engine.state).toBe('failed')
    expect(second.engine.cart.quantityOf(productId)).toBe(1)
    expect(second.catalog.getById(productId)?.stock).toBe(0)
    expect(second.ledger.listSales()).toEqual([{ id: 1, timestamp: '2026-03-14T09:26:53Z', total: 4 }])
  })
})

