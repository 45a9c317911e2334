import type { Logger } from '../../utils/logger'
import type { CatalogStore, Product } from '../catalog/catalogStore'
import type { Sale, SaleLedger, SaleLineInput } from '../sales/saleLedger'
import { Cart, CartLine } from './cart'
import {
  EmptyCartError,
  InsufficientStockError,
  NotFoundError,
  ValidationError,
} from '../../utils/errors'
import { fromCents, isValidAmount, toCents } from '../../utils/money'

export type CheckoutState = 'idle' | 'validating' | 'committing' | 'done' | 'failed'

const TRANSITIONS: Record<CheckoutState, readonly CheckoutState[]> = {
  idle: ['validating'],
  validating: ['committing', 'failed'],
  committing: ['done', 'failed'],
  done: ['idle'],
  failed: ['idle'],
}

export type Totals = {
  subtotal: number
  discount: number
  total: number
}

export type ReceiptLine = {
  productId: number
  name: string
  quantity: number
  unitPrice: number
  lineTotal: number
}

/** Everything a renderer needs; no further arithmetic required */
export type Receipt = Totals & {
  saleId: number
  items: ReceiptLine[]
  timestamp: string
}

export type CheckoutEngineDeps = {
  catalog: CatalogStore
  ledger: SaleLedger
  logger: Logger
  cart?: Cart
}

/**
 * The only component that turns a cart into a sale.
 *
 * Stock checks made while scanning are advisory; the authoritative check is
 * the conditional decrement inside {@link SaleLedger.recordSale}.
 */
export class CheckoutEngine {
  readonly cart: Cart
  private readonly catalog: CatalogStore
  private readonly ledger: SaleLedger
  private readonly logger: Logger
  private _state: CheckoutState = 'idle'

  constructor(deps: CheckoutEngineDeps) {
    this.catalog = deps.catalog
    this.ledger = deps.ledger
    this.logger = deps.logger
    this.cart = deps.cart ?? new Cart()
  }

  /** State of the most recent checkout attempt */
  get state(): CheckoutState {
    return this._state
  }

  scanAndAdd(barcode: string, quantity: number): CartLine {
    const product = this.catalog.getByBarcode(barcode)
    if (!product) throw new NotFoundError('product', barcode)

    this.assertAvailable(product, this.cart.quantityOf(product.id) + quantity)
    const line = this.cart.addItem(product, quantity)
    this.logger.debug('Item scanned', { barcode, quantity, lineQuantity: line.quantity })
    return line
  }

  changeQuantity(productId: number, quantity: number): CartLine {
    if (this.cart.quantityOf(productId) === 0) throw new NotFoundError('cart item', productId)
    this.assertAvailable(this.catalog.requireById(productId), quantity)
    return this.cart.setQuantity(productId, quantity)
  }

  removeItem(productId: number): boolean {
    return this.cart.removeItem(productId)
  }

  /**
   * Flat discount off the subtotal. A discount larger than the subtotal
   * brings the total to 0; the excess is dropped.
   */
  computeTotals(discount = 0): Totals {
    if (!isValidAmount(discount) || !Number.isSafeInteger(toCents(discount))) {
      throw new ValidationError(`Discount must be a non-negative amount, got ${discount}`)
    }
    const subtotal = this.cart.subtotal()
    const totalCents = Math.max(toCents(subtotal) - toCents(discount), 0)
    return { subtotal, discount: fromCents(toCents(discount)), total: fromCents(totalCents) }
  }

  /**
   * Commit the cart as a sale. On any failure the cart is left exactly as it
   * was so the cashier can adjust and retry.
   */
  checkout(discount = 0): Receipt {
    if (this._state !== 'idle') this.transition('idle')
    this.transition('validating')

    let totals: Totals
    let lines: CartLine[]
    try {
      if (this.cart.isEmpty()) throw new EmptyCartError()
      totals = this.computeTotals(discount)
      lines = this.cart.items()
      for (const line of lines) {
        this.assertAvailable(this.catalog.requireById(line.productId), line.quantity)
      }
    } catch (err) {
      this.transition('failed')
      throw err
    }

    this.transition('committing')
    const saleLines: SaleLineInput[] = lines.map((line) => ({
      productId: line.productId,
      quantity: line.quantity,
      unitPrice: line.unitPrice,
      lineTotal: line.lineTotal,
    }))

    let sale: Sale
    try {
      sale = this.ledger.recordSale(saleLines, totals.total)
    } catch (err) {
      this.transition('failed')
      throw err
    }

    this.transition('done')
    this.cart.clear()

    return {
      saleId: sale.id,
      items: lines.map((line) => ({
        productId: line.productId,
        name: line.name,
        quantity: line.quantity,
        unitPrice: line.unitPrice,
        lineTotal: line.lineTotal,
      })),
      ...totals,
      timestamp: sale.timestamp,
    }
  }

  /** Abandon the transaction in progress */
  cancel(): void {
    this.cart.clear()
    if (this._state !== 'idle') this.transition('idle')
    this.logger.info('Transaction cancelled')
  }

  private assertAvailable(product: Product, requested: number): void {
    if (requested > product.stock) {
      throw new InsufficientStockError({
        productId: product.id,
        name: product.name,
        requested,
        available: product.stock,
      })
    }
  }

  private transition(next: CheckoutState): void {
    if (!TRANSITIONS[this._state].includes(next)) {
      throw new Error(`Illegal checkout transition ${this._state} -> ${next}`)
    }
    this.logger.debug('Checkout state', { from: this._state, to: next })
    this._state = next
  }
}
