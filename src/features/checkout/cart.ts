import type { Product } from '../catalog/catalogStore'
import { InvalidQuantityError, NotFoundError } from '../../utils/errors'
import { fromCents, toCents } from '../../utils/money'

export type CartLine = {
  productId: number
  barcode: string
  name: string
  unitPrice: number
  quantity: number
  lineTotal: number
}

type Line = {
  productId: number
  barcode: string
  name: string
  unitPriceCents: number
  quantity: number
}

function assertQuantity(quantity: number): void {
  if (!Number.isInteger(quantity) || quantity < 1) {
    throw new InvalidQuantityError(quantity)
  }
}

function toCartLine(line: Line): CartLine {
  return {
    productId: line.productId,
    barcode: line.barcode,
    name: line.name,
    unitPrice: fromCents(line.unitPriceCents),
    quantity: line.quantity,
    lineTotal: fromCents(line.unitPriceCents * line.quantity),
  }
}

/**
 * Pending line items for one in-progress transaction. Owned by a single
 * terminal and never shared. Knows nothing about stock.
 *
 * Name and unit price are captured the first time a product is added and kept
 * until the line is removed; later catalog edits do not reprice the line.
 */
export class Cart {
  private readonly lines = new Map<number, Line>()

  /** Adds a new line or accumulates onto the existing one for this product */
  addItem(product: Product, quantity: number): CartLine {
    assertQuantity(quantity)

    const existing = this.lines.get(product.id)
    if (existing) {
      existing.quantity += quantity
      return toCartLine(existing)
    }

    const line: Line = {
      productId: product.id,
      barcode: product.barcode,
      name: product.name,
      unitPriceCents: toCents(product.price),
      quantity,
    }
    this.lines.set(product.id, line)
    return toCartLine(line)
  }

  removeItem(productId: number): boolean {
    return this.lines.delete(productId)
  }

  setQuantity(productId: number, quantity: number): CartLine {
    assertQuantity(quantity)
    const line = this.lines.get(productId)
    if (!line) throw new NotFoundError('cart item', productId)
    line.quantity = quantity
    return toCartLine(line)
  }

  quantityOf(productId: number): number {
    return this.lines.get(productId)?.quantity ?? 0
  }

  /** Lines in the order they were first added */
  items(): CartLine[] {
    return [...this.lines.values()].map(toCartLine)
  }

  isEmpty(): boolean {
    return this.lines.size === 0
  }

  get size(): number {
    return this.lines.size
  }

  clear(): void {
    this.lines.clear()
  }

  subtotal(): number {
    let cents = 0
    for (const line of this.lines.values()) {
      cents += line.unitPriceCents * line.quantity
    }
    return fromCents(cents)
  }
}
