export type PosErrorCode =
  | 'DUPLICATE_BARCODE'
  | 'NOT_FOUND'
  | 'INVALID_QUANTITY'
  | 'INSUFFICIENT_STOCK'
  | 'COMMIT_FAILURE'
  | 'VALIDATION'
  | 'EMPTY_CART'

/** Base class of every error the engine raises on purpose. All are recoverable by the caller. */
export abstract class PosError extends Error {
  abstract readonly code: PosErrorCode

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }

  /** Structured payload for API responses and logs */
  get details(): Record<string, unknown> | undefined {
    return undefined
  }
}

export class DuplicateBarcodeError extends PosError {
  readonly code = 'DUPLICATE_BARCODE'

  constructor(readonly barcode: string) {
    super(`A product with barcode "${barcode}" already exists`)
  }

  override get details() {
    return { barcode: this.barcode }
  }
}

export type NotFoundEntity = 'product' | 'sale' | 'cart item' | 'terminal'

export class NotFoundError extends PosError {
  readonly code = 'NOT_FOUND'

  constructor(readonly entity: NotFoundEntity, readonly key: string | number) {
    super(`No ${entity} found for ${JSON.stringify(key)}`)
  }

  override get details() {
    return { entity: this.entity, key: this.key }
  }
}

export class InvalidQuantityError extends PosError {
  readonly code = 'INVALID_QUANTITY'

  constructor(readonly quantity: number, reason = 'must be a positive integer') {
    super(`Invalid quantity ${quantity}: ${reason}`)
  }

  override get details() {
    return { quantity: this.quantity }
  }
}

export type StockShortfall = {
  productId: number
  name: string
  requested: number
  available: number
}

export class InsufficientStockError extends PosError {
  readonly code = 'INSUFFICIENT_STOCK'

  constructor(readonly shortfall: StockShortfall) {
    super(
      `Not enough stock for "${shortfall.name}": requested ${shortfall.requested}, available ${shortfall.available}`
    )
  }

  override get details() {
    return { ...this.shortfall }
  }
}

export class CommitFailureError extends PosError {
  readonly code = 'COMMIT_FAILURE'
}

export class ValidationError extends PosError {
  readonly code = 'VALIDATION'

  constructor(message: string, readonly issues: string[] = []) {
    super(message)
  }

  override get details() {
    return this.issues.length ? { issues: this.issues } : undefined
  }
}

export class EmptyCartError extends PosError {
  readonly code = 'EMPTY_CART'

  constructor() {
    super('Cannot check out an empty cart')
  }
}

export function isPosError(err: unknown): err is PosError {
  return err instanceof PosError
}
