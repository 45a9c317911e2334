// Amounts are summed in integer cents so repeated additions never drift.

export function toCents(amount: number): number {
  return Math.round(amount * 100)
}

export function fromCents(cents: number): number {
  return cents / 100
}

export function roundMoney(amount: number): number {
  return fromCents(toCents(amount))
}

/** quantity × unit price, exact to the cent */
export function lineTotal(unitPrice: number, quantity: number): number {
  return fromCents(toCents(unitPrice) * quantity)
}

export function sumMoney(amounts: readonly number[]): number {
  return fromCents(amounts.reduce((sum, amount) => sum + toCents(amount), 0))
}

export function isValidAmount(amount: number): boolean {
  return Number.isFinite(amount) && amount >= 0
}
