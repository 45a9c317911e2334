import { describe, it, expect } from 'vitest'
import {
  checkoutSchema,
  dateRangeSchema,
  parseId,
  parseInput,
  productCreateSchema,
  scanSchema,
  thresholdSchema,
} from '../validation'
import { ValidationError } from '../../utils/errors'

function issuesOf(fn: () => unknown): string[] {
  try {
    fn()
  } catch (err) {
    if (err instanceof ValidationError) return err.issues
    throw err
  }
  throw new Error('expected a ValidationError')
}

describe('parseInput', () => {
  it('trims strings and fills defaults', () => {
    expect(parseInput(productCreateSchema, { barcode: ' B7 ', name: ' Bolt ', price: 0.25 })).toEqual({
      barcode: 'B7',
      name: 'Bolt',
      price: 0.25,
      stock: 0,
    })
    expect(parseInput(scanSchema, { barcode: 'B7' })).toEqual({ barcode: 'B7', quantity: 1 })
    expect(parseInput(checkoutSchema, {})).toEqual({ discount: 0 })
  })

  it('lists every failing field by path', () => {
    const issues = issuesOf(() => parseInput(productCreateSchema, { barcode: '', name: 'Bolt', price: -1, stock: 1.5 }))

    expect(issues).toHaveLength(3)
    expect(issues[0]).toMatch(/^barcode: /)
    expect(issues[1]).toMatch(/^price: /)
    expect(issues[2]).toMatch(/^stock: /)
  })

  it('rejects a zero scan quantity', () => {
    const issues = issuesOf(() => parseInput(scanSchema, { barcode: 'B7', quantity: 0 }))
    expect(issues).toHaveLength(1)
    expect(issues[0]).toMatch(/^quantity: /)
  })

  it('caps discounts at a billion', () => {
    expect(parseInput(checkoutSchema, { discount: 1_000_000_000 })).toEqual({ discount: 1_000_000_000 })
    const issues = issuesOf(() => parseInput(checkoutSchema, { discount: 1e308 }))
    expect(issues).toHaveLength(1)
    expect(issues[0]).toMatch(/^discount: /)
  })

  it('accepts calendar days only in a date range', () => {
    expect(parseInput(dateRangeSchema, { from: '2026-03-01' })).toEqual({ from: '2026-03-01' })
    expect(() => parseInput(dateRangeSchema, { to: '03/01/2026' })).toThrow(ValidationError)
  })

  it('coerces a threshold from the query string', () => {
    expect(parseInput(thresholdSchema, { threshold: '3' })).toEqual({ threshold: 3 })
    expect(parseInput(thresholdSchema, {})).toEqual({})
    expect(() => parseInput(thresholdSchema, { threshold: '-1' })).toThrow(ValidationError)
  })
})

describe('parseId', () => {
  it('parses positive integers', () => {
    expect(parseId('42')).toBe(42)
  })

  it.each(['0', '-3', '1.5', 'abc', ''])('rejects %j', (raw) => {
    expect(() => parseId(raw)).toThrow(ValidationError)
  })

  it('names the parameter in the message', () => {
    expect(() => parseId('x', 'productId')).toThrow('productId must be a positive integer, got "x"')
  })
})
