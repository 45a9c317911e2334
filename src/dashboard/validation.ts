import { z } from 'zod'
import { ValidationError } from '../utils/errors'

const MAX_AMOUNT = 1_000_000_000

const money = z.number().finite().min(0).max(MAX_AMOUNT)
const count = z.number().int()

export const productCreateSchema = z.object({
  barcode: z.string().trim().min(1).max(64),
  name: z.string().trim().min(1).max(255),
  price: money,
  stock: count.min(0).default(0),
})

export const productUpdateSchema = z.object({
  name: z.string().trim().min(1).max(255),
  price: money,
  stock: count.min(0),
})

export const productImportSchema = z.object({
  products: z.array(productCreateSchema.extend({ stock: count.min(0) })).min(1).max(5000),
})

export const restockSchema = z.object({
  quantity: count.positive(),
})

export const scanSchema = z.object({
  barcode: z.string().trim().min(1),
  quantity: count.positive().default(1),
})

export const quantitySchema = z.object({
  quantity: count.positive(),
})

export const checkoutSchema = z.object({
  discount: money.default(0),
})

export const dateRangeSchema = z.object({
  from: z.string().regex(/^\d{4}-\d{2}-\d{2}$/).optional(),
  to: z.string().regex(/^\d{4}-\d{2}-\d{2}$/).optional(),
})

export const thresholdSchema = z.object({
  threshold: z.coerce.number().int().min(0).optional(),
})

export const discountQuerySchema = z.object({
  discount: z.coerce.number().finite().min(0).max(MAX_AMOUNT).default(0),
})

/** Parse or throw a {@link ValidationError} listing every issue */
export function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input)
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    )
    throw new ValidationError('Invalid request', issues)
  }
  return result.data
}

/** Route params are strings; ids must be positive integers */
export function parseId(raw: string, label = 'id'): number {
  const id = Number(raw)
  if (!Number.isInteger(id) || id < 1) {
    throw new ValidationError(`${label} must be a positive integer, got "${raw}"`)
  }
  return id
}
