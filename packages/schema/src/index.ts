import { z } from 'zod'

// Common schemas
export const idSchema = z.number().int().positive()

export const moneySchema = z.number().positive().multipleOf(0.01)

export const isoDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a YYYY-MM-DD date')
  .refine((value) => isCalendarDate(value), { message: 'Not a calendar date' })

/** True when `YYYY-MM-DD` names a real day (no rollover such as Feb 30). */
export function isCalendarDate(value: string): boolean {
  const time = Date.parse(`${value}T00:00:00.000Z`)
  return !Number.isNaN(time) && new Date(time).toISOString().slice(0, 10) === value
}

/**
 * Largest batch whose insert fits Postgres' 65535 bind parameters for the
 * widest table (customers, 10 columns).
 */
export const MAX_BATCH_SIZE = Math.floor(65535 / 10)

export const sourceSystemSchema = z.enum(['CSV', 'API'])

// Product
export const productSchema = z.object({
  productId: idSchema,
  productName: z.string().min(1).max(300),
  price: moneySchema,
  stockQuantity: z.number().int().min(0),
  sourceSystem: sourceSystemSchema,
  createdAt: z.date(),
})

// Customer
export const customerSchema = z.object({
  customerId: idSchema,
  firstName: z.string().min(1).max(100),
  lastName: z.string().min(1).max(100),
  email: z.string().email().max(200),
  phone: z.string().regex(/^0[17]\d{8}$/),
  addressLine1: z.string().max(255),
  addressLine2: z.string().max(255),
  city: z.string().max(100),
  country: z.string().max(100),
  createdAt: z.date(),
})

// Order
export const orderSchema = z.object({
  orderId: idSchema,
  customerId: idSchema,
  orderDate: isoDateSchema,
  totalAmount: moneySchema,
})

// Order item
export const orderItemSchema = z.object({
  orderItemId: idSchema,
  orderId: idSchema,
  productId: idSchema,
  quantity: z.number().int().min(1),
  unitPrice: moneySchema,
  subtotal: moneySchema,
})

export type SourceSystem = z.infer<typeof sourceSystemSchema>
export type Product = z.infer<typeof productSchema>
export type Customer = z.infer<typeof customerSchema>
export type Order = z.infer<typeof orderSchema>
export type OrderItem = z.infer<typeof orderItemSchema>

// Generation config
export type NumericRange = { min: number; max: number }

const rangeOf = (bound: z.ZodNumber) =>
  z
    .object({ min: bound, max: bound })
    .refine((range) => range.min <= range.max, { message: 'min must not exceed max' })

const moneyRangeSchema = rangeOf(z.number().min(0.01))
const stockRangeSchema = rangeOf(z.number().int().min(0))
const quantityRangeSchema = rangeOf(z.number().int().min(1))

export const generationConfigSchema = z
  .object({
    customerCount: z.number().int().positive(),
    productCount: z.number().int().positive(),
    orderCount: z.number().int().positive(),
    orderItemCount: z.number().int().min(0),
    batchSize: z.number().int().positive().max(MAX_BATCH_SIZE).default(500),
    seed: z.number().int().default(42),
    generatedAt: z.date(),
    orderDateStart: isoDateSchema.default('2022-01-01'),
    orderDateEnd: isoDateSchema.default('2025-10-30'),
    productPrice: moneyRangeSchema.default({ min: 50, max: 10000 }),
    stockQuantity: stockRangeSchema.default({ min: 0, max: 500 }),
    unitPrice: moneyRangeSchema.default({ min: 50, max: 10000 }),
    quantity: quantityRangeSchema.default({ min: 1, max: 5 }),
    stapleCutoff: z.number().int().min(0).default(400),
    stapleWeight: z.number().positive().default(3),
    standardWeight: z.number().positive().default(1),
  })
  .refine((config) => config.orderDateStart <= config.orderDateEnd, {
    message: 'orderDateStart must not be after orderDateEnd',
    path: ['orderDateEnd'],
  })

export type GenerationConfigInput = z.input<typeof generationConfigSchema>
export type GenerationConfig = z.output<typeof generationConfigSchema>

// Environment
const optionalCount = z.coerce.number().int().positive().optional()

export const generationEnvSchema = z.object({
  RECORD_COUNT: z.coerce.number().int().positive().default(2000),
  CUSTOMER_COUNT: optionalCount,
  PRODUCT_COUNT: optionalCount,
  ORDER_COUNT: optionalCount,
  ORDER_ITEM_COUNT: z.coerce.number().int().min(0).optional(),
  BATCH_SIZE: z.coerce.number().int().positive().max(MAX_BATCH_SIZE).default(500),
  SEED: z.coerce.number().int().default(42),
  ORDER_DATE_START: isoDateSchema.default('2022-01-01'),
  ORDER_DATE_END: isoDateSchema.default('2025-10-30'),
  STAPLE_CUTOFF: z.coerce.number().int().min(0).default(400),
  PRODUCTS_CSV_FILE: z.string().min(1).default('products.csv'),
  GENERATED_AT: z.coerce.date().optional(),
})

export type GenerationEnv = z.infer<typeof generationEnvSchema>

// API query schemas
export const limitQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(2000).optional(),
})

export const productListQuerySchema = limitQuerySchema
  .extend({
    minPrice: z.coerce.number().min(0).default(0),
    maxPrice: z.coerce.number().min(0).default(50000),
  })
  .refine((query) => query.minPrice <= query.maxPrice, {
    message: 'minPrice must not exceed maxPrice',
    path: ['maxPrice'],
  })

export type ProductListQuery = z.infer<typeof productListQuerySchema>

