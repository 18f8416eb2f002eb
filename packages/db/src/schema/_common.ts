import { numeric, timestamp } from 'drizzle-orm/pg-core'

/** Row creation timestamp written by the generator. */
export const createdAt = () => timestamp('created_at', { withTimezone: true })

/** Two-decimal money column; drizzle reads numerics back as strings. */
export const money = (name: string, precision: 10 | 12) => numeric(name, { precision, scale: 2 })
