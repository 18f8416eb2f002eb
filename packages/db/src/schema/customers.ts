import { integer, pgTable, varchar } from 'drizzle-orm/pg-core'
import { createdAt } from './_common'

/**
 * customers
 *
 * Synthetic Kenyan customers. `city` holds the county the generator drew the
 * name and address from.
 */
export const customers = pgTable('customers', {
  customerId: integer('customer_id').primaryKey(),
  firstName: varchar('first_name', { length: 100 }),
  lastName: varchar('last_name', { length: 100 }),

  /** `first.last<id>@example.com`, unique by construction. */
  email: varchar('email', { length: 200 }),

  phone: varchar('phone', { length: 100 }),
  addressLine1: varchar('address_line1', { length: 255 }),
  addressLine2: varchar('address_line2', { length: 255 }),
  city: varchar('city', { length: 100 }),
  country: varchar('country', { length: 100 }),
  createdAt: createdAt(),
})

export type CustomerRow = typeof customers.$inferSelect
export type NewCustomerRow = typeof customers.$inferInsert
