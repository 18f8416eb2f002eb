// Schema exports
export * from './schema/customers'
export * from './schema/products'
export * from './schema/orders'
export * from './schema/order_items'

export * from './client'
export * from './admin'
export * from './sink'
export * from './queries'
