export * from './errors'
export * from './logger'
export * from './random'
export * from './weighted'
export * from './products'
export * from './names'
export * from './regions'
export * from './customers'
export * from './orders'
export * from './consistency'
export * from './sink'
export * from './tables'
export * from './pipeline'
export * from './export'
export * from './config'
