export * from './types.js'
export * from './schema.js'
export * from './errors.js'
export * from './identity.js'
export * from './variant.js'
