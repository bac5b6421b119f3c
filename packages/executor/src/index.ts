export * from './errors.js'
export * from './options.js'
export * from './executor.js'
export * from './scoped.js'
