export * from './types.js'
export * from './in_memory.js'
