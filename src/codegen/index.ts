export * from './module.js'
export * from './kotlin.js'
