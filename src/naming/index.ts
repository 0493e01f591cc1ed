export * from './escape.js'
export * from './denylist.js'
export * from './resolve.js'
