export * from './writer.js'
export * from './messages.js'
