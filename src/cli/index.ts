export * from './options.js'
export * from './syncLibs.js'
