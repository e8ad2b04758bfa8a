export * from './constructs.js'
export * from './misc.js'
