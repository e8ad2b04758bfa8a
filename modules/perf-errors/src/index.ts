export * from './perf-errors.js'
