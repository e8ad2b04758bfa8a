export * from './brand.js'
export * from './perf-test-config.js'
export * from './perf-types.js'
