export * from './invariants.js'
export * from './orchestrator.js'
export * from './perf-test.js'
export * from './perf-test-cli.js'
export * from './relocate.js'
export * from './revision-driver.js'
export * from './target-builder.js'
