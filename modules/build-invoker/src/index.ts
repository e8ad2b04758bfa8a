export * from './buck-layout.js'
export * from './build-invoker.js'
export * from './side-configurator.js'
