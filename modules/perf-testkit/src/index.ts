export * from './fake-buck.js'
