export * from './line-grammars.js'
export * from './log-parser.js'
