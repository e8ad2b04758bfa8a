export * from './hg-vcs.js'
export * from './vcs.js'
