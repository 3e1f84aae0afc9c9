export * from './diagnostics'
export * from './errors'
export * from './format'
export * from './types'
