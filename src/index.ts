// General
export * from './diagnostic.ts'
export * from './errors.ts'
export * from './logging.ts'
export * from './utils.ts'
export * from './version.ts'

// Clients
export * from './clients/producer/index.ts'

// Command line
export * from './cli/index.ts'
