export * from './credentials.ts'
export * from './delivery.ts'
export * from './options.ts'
export * from './producer.ts'
export * from './types.ts'
