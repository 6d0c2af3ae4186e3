export * from './arguments.ts'
export * from './reporter.ts'
export * from './run.ts'
