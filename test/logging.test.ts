import { notStrictEqual, strictEqual } from 'node:assert'
import { afterEach, test } from 'node:test'
import { createDebugLogger, logger, loggers, setDebugLoggers, setLogger } from '../src/index.ts'

afterEach(() => {
  setDebugLoggers(process.env.NODE_DEBUG)
  setLogger(process.env.LOG_LEVEL)
})

test('logger should respect LOG_LEVEL environment variable', () => {
  strictEqual(logger.level, process.env.LOG_LEVEL ?? 'debug')

  setLogger('info')
  strictEqual(logger.level, 'info')
})

test('createDebugLogger should return null when no debug patterns match', () => {
  setDebugLoggers('')
  strictEqual(createDebugLogger('test-logger'), null)
})

test('createDebugLogger should return a logger when a debug pattern matches exactly', () => {
  setDebugLoggers('test-logger')
  const debugLogger = createDebugLogger('test-logger')

  notStrictEqual(debugLogger, null)
  strictEqual(debugLogger?.bindings().name, 'test-logger')
})

test('createDebugLogger should return a logger when a debug pattern matches with wildcard', () => {
  setDebugLoggers('test-*')
  const debugLogger = createDebugLogger('test-logger')

  notStrictEqual(debugLogger, null)
  strictEqual(debugLogger?.bindings().name, 'test-logger')
})

test('createDebugLogger should handle multiple patterns in NODE_DEBUG', () => {
  setDebugLoggers('foo,test-*,bar')

  notStrictEqual(createDebugLogger('foo'), null)
  notStrictEqual(createDebugLogger('test-logger'), null)
  notStrictEqual(createDebugLogger('bar'), null)
  strictEqual(createDebugLogger('baz'), null)
})

test('createDebugLogger should ignore empty patterns', () => {
  setDebugLoggers(',test-logger,,')

  notStrictEqual(createDebugLogger('test-logger'), null)
  strictEqual(createDebugLogger(''), null)
})

test('loggers should be pre-configured for known namespaces', () => {
  setDebugLoggers('trp:*')

  notStrictEqual(loggers.producer, null)
  notStrictEqual(loggers.cli, null)

  setDebugLoggers('trp:producer')

  notStrictEqual(loggers.producer, null)
  strictEqual(loggers.cli, null)
})
