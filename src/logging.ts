import { type Logger, pino } from 'pino'

export function setDebugLoggers (debug: string | undefined): void {
  enabledDebugLoggers = (debug ?? '')
    .split(',')
    .map(x => x.trim())
    .filter(x => x.length > 0)
    .map(x => new RegExp(`^${x.replaceAll('*', '.*')}$`))

  loggers = {
    producer: createDebugLogger('trp:producer'),
    cli: createDebugLogger('trp:cli')
  }
}

export function setLogger (level: string | undefined): void {
  logger = pino({
    level: level ?? 'debug',
    transport: {
      target: 'pino-pretty',
      // Standard output belongs to the command report
      options: { destination: 2 }
    }
  })
}

export function createDebugLogger (name: string | undefined): Logger | null {
  name ??= ''

  if (!enabledDebugLoggers.some(r => r.test(name))) {
    return null
  }

  return logger.child({ name })
}

export let logger: Logger
export let enabledDebugLoggers: RegExp[]
export let loggers: Record<'producer' | 'cli', Logger | null>

setLogger(process.env.LOG_LEVEL)
setDebugLoggers(process.env.NODE_DEBUG ?? '')
