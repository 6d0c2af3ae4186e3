import { RestProducer } from '../clients/producer/producer.ts'
import { formatMessage } from '../clients/producer/delivery.ts'
import { AbortedError, UsageError } from '../errors.ts'
import { loggers } from '../logging.ts'
import { type ParsedArguments, parseArguments, type ProduceCommandOptions } from './arguments.ts'
import { Reporter, type ReporterStreams } from './reporter.ts'

export const exitCodes = {
  success: 0,
  failure: 1,
  usage: 2
} as const

export type ExitCode = (typeof exitCodes)[keyof typeof exitCodes]

export interface CommandContext extends ReporterStreams {
  // Aborting it interrupts the run, including the request in flight
  signal?: AbortSignal
}

/**
 * Sends `options.count` messages one after the other and reports each delivery.
 *
 * The first failure stops the run: messages already delivered stay delivered and have been reported.
 * A `count` of zero or less sends nothing and still reports success.
 */
export async function produce (options: ProduceCommandOptions, context: CommandContext): Promise<ExitCode> {
  const { topic, message, count } = options
  const { signal } = context
  const reporter = new Reporter(context)
  let producer: RestProducer | undefined

  reporter.banner(options)
  loggers.cli?.debug({ topic, count, url: options.restApiUrl }, 'Starting produce command.')

  try {
    producer = new RestProducer({
      url: options.restApiUrl,
      username: options.username,
      password: options.password,
      timeout: options.timeout,
      insecureSkipVerify: options.insecureSkipVerify
    })

    for (let i = 0; i < count; i++) {
      if (signal?.aborted) {
        throw new AbortedError(`Interrupted before sending message ${i + 1}.`)
      }

      const report = await producer.send(topic, formatMessage(message, i, count), { signal })
      reporter.delivered(i + 1, topic, report)
    }

    reporter.completed()
    return exitCodes.success
  } catch (error) {
    if (error instanceof AbortedError) {
      reporter.interrupted()
    } else {
      reporter.failed(error)
    }

    loggers.cli?.debug({ err: error }, 'Produce command failed.')
    return exitCodes.failure
  } finally {
    await producer?.close()
  }
}

export async function main (argv: string[], context: CommandContext): Promise<ExitCode> {
  const reporter = new Reporter(context)
  let parsed: ParsedArguments

  try {
    parsed = parseArguments(argv)
  } catch (error) {
    if (error instanceof UsageError) {
      reporter.usageError(error.message)
      return exitCodes.usage
    }

    reporter.failed(error)
    return exitCodes.failure
  }

  if (parsed.command === 'help') {
    reporter.help()
    return exitCodes.success
  }

  return produce(parsed.options, context)
}
