import { parseArgs } from 'node:util'
import { Secret } from '../clients/producer/credentials.ts'
import { defaultMessage, defaultTimeout } from '../clients/producer/options.ts'
import { UsageError } from '../errors.ts'
import { ajv, formatValidationErrors, stripTrailingSlashes } from '../utils.ts'

export const commandName = 'topic-rest-produce'

export interface ProduceCommandOptions {
  topic: string
  restApiUrl: string
  username: string
  password: Secret
  message: string
  count: number
  timeout: number
  insecureSkipVerify: boolean
}

export type ParsedArguments = { command: 'help' } | { command: 'produce'; options: ProduceCommandOptions }

const requiredFlags = ['topic', 'rest-api-url', 'username', 'password'] as const
const valueFlags = new Set(['--topic', '--rest-api-url', '--username', '--password', '--message', '--count', '--timeout'])
const negativeNumber = /^-\d+$|^-\d*\.\d+$/

export const usage =
  `usage: ${commandName} --topic TOPIC --rest-api-url URL --username USER --password PASS ` +
  '[--message MSG] [--count N] [--timeout MS] [--verify-tls]'

export const help = `${usage}

Produces messages to a topic through a REST ingestion gateway.

options:
  -h, --help            show this help message and exit
  --topic TOPIC         Topic name
  --rest-api-url URL    REST API base URL (e.g., https://gateway.example.com)
  --username USER       Username
  --password PASS       Password
  --message MSG         Message content (default: ${defaultMessage})
  --count N             Number of messages (default: 1)
  --timeout MS          Request timeout in milliseconds (default: ${defaultTimeout})
  --verify-tls          Verify the TLS certificate of the REST API (default: off)
`

const argumentsSchema = {
  type: 'object',
  properties: {
    topic: { type: 'string', minLength: 1 },
    'rest-api-url': { type: 'string', minLength: 1 },
    username: { type: 'string' },
    password: { type: 'string' },
    message: { type: 'string' },
    count: { type: 'string' },
    timeout: { type: 'string' },
    'verify-tls': { type: 'boolean' },
    help: { type: 'boolean' }
  },
  additionalProperties: false
}

const argumentsValidator = ajv.compile(argumentsSchema)

function parseInteger (flag: string, raw: string): number {
  // Optional sign and surrounding whitespace are accepted, anything else is not an integer
  if (!/^\s*[+-]?\d+\s*$/.test(raw)) {
    throw new UsageError(`argument --${flag}: invalid int value: '${raw}'`)
  }

  return Number.parseInt(raw.trim(), 10)
}

// parseArgs refuses an option value starting with a dash, so `--count -2` becomes `--count=-2`
export function joinNegativeValues (argv: string[]): string[] {
  const args: string[] = []

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]
    const next = argv[i + 1]

    if (valueFlags.has(arg) && next !== undefined && negativeNumber.test(next)) {
      args.push(`${arg}=${next}`)
      i++
    } else {
      args.push(arg)
    }
  }

  return args
}

function readFlags (argv: string[]) {
  try {
    return parseArgs({
      args: joinNegativeValues(argv),
      options: {
        topic: { type: 'string' },
        'rest-api-url': { type: 'string' },
        username: { type: 'string' },
        password: { type: 'string' },
        message: { type: 'string', default: defaultMessage },
        count: { type: 'string', default: '1' },
        timeout: { type: 'string', default: String(defaultTimeout) },
        'verify-tls': { type: 'boolean', default: false },
        help: { type: 'boolean', short: 'h', default: false }
      },
      strict: true,
      allowPositionals: false
    }).values
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error), { cause: error })
  }
}

export function parseArguments (argv: string[]): ParsedArguments {
  const values = readFlags(argv)

  if (values.help) {
    return { command: 'help' }
  }

  const { topic, 'rest-api-url': restApiUrl, username, password, message, count, timeout } = values

  if (topic === undefined || restApiUrl === undefined || username === undefined || password === undefined) {
    const missing = requiredFlags.filter(flag => values[flag] === undefined).map(flag => `--${flag}`)
    throw new UsageError(`the following arguments are required: ${missing.join(', ')}`)
  }

  if (!argumentsValidator(values)) {
    throw new UsageError(formatValidationErrors(argumentsValidator, 'argument'), { errors: argumentsValidator.errors })
  }

  const rawTimeout = timeout ?? String(defaultTimeout)
  const parsedTimeout = parseInteger('timeout', rawTimeout)
  if (parsedTimeout <= 0) {
    throw new UsageError(`argument --timeout: must be a positive integer: '${rawTimeout}'`)
  }

  return {
    command: 'produce',
    options: {
      topic,
      restApiUrl: stripTrailingSlashes(restApiUrl),
      username,
      password: new Secret(password),
      message: message ?? defaultMessage,
      count: parseInteger('count', count ?? '1'),
      timeout: parsedTimeout,
      insecureSkipVerify: !values['verify-tls']
    }
  }
}
