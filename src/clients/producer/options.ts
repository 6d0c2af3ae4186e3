import { ajv } from '../../utils.ts'
import { name, version } from '../../version.ts'
import { type RestProducerOptions } from './types.ts'

export const clientSoftwareName = name
export const clientSoftwareVersion = version
export const userAgent = `${clientSoftwareName}/${clientSoftwareVersion}`

export const defaultTimeout = 30_000
export const defaultMessage = 'Hello from REST API'

export const restProducerOptionsSchema = {
  type: 'object',
  properties: {
    url: { type: 'string', pattern: '^https?://' },
    username: { type: 'string' },
    password: { oneOf: [{ type: 'string' }, { secret: true }] },
    timeout: { type: 'number', exclusiveMinimum: 0 },
    insecureSkipVerify: { type: 'boolean' }
  },
  required: ['url', 'username', 'password'],
  additionalProperties: false
}

export const sendOptionsSchema = {
  type: 'object',
  properties: {
    topic: { type: 'string', minLength: 1 },
    value: { type: 'string' }
  },
  required: ['topic', 'value'],
  additionalProperties: false
}

export const restProducerOptionsValidator = ajv.compile(restProducerOptionsSchema)
export const sendOptionsValidator = ajv.compile(sendOptionsSchema)

export const defaultRestProducerOptions: Required<Pick<RestProducerOptions, 'timeout' | 'insecureSkipVerify'>> = {
  timeout: defaultTimeout,
  // Mirrors the behavior of the tooling this replaces, see RestProducerOptions.insecureSkipVerify
  insecureSkipVerify: true
}
