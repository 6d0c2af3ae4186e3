const kGenericError = Symbol('trp.genericError')

export const ERROR_PREFIX = 'TRP_'

export const errorCodes = [
  'TRP_ABORTED',
  'TRP_HTTP',
  'TRP_NETWORK',
  'TRP_RESPONSE',
  'TRP_TIMEOUT',
  'TRP_USAGE',
  'TRP_USER'
] as const

export type ErrorCode = (typeof errorCodes)[number]

export type ErrorProperties = { cause?: unknown } & Record<string, unknown>

export class GenericError extends Error {
  code: string;
  [index: string]: unknown
  [kGenericError]: true

  static isGenericError (error: unknown): error is GenericError {
    return error instanceof Error && kGenericError in error && error[kGenericError] === true
  }

  constructor (code: ErrorCode, message: string, { cause, ...rest }: ErrorProperties = {}) {
    super(message, cause ? { cause } : {})
    this.code = code
    this[kGenericError] = true

    Reflect.defineProperty(this, 'message', { enumerable: true })
    Reflect.defineProperty(this, 'code', { enumerable: true })

    if ('stack' in this) {
      Reflect.defineProperty(this, 'stack', { enumerable: true })
    }

    for (const [key, value] of Object.entries(rest)) {
      Reflect.defineProperty(this, key, { value, enumerable: true })
    }

    Reflect.defineProperty(this, kGenericError, { value: true, enumerable: false })
  }
}

export class AbortedError extends GenericError {
  static code: ErrorCode = 'TRP_ABORTED'

  constructor (message: string, properties: ErrorProperties = {}) {
    super(AbortedError.code, message, properties)
  }
}

// Raised for any response outside the 2xx range, the body is kept verbatim
export class HttpResponseError extends GenericError {
  static code: ErrorCode = 'TRP_HTTP'

  declare readonly statusCode: number
  declare readonly body: string
  declare readonly url: string

  constructor (statusCode: number, body: string, url: string, properties: ErrorProperties = {}) {
    super(HttpResponseError.code, `Request to ${url} failed: [HTTP ${statusCode}]`, {
      ...properties,
      statusCode,
      body,
      url
    })
  }
}

// Raised for a 2xx response whose body is not JSON
export class InvalidResponseError extends GenericError {
  static code: ErrorCode = 'TRP_RESPONSE'

  declare readonly statusCode: number
  declare readonly body: string
  declare readonly url: string

  constructor (statusCode: number, body: string, url: string, properties: ErrorProperties = {}) {
    super(InvalidResponseError.code, `Request to ${url} returned an invalid JSON response: [HTTP ${statusCode}]`, {
      ...properties,
      statusCode,
      body,
      url
    })
  }
}

export class NetworkError extends GenericError {
  static code: ErrorCode = 'TRP_NETWORK'

  constructor (message: string, properties: ErrorProperties = {}) {
    super(NetworkError.code, message, properties)
  }
}

export class TimeoutError extends GenericError {
  static code: ErrorCode = 'TRP_TIMEOUT'

  constructor (message: string, properties: ErrorProperties = {}) {
    super(TimeoutError.code, message, properties)
  }
}

export class UsageError extends GenericError {
  static code: ErrorCode = 'TRP_USAGE'

  constructor (message: string, properties: ErrorProperties = {}) {
    super(UsageError.code, message, properties)
  }
}

export class UserError extends GenericError {
  static code: ErrorCode = 'TRP_USER'

  constructor (message: string, properties: ErrorProperties = {}) {
    super(UserError.code, message, properties)
  }
}

export type RequestError = HttpResponseError | InvalidResponseError | NetworkError | TimeoutError

export function isRequestError (error: unknown): error is RequestError {
  return (
    error instanceof HttpResponseError ||
    error instanceof InvalidResponseError ||
    error instanceof NetworkError ||
    error instanceof TimeoutError
  )
}
