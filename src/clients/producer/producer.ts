import { clearTimeout, setTimeout } from 'node:timers'
import { Agent, errors, request } from 'undici'
import { createDiagnosticContext, notifyCreation, producerSendsChannel } from '../../diagnostic.ts'
import {
  AbortedError,
  GenericError,
  HttpResponseError,
  InvalidResponseError,
  NetworkError,
  TimeoutError,
  UserError
} from '../../errors.ts'
import { loggers } from '../../logging.ts'
import { basicAuthorization, formatValidationErrors, stripTrailingSlashes } from '../../utils.ts'
import { type Secret, toSecret } from './credentials.ts'
import { parseDeliveryReport } from './delivery.ts'
import {
  defaultRestProducerOptions,
  restProducerOptionsValidator,
  sendOptionsValidator,
  userAgent
} from './options.ts'
import { type DeliveryReport, type ProduceRequestBody, type RestProducerOptions, type SendOptions } from './types.ts'

function isTimeoutError (error: unknown): boolean {
  return (
    error instanceof errors.ConnectTimeoutError ||
    error instanceof errors.HeadersTimeoutError ||
    error instanceof errors.BodyTimeoutError
  )
}

export class RestProducer {
  #url: string
  #username: string
  #password: Secret
  #timeout: number
  #insecureSkipVerify: boolean
  #agent: Agent
  #closed: boolean

  constructor (options: RestProducerOptions) {
    if (!restProducerOptionsValidator(options)) {
      throw new UserError(formatValidationErrors(restProducerOptionsValidator, '/options'))
    }

    this.#url = stripTrailingSlashes(options.url)
    this.#username = options.username
    this.#password = toSecret(options.password)
    this.#timeout = options.timeout ?? defaultRestProducerOptions.timeout
    this.#insecureSkipVerify = options.insecureSkipVerify ?? defaultRestProducerOptions.insecureSkipVerify
    this.#closed = false

    this.#agent = new Agent({
      connect: {
        timeout: this.#timeout,
        // See RestProducerOptions.insecureSkipVerify
        rejectUnauthorized: !this.#insecureSkipVerify
      },
      headersTimeout: this.#timeout,
      bodyTimeout: this.#timeout
    })

    notifyCreation('producer', this)
  }

  get url (): string {
    return this.#url
  }

  get username (): string {
    return this.#username
  }

  get timeout (): number {
    return this.#timeout
  }

  get insecureSkipVerify (): boolean {
    return this.#insecureSkipVerify
  }

  get closed (): boolean {
    return this.#closed
  }

  recordsUrl (topic: string): string {
    return `${this.#url}/topics/${encodeURIComponent(topic)}/records`
  }

  async send (topic: string, value: string, options: SendOptions = {}): Promise<DeliveryReport> {
    if (this.#closed) {
      throw new UserError('Producer is closed.', { closed: true })
    }

    if (!sendOptionsValidator({ topic, value })) {
      throw new UserError(formatValidationErrors(sendOptionsValidator, '/send'))
    }

    const context = createDiagnosticContext({ client: this, operation: 'send', topic })
    producerSendsChannel.start.publish(context)

    try {
      const report = await this.#send(topic, value, options)
      context.result = report
      producerSendsChannel.asyncEnd.publish(context)
      return report
    } catch (error) {
      context.error = error
      producerSendsChannel.error.publish(context)
      throw error
    }
  }

  async close (): Promise<void> {
    if (this.#closed) {
      return
    }

    this.#closed = true
    await this.#agent.close()
  }

  async #send (topic: string, value: string, { signal }: SendOptions): Promise<DeliveryReport> {
    const url = this.recordsUrl(topic)

    if (signal?.aborted) {
      throw new AbortedError('Request was aborted before being sent.', { url })
    }

    const payload: ProduceRequestBody = { records: [{ value }] }
    const controller = new AbortController()
    let timedOut = false

    const timer = setTimeout(() => {
      timedOut = true
      controller.abort()
    }, this.#timeout)

    const onAbort = (): void => {
      controller.abort()
    }

    signal?.addEventListener('abort', onAbort, { once: true })

    loggers.producer?.debug({ url, topic }, 'Sending record.')

    try {
      const response = await request(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'User-Agent': userAgent,
          Authorization: basicAuthorization(this.#username, this.#password.reveal())
        },
        body: JSON.stringify(payload),
        dispatcher: this.#agent,
        signal: controller.signal
      })

      const text = await response.body.text()
      loggers.producer?.debug({ url, statusCode: response.statusCode }, 'Received response.')

      if (response.statusCode < 200 || response.statusCode >= 300) {
        throw new HttpResponseError(response.statusCode, text, url)
      }

      let body: unknown
      try {
        body = JSON.parse(text)
      } catch (error) {
        throw new InvalidResponseError(response.statusCode, text, url, { cause: error })
      }

      return parseDeliveryReport(body)
    } catch (error) {
      if (GenericError.isGenericError(error)) {
        throw error
      }

      if (timedOut || isTimeoutError(error)) {
        throw new TimeoutError(`Request to ${url} timed out after ${this.#timeout} ms.`, { cause: error, url })
      }

      if (signal?.aborted) {
        throw new AbortedError('Request was aborted.', { cause: error, url })
      }

      const reason = error instanceof Error ? error.message : String(error)
      throw new NetworkError(`Request to ${url} failed: ${reason}`, { cause: error, url })
    } finally {
      clearTimeout(timer)
      signal?.removeEventListener('abort', onAbort)
    }
  }
}
