import { type ValidateFunction } from 'ajv'
import { Ajv2020 } from 'ajv/dist/2020.js'
import { Secret } from './clients/producer/credentials.ts'

export const ajv = new Ajv2020({ allErrors: true, coerceTypes: false, strict: true })

ajv.addKeyword({
  keyword: 'secret',
  validate (_: unknown, x: unknown) {
    return x instanceof Secret
  },
  error: {
    message: 'must be Secret'
  }
})

export function formatValidationErrors (validator: ValidateFunction<unknown>, targetName: string): string {
  return ajv.errorsText(validator.errors, { dataVar: '$dataVar$' }).replaceAll('$dataVar$', targetName) + '.'
}

export function stripTrailingSlashes (url: string): string {
  let end = url.length

  while (end > 0 && url[end - 1] === '/') {
    end--
  }

  return url.slice(0, end)
}

export function basicAuthorization (username: string, password: string): string {
  return `Basic ${Buffer.from(`${username}:${password}`).toString('base64')}`
}
