import { inspect } from 'node:util'

const redacted = '[REDACTED]'

// Holds a credential so that it never ends up in console output, logs or serialized errors by accident
export class Secret {
  #value: string

  constructor (value: string) {
    this.#value = value
  }

  reveal (): string {
    return this.#value
  }

  toString (): string {
    return redacted
  }

  toJSON (): string {
    return redacted
  }

  [inspect.custom] (): string {
    return `Secret(${redacted})`
  }
}

export function toSecret (value: string | Secret): Secret {
  return value instanceof Secret ? value : new Secret(value)
}
