import { strictEqual } from 'node:assert'
import test from 'node:test'
import { inspect } from 'node:util'
import { Secret, toSecret } from '../../../src/index.ts'

test('Secret should only disclose its value through reveal', () => {
  const secret = new Secret('test-secret')

  strictEqual(secret.reveal(), 'test-secret')
  strictEqual(`${secret}`, '[REDACTED]')
  strictEqual(String(secret), '[REDACTED]')
  strictEqual(JSON.stringify({ password: secret }), '{"password":"[REDACTED]"}')
  strictEqual(inspect(secret), 'Secret([REDACTED])')
  strictEqual(inspect({ password: secret }), '{ password: Secret([REDACTED]) }')
})

test('toSecret should wrap strings and keep existing secrets', () => {
  const secret = new Secret('test-secret')

  strictEqual(toSecret(secret), secret)
  strictEqual(toSecret('test-secret').reveal(), 'test-secret')
})
