import { once } from 'node:events'
import { createServer, type IncomingHttpHeaders, type Server } from 'node:http'
import { type AddressInfo } from 'node:net'
import { Writable } from 'node:stream'
import { type TestContext } from 'node:test'
import { Secret } from '../src/clients/producer/credentials.ts'
import { type ProduceCommandOptions } from '../src/cli/arguments.ts'

export const testUsername = 'test-user'
export const testPassword = 'test-secret'

export interface RecordedRequest {
  method: string | undefined
  url: string | undefined
  headers: IncomingHttpHeaders
  body: string
}

export interface GatewayReply {
  statusCode?: number
  body?: string
}

// Returning null leaves the request hanging until the server is closed
export type GatewayHandler = (request: RecordedRequest, index: number) => GatewayReply | null

export interface Gateway {
  url: string
  requests: RecordedRequest[]
  server: Server
}

export function metadataReply (partition: number, offset: number): GatewayReply {
  return { body: JSON.stringify({ metadata: { partition, offset } }) }
}

// Stands in for the REST gateway on an ephemeral local port
export async function createGateway (t: TestContext, handler: GatewayHandler): Promise<Gateway> {
  const requests: RecordedRequest[] = []

  const server = createServer((request, response) => {
    const chunks: Buffer[] = []

    request.on('data', (chunk: Buffer) => chunks.push(chunk))
    request.on('end', () => {
      const recorded: RecordedRequest = {
        method: request.method,
        url: request.url,
        headers: request.headers,
        body: Buffer.concat(chunks).toString('utf-8')
      }

      requests.push(recorded)
      const reply = handler(recorded, requests.length - 1)

      if (!reply) {
        return
      }

      response.writeHead(reply.statusCode ?? 200, { 'Content-Type': 'application/json' })
      response.end(reply.body ?? '')
    })
  })

  server.listen(0, '127.0.0.1')
  await once(server, 'listening')

  t.after(async () => {
    server.closeAllConnections()
    server.close()
    await once(server, 'close')
  })

  const { port } = server.address() as AddressInfo
  return { url: `http://127.0.0.1:${port}`, requests, server }
}

// Returns a URL where nothing is listening
export async function createUnusedUrl (): Promise<string> {
  const server = createServer()
  server.listen(0, '127.0.0.1')
  await once(server, 'listening')

  const { port } = server.address() as AddressInfo
  server.close()
  await once(server, 'close')

  return `http://127.0.0.1:${port}`
}

export function createOutput () {
  const chunks: string[] = []

  const stream = new Writable({
    write (chunk: Buffer, _: BufferEncoding, callback: (error?: Error | null) => void) {
      chunks.push(chunk.toString('utf-8'))
      callback()
    }
  })

  return {
    stream,
    text (): string {
      return chunks.join('')
    },
    lines (): string[] {
      return chunks.join('').split('\n').slice(0, -1)
    }
  }
}

export function createCommandOptions (overrides: Partial<ProduceCommandOptions> = {}): ProduceCommandOptions {
  return {
    topic: 'orders',
    restApiUrl: 'http://127.0.0.1:9',
    username: testUsername,
    password: new Secret(testPassword),
    message: 'Hello from REST API',
    count: 1,
    timeout: 5000,
    insecureSkipVerify: true,
    ...overrides
  }
}

export function decodeBasicAuthorization (header: string | undefined): string {
  return Buffer.from((header ?? '').replace(/^Basic /, ''), 'base64').toString('utf-8')
}
