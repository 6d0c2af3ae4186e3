import { type Writable } from 'node:stream'
import { type DeliveryReport } from '../clients/producer/types.ts'
import { HttpResponseError, InvalidResponseError, isRequestError } from '../errors.ts'
import { commandName, help, usage, type ProduceCommandOptions } from './arguments.ts'

export interface ReporterStreams {
  stdout: Writable
  stderr: Writable
}

const placeholder = '?'

export function formatResponse (response: unknown): string {
  return typeof response === 'string' ? response : JSON.stringify(response)
}

export function formatDelivery (index: number, topic: string, report: DeliveryReport): string {
  if (report.type === 'unrecognized') {
    return `✅ Message ${index} sent (response: ${formatResponse(report.response)})`
  }

  const partition = report.partition ?? placeholder
  const offset = report.offset ?? placeholder
  return `✅ Message ${index} delivered to ${topic} [partition ${partition}] at offset ${offset}`
}

// Writes the human readable report of a command run. The password is never part of what this class receives.
export class Reporter {
  #stdout: Writable
  #stderr: Writable

  constructor ({ stdout, stderr }: ReporterStreams) {
    this.#stdout = stdout
    this.#stderr = stderr
  }

  banner ({ topic, restApiUrl, username }: Pick<ProduceCommandOptions, 'topic' | 'restApiUrl' | 'username'>): void {
    this.#print('🚀 Producing messages via REST API...')
    this.#print(`   Topic: ${topic}`)
    this.#print(`   REST API: ${restApiUrl}`)
    this.#print(`   Username: ${username}`)
    this.#print('')
  }

  delivered (index: number, topic: string, report: DeliveryReport): void {
    this.#print(formatDelivery(index, topic, report))
  }

  completed (): void {
    this.#print('✅ All messages sent and delivered')
  }

  interrupted (): void {
    this.#print('\n⚠️  Interrupted')
  }

  failed (error: unknown): void {
    const message = error instanceof Error ? error.message : String(error)

    if (isRequestError(error)) {
      this.#printError(`❌ REST API error: ${message}`)

      if (error instanceof HttpResponseError || error instanceof InvalidResponseError) {
        this.#printError(`   Status: ${error.statusCode}`)
        this.#printError(`   Response: ${error.body}`)
      }
    }

    this.#printError(`❌ Error: ${message}`)
  }

  usageError (message: string): void {
    this.#printError(usage)
    this.#printError(`${commandName}: error: ${message}`)
  }

  help (): void {
    this.#stdout.write(help)
  }

  #print (line: string): void {
    this.#stdout.write(line + '\n')
  }

  #printError (line: string): void {
    this.#stderr.write(line + '\n')
  }
}
