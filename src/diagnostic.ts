import { channel, type TracingChannel, tracingChannel } from 'node:diagnostics_channel'
import { type RestProducer } from './clients/producer/producer.ts'

export type ClientType = 'producer'

export interface CreationEvent<InstanceType> {
  type: ClientType
  instance: InstanceType
}

export type ClientDiagnosticEvent<Attributes = Record<string, unknown>> = {
  client: RestProducer
} & Attributes

export type TracingChannelWithName<EventType extends object> = TracingChannel<string, EventType> & { name: string }

export type DiagnosticContext<BaseContext = {}> = BaseContext & {
  operationId: bigint
  result?: unknown
  error?: unknown
}

export const channelsNamespace = 'trp' as const

let operationId = 0n

export function createDiagnosticContext<BaseContext = {}> (context: BaseContext): DiagnosticContext<BaseContext> {
  return { operationId: operationId++, ...context }
}

export function notifyCreation<InstanceType> (type: ClientType, instance: InstanceType): void {
  instancesChannel.publish({ type, instance } satisfies CreationEvent<InstanceType>)
}

export function createTracingChannel<DiagnosticEvent extends object> (
  name: string
): TracingChannelWithName<DiagnosticEvent> {
  name = `${channelsNamespace}:${name}`
  const channel = tracingChannel<string, DiagnosticEvent>(name) as TracingChannelWithName<DiagnosticEvent>
  channel.name = name
  return channel
}

// Generic channel for objects creation
export const instancesChannel = channel(`${channelsNamespace}:instances`)

// Producer channels
export const producerSendsChannel = createTracingChannel<ClientDiagnosticEvent>('producer:sends')
