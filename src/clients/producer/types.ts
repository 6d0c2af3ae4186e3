import { type Secret } from './credentials.ts'

export interface RestProducerOptions {
  // Base URL of the REST gateway, trailing slashes are ignored
  url: string
  username: string
  password: string | Secret
  // Per request, in milliseconds
  timeout?: number
  // SECURITY: disables TLS certificate verification. The default (true) targets gateways that only expose a
  // self-signed certificate; switch it off whenever the gateway has a trusted certificate.
  insecureSkipVerify?: boolean
}

export interface SendOptions {
  signal?: AbortSignal
}

export interface ProduceRecord {
  value: string
}

export interface ProduceRequestBody {
  records: ProduceRecord[]
}

// Partition and offset are reported as sent by the gateway, undefined when missing
export type PartitionOrOffset = number | string | undefined

export interface MetadataDeliveryReport {
  type: 'metadata'
  partition: PartitionOrOffset
  offset: PartitionOrOffset
  response: unknown
}

export interface OffsetsDeliveryReport {
  type: 'offsets'
  partition: PartitionOrOffset
  offset: PartitionOrOffset
  response: unknown
}

export interface UnrecognizedDeliveryReport {
  type: 'unrecognized'
  response: unknown
}

export type DeliveryReport = MetadataDeliveryReport | OffsetsDeliveryReport | UnrecognizedDeliveryReport

export type DeliveryReportType = DeliveryReport['type']
