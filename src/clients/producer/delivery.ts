import { ajv } from '../../utils.ts'
import { type DeliveryReport, type PartitionOrOffset } from './types.ts'

type PositionRecord = Record<string, unknown>

export const metadataResponseValidator = ajv.compile<{ metadata: PositionRecord }>({
  type: 'object',
  properties: {
    metadata: { type: 'object' }
  },
  required: ['metadata']
})

export const offsetsResponseValidator = ajv.compile<{ offsets: unknown[] }>({
  type: 'object',
  properties: {
    offsets: { type: 'array', minItems: 1 }
  },
  required: ['offsets']
})

function isPositionRecord (value: unknown): value is PositionRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function readPosition (record: PositionRecord, property: 'partition' | 'offset'): PartitionOrOffset {
  const value = record[property]
  return typeof value === 'number' || typeof value === 'string' ? value : undefined
}

/**
 * Interprets the parsed JSON body of a successful produce request.
 *
 * Gateways answer either with `{ metadata: { partition, offset } }` or with `{ offsets: [{ partition, offset }] }`.
 * Any other JSON value is reported as `unrecognized` with the body attached.
 */
export function parseDeliveryReport (response: unknown): DeliveryReport {
  if (metadataResponseValidator(response)) {
    const { metadata } = response

    return {
      type: 'metadata',
      partition: readPosition(metadata, 'partition'),
      offset: readPosition(metadata, 'offset'),
      response
    }
  }

  if (offsetsResponseValidator(response)) {
    const first = response.offsets[0]

    if (isPositionRecord(first)) {
      return {
        type: 'offsets',
        partition: readPosition(first, 'partition'),
        offset: readPosition(first, 'offset'),
        response
      }
    }
  }

  return { type: 'unrecognized', response }
}

export function formatMessage (template: string, index: number, count: number): string {
  return count === 1 ? template : `${template} (${index + 1}/${count})`
}
