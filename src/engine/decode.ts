import type {Build, Event, ImageStream, ImageStreamTag, ObjectMeta, Pod} from './types.js'

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function hasMetadata(value: unknown): value is Record<string, unknown> & {metadata: ObjectMeta} {
  return isRecord(value)
    && isRecord(value.metadata)
    && typeof value.metadata.name === 'string'
}

export function isBuild(value: unknown): value is Build {
  return hasMetadata(value)
    && isRecord(value)
    && value.kind === 'Build'
    && isRecord(value.spec)
    && (value.status === undefined || (isRecord(value.status) && typeof value.status.phase === 'string'))
}

export function isImageStream(value: unknown): value is ImageStream {
  return hasMetadata(value) && isRecord(value) && isRecord(value.status)
}

export function isImageStreamTag(value: unknown): value is ImageStreamTag {
  return hasMetadata(value)
    && isRecord(value)
    && isRecord(value.image)
    && isRecord(value.image.metadata)
    && typeof value.image.metadata.name === 'string'
}

export function isPod(value: unknown): value is Pod {
  return hasMetadata(value) && isRecord(value) && isRecord(value.status)
}

export function isEventList(value: unknown): value is {items: Event[]} {
  return isRecord(value)
    && Array.isArray(value.items)
    && value.items.every(item => hasMetadata(item))
}
