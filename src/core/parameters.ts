import {ParameterResolutionError} from '../errors.js'
import type {BuildClient} from '../engine/build-client.js'
import {errorMessage, raceAbort} from './utils.js'

/**
 * A parameter whose value is computed on first read, not when the graph is
 * built. A successful resolution is kept; a failed one is tried again on the
 * next read.
 *
 * Concurrent readers share one resolution. A reader's signal only ends its
 * own wait.
 */
export class DeferredParameter {
  private value?: string
  private pending?: Promise<string>

  constructor(
    readonly key: string,
    private readonly resolver: () => Promise<string>
  ) {}

  get resolved(): boolean {
    return this.value !== undefined
  }

  async resolve(signal?: AbortSignal): Promise<string> {
    signal?.throwIfAborted()
    if (this.value !== undefined) {
      return this.value
    }

    this.pending ??= this.resolveOnce()
    return raceAbort(this.pending, signal)
  }

  private async resolveOnce(): Promise<string> {
    try {
      const value = await this.resolver()
      this.value = value
      return value
    } finally {
      this.pending = undefined
    }
  }
}

export type ParameterMap = Map<string, DeferredParameter>

/** Environment name under which the image of a pipeline tag is published. */
export function pipelineImageEnvFor(tag: string): string {
  return `LOCAL_IMAGE_${tag.toUpperCase().replaceAll('-', '_')}`
}

/**
 * Resolver returning the content digest of `<stream>:<tag>`.
 * @throws ParameterResolutionError when the tag cannot be read or has no image yet
 */
export function imageDigestFor(
  client: BuildClient,
  namespace: string,
  stream: string,
  tag: string
): () => Promise<string> {
  const key = `${stream}:${tag}`
  return async () => {
    let digest: string
    try {
      const imageStreamTag = await client.getImageStreamTag(namespace, key)
      digest = imageStreamTag.image.metadata.name
    } catch (error) {
      throw new ParameterResolutionError(key, errorMessage(error), {cause: error})
    }

    if (!digest) {
      throw new ParameterResolutionError(key, 'image stream tag has no image')
    }

    return digest
  }
}
