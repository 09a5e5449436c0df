import {ImageResolutionError, StreamUnresolvableError} from '../errors.js'
import type {BuildClient} from '../engine/build-client.js'
import type {ImageStream, ImageStreamTag, ObjectReference} from '../engine/types.js'
import type {ImageStreamTagReference} from '../types.js'
import {errorMessage} from './utils.js'

/**
 * Resolves an image stream tag to a digest-pinned pull spec.
 *
 * The stream gives the registry repository (public address preferred), the
 * tag gives the digest. Both are single reads; errors are not retried here.
 */
export async function resolveImageStreamTag(
  client: BuildClient,
  reference: ImageStreamTagReference,
  signal?: AbortSignal
): Promise<ObjectReference> {
  let stream: ImageStream
  try {
    stream = await client.getImageStream(reference.namespace, reference.name, signal)
  } catch (error) {
    signal?.throwIfAborted()
    throw new ImageResolutionError(`could not resolve remote image stream: ${errorMessage(error)}`, {cause: error})
  }

  const repository = stream.status.publicDockerImageRepository || stream.status.dockerImageRepository
  if (!repository) {
    throw new StreamUnresolvableError(reference.name)
  }

  let tag: ImageStreamTag
  try {
    tag = await client.getImageStreamTag(reference.namespace, `${reference.name}:${reference.tag}`, signal)
  } catch (error) {
    signal?.throwIfAborted()
    throw new ImageResolutionError(`could not resolve remote image stream tag: ${errorMessage(error)}`, {cause: error})
  }

  return {kind: 'DockerImage', name: `${repository}@${tag.image.metadata.name}`}
}
