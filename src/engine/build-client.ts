import type {Readable} from 'node:stream'
import type {Build, Event, ImageStream, ImageStreamTag, Pod} from './types.js'

/**
 * Options for deleting a build object.
 */
export type DeleteBuildOptions = {
  /** Only delete if the live object still has this UID. */
  uid?: string;
  gracePeriodSeconds?: number;
  propagationPolicy?: 'Foreground' | 'Background' | 'Orphan';
}

/**
 * Abstract capability interface over the orchestration API.
 *
 * Implementations:
 * - `OcCliBuildClient`: drives the `oc` CLI
 * - In tests: an in-memory fake honouring the same contract
 *
 * Every method rejects with an `ApiError` whose `reason` is `AlreadyExists`,
 * `NotFound`, `Conflict` or `Unknown`. Methods taking a signal must not start
 * a request once it is aborted.
 */
export abstract class BuildClient {
  /**
   * Submits a new build object.
   * @throws ApiError with reason `AlreadyExists` when a build of the same name exists
   */
  abstract createBuild(build: Build, signal?: AbortSignal): Promise<void>

  abstract getBuild(namespace: string, name: string, signal?: AbortSignal): Promise<Build>

  abstract deleteBuild(namespace: string, name: string, options: DeleteBuildOptions, signal?: AbortSignal): Promise<void>

  abstract getImageStream(namespace: string, name: string, signal?: AbortSignal): Promise<ImageStream>

  /**
   * Reads one tag of an image stream.
   * @param name - `<stream>:<tag>`
   */
  abstract getImageStreamTag(namespace: string, name: string, signal?: AbortSignal): Promise<ImageStreamTag>

  /**
   * Opens the log stream of a build. With `noWait` the stream ends at the
   * current end of the log instead of following it.
   */
  abstract buildLogs(namespace: string, name: string, options?: {noWait?: boolean}, signal?: AbortSignal): Promise<Readable>

  abstract getPod(namespace: string, name: string, signal?: AbortSignal): Promise<Pod>

  /** Lists events whose involved object has the given UID. */
  abstract listEvents(namespace: string, involvedObjectUid: string, signal?: AbortSignal): Promise<Event[]>
}
