import process from 'node:process'
import type {Writable} from 'node:stream'
import {
  BuildCreateError,
  BuildDeletionError,
  BuildFailedError,
  BuildWaitError,
  isAlreadyExists,
  isConflict,
  isNotFound
} from '../errors.js'
import type {BuildClient} from '../engine/build-client.js'
import {isBuildPhaseTerminated, type Build} from '../engine/types.js'
import type {ArtifactSink} from './artifacts.js'
import {buildPodName, podEvents, unreadyContainerReasons} from './diagnostics.js'
import {InfraFailureClassifier} from './infra-classifier.js'
import type {BuildRef, DiagnosticsFailedEvent, Reporter} from './reporter.js'
import {errorMessage, exponentialBackoff, formatDuration, raceAbort, sleep, type Backoff} from './utils.js'

export type BuildLifecycleOptions = {
  classifier?: InfraFailureClassifier;
  reporter?: Reporter;
  /** Where logs of successful builds are kept. Skipped when absent. */
  artifacts?: ArtifactSink;
  /** Operator output receiving logs of failed builds (default: stdout). */
  output?: Writable;
  /** Delay between status reads while a build runs (default: 5000). */
  pollIntervalMs?: number;
  /** Backoff used while waiting for a deleted build to disappear. */
  deletionBackoff?: Backoff;
  now?: () => Date;
}

export const defaultPollIntervalMs = 5000
export const defaultDeletionBackoff: Backoff = Object.freeze({durationMs: 10, factor: 2, steps: 10})

const silentReporter: Reporter = {
  emit() {/* noop */}
}

function isComplete(build: Build): boolean {
  return build.status?.phase === 'Complete'
}

function isFailed(build: Build): boolean {
  const phase = build.status?.phase
  return phase === 'Failed' || phase === 'Cancelled' || phase === 'Error'
}

/**
 * Drives one build object from submission to a terminal state.
 *
 * A build left over from an earlier attempt is reused, unless it ended in an
 * infrastructure failure: then it is deleted and submitted again, once.
 * Aborting the signal rejects with the signal's reason and stops every
 * further call to the API.
 */
export class BuildLifecycleController {
  private readonly classifier: InfraFailureClassifier
  private readonly reporter: Reporter
  private readonly artifacts?: ArtifactSink
  private readonly output: Writable
  private readonly pollIntervalMs: number
  private readonly deletionBackoff: Backoff
  private readonly now: () => Date

  constructor(
    private readonly client: BuildClient,
    options: BuildLifecycleOptions = {}
  ) {
    this.classifier = options.classifier ?? new InfraFailureClassifier()
    this.reporter = options.reporter ?? silentReporter
    this.artifacts = options.artifacts
    this.output = options.output ?? process.stdout
    this.pollIntervalMs = options.pollIntervalMs ?? defaultPollIntervalMs
    this.deletionBackoff = options.deletionBackoff ?? defaultDeletionBackoff
    this.now = options.now ?? (() => new Date())
  }

  /**
   * Submits `build` and waits for it to complete.
   * @throws BuildFailedError when the build ends in Failed, Cancelled or Error
   */
  async run(build: Build, signal?: AbortSignal): Promise<void> {
    const ref: BuildRef = {namespace: build.metadata.namespace, name: build.metadata.name}
    signal?.throwIfAborted()

    try {
      await this.client.createBuild(build, signal)
      this.reporter.emit({event: 'BUILD_SUBMITTED', build: ref})
    } catch (error) {
      signal?.throwIfAborted()
      if (!isAlreadyExists(error)) {
        throw new BuildCreateError(`could not create build ${ref.name}: ${errorMessage(error)}`, {cause: error})
      }

      await this.retryInfraFailure(build, ref, signal)
    }

    await this.waitForBuild(ref, signal)
    await this.gatherSuccessfulBuildLog(ref, signal)
  }

  /**
   * Replaces an existing build that ended in an infrastructure failure.
   * Any other existing build is left alone and simply observed.
   */
  private async retryInfraFailure(build: Build, ref: BuildRef, signal?: AbortSignal): Promise<void> {
    let existing: Build
    try {
      existing = await this.client.getBuild(ref.namespace, ref.name, signal)
    } catch (error) {
      signal?.throwIfAborted()
      throw new BuildWaitError(`could not get build ${ref.name}: ${errorMessage(error)}`, {cause: error})
    }

    const status = existing.status
    this.reporter.emit({event: 'BUILD_EXISTS', build: ref, phase: status?.phase})
    if (!status || !isBuildPhaseTerminated(status.phase) || !this.classifier.isInfra(status.reason, status.logSnippet)) {
      return
    }

    this.reporter.emit({event: 'BUILD_RETRYING', build: ref, reason: status.reason})
    try {
      await this.client.deleteBuild(ref.namespace, ref.name, {
        uid: existing.metadata.uid,
        gracePeriodSeconds: 0,
        propagationPolicy: 'Foreground'
      }, signal)
    } catch (error) {
      signal?.throwIfAborted()
      // Someone else already deleted or replaced it
      if (!isNotFound(error) && !isConflict(error)) {
        throw new BuildDeletionError(`could not delete build ${ref.name}: ${errorMessage(error)}`, {cause: error})
      }
    }

    try {
      await this.waitForDeletion(ref, signal)
    } catch (error) {
      signal?.throwIfAborted()
      throw new BuildDeletionError(`could not wait for build ${ref.name} to be deleted: ${errorMessage(error)}`, {cause: error})
    }

    try {
      await this.client.createBuild(build, signal)
      this.reporter.emit({event: 'BUILD_SUBMITTED', build: ref})
    } catch (error) {
      signal?.throwIfAborted()
      if (!isAlreadyExists(error)) {
        throw new BuildCreateError(`could not recreate build ${ref.name}: ${errorMessage(error)}`, {cause: error})
      }
    }
  }

  /**
   * Resolves once the build is gone. The backoff runs detached so that an
   * abort wins even while a read is in flight.
   */
  async waitForDeletion(ref: BuildRef, signal?: AbortSignal): Promise<void> {
    const gone = exponentialBackoff(this.deletionBackoff, async () => {
      try {
        await this.client.getBuild(ref.namespace, ref.name, signal)
        return false
      } catch (error) {
        if (isNotFound(error)) {
          return true
        }

        throw error
      }
    }, signal)

    await raceAbort(gone, signal)
  }

  /**
   * Polls the build until it reaches a terminal phase.
   * @throws BuildFailedError when the build did not complete
   */
  async waitForBuild(ref: BuildRef, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted()

    let build: Build
    try {
      build = await this.client.getBuild(ref.namespace, ref.name, signal)
    } catch (error) {
      signal?.throwIfAborted()
      if (isNotFound(error)) {
        throw new BuildWaitError(`could not find build ${ref.name}`, {cause: error})
      }

      throw new BuildWaitError(`could not get build: ${errorMessage(error)}`, {cause: error})
    }

    if (isComplete(build)) {
      this.reporter.emit({event: 'BUILD_SUCCEEDED', build: ref, durationMs: this.buildDuration(build), alreadyComplete: true})
      return
    }

    if (isFailed(build)) {
      throw await this.failure(build, ref, signal)
    }

    for (;;) {
      await sleep(this.pollIntervalMs, signal)

      try {
        build = await this.client.getBuild(ref.namespace, ref.name, signal)
      } catch (error) {
        signal?.throwIfAborted()
        this.reporter.emit({event: 'BUILD_POLL_FAILED', build: ref, error: errorMessage(error)})
        continue
      }

      if (isComplete(build)) {
        this.reporter.emit({event: 'BUILD_SUCCEEDED', build: ref, durationMs: this.buildDuration(build), alreadyComplete: false})
        return
      }

      if (isFailed(build)) {
        throw await this.failure(build, ref, signal)
      }
    }
  }

  /** Elapsed build time in milliseconds, truncated to whole seconds. */
  buildDuration(build: Build): number {
    const start = build.status?.startTimestamp ?? build.metadata.creationTimestamp
    if (!start) {
      return 0
    }

    const end = build.status?.completionTimestamp ? Date.parse(build.status.completionTimestamp) : this.now().getTime()
    const elapsed = Math.max(0, end - Date.parse(start))
    return Math.floor(elapsed / 1000) * 1000
  }

  /**
   * Reports a failed build, dumps what can be collected about it and returns
   * the error describing it.
   */
  private async failure(build: Build, ref: BuildRef, signal?: AbortSignal): Promise<BuildFailedError> {
    const status = build.status ?? {phase: 'Error'}
    const durationMs = this.buildDuration(build)
    this.reporter.emit({event: 'BUILD_FAILED', build: ref, phase: status.phase, reason: status.reason, durationMs})

    await this.printBuildLogs(ref, signal)
    await this.printPodDiagnostics(build, ref, signal)
    signal?.throwIfAborted()

    const reason = status.reason ?? 'unknown'
    const message = appendLogToError(
      `the build ${ref.name} failed after ${formatDuration(durationMs)} with phase ${status.phase} and reason ${reason}: ${status.message ?? ''}`,
      status.logSnippet
    )
    return new BuildFailedError(ref.name, status.phase, reason, message)
  }

  private async printBuildLogs(ref: BuildRef, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return
    }

    try {
      const stream = await this.client.buildLogs(ref.namespace, ref.name, {noWait: true}, signal)
      this.output.write(`Logs of failed build ${ref.name}:\n`)
      for await (const chunk of stream) {
        if (signal?.aborted) {
          break
        }

        this.output.write(chunk)
      }
    } catch (error) {
      if (signal?.aborted) {
        return
      }

      this.diagnosticsFailed(ref, 'build-log', error)
    }
  }

  private async printPodDiagnostics(build: Build, ref: BuildRef, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return
    }

    let pod
    try {
      pod = await this.client.getPod(ref.namespace, buildPodName(build), signal)
    } catch (error) {
      if (!signal?.aborted) {
        this.diagnosticsFailed(ref, 'pod', error)
      }

      return
    }

    const unready = unreadyContainerReasons(pod)
    if (unready) {
      this.output.write(`Pod ${pod.metadata.name} has containers that are not ready:${unready}\n`)
    }

    try {
      this.output.write(`${await podEvents(this.client, pod, signal)}\n`)
    } catch (error) {
      if (signal?.aborted) {
        return
      }

      this.diagnosticsFailed(ref, 'events', error)
    }
  }

  private async gatherSuccessfulBuildLog(ref: BuildRef, signal?: AbortSignal): Promise<void> {
    if (!this.artifacts) {
      return
    }

    try {
      const stream = await this.client.buildLogs(ref.namespace, ref.name, {noWait: true}, signal)
      await this.artifacts.write(`build-logs/${ref.name}.log`, stream)
    } catch (error) {
      signal?.throwIfAborted()
      // A successful build stays successful
      this.diagnosticsFailed(ref, 'artifacts', error)
    }
  }

  private diagnosticsFailed(ref: BuildRef, what: DiagnosticsFailedEvent['what'], error: unknown): void {
    this.reporter.emit({event: 'DIAGNOSTICS_FAILED', build: ref, what, error: errorMessage(error)})
  }
}

/**
 * Appends the trimmed log tail to an error message, after a blank line.
 */
export function appendLogToError(message: string, log: string | undefined): string {
  const tail = log?.trim() ?? ''
  if (tail.length === 0) {
    return message
  }

  return `${message}\n\n${tail}`
}
