import {mkdtemp} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {join} from 'node:path'
import {Readable, Writable} from 'node:stream'
import {ApiError} from '../errors.js'
import {BuildClient, type DeleteBuildOptions} from '../engine/build-client.js'
import type {Build, BuildStatus, Event, ImageStream, ImageStreamTag, Pod} from '../engine/types.js'
import type {ArtifactSink} from '../core/artifacts.js'
import type {BuildEvent, Reporter} from '../core/reporter.js'
import type {JobSpec} from '../types.js'

export const testNamespace = 'ci-op-test'

/**
 * Reporter that drops every event.
 */
export const noopReporter: Reporter = {
  emit() {/* noop */}
}

/**
 * Returns a reporter that records emitted events for assertions.
 */
export function recordingReporter(): {reporter: Reporter; events: BuildEvent[]} {
  const events: BuildEvent[] = []
  const reporter: Reporter = {
    emit(event: BuildEvent) {
      events.push(event)
    }
  }

  return {reporter, events}
}

/**
 * Writable collecting everything written to it as text.
 */
export function memoryOutput(): {output: Writable; text: () => string} {
  const chunks: string[] = []
  const output = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(String(chunk))
      callback()
    }
  })

  return {output, text: () => chunks.join('')}
}

/**
 * Artifact sink keeping files in memory.
 */
export function memoryArtifacts(): {sink: ArtifactSink; files: Map<string, string>} {
  const files = new Map<string, string>()
  const sink: ArtifactSink = {
    async write(relativePath: string, stream: Readable) {
      let text = ''
      for await (const chunk of stream) {
        text += String(chunk)
      }

      files.set(relativePath, text)
    }
  }

  return {sink, files}
}

export function jobSpecFixture(overrides: Partial<JobSpec> = {}): JobSpec {
  return {
    type: 'periodic',
    job: 'periodic-ci-o-r-main-unit',
    buildId: '100',
    prowJobId: 'prow-job-1',
    refs: {org: 'o', repo: 'r', baseRef: 'main'},
    extraRefs: [],
    namespace: testNamespace,
    rawSpec: '{"type":"periodic"}',
    ...overrides
  }
}

export function buildFixture(name = 'src', status?: BuildStatus): Build {
  return {
    apiVersion: 'build.openshift.io/v1',
    kind: 'Build',
    metadata: {name, namespace: testNamespace},
    spec: {
      resources: {},
      source: {type: 'Dockerfile', dockerfile: 'FROM scratch', images: []},
      strategy: {
        type: 'Docker',
        dockerStrategy: {forcePull: true, noCache: true, env: [], imageOptimizationPolicy: 'SkipLayers'}
      },
      output: {to: {kind: 'ImageStreamTag', namespace: testNamespace, name: `pipeline:${name}`}, imageLabels: []}
    },
    status
  }
}

// -- Fake client -------------------------------------------------------------

export type FakeMethod =
  | 'createBuild'
  | 'getBuild'
  | 'deleteBuild'
  | 'getImageStream'
  | 'getImageStreamTag'
  | 'buildLogs'
  | 'getPod'
  | 'listEvents'

export type FakeCall = {
  method: FakeMethod;
  name: string;
  deleteOptions?: DeleteBuildOptions;
}

type StoredBuild = {
  build: Build;
  /** Statuses handed out by successive reads; the last one sticks. */
  script: BuildStatus[];
  /** Reads that still see the build after it was deleted. */
  lingering?: number;
}

function key(namespace: string, name: string): string {
  return `${namespace}/${name}`
}

/**
 * In-memory BuildClient.
 *
 * Each created build takes the next status script queued with
 * `scriptBuilds()`; every read moves it one status forward. Errors queued
 * with `failCall()` are thrown on the n-th call of a method, before it does
 * anything.
 */
export class FakeBuildClient extends BuildClient {
  readonly calls: FakeCall[] = []
  readonly created: Build[] = []
  readonly imageStreams = new Map<string, ImageStream>()
  readonly imageStreamTags = new Map<string, ImageStreamTag>()
  readonly pods = new Map<string, Pod>()
  readonly logs = new Map<string, string>()
  events: Event[] = []
  /** Reads a deleted build stays visible for. */
  deletionLinger = 0
  /** Called after a call is recorded, before it runs. */
  beforeCall?: (call: FakeCall) => void

  private readonly builds = new Map<string, StoredBuild>()
  private readonly scripts: BuildStatus[][] = []
  private readonly failures: Array<{method: FakeMethod; call: number; error: Error}> = []
  private uidCounter = 0

  scriptBuilds(...scripts: BuildStatus[][]): void {
    this.scripts.push(...scripts)
  }

  failCall(method: FakeMethod, call: number, error: Error): void {
    this.failures.push({method, call, error})
  }

  /** Puts a build in place as if an earlier run had created it. */
  seedBuild(build: Build): void {
    this.builds.set(key(build.metadata.namespace, build.metadata.name), {
      build: {...build, metadata: {...build.metadata, uid: build.metadata.uid ?? this.nextUid()}},
      script: []
    })
  }

  removeBuild(namespace: string, name: string): void {
    this.builds.delete(key(namespace, name))
  }

  hasBuild(namespace: string, name: string): boolean {
    return this.builds.has(key(namespace, name))
  }

  count(method: FakeMethod): number {
    return this.calls.filter(call => call.method === method).length
  }

  methods(): FakeMethod[] {
    return this.calls.map(call => call.method)
  }

  async createBuild(build: Build, signal?: AbortSignal): Promise<void> {
    this.record({method: 'createBuild', name: build.metadata.name}, signal)
    const id = key(build.metadata.namespace, build.metadata.name)
    if (this.builds.has(id)) {
      throw new ApiError('AlreadyExists', `builds.build.openshift.io "${build.metadata.name}" already exists`)
    }

    this.created.push(build)
    this.builds.set(id, {
      build: {...build, metadata: {...build.metadata, uid: this.nextUid()}, status: {phase: 'New'}},
      script: [...this.scripts.shift() ?? []]
    })
  }

  async getBuild(namespace: string, name: string, signal?: AbortSignal): Promise<Build> {
    this.record({method: 'getBuild', name}, signal)
    const stored = this.builds.get(key(namespace, name))
    if (!stored) {
      throw notFound('builds', name)
    }

    if (stored.lingering !== undefined) {
      if (stored.lingering === 0) {
        this.builds.delete(key(namespace, name))
        throw notFound('builds', name)
      }

      stored.lingering--
      return stored.build
    }

    const next = stored.script.shift()
    if (next) {
      stored.build = {...stored.build, status: next}
    }

    return stored.build
  }

  async deleteBuild(namespace: string, name: string, options: DeleteBuildOptions, signal?: AbortSignal): Promise<void> {
    this.record({method: 'deleteBuild', name, deleteOptions: options}, signal)
    const stored = this.builds.get(key(namespace, name))
    if (!stored || stored.lingering !== undefined) {
      throw notFound('builds', name)
    }

    if (options.uid && options.uid !== stored.build.metadata.uid) {
      throw new ApiError('Conflict', `Precondition failed: UID in precondition: ${options.uid}, UID in object meta: ${stored.build.metadata.uid ?? ''}`)
    }

    if (this.deletionLinger > 0) {
      stored.lingering = this.deletionLinger
    } else {
      this.builds.delete(key(namespace, name))
    }
  }

  async getImageStream(namespace: string, name: string, signal?: AbortSignal): Promise<ImageStream> {
    this.record({method: 'getImageStream', name}, signal)
    const stream = this.imageStreams.get(key(namespace, name))
    if (!stream) {
      throw notFound('imagestreams', name)
    }

    return stream
  }

  async getImageStreamTag(namespace: string, name: string, signal?: AbortSignal): Promise<ImageStreamTag> {
    this.record({method: 'getImageStreamTag', name}, signal)
    const tag = this.imageStreamTags.get(key(namespace, name))
    if (!tag) {
      throw notFound('imagestreamtags', name)
    }

    return tag
  }

  async buildLogs(_namespace: string, name: string, _options?: {noWait?: boolean}, signal?: AbortSignal): Promise<Readable> {
    this.record({method: 'buildLogs', name}, signal)
    const text = this.logs.get(name)
    if (text === undefined) {
      throw notFound('builds', name)
    }

    return Readable.from([text])
  }

  async getPod(namespace: string, name: string, signal?: AbortSignal): Promise<Pod> {
    this.record({method: 'getPod', name}, signal)
    const pod = this.pods.get(key(namespace, name))
    if (!pod) {
      throw notFound('pods', name)
    }

    return pod
  }

  async listEvents(_namespace: string, involvedObjectUid: string, signal?: AbortSignal): Promise<Event[]> {
    this.record({method: 'listEvents', name: involvedObjectUid}, signal)
    return this.events
  }

  private record(call: FakeCall, signal?: AbortSignal): void {
    signal?.throwIfAborted()
    this.calls.push(call)
    this.beforeCall?.(call)

    const made = this.count(call.method)
    const index = this.failures.findIndex(failure => failure.method === call.method && failure.call === made)
    if (index !== -1) {
      const [failure] = this.failures.splice(index, 1)
      throw failure.error
    }
  }

  private nextUid(): string {
    this.uidCounter++
    return `uid-${this.uidCounter}`
  }
}

function notFound(resource: string, name: string): ApiError {
  return new ApiError('NotFound', `${resource} "${name}" not found`)
}

/**
 * Creates a temporary directory for test isolation.
 * Each test should use its own tmpdir to avoid interference.
 */
export async function createTmpDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'source-step-test-'))
}
