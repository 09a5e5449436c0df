import process from 'node:process'
import {Readable} from 'node:stream'
import {execa} from 'execa'
import {ApiError, type ApiErrorReason} from '../errors.js'
import {BuildClient, type DeleteBuildOptions} from './build-client.js'
import {isBuild, isEventList, isImageStream, isImageStreamTag, isPod} from './decode.js'
import type {Build, Event, ImageStream, ImageStreamTag, Pod} from './types.js'

/**
 * Build a minimal environment for the `oc` process.
 * Only PATH, HOME and KUBECONFIG are kept so that unrelated host secrets are
 * never handed to the CLI.
 */
function ocCliEnv(): Record<string, string> {
  const env: Record<string, string> = {}
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined && (key === 'PATH' || key === 'HOME' || key === 'KUBECONFIG')) {
      env[key] = value
    }
  }

  return env
}

const apiErrorReasons = new Set<ApiErrorReason>(['AlreadyExists', 'NotFound', 'Conflict'])

/**
 * Maps `oc` error output to an API error reason.
 *
 * @example
 * classifyOcError('Error from server (NotFound): builds.build.openshift.io "src" not found') // 'NotFound'
 */
export function classifyOcError(stderr: string): ApiErrorReason {
  const match = /Error from server \((\w+)\)/.exec(stderr)
  if (match) {
    for (const reason of apiErrorReasons) {
      if (reason === match[1]) {
        return reason
      }
    }
  }

  return 'Unknown'
}

/**
 * BuildClient backed by the `oc` CLI.
 */
export class OcCliBuildClient extends BuildClient {
  private readonly env = ocCliEnv()

  constructor(private readonly binary = 'oc') {
    super()
  }

  async createBuild(build: Build, signal?: AbortSignal): Promise<void> {
    await this.exec(['create', '-f', '-', '-o', 'name'], {input: JSON.stringify(build), signal})
  }

  async getBuild(namespace: string, name: string, signal?: AbortSignal): Promise<Build> {
    const value = await this.getJson(['get', 'build', name, '-n', namespace, '-o', 'json'], signal)
    if (!isBuild(value)) {
      throw new ApiError('Unknown', `unexpected response for build ${namespace}/${name}`)
    }

    return value
  }

  async deleteBuild(namespace: string, name: string, options: DeleteBuildOptions, signal?: AbortSignal): Promise<void> {
    const body = {
      kind: 'DeleteOptions',
      apiVersion: 'v1',
      gracePeriodSeconds: options.gracePeriodSeconds,
      propagationPolicy: options.propagationPolicy,
      preconditions: options.uid ? {uid: options.uid} : undefined
    }
    const path = `/apis/build.openshift.io/v1/namespaces/${namespace}/builds/${name}`
    await this.exec(['delete', '--raw', path, '-f', '-'], {input: JSON.stringify(body), signal})
  }

  async getImageStream(namespace: string, name: string, signal?: AbortSignal): Promise<ImageStream> {
    const value = await this.getJson(['get', 'imagestream', name, '-n', namespace, '-o', 'json'], signal)
    if (!isImageStream(value)) {
      throw new ApiError('Unknown', `unexpected response for image stream ${namespace}/${name}`)
    }

    return value
  }

  async getImageStreamTag(namespace: string, name: string, signal?: AbortSignal): Promise<ImageStreamTag> {
    const value = await this.getJson(['get', 'imagestreamtag', name, '-n', namespace, '-o', 'json'], signal)
    if (!isImageStreamTag(value)) {
      throw new ApiError('Unknown', `unexpected response for image stream tag ${namespace}/${name}`)
    }

    return value
  }

  async buildLogs(namespace: string, name: string, options?: {noWait?: boolean}, signal?: AbortSignal): Promise<Readable> {
    const args = ['logs', `build/${name}`, '-n', namespace]
    if (!options?.noWait) {
      args.push('--follow')
    }

    const stdout = await this.exec(args, {signal})
    return Readable.from([stdout])
  }

  async getPod(namespace: string, name: string, signal?: AbortSignal): Promise<Pod> {
    const value = await this.getJson(['get', 'pod', name, '-n', namespace, '-o', 'json'], signal)
    if (!isPod(value)) {
      throw new ApiError('Unknown', `unexpected response for pod ${namespace}/${name}`)
    }

    return value
  }

  async listEvents(namespace: string, involvedObjectUid: string, signal?: AbortSignal): Promise<Event[]> {
    const value = await this.getJson([
      'get', 'events', '-n', namespace, '--field-selector', `involvedObject.uid=${involvedObjectUid}`, '-o', 'json'
    ], signal)
    if (!isEventList(value)) {
      throw new ApiError('Unknown', `unexpected response for events in ${namespace}`)
    }

    return value.items
  }

  private async getJson(args: string[], signal?: AbortSignal): Promise<unknown> {
    const stdout = await this.exec(args, {signal})
    try {
      const parsed: unknown = JSON.parse(stdout)
      return parsed
    } catch (error) {
      throw new ApiError('Unknown', `could not decode output of ${this.binary} ${args.join(' ')}`, {cause: error})
    }
  }

  /**
   * Run the CLI and return its stdout, mapping failures to ApiError.
   */
  private async exec(args: string[], options?: {input?: string; signal?: AbortSignal}): Promise<string> {
    options?.signal?.throwIfAborted()

    const result = await execa(this.binary, args, {
      env: this.env,
      extendEnv: false,
      input: options?.input,
      cancelSignal: options?.signal,
      reject: false
    })

    if (result.isCanceled) {
      options?.signal?.throwIfAborted()
    }

    if (result.failed) {
      const stderr = String(result.stderr).trim()
      const message = stderr || `${this.binary} ${args[0]} exited with code ${result.exitCode ?? 'unknown'}`
      throw new ApiError(classifyOcError(stderr), message)
    }

    return String(result.stdout)
  }
}
