import {forReason} from '../errors.js'
import type {BuildClient} from '../engine/build-client.js'
import type {CloneAuthConfig, JobSpec, ResourceConfiguration, SourceStepConfiguration, StepLink} from '../types.js'
import {BuildLifecycleController, type BuildLifecycleOptions} from './build-lifecycle.js'
import {createSourceBuild} from './build-spec.js'
import {pipelineImageStream} from './dockerfile.js'
import {jobInputs} from './job-spec.js'
import {internalImageLink} from './links.js'
import {DeferredParameter, imageDigestFor, pipelineImageEnvFor, type ParameterMap} from './parameters.js'
import {resolveImageStreamTag} from './source-resolver.js'

/** Reason attached to every failure of the step. */
export const cloningSourceReason = 'cloning_source'

export type SourceStepOptions = {
  config: SourceStepConfiguration;
  resources: ResourceConfiguration;
  client: BuildClient;
  jobSpec: JobSpec;
  cloneAuth?: CloneAuthConfig;
  /** Whether the registry pull secret exists in the namespace. */
  pullSecret?: boolean;
  lifecycle?: BuildLifecycleOptions;
}

/**
 * Pipeline step cloning the job's refs into `pipeline:<to>`, on top of
 * `pipeline:<from>`.
 */
export class SourceStep {
  private readonly config: SourceStepConfiguration
  private readonly resources: ResourceConfiguration
  private readonly client: BuildClient
  private readonly jobSpec: JobSpec
  private readonly cloneAuth?: CloneAuthConfig
  private readonly pullSecret: boolean
  private readonly controller: BuildLifecycleController
  private readonly parameters: ParameterMap

  constructor(options: SourceStepOptions) {
    this.config = options.config
    this.resources = options.resources
    this.client = options.client
    this.jobSpec = options.jobSpec
    this.cloneAuth = options.cloneAuth
    this.pullSecret = options.pullSecret ?? false
    this.controller = new BuildLifecycleController(options.client, options.lifecycle)

    const key = pipelineImageEnvFor(this.config.to)
    const digest = imageDigestFor(this.client, this.jobSpec.namespace, pipelineImageStream, this.config.to)
    this.parameters = new Map([[key, new DeferredParameter(key, digest)]])
  }

  name(): string {
    return this.config.to
  }

  description(): string {
    return `Clone the correct source code into an image and tag it as ${this.config.to}`
  }

  inputs(): string[] {
    return jobInputs(this.jobSpec)
  }

  requires(): StepLink[] {
    return [internalImageLink(this.config.from)]
  }

  creates(): StepLink[] {
    return [internalImageLink(this.config.to)]
  }

  /** Parameters exposed to downstream steps, resolved on first read. */
  provides(): ParameterMap {
    return this.parameters
  }

  validate(): void {/* noop */}

  /**
   * Builds the source image.
   * @throws ReasonedError tagged `cloning_source`, wrapping the actual failure
   */
  async run(signal?: AbortSignal): Promise<void> {
    try {
      await this.cloneSource(signal)
    } catch (error: unknown) {
      throw forReason(cloningSourceReason).forError(error) ?? error
    }
  }

  private async cloneSource(signal?: AbortSignal): Promise<void> {
    const clonerefsRef = await resolveImageStreamTag(this.client, this.config.clonerefsImage, signal)
    const build = createSourceBuild({
      config: this.config,
      jobSpec: this.jobSpec,
      clonerefsRef,
      resources: this.resources,
      cloneAuth: this.cloneAuth,
      pullSecret: this.pullSecret
    })
    await this.controller.run(build, signal)
  }
}
