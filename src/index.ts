/**
 * Source step exports for programmatic use.
 *
 * The step clones a job's refs into a pipeline image through a cluster
 * build, then exposes the image digest to downstream steps.
 *
 * For CLI usage, see src/cli/index.ts
 *
 * @example
 * ```typescript
 * import {OcCliBuildClient, SourceStep, parseJobSpec} from 'source-step'
 *
 * const step = new SourceStep({
 *   config: {
 *     from: 'root',
 *     to: 'src',
 *     clonerefsImage: {namespace: 'ci', name: 'clonerefs', tag: 'latest'},
 *     clonerefsPath: '/clonerefs'
 *   },
 *   resources: {'*': {requests: {cpu: '100m'}}},
 *   client: new OcCliBuildClient(),
 *   jobSpec: parseJobSpec(process.env.JOB_SPEC ?? '', {namespace: 'ci-op-1234'})
 * })
 *
 * await step.run(AbortSignal.timeout(3_600_000))
 * const digest = await step.provides().get('LOCAL_IMAGE_SRC')?.resolve()
 * ```
 */

export * from './engine/index.js'
export * from './core/index.js'
export * from './errors.js'
export type * from './types.js'
