import type {Build, BuildSource, ImageSource, ObjectReference} from '../engine/types.js'
import type {CloneAuthConfig, JobSpec, ResourceConfiguration, SourceStepConfiguration} from '../types.js'
import {
  clonerefsOptionsEnvVar,
  determineWorkDir,
  encodeClonerefsOptions,
  oauthTokenPath,
  refsForClone,
  sourceRoot,
  sshConfigPath,
  sshPrivateKeyPath,
  type ClonerefsOptions
} from './clonerefs.js'
import {pipelineImageStream, sourceDockerfile} from './dockerfile.js'
import {createsLabel, defaultPodLabels, jobSpecAnnotation, provenanceImageLabels, trimLabels} from './labels.js'
import {requirementsForStep, resourcesFor} from './resources.js'

/** Name of the pull secret mounted into builds when one is configured. */
export const pullSecretName = 'registry-pull-credentials'

export type SourceBuildOptions = {
  config: SourceStepConfiguration;
  jobSpec: JobSpec;
  /** Digest-pinned pull spec of the image holding clonerefs. */
  clonerefsRef: ObjectReference;
  resources: ResourceConfiguration;
  cloneAuth?: CloneAuthConfig;
  /** Whether the registry pull secret exists in the namespace. */
  pullSecret?: boolean;
}

/**
 * Assembles the build that clones the job's refs into `pipeline:<to>`.
 *
 * @throws MalformedQuantityError when the step's resource settings do not parse
 */
export function createSourceBuild(options: SourceBuildOptions): Build {
  const {config, jobSpec, clonerefsRef, resources, cloneAuth, pullSecret} = options
  const refs = refsForClone(jobSpec.refs, jobSpec.extraRefs, cloneAuth)

  const clonerefsImage: ImageSource = {
    from: clonerefsRef,
    paths: [{sourcePath: config.clonerefsPath, destinationDir: '.'}]
  }
  const source: BuildSource = {
    type: 'Dockerfile',
    dockerfile: sourceDockerfile(config.from, determineWorkDir(sourceRoot, refs), cloneAuth),
    images: [clonerefsImage]
  }

  const clonerefsOptions: ClonerefsOptions = {
    srcRoot: sourceRoot,
    log: '/dev/null',
    gitUserName: 'ci-robot',
    gitUserEmail: 'ci-robot@openshift.io',
    refs,
    fail: true
  }

  if (cloneAuth) {
    source.secrets = [{secret: {name: cloneAuth.secretName}}]
    if (cloneAuth.type === 'SSH') {
      clonerefsImage.paths.push({sourcePath: sshConfigPath, destinationDir: '.'})
      clonerefsOptions.keyFiles = [sshPrivateKeyPath]
    } else {
      clonerefsOptions.oauthTokenFile = oauthTokenPath
    }
  }

  const build = buildFromSource({jobSpec, fromTag: config.from, toTag: config.to, source, resources, pullSecret})
  build.spec.strategy.dockerStrategy.env.push({
    name: clonerefsOptionsEnvVar,
    value: encodeClonerefsOptions(clonerefsOptions)
  })

  return build
}

/**
 * Wraps a build source into a Docker strategy build publishing `pipeline:<toTag>`.
 */
export function buildFromSource({jobSpec, fromTag, toTag, source, resources, pullSecret}: {
  jobSpec: JobSpec;
  fromTag: string;
  toTag: string;
  source: BuildSource;
  resources: ResourceConfiguration;
  pullSecret?: boolean;
}): Build {
  const buildResources = resourcesFor(requirementsForStep(resources, toTag))
  const from: ObjectReference | undefined = fromTag
    ? {kind: 'ImageStreamTag', namespace: jobSpec.namespace, name: `${pipelineImageStream}:${fromTag}`}
    : undefined

  const build: Build = {
    apiVersion: 'build.openshift.io/v1',
    kind: 'Build',
    metadata: {
      name: toTag,
      namespace: jobSpec.namespace,
      labels: trimLabels({...defaultPodLabels(jobSpec), [createsLabel]: toTag}),
      annotations: {[jobSpecAnnotation]: jobSpec.rawSpec}
    },
    spec: {
      resources: buildResources,
      source,
      strategy: {
        type: 'Docker',
        dockerStrategy: {
          from,
          forcePull: true,
          noCache: true,
          // Mirrors the default; kept for documentation
          env: [{name: 'BUILD_LOGLEVEL', value: '0'}],
          imageOptimizationPolicy: 'SkipLayers'
        }
      },
      output: {
        to: {kind: 'ImageStreamTag', namespace: jobSpec.namespace, name: `${pipelineImageStream}:${toTag}`},
        imageLabels: provenanceImageLabels(jobSpec.refs, source.contextDir)
      }
    }
  }

  if (pullSecret) {
    build.spec.strategy.dockerStrategy.pullSecret = {name: pullSecretName}
  }

  if (jobSpec.owner) {
    build.metadata.ownerReferences = [jobSpec.owner]
  }

  return build
}
