export {SourceStep, cloningSourceReason} from './source-step.js'
export type {SourceStepOptions} from './source-step.js'
export {BuildLifecycleController, appendLogToError, defaultDeletionBackoff, defaultPollIntervalMs} from './build-lifecycle.js'
export type {BuildLifecycleOptions} from './build-lifecycle.js'
export {createSourceBuild, buildFromSource, pullSecretName} from './build-spec.js'
export type {SourceBuildOptions} from './build-spec.js'
export {sourceDockerfile, pipelineImageStream} from './dockerfile.js'
export {encodeClonerefsOptions, refsForClone, determineWorkDir, pathForRefs, cloneUri} from './clonerefs.js'
export type {ClonerefsOptions} from './clonerefs.js'
export {trimLabels, defaultPodLabels, provenanceImageLabels} from './labels.js'
export {Quantity, parseQuantity, resourcesFor, requirementsForStep} from './resources.js'
export {InfraFailureClassifier, defaultInfraFailureRules} from './infra-classifier.js'
export type {InfraFailureRules} from './infra-classifier.js'
export {resolveImageStreamTag} from './source-resolver.js'
export {DeferredParameter, pipelineImageEnvFor, imageDigestFor} from './parameters.js'
export type {ParameterMap} from './parameters.js'
export {internalImageLink, linkSatisfiedBy} from './links.js'
export {parseJobSpec, jobInputs, refsToString} from './job-spec.js'
export {loadConfig, parseConfig, defaultConfigFile} from './config.js'
export type {SourceStepFileConfig} from './config.js'
export {DirectoryArtifactSink} from './artifacts.js'
export type {ArtifactSink} from './artifacts.js'
export {ConsoleReporter, CompositeReporter} from './reporter.js'
export type {
  BuildEvent,
  BuildRef,
  Reporter,
  BuildSubmittedEvent,
  BuildExistsEvent,
  BuildRetryingEvent,
  BuildPollFailedEvent,
  BuildSucceededEvent,
  BuildFailedEvent,
  DiagnosticsFailedEvent
} from './reporter.js'
export {formatDuration, sleep, exponentialBackoff, raceAbort} from './utils.js'
export type {Backoff} from './utils.js'
