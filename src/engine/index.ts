export {BuildClient, type DeleteBuildOptions} from './build-client.js'
export {OcCliBuildClient, classifyOcError} from './oc-client.js'
export {isBuildPhaseTerminated, nonTerminalPhases, terminalPhases} from './types.js'
export type {
  Build,
  BuildOutput,
  BuildPhase,
  BuildSource,
  BuildSpec,
  BuildStatus,
  BuildStrategy,
  ContainerStatus,
  DockerBuildStrategy,
  EnvVar,
  Event,
  ImageLabel,
  ImageSource,
  ImageStream,
  ImageStreamTag,
  LocalObjectReference,
  ObjectMeta,
  ObjectReference,
  OwnerReference,
  Pod,
  ResourceList,
  ResourceRequirements,
  SerializableQuantity
} from './types.js'
