/**
 * Shapes of the cluster objects exchanged with the orchestration API.
 *
 * Field names follow the JSON wire format of the API so that objects can be
 * serialized as-is.
 */

export type ObjectMeta = {
  name: string;
  namespace: string;
  uid?: string;
  creationTimestamp?: string;
  labels?: Record<string, string>;
  annotations?: Record<string, string>;
  ownerReferences?: OwnerReference[];
}

export type OwnerReference = {
  apiVersion: string;
  kind: string;
  name: string;
  uid: string;
  controller?: boolean;
}

/** Reference to another object, e.g. an image stream tag or a pull spec. */
export type ObjectReference = {
  kind: string;
  name: string;
  namespace?: string;
}

export type LocalObjectReference = {
  name: string;
}

export type EnvVar = {
  name: string;
  value: string;
}

/** A value that serializes to the canonical quantity string (e.g. "500m"). */
export type SerializableQuantity = {
  readonly value: number;
  toJSON(): string;
}

export type ResourceList = Record<string, SerializableQuantity>

export type ResourceRequirements = {
  requests?: ResourceList;
  limits?: ResourceList;
}

// -- Build -------------------------------------------------------------------

export type ImageSourcePath = {
  sourcePath: string;
  destinationDir: string;
}

export type ImageSource = {
  from: ObjectReference;
  as?: string[];
  paths: ImageSourcePath[];
}

export type SecretBuildSource = {
  secret: LocalObjectReference;
  destinationDir?: string;
}

export type BuildSource = {
  type: 'Dockerfile';
  dockerfile: string;
  images: ImageSource[];
  secrets?: SecretBuildSource[];
  contextDir?: string;
}

export type DockerBuildStrategy = {
  from?: ObjectReference;
  pullSecret?: LocalObjectReference;
  dockerfilePath?: string;
  forcePull: boolean;
  noCache: boolean;
  env: EnvVar[];
  imageOptimizationPolicy: 'SkipLayers' | 'None' | 'SkipLayersAndWarn';
}

export type BuildStrategy = {
  type: 'Docker';
  dockerStrategy: DockerBuildStrategy;
}

export type ImageLabel = {
  name: string;
  value: string;
}

export type BuildOutput = {
  to: ObjectReference;
  imageLabels: ImageLabel[];
}

export type BuildSpec = {
  resources: ResourceRequirements;
  source: BuildSource;
  strategy: BuildStrategy;
  output: BuildOutput;
}

export const nonTerminalPhases = ['New', 'Pending', 'Running'] as const
export const terminalPhases = ['Complete', 'Failed', 'Cancelled', 'Error'] as const

export type BuildPhase = typeof nonTerminalPhases[number] | typeof terminalPhases[number]

export type BuildStatus = {
  phase: BuildPhase;
  reason?: string;
  message?: string;
  logSnippet?: string;
  startTimestamp?: string;
  completionTimestamp?: string;
}

export type Build = {
  apiVersion: 'build.openshift.io/v1';
  kind: 'Build';
  metadata: ObjectMeta;
  spec: BuildSpec;
  status?: BuildStatus;
}

const nonTerminalPhaseSet: ReadonlySet<BuildPhase> = new Set<BuildPhase>(nonTerminalPhases)

export function isBuildPhaseTerminated(phase: BuildPhase): boolean {
  return !nonTerminalPhaseSet.has(phase)
}

// -- Images ------------------------------------------------------------------

export type ImageStream = {
  metadata: ObjectMeta;
  status: {
    dockerImageRepository?: string;
    publicDockerImageRepository?: string;
  };
}

export type ImageStreamTag = {
  metadata: ObjectMeta;
  image: {
    metadata: {name: string};
    dockerImageReference?: string;
  };
}

// -- Pods and events ---------------------------------------------------------

export type ContainerState = {
  waiting?: {reason?: string; message?: string};
  running?: {startedAt?: string};
  terminated?: {reason?: string; message?: string; exitCode: number};
}

export type ContainerStatus = {
  name: string;
  ready: boolean;
  state: ContainerState;
}

export type Pod = {
  metadata: ObjectMeta;
  status: {
    phase?: string;
    containerStatuses?: ContainerStatus[];
  };
}

export type Event = {
  metadata: ObjectMeta;
  count?: number;
  message?: string;
  reason?: string;
  source?: {component?: string};
}
