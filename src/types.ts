// ---------------------------------------------------------------------------
// Shared domain types for the source step.
//
// These types describe what the surrounding pipeline hands to the step:
// its configuration, the job being run and the refs to check out.
// ---------------------------------------------------------------------------

import type {OwnerReference} from './engine/types.js'

// -- Refs -------------------------------------------------------------------

/** A pull request merged on top of the base ref. */
export type Pull = {
  number: number;
  author: string;
  sha: string;
  title?: string;
  ref?: string;
  link?: string;
}

/** One repository to check out, at a base ref plus optional pull requests. */
export type Refs = {
  org: string;
  repo: string;
  repoLink?: string;
  baseRef: string;
  baseSha?: string;
  baseLink?: string;
  pulls?: Pull[];
  /** Checkout path below the source root instead of `github.com/<org>/<repo>`. */
  pathAlias?: string;
  /** When true, this ref's checkout becomes the working directory. */
  workDir?: boolean;
  cloneUri?: string;
  skipSubmodules?: boolean;
  cloneDepth?: number;
  skipFetchHead?: boolean;
}

// -- Job --------------------------------------------------------------------

/**
 * The job this step runs for. `rawSpec` is the serialized job specification
 * as received, stored verbatim on every build.
 */
export type JobSpec = {
  type: string;
  job: string;
  buildId: string;
  prowJobId: string;
  refs?: Refs;
  extraRefs: Refs[];
  namespace: string;
  owner?: OwnerReference;
  rawSpec: string;
}

// -- Step configuration -----------------------------------------------------

/** Reference to a tag of an image stream in some namespace. */
export type ImageStreamTagReference = {
  namespace: string;
  name: string;
  tag: string;
}

export type SourceStepConfiguration = {
  /** Pipeline tag of the base image. */
  from: string;
  /** Pipeline tag the produced image is published under. */
  to: string;
  /** Image holding the clonerefs helper binary. */
  clonerefsImage: ImageStreamTagReference;
  /** Path of the helper binary inside `clonerefsImage`. */
  clonerefsPath: string;
}

export type CloneAuthType = 'SSH' | 'OAuth'

/** Credentials used to clone private repositories. The secret must already exist. */
export type CloneAuthConfig = {
  secretName: string;
  type: CloneAuthType;
}

/** Request and limit quantities as written by users, e.g. `{cpu: '500m'}`. */
export type ResourceRequirementsSpec = {
  requests?: Record<string, string>;
  limits?: Record<string, string>;
}

/** Per-step resource settings. The `*` entry applies to every step. */
export type ResourceConfiguration = Record<string, ResourceRequirementsSpec>

// -- Graph ------------------------------------------------------------------

/** Dependency edge between pipeline steps. */
export type StepLink = {
  kind: 'internal-image';
  tag: string;
}
