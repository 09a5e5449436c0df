import type {ImageLabel} from '../engine/types.js'
import type {JobSpec, Refs} from '../types.js'

export const ciAnnotationPrefix = 'ci.openshift.io'
export const jobSpecAnnotation = `${ciAnnotationPrefix}/job-spec`

export const jobLabel = 'job'
export const buildIdLabel = 'build-id'
export const prowJobIdLabel = 'prow.k8s.io/id'
export const createdByCiLabel = 'created-by-ci'
export const createsLabel = 'creates'
export const ciEnvLabel = 'OPENSHIFT_CI'
export const refsOrgLabel = `${ciAnnotationPrefix}/refs.org`
export const refsRepoLabel = `${ciAnnotationPrefix}/refs.repo`
export const refsBranchLabel = `${ciAnnotationPrefix}/refs.branch`

const maxLabelLength = 63

/**
 * Returns a copy of `labels` where every value longer than 63 characters is
 * cut to 60 characters followed by `XXX`. Characters are code points.
 */
export function trimLabels(labels: Record<string, string>): Record<string, string> {
  const trimmed: Record<string, string> = {}
  for (const [key, value] of Object.entries(labels)) {
    const chars = Array.from(value)
    trimmed[key] = chars.length > maxLabelLength ? `${chars.slice(0, maxLabelLength - 3).join('')}XXX` : value
  }

  return trimmed
}

/**
 * Labels identifying the job a build belongs to. Repository labels come from
 * the primary ref, or from the first extra ref when there is none.
 */
export function defaultPodLabels(jobSpec: JobSpec): Record<string, string> {
  const labels: Record<string, string> = {
    [jobLabel]: jobSpec.job,
    [buildIdLabel]: jobSpec.buildId,
    [prowJobIdLabel]: jobSpec.prowJobId,
    [createdByCiLabel]: 'true',
    [ciEnvLabel]: 'true'
  }

  const refs = jobSpec.refs ?? jobSpec.extraRefs[0]
  if (refs) {
    labels[refsOrgLabel] = refs.org
    labels[refsRepoLabel] = refs.repo
    labels[refsBranchLabel] = refs.baseRef
  }

  return trimLabels(labels)
}

// Every label a lower layer of the image may carry; all are reset.
const provenanceLabelKeys = [
  'vcs-type',
  'vcs-ref',
  'vcs-url',
  'io.openshift.build.name',
  'io.openshift.build.namespace',
  'io.openshift.build.commit.id',
  'io.openshift.build.commit.ref',
  'io.openshift.build.commit.message',
  'io.openshift.build.commit.author',
  'io.openshift.build.commit.date',
  'io.openshift.build.source-location',
  'io.openshift.build.source-context-dir'
] as const

/**
 * Provenance labels for the produced image, sorted by name.
 *
 * Values are only filled for builds of a plain branch: with pull requests
 * on top, the commit does not exist upstream and everything stays empty.
 */
export function provenanceImageLabels(refs: Refs | undefined, contextDir = ''): ImageLabel[] {
  const labels = new Map<string, string>(provenanceLabelKeys.map(key => [key, '']))

  if (refs && (refs.pulls ?? []).length === 0) {
    const url = `https://github.com/${refs.org}/${refs.repo}`
    labels.set('vcs-type', 'git')
    labels.set('vcs-ref', refs.baseSha ?? '')
    labels.set('io.openshift.build.commit.id', refs.baseSha ?? '')
    labels.set('io.openshift.build.commit.ref', refs.baseRef)
    labels.set('vcs-url', url)
    labels.set('io.openshift.build.source-location', url)
    labels.set('io.openshift.build.source-context-dir', contextDir)
  }

  return [...labels]
    .map(([name, value]) => ({name, value}))
    .sort((a, b) => (a.name < b.name ? -1 : (a.name > b.name ? 1 : 0)))
}
