import {ValidationError} from '../errors.js'
import {isRecord} from '../engine/decode.js'
import type {OwnerReference} from '../engine/types.js'
import type {JobSpec, Pull, Refs} from '../types.js'

// -- Field readers -----------------------------------------------------------

function requiredString(object: Record<string, unknown>, key: string, where: string): string {
  const value = object[key]
  if (typeof value !== 'string' || value.length === 0) {
    throw new ValidationError(`Invalid job spec: ${where}.${key} must be a non-empty string`)
  }

  return value
}

function optionalString(object: Record<string, unknown>, key: string, where: string): string | undefined {
  const value = object[key]
  if (value === undefined || value === null || value === '') {
    return undefined
  }

  if (typeof value !== 'string') {
    throw new ValidationError(`Invalid job spec: ${where}.${key} must be a string`)
  }

  return value
}

function optionalBoolean(object: Record<string, unknown>, key: string, where: string): boolean | undefined {
  const value = object[key]
  if (value === undefined || value === null) {
    return undefined
  }

  if (typeof value !== 'boolean') {
    throw new ValidationError(`Invalid job spec: ${where}.${key} must be a boolean`)
  }

  return value
}

function optionalInteger(object: Record<string, unknown>, key: string, where: string): number | undefined {
  const value = object[key]
  if (value === undefined || value === null) {
    return undefined
  }

  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new ValidationError(`Invalid job spec: ${where}.${key} must be an integer`)
  }

  return value
}

// -- Decoding ----------------------------------------------------------------

function parsePull(value: unknown, where: string): Pull {
  if (!isRecord(value)) {
    throw new ValidationError(`Invalid job spec: ${where} must be an object`)
  }

  const number = optionalInteger(value, 'number', where)
  if (number === undefined) {
    throw new ValidationError(`Invalid job spec: ${where}.number is required`)
  }

  return {
    number,
    author: optionalString(value, 'author', where) ?? '',
    sha: requiredString(value, 'sha', where),
    title: optionalString(value, 'title', where),
    ref: optionalString(value, 'ref', where),
    link: optionalString(value, 'link', where)
  }
}

function parseRefs(value: unknown, where: string): Refs {
  if (!isRecord(value)) {
    throw new ValidationError(`Invalid job spec: ${where} must be an object`)
  }

  let pulls: Pull[] | undefined
  if (value.pulls !== undefined && value.pulls !== null) {
    if (!Array.isArray(value.pulls)) {
      throw new ValidationError(`Invalid job spec: ${where}.pulls must be an array`)
    }

    pulls = value.pulls.map((pull, index) => parsePull(pull, `${where}.pulls[${index}]`))
  }

  return {
    org: requiredString(value, 'org', where),
    repo: requiredString(value, 'repo', where),
    repoLink: optionalString(value, 'repo_link', where),
    baseRef: requiredString(value, 'base_ref', where),
    baseSha: optionalString(value, 'base_sha', where),
    baseLink: optionalString(value, 'base_link', where),
    pulls,
    pathAlias: optionalString(value, 'path_alias', where),
    workDir: optionalBoolean(value, 'workdir', where),
    cloneUri: optionalString(value, 'clone_uri', where),
    skipSubmodules: optionalBoolean(value, 'skip_submodules', where),
    cloneDepth: optionalInteger(value, 'clone_depth', where),
    skipFetchHead: optionalBoolean(value, 'skip_fetch_head', where)
  }
}

/**
 * Parses the serialized job specification handed to the step by the job
 * runner. The raw text is kept as is in `rawSpec`.
 *
 * @throws ValidationError when the text is not a valid job specification
 */
export function parseJobSpec(raw: string, {namespace, owner}: {namespace: string; owner?: OwnerReference}): JobSpec {
  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch (error: unknown) {
    throw new ValidationError('Invalid job spec: not valid JSON', {cause: error})
  }

  if (!isRecord(parsed)) {
    throw new ValidationError('Invalid job spec: must be an object')
  }

  if (!namespace) {
    throw new ValidationError('Invalid job spec: a namespace is required')
  }

  let extraRefs: Refs[] = []
  if (parsed.extra_refs !== undefined && parsed.extra_refs !== null) {
    if (!Array.isArray(parsed.extra_refs)) {
      throw new ValidationError('Invalid job spec: extra_refs must be an array')
    }

    extraRefs = parsed.extra_refs.map((refs, index) => parseRefs(refs, `extra_refs[${index}]`))
  }

  const refs = parsed.refs === undefined || parsed.refs === null ? undefined : parseRefs(parsed.refs, 'refs')

  return {
    type: requiredString(parsed, 'type', 'spec'),
    job: requiredString(parsed, 'job', 'spec'),
    buildId: optionalString(parsed, 'buildid', 'spec') ?? '',
    prowJobId: optionalString(parsed, 'prowjobid', 'spec') ?? '',
    refs,
    extraRefs,
    namespace,
    owner,
    rawSpec: raw
  }
}

// -- Inputs ------------------------------------------------------------------

/**
 * Short description of what a ref set checks out, e.g. `main:abc,42:def`.
 */
export function refsToString(refs: Refs): string {
  const parts = [refs.baseSha ? `${refs.baseRef}:${refs.baseSha}` : refs.baseRef]
  for (const pull of refs.pulls ?? []) {
    parts.push(pull.ref ? `${pull.number}:${pull.sha}:${pull.ref}` : `${pull.number}:${pull.sha}`)
  }

  return parts.join(',')
}

/** One entry per ref set, primary first. Used as a cache key. */
export function jobInputs(jobSpec: JobSpec): string[] {
  const inputs: string[] = []
  if (jobSpec.refs) {
    inputs.push(refsToString(jobSpec.refs))
  }

  for (const refs of jobSpec.extraRefs) {
    inputs.push(refsToString(refs))
  }

  return inputs
}
