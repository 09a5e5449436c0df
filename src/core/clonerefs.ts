import {posix} from 'node:path'
import type {CloneAuthConfig, Pull, Refs} from '../types.js'

/** Environment variable the clonerefs helper reads its options from. */
export const clonerefsOptionsEnvVar = 'CLONEREFS_OPTIONS'

export const sourceRoot = '/go'
export const sshPrivateKeyPath = '/sshprivatekey'
export const sshConfigPath = '/ssh_config'
export const oauthTokenPath = '/oauth-token'

/** Keys of the clone secret that get copied into the build context. */
export const sshPrivateKeySecretKey = 'ssh-privatekey'
export const oauthSecretKey = 'oauth-token'

const gitHost = 'github.com'

export function cloneUri(org: string, repo: string, auth?: CloneAuthConfig): string {
  if (auth?.type === 'SSH') {
    return `ssh://git@${gitHost}/${org}/${repo}.git`
  }

  return `https://${gitHost}/${org}/${repo}.git`
}

/**
 * Copies the job's refs, primary first, pointing each clone URI at the
 * scheme matching `auth`. Without auth, an explicit clone URI is kept and a
 * missing one defaults to anonymous HTTPS.
 */
export function refsForClone(primary: Refs | undefined, extra: Refs[], auth?: CloneAuthConfig): Refs[] {
  const all = primary ? [primary, ...extra] : extra
  return all.map(ref => ({
    ...ref,
    pulls: ref.pulls?.map(pull => ({...pull})),
    cloneUri: auth ? cloneUri(ref.org, ref.repo, auth) : (ref.cloneUri ?? cloneUri(ref.org, ref.repo))
  }))
}

/** Checkout path of one ref, relative to `<base>/src`. */
export function pathForRefs(baseDir: string, refs: Refs): string {
  let clonePath: string
  if (refs.pathAlias) {
    clonePath = refs.pathAlias
  } else if (refs.repoLink) {
    const parts = refs.repoLink.split('://')
    clonePath = parts.at(-1) ?? refs.repoLink
  } else {
    clonePath = `${gitHost}/${refs.org}/${refs.repo}`
  }

  return posix.join(baseDir, 'src', clonePath)
}

/**
 * Working directory of the build: the checkout of the ref flagged `workDir`,
 * else of the first ref, else the source root itself.
 */
export function determineWorkDir(baseDir: string, refs: Refs[]): string {
  const workDirRef = refs.find(ref => ref.workDir) ?? refs[0]
  return workDirRef ? pathForRefs(baseDir, workDirRef) : baseDir
}

export type ClonerefsOptions = {
  srcRoot: string;
  log: string;
  gitUserName: string;
  gitUserEmail: string;
  refs: Refs[];
  keyFiles?: string[];
  oauthTokenFile?: string;
  fail: boolean;
}

function isEmpty(value: unknown): boolean {
  return value === undefined
    || value === false
    || value === 0
    || value === ''
    || (Array.isArray(value) && value.length === 0)
}

/**
 * Drops empty values of every field but the `required` ones, the way the
 * helper encodes its own options. Field order is kept.
 */
function compact(fields: Record<string, unknown>, required: readonly string[]): Record<string, unknown> {
  const encoded: Record<string, unknown> = {}
  for (const [key, value] of Object.entries(fields)) {
    if (required.includes(key) || !isEmpty(value)) {
      encoded[key] = value
    }
  }

  return encoded
}

function encodePull(pull: Pull): Record<string, unknown> {
  return compact({
    number: pull.number,
    author: pull.author,
    sha: pull.sha,
    title: pull.title,
    ref: pull.ref,
    link: pull.link
  }, ['number', 'author', 'sha'])
}

function encodeRefs(refs: Refs): Record<string, unknown> {
  return compact({
    org: refs.org,
    repo: refs.repo,
    repo_link: refs.repoLink,
    base_ref: refs.baseRef,
    base_sha: refs.baseSha,
    base_link: refs.baseLink,
    pulls: refs.pulls?.map(pull => encodePull(pull)),
    path_alias: refs.pathAlias,
    workdir: refs.workDir,
    clone_uri: refs.cloneUri,
    skip_submodules: refs.skipSubmodules,
    clone_depth: refs.cloneDepth,
    skip_fetch_head: refs.skipFetchHead
  }, ['org', 'repo'])
}

/**
 * Serializes helper options to the JSON the helper expects. Keys are emitted
 * in a fixed order and empty fields are dropped, so equal options always
 * encode to the same string.
 */
export function encodeClonerefsOptions(options: ClonerefsOptions): string {
  return JSON.stringify(compact({
    src_root: options.srcRoot,
    log: options.log,
    git_user_name: options.gitUserName,
    git_user_email: options.gitUserEmail,
    refs: options.refs.map(refs => encodeRefs(refs)),
    key_files: options.keyFiles,
    oauth_token_file: options.oauthTokenFile,
    fail: options.fail
  }, ['src_root', 'log', 'refs']))
}
