/**
 * Rules deciding whether a failed build is worth one more attempt.
 */
export type InfraFailureRules = {
  /** Build status reasons that point at the cluster rather than the build. */
  readonly reasons: readonly string[];
  /** Log substrings that betray a transient network or registry problem. */
  readonly logHints: readonly string[];
}

export const defaultInfraFailureRules: InfraFailureRules = Object.freeze({
  reasons: Object.freeze([
    'CannotCreateBuildPod',
    'BuildPodDeleted',
    'ExceededRetryTimeout',
    'PushImageToRegistryFailed',
    'PullBuilderImageFailed',
    'FetchSourceFailed',
    'BuildPodExists',
    'NoBuildContainerStatus',
    'FailedContainer',
    'OutOfMemoryKilled',
    'CannotRetrieveServiceAccount',
    'FetchImageContentFailed',
    'BuildPodEvicted'
  ]),
  logHints: Object.freeze([
    'error: build error: no such image',
    '[Errno 256] No more mirrors to try.',
    'Error: Failed to synchronize cache for repo',
    'Could not resolve host: ',
    'net/http: TLS handshake timeout',
    'All mirrors were tried',
    'connection reset by peer'
  ])
})

export class InfraFailureClassifier {
  private readonly reasons: ReadonlySet<string>
  private readonly logHints: readonly string[]

  constructor(rules: InfraFailureRules = defaultInfraFailureRules) {
    this.reasons = new Set(rules.reasons)
    this.logHints = [...rules.logHints]
  }

  isInfra(reason: string | undefined, logSnippet: string | undefined): boolean {
    if (reason && this.reasons.has(reason)) {
      return true
    }

    if (logSnippet) {
      return this.logHints.some(hint => logSnippet.includes(hint))
    }

    return false
  }

  /**
   * Returns a classifier that also accepts the given reasons and hints.
   */
  withRules(extra: {reasons?: Iterable<string>; logHints?: Iterable<string>}): InfraFailureClassifier {
    return new InfraFailureClassifier({
      reasons: [...this.reasons, ...extra.reasons ?? []],
      logHints: [...this.logHints, ...extra.logHints ?? []]
    })
  }
}
