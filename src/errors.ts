export class SourceStepError extends Error {
  constructor(
    readonly code: string,
    message: string,
    options?: {cause?: unknown}
  ) {
    super(message, options)
    this.name = 'SourceStepError'
  }

  get transient(): boolean {
    return false
  }
}

// -- Configuration errors ----------------------------------------------------

export class ConfigurationError extends SourceStepError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'ConfigurationError'
  }
}

export class MalformedQuantityError extends ConfigurationError {
  constructor(
    readonly resource: string,
    readonly kind: 'request' | 'limit',
    readonly raw: string,
    options?: {cause?: unknown}
  ) {
    super('MALFORMED_QUANTITY', `invalid resource ${kind} for ${resource}: quantity "${raw}" is malformed`, options)
    this.name = 'MalformedQuantityError'
  }
}

export class ValidationError extends ConfigurationError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('VALIDATION_ERROR', message, options)
    this.name = 'ValidationError'
  }
}

// -- Resolution errors -------------------------------------------------------

export class ResolutionError extends SourceStepError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'ResolutionError'
  }
}

export class StreamUnresolvableError extends ResolutionError {
  constructor(readonly stream: string, options?: {cause?: unknown}) {
    super('STREAM_UNRESOLVABLE', `remote image stream ${stream} has no accessible image registry value`, options)
    this.name = 'StreamUnresolvableError'
  }
}

export class ImageResolutionError extends ResolutionError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('IMAGE_RESOLUTION_FAILED', message, options)
    this.name = 'ImageResolutionError'
  }
}

export class ParameterResolutionError extends ResolutionError {
  constructor(readonly key: string, message: string, options?: {cause?: unknown}) {
    super('PARAMETER_RESOLUTION_FAILED', `could not resolve parameter ${key}: ${message}`, options)
    this.name = 'ParameterResolutionError'
  }
}

// -- API errors --------------------------------------------------------------

export type ApiErrorReason = 'AlreadyExists' | 'NotFound' | 'Conflict' | 'Unknown'

/**
 * Error raised by a BuildClient. The reason mirrors the status reason of the
 * orchestration API so callers can tell existence conflicts apart.
 */
export class ApiError extends SourceStepError {
  constructor(
    readonly reason: ApiErrorReason,
    message: string,
    options?: {cause?: unknown}
  ) {
    super(`API_${reason.replaceAll(/([a-z])([A-Z])/g, '$1_$2').toUpperCase()}`, message, options)
    this.name = 'ApiError'
  }

  override get transient(): boolean {
    return this.reason === 'Unknown'
  }
}

export function isAlreadyExists(error: unknown): boolean {
  return error instanceof ApiError && error.reason === 'AlreadyExists'
}

export function isNotFound(error: unknown): boolean {
  return error instanceof ApiError && error.reason === 'NotFound'
}

export function isConflict(error: unknown): boolean {
  return error instanceof ApiError && error.reason === 'Conflict'
}

// -- Build errors ------------------------------------------------------------

export class BuildError extends SourceStepError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'BuildError'
  }
}

export class BuildCreateError extends BuildError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('BUILD_CREATE_FAILED', message, options)
    this.name = 'BuildCreateError'
  }
}

export class BuildDeletionError extends BuildError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('BUILD_DELETE_FAILED', message, options)
    this.name = 'BuildDeletionError'
  }
}

export class BuildWaitError extends BuildError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('BUILD_WAIT_FAILED', message, options)
    this.name = 'BuildWaitError'
  }
}

export class BuildFailedError extends BuildError {
  constructor(
    readonly build: string,
    readonly phase: string,
    readonly reason: string,
    message: string,
    options?: {cause?: unknown}
  ) {
    super('BUILD_FAILED', message, options)
    this.name = 'BuildFailedError'
  }
}

export class BackoffTimeoutError extends SourceStepError {
  constructor(options?: {cause?: unknown}) {
    super('BACKOFF_TIMEOUT', 'timed out waiting for the condition', options)
    this.name = 'BackoffTimeoutError'
  }
}

// -- Step results ------------------------------------------------------------

/**
 * Envelope that tags a step failure with a reason used for upstream
 * aggregation. The wrapped error stays available as `cause`.
 */
export class ReasonedError extends SourceStepError {
  constructor(readonly reason: string, cause: unknown) {
    super('STEP_FAILED', cause instanceof Error ? cause.message : String(cause), {cause})
    this.name = 'ReasonedError'
  }
}

export function forReason(reason: string): {forError(error: unknown): ReasonedError | undefined} {
  return {
    forError(error: unknown) {
      if (error === undefined || error === null) {
        return undefined
      }

      if (error instanceof ReasonedError) {
        return error
      }

      return new ReasonedError(reason, error)
    }
  }
}
