import test from 'ava'
import {
  SourceStepError,
  ConfigurationError,
  MalformedQuantityError,
  ValidationError,
  ResolutionError,
  StreamUnresolvableError,
  ImageResolutionError,
  ParameterResolutionError,
  ApiError,
  BuildError,
  BuildCreateError,
  BuildDeletionError,
  BuildWaitError,
  BuildFailedError,
  BackoffTimeoutError,
  ReasonedError,
  forReason,
  isAlreadyExists,
  isConflict,
  isNotFound
} from '../errors.js'

// -- instanceof chains -------------------------------------------------------

test('MalformedQuantityError is instanceof ConfigurationError and SourceStepError', t => {
  const error = new MalformedQuantityError('cpu', 'request', 'lots')
  t.true(error instanceof MalformedQuantityError)
  t.true(error instanceof ConfigurationError)
  t.true(error instanceof SourceStepError)
  t.true(error instanceof Error)
})

test('ValidationError is instanceof ConfigurationError', t => {
  t.true(new ValidationError('bad') instanceof ConfigurationError)
})

test('resolution errors are instanceof ResolutionError', t => {
  t.true(new StreamUnresolvableError('clonerefs') instanceof ResolutionError)
  t.true(new ImageResolutionError('missing') instanceof ResolutionError)
  t.true(new ParameterResolutionError('pipeline:src', 'missing') instanceof ResolutionError)
})

test('build errors are instanceof BuildError', t => {
  t.true(new BuildCreateError('x') instanceof BuildError)
  t.true(new BuildDeletionError('x') instanceof BuildError)
  t.true(new BuildWaitError('x') instanceof BuildError)
  t.true(new BuildFailedError('src', 'Failed', 'GenericBuildFailed', 'x') instanceof BuildError)
})

// -- Codes and names ---------------------------------------------------------

test('errors carry a machine code and their class name', t => {
  const cases: Array<[SourceStepError, string, string]> = [
    [new MalformedQuantityError('cpu', 'limit', 'x'), 'MALFORMED_QUANTITY', 'MalformedQuantityError'],
    [new ValidationError('x'), 'VALIDATION_ERROR', 'ValidationError'],
    [new StreamUnresolvableError('s'), 'STREAM_UNRESOLVABLE', 'StreamUnresolvableError'],
    [new ImageResolutionError('x'), 'IMAGE_RESOLUTION_FAILED', 'ImageResolutionError'],
    [new ParameterResolutionError('k', 'x'), 'PARAMETER_RESOLUTION_FAILED', 'ParameterResolutionError'],
    [new BuildCreateError('x'), 'BUILD_CREATE_FAILED', 'BuildCreateError'],
    [new BuildDeletionError('x'), 'BUILD_DELETE_FAILED', 'BuildDeletionError'],
    [new BuildWaitError('x'), 'BUILD_WAIT_FAILED', 'BuildWaitError'],
    [new BuildFailedError('src', 'Failed', 'r', 'x'), 'BUILD_FAILED', 'BuildFailedError'],
    [new BackoffTimeoutError(), 'BACKOFF_TIMEOUT', 'BackoffTimeoutError']
  ]

  for (const [error, code, name] of cases) {
    t.is(error.code, code)
    t.is(error.name, name)
  }
})

test('ApiError derives its code from the reason', t => {
  t.is(new ApiError('AlreadyExists', 'x').code, 'API_ALREADY_EXISTS')
  t.is(new ApiError('NotFound', 'x').code, 'API_NOT_FOUND')
  t.is(new ApiError('Conflict', 'x').code, 'API_CONFLICT')
  t.is(new ApiError('Unknown', 'x').code, 'API_UNKNOWN')
})

test('ParameterResolutionError names the parameter', t => {
  t.is(new ParameterResolutionError('pipeline:src', 'not found').message, 'could not resolve parameter pipeline:src: not found')
})

// -- transient ---------------------------------------------------------------

test('only unknown API errors are transient', t => {
  t.true(new ApiError('Unknown', 'x').transient)
  t.false(new ApiError('NotFound', 'x').transient)
  t.false(new BuildFailedError('src', 'Failed', 'r', 'x').transient)
  t.false(new ValidationError('x').transient)
})

// -- API error predicates ----------------------------------------------------

test('API error predicates match on the reason', t => {
  t.true(isAlreadyExists(new ApiError('AlreadyExists', 'x')))
  t.true(isNotFound(new ApiError('NotFound', 'x')))
  t.true(isConflict(new ApiError('Conflict', 'x')))
  t.false(isNotFound(new ApiError('Conflict', 'x')))
  t.false(isNotFound(new Error('NotFound')))
})

// -- cause chaining ----------------------------------------------------------

test('BuildCreateError preserves its cause', t => {
  const cause = new ApiError('Unknown', 'server unavailable')
  const error = new BuildCreateError('could not create build src', {cause})
  t.is(error.cause, cause)
})

// -- forReason ---------------------------------------------------------------

test('forReason wraps an error with the reason', t => {
  const cause = new BuildWaitError('could not find build src')
  const error = forReason('cloning_source').forError(cause)
  t.true(error instanceof ReasonedError)
  t.is(error?.reason, 'cloning_source')
  t.is(error?.message, 'could not find build src')
  t.is(error?.cause, cause)
  t.is(error?.code, 'STEP_FAILED')
})

test('forReason keeps an already reasoned error', t => {
  const inner = new ReasonedError('resolving_inputs', new Error('x'))
  t.is(forReason('cloning_source').forError(inner), inner)
})

test('forReason passes the absence of an error through', t => {
  t.is(forReason('cloning_source').forError(undefined), undefined)
  t.is(forReason('cloning_source').forError(null), undefined)
})
