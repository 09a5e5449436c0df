import {readFile} from 'node:fs/promises'
import {parse as parseYaml} from 'yaml'
import {ValidationError} from '../errors.js'
import {isRecord} from '../engine/decode.js'
import type {
  CloneAuthConfig,
  ImageStreamTagReference,
  ResourceConfiguration,
  ResourceRequirementsSpec,
  SourceStepConfiguration
} from '../types.js'

export const defaultConfigFile = '.source-step.yml'

/**
 * Content of `.source-step.yml`.
 */
export type SourceStepFileConfig = {
  namespace?: string;
  step?: SourceStepConfiguration;
  resources?: ResourceConfiguration;
  cloneAuth?: CloneAuthConfig;
  pullSecret?: boolean;
  pollIntervalMs?: number;
  /** Added to the built-in infrastructure failure rules. */
  infra?: {
    reasons?: string[];
    logHints?: string[];
  };
}

function fail(message: string): never {
  throw new ValidationError(`Invalid config: ${message}`)
}

function readString(object: Record<string, unknown>, key: string, where: string): string {
  const value = object[key]
  if (typeof value !== 'string' || value.length === 0) {
    fail(`${where}.${key} must be a non-empty string`)
  }

  return value
}

function readStringList(value: unknown, where: string): string[] {
  if (!Array.isArray(value) || !value.every(item => typeof item === 'string')) {
    fail(`${where} must be a list of strings`)
  }

  return value.map(String)
}

function readQuantities(value: unknown, where: string): Record<string, string> {
  if (!isRecord(value)) {
    fail(`${where} must be a map`)
  }

  const quantities: Record<string, string> = {}
  for (const [name, quantity] of Object.entries(value)) {
    // YAML reads `cpu: 1` as a number
    if (typeof quantity !== 'string' && typeof quantity !== 'number') {
      fail(`${where}.${name} must be a quantity`)
    }

    quantities[name] = String(quantity)
  }

  return quantities
}

function parseImageReference(value: unknown): ImageStreamTagReference {
  if (!isRecord(value)) {
    fail('step.clonerefsImage must be a map')
  }

  return {
    namespace: readString(value, 'namespace', 'step.clonerefsImage'),
    name: readString(value, 'name', 'step.clonerefsImage'),
    tag: readString(value, 'tag', 'step.clonerefsImage')
  }
}

function parseStep(value: unknown): SourceStepConfiguration {
  if (!isRecord(value)) {
    fail('step must be a map')
  }

  return {
    from: readString(value, 'from', 'step'),
    to: readString(value, 'to', 'step'),
    clonerefsImage: parseImageReference(value.clonerefsImage),
    clonerefsPath: readString(value, 'clonerefsPath', 'step')
  }
}

function parseResources(value: unknown): ResourceConfiguration {
  if (!isRecord(value)) {
    fail('resources must be a map')
  }

  const resources: ResourceConfiguration = {}
  for (const [step, requirements] of Object.entries(value)) {
    if (!isRecord(requirements)) {
      fail(`resources.${step} must be a map`)
    }

    const spec: ResourceRequirementsSpec = {}
    if (requirements.requests !== undefined) {
      spec.requests = readQuantities(requirements.requests, `resources.${step}.requests`)
    }

    if (requirements.limits !== undefined) {
      spec.limits = readQuantities(requirements.limits, `resources.${step}.limits`)
    }

    resources[step] = spec
  }

  return resources
}

function parseCloneAuth(value: unknown): CloneAuthConfig {
  if (!isRecord(value)) {
    fail('cloneAuth must be a map')
  }

  const secretName = readString(value, 'secretName', 'cloneAuth')
  const {type} = value
  if (type !== 'SSH' && type !== 'OAuth') {
    fail('cloneAuth.type must be SSH or OAuth')
  }

  return {secretName, type}
}

/**
 * Narrows parsed YAML to a configuration.
 * @throws ValidationError on any unexpected value
 */
export function parseConfig(value: unknown): SourceStepFileConfig {
  if (value === null || value === undefined) {
    return {}
  }

  if (!isRecord(value)) {
    fail('top level must be a map')
  }

  const config: SourceStepFileConfig = {}
  if (value.namespace !== undefined) {
    config.namespace = readString(value, 'namespace', 'config')
  }

  if (value.step !== undefined) {
    config.step = parseStep(value.step)
  }

  if (value.resources !== undefined) {
    config.resources = parseResources(value.resources)
  }

  if (value.cloneAuth !== undefined) {
    config.cloneAuth = parseCloneAuth(value.cloneAuth)
  }

  if (value.pullSecret !== undefined) {
    if (typeof value.pullSecret !== 'boolean') {
      fail('pullSecret must be a boolean')
    }

    config.pullSecret = value.pullSecret
  }

  if (value.pollIntervalMs !== undefined) {
    const interval = value.pollIntervalMs
    if (typeof interval !== 'number' || !Number.isInteger(interval) || interval <= 0) {
      fail('pollIntervalMs must be a positive integer')
    }

    config.pollIntervalMs = interval
  }

  if (value.infra !== undefined) {
    if (!isRecord(value.infra)) {
      fail('infra must be a map')
    }

    const {reasons, logHints} = value.infra
    config.infra = {
      reasons: reasons === undefined ? undefined : readStringList(reasons, 'infra.reasons'),
      logHints: logHints === undefined ? undefined : readStringList(logHints, 'infra.logHints')
    }
  }

  return config
}

/**
 * Loads a step configuration file.
 * Returns an empty config when the file does not exist.
 */
export async function loadConfig(filePath: string): Promise<SourceStepFileConfig> {
  let content: string
  try {
    content = await readFile(filePath, 'utf8')
  } catch (error: unknown) {
    if (isRecord(error) && error.code === 'ENOENT') {
      return {}
    }

    throw error
  }

  return parseConfig(parseYaml(content))
}
