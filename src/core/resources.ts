import {MalformedQuantityError} from '../errors.js'
import type {ResourceList, ResourceRequirements} from '../engine/types.js'
import type {ResourceConfiguration, ResourceRequirementsSpec} from '../types.js'

const binarySuffixes: Record<string, number> = {
  Ki: 2 ** 10,
  Mi: 2 ** 20,
  Gi: 2 ** 30,
  Ti: 2 ** 40,
  Pi: 2 ** 50,
  Ei: 2 ** 60
}

const decimalSuffixes: Record<string, number> = {
  n: 1e-9,
  u: 1e-6,
  m: 1e-3,
  '': 1,
  k: 1e3,
  M: 1e6,
  G: 1e9,
  T: 1e12,
  P: 1e15,
  E: 1e18
}

const quantityPattern = /^([+-]?(?:\d+(?:\.\d*)?|\.\d+))(Ki|Mi|Gi|Ti|Pi|Ei|[eE][+-]?\d+|[numkMGTPE])?$/

/**
 * A parsed resource quantity. `value` is expressed in base units (cores,
 * bytes); serializing to JSON yields the original text.
 */
export class Quantity {
  constructor(
    readonly value: number,
    readonly text: string
  ) {}

  toJSON(): string {
    return this.text
  }

  toString(): string {
    return this.text
  }
}

/**
 * Parses a quantity string such as `500m`, `1Gi` or `1e3`.
 * Returns undefined when the string is not a valid quantity.
 */
export function parseQuantity(raw: string): Quantity | undefined {
  const text = raw.trim()
  const match = quantityPattern.exec(text)
  if (!match) {
    return undefined
  }

  const number = Number(match[1])
  const suffix = match[2] ?? ''

  let multiplier: number
  if (suffix in binarySuffixes) {
    multiplier = binarySuffixes[suffix]
  } else if (suffix in decimalSuffixes) {
    multiplier = decimalSuffixes[suffix]
  } else {
    multiplier = 10 ** Number(suffix.slice(1))
  }

  const value = number * multiplier
  if (!Number.isFinite(value)) {
    return undefined
  }

  return new Quantity(value, text)
}

function parseList(values: Record<string, string>, kind: 'request' | 'limit'): ResourceList {
  const list: ResourceList = {}
  for (const [name, raw] of Object.entries(values)) {
    const quantity = parseQuantity(raw)
    if (!quantity) {
      throw new MalformedQuantityError(name, kind, raw)
    }

    list[name] = quantity
  }

  return list
}

/**
 * Translates user-facing request/limit strings into validated quantities.
 * Throws on the first malformed value; nothing partial is returned.
 */
export function resourcesFor(spec: ResourceRequirementsSpec): ResourceRequirements {
  const requirements: ResourceRequirements = {}
  if (spec.requests && Object.keys(spec.requests).length > 0) {
    requirements.requests = parseList(spec.requests, 'request')
  }

  if (spec.limits && Object.keys(spec.limits).length > 0) {
    requirements.limits = parseList(spec.limits, 'limit')
  }

  return requirements
}

/**
 * Resource requirements for one step: the `*` entry, overridden key by key
 * by the step's own entry.
 */
export function requirementsForStep(config: ResourceConfiguration, name: string): ResourceRequirementsSpec {
  const merged: ResourceRequirementsSpec = {}
  for (const entry of [config['*'], config[name]]) {
    if (!entry) {
      continue
    }

    if (entry.requests) {
      merged.requests = {...merged.requests, ...entry.requests}
    }

    if (entry.limits) {
      merged.limits = {...merged.limits, ...entry.limits}
    }
  }

  return merged
}
