import type {StepLink} from '../types.js'

export function internalImageLink(tag: string): StepLink {
  return {kind: 'internal-image', tag}
}

/** Whether `link` is satisfied by `other`. */
export function linkSatisfiedBy(link: StepLink, other: StepLink): boolean {
  return link.kind === other.kind && link.tag === other.tag
}
