import type {BuildClient} from '../engine/build-client.js'
import type {Build, Pod} from '../engine/types.js'

const buildPodNameAnnotation = 'openshift.io/build.pod-name'

/** Name of the pod running a build. */
export function buildPodName(build: Build): string {
  return build.metadata.annotations?.[buildPodNameAnnotation] ?? `${build.metadata.name}-build`
}

/**
 * One line per container that is not ready, with its state's reason and
 * message. Empty when every container is ready.
 */
export function unreadyContainerReasons(pod: Pod): string {
  let text = ''
  for (const container of pod.status.containerStatuses ?? []) {
    if (container.ready) {
      continue
    }

    let reason = 'unknown'
    let message = 'unknown'
    const {waiting, running, terminated} = container.state
    if (waiting) {
      reason = waiting.reason ?? ''
      message = waiting.message ?? ''
    } else if (running) {
      reason = 'Running'
      message = ''
    } else if (terminated) {
      reason = terminated.reason ?? ''
      message = terminated.message ?? ''
    }

    const suffix = message ? ` and message ${message}` : ''
    text += `\n* Container ${container.name} is not ready with reason ${reason}${suffix}`
  }

  return text
}

/**
 * Summary of the events recorded for a pod.
 * @throws Whatever the client throws while listing events
 */
export async function podEvents(client: BuildClient, pod: Pod, signal?: AbortSignal): Promise<string> {
  const events = await client.listEvents(pod.metadata.namespace, pod.metadata.uid ?? '', signal)
  let text = `Found ${events.length} events for Pod ${pod.metadata.name}:`
  for (const event of events) {
    text += `\n* ${event.count ?? 1}x ${event.source?.component ?? 'unknown'}: ${event.message ?? ''}`
  }

  return text
}
