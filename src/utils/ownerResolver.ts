import type { OwnerReference, PodObject } from '../types/k8s';

// Phases in which a pod still holds (or is about to hold) its requests
const ACTIVE_PHASES = ['Running', 'Pending'];

// The controller a pod belongs to, taken from its first ownerReference.
// Returns undefined for bare pods created directly, without any controller.
export function resolveOwner(pod: PodObject): OwnerReference | undefined {
  return pod.ownerReferences[0];
}

// Pods nothing else accounts for: no controller (so no Deployment, StatefulSet, DaemonSet,
// DeploymentConfig or Job replicates them) and not finished.
export function findBarePods(pods: PodObject[]): PodObject[] {
  return pods.filter(pod => resolveOwner(pod) === undefined && ACTIVE_PHASES.includes(pod.phase));
}
