import type * as k8s from "@kubernetes/client-node";
import type { Logger } from "winston";
import type {
  PodSet,
  PodSetStatus,
  ReconcileRequest,
  ReconcileResult,
} from "../../models/types.js";
import { describeError, isNotFound } from "../../utils/k8s-client/errors.js";
import logger from "../../utils/logger.js";
import { objectKey } from "../../utils/object-key.js";
import type { PodSetControllerContext } from "./controller-types.js";
import {
  newPodForPodSet,
  podSetLabels,
  setControllerReference,
} from "./pod-management.js";

const LIVE_PHASES: ReadonlySet<string> = new Set(["Pending", "Running"]);

/**
 * A pod counts towards the replica total unless it is being torn down or
 * has already finished
 */
export function isLivePod(pod: k8s.V1Pod): boolean {
  if (!pod.metadata?.name || pod.metadata.deletionTimestamp) {
    return false;
  }
  const phase = pod.status?.phase;
  return phase !== undefined && LIVE_PHASES.has(phase);
}

export function computePodSetStatus(livePods: k8s.V1Pod[]): PodSetStatus {
  return {
    podNames: livePods.map((pod) => pod.metadata?.name ?? ""),
  };
}

// Order matters: podNames follows the order the API server listed the pods in
export function podSetStatusEqual(
  current: PodSetStatus | undefined,
  next: PodSetStatus,
): boolean {
  const a = current?.podNames;
  const b = next.podNames;
  if (a === undefined || b === undefined) {
    return a === b;
  }
  return a.length === b.length && a.every((name, i) => name === b[i]);
}

/**
 * Pick which live pods to remove when scaling down. No ordering is
 * promised beyond being deterministic for a given listing.
 */
export function selectPodsForDeletion(
  livePods: k8s.V1Pod[],
  count: number,
): k8s.V1Pod[] {
  return livePods.slice(0, Math.max(0, count));
}

/**
 * One convergence step for a PodSet: refresh its status from the pods that
 * are actually live, then delete the surplus or create a single missing pod.
 */
export async function reconcilePodSet(
  this: PodSetControllerContext,
  request: ReconcileRequest,
  signal?: AbortSignal,
): Promise<ReconcileResult> {
  const log = logger.child({ key: objectKey(request) });

  const podSet = await this.store.getPodSet(
    request.namespace,
    request.name,
    signal,
  );
  if (!podSet) {
    // Owned pods go away with it through garbage collection
    log.debug("PodSet no longer exists, nothing to do");
    return { requeue: false };
  }

  const pods = await this.store.listPods(
    request.namespace,
    podSetLabels(podSet),
    signal,
  );
  const livePods = pods.filter(isLivePod);

  const status = computePodSetStatus(livePods);
  if (!podSetStatusEqual(podSet.status, status)) {
    log.debug(`Updating status to ${status.podNames?.length ?? 0} live pods`);
    await this.store.updatePodSetStatus(podSet, status, signal);
  }

  const available = livePods.length;
  const desired = podSet.spec.replicas;

  if (available > desired) {
    log.info(
      `Scaling down PodSet: currently available ${available}, required ${desired}`,
    );
    const surplus = selectPodsForDeletion(livePods, available - desired);
    await deletePods.call(this, log, request.namespace, surplus, signal);
    return { requeue: true };
  }

  if (available < desired) {
    log.info(
      `Scaling up PodSet: currently available ${available}, required ${desired}`,
    );
    await createPodForPodSet.call(this, log, podSet, signal);
    return { requeue: true };
  }

  return { requeue: false };
}

/**
 * Attempt every deletion even if some fail, then surface the first failure.
 * The worker logs the error that escapes, so only the others are logged here.
 */
async function deletePods(
  this: PodSetControllerContext,
  log: Logger,
  namespace: string,
  pods: k8s.V1Pod[],
  signal?: AbortSignal,
): Promise<void> {
  let failure: { error: unknown } | undefined;
  for (const pod of pods) {
    const name = pod.metadata?.name ?? "";
    try {
      await this.store.deletePod(namespace, name, signal);
      log.info(`Deleted pod ${name}`);
    } catch (error) {
      if (isNotFound(error)) {
        continue;
      }
      if (failure) {
        log.error(`Failed to delete pod ${name}: ${describeError(error)}`);
      } else {
        failure = { error };
      }
    }
  }
  if (failure) {
    throw failure.error;
  }
}

async function createPodForPodSet(
  this: PodSetControllerContext,
  log: Logger,
  podSet: PodSet,
  signal?: AbortSignal,
): Promise<void> {
  const pod = newPodForPodSet(podSet);
  setControllerReference(podSet, pod);
  const created = await this.store.createPod(pod, signal);
  log.info(`Created pod ${created.metadata?.name}`);
}
