import { describeError, isNotFound } from "../../utils/k8s-client/errors.js";
import logger from "../../utils/logger.js";
import type { PodSetControllerContext } from "./controller-types.js";
import { ownerKeyForPod } from "./event-handlers.js";
import { controllerOwnerReference, POD_VERSION_LABEL } from "./pod-management.js";

/**
 * Delete pods whose controlling PodSet is gone (or was recreated under a
 * new uid). Only needed where the cluster does not garbage-collect owned
 * objects; returns the number of pods deleted.
 */
export async function sweepOrphanedPods(
  this: PodSetControllerContext,
  signal?: AbortSignal,
): Promise<number> {
  const pods = await this.store.listPods(
    this.namespace,
    { version: POD_VERSION_LABEL },
    signal,
  );

  // owner name -> uid of the live PodSet, null when it does not exist,
  // undefined when the lookup failed
  const owners = new Map<string, string | null | undefined>();
  let deleted = 0;
  let failure: { error: unknown } | undefined;

  for (const pod of pods) {
    const ref = controllerOwnerReference(pod);
    const name = pod.metadata?.name;
    if (!ref || !name || ownerKeyForPod(pod) === undefined) {
      continue;
    }

    if (!owners.has(ref.name)) {
      try {
        const owner = await this.store.getPodSet(this.namespace, ref.name, signal);
        owners.set(ref.name, owner?.metadata.uid ?? null);
      } catch (error) {
        // Owner state unknown: keep its pods and move on to the next owner
        logger.error(`Error looking up PodSet ${ref.name}: ${describeError(error)}`);
        failure ??= { error };
        owners.set(ref.name, undefined);
      }
    }
    const ownerUid = owners.get(ref.name);
    if (ownerUid === undefined || ownerUid === ref.uid) {
      continue;
    }

    logger.info(`Pod ${name} lost its PodSet ${ref.name}, cleaning up`);
    try {
      await this.store.deletePod(this.namespace, name, signal);
      deleted++;
    } catch (error) {
      if (isNotFound(error)) {
        continue;
      }
      logger.error(`Error deleting orphaned pod ${name}: ${describeError(error)}`);
      failure ??= { error };
    }
  }

  if (failure) {
    throw failure.error;
  }
  return deleted;
}

/**
 * Start the orphan sweep timer
 */
export function startSweepTimer(
  this: PodSetControllerContext,
  intervalMinutes: number,
  signal?: AbortSignal,
): NodeJS.Timeout {
  const timer = setInterval(
    () => {
      sweepOrphanedPods.call(this, signal).catch((err: unknown) => {
        logger.error(`Orphan sweep error: ${describeError(err)}`);
      });
    },
    intervalMinutes * 60 * 1000,
  );

  logger.info(`Started orphan sweep timer with interval ${intervalMinutes} minutes`);
  return timer;
}
