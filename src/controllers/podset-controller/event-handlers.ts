import type * as k8s from "@kubernetes/client-node";
import type { PodSet } from "../../models/types.js";
import {
  PODSET_GROUP,
  PODSET_KIND,
} from "../../utils/k8s-client/custom-resource-operations.js";
import { describeError } from "../../utils/k8s-client/errors.js";
import logger from "../../utils/logger.js";
import { objectKey } from "../../utils/object-key.js";
import type { ResourceInformer } from "./controller-types.js";
import type { PodSetController } from "./index.js";
import { controllerOwnerReference } from "./pod-management.js";

const INFORMER_RESTART_DELAY_MS = 5000;

export function podSetKey(podSet: PodSet): string | undefined {
  const { namespace, name } = podSet.metadata;
  if (!namespace || !name) {
    return undefined;
  }
  return objectKey({ namespace, name });
}

/**
 * Route a pod event to the PodSet that controls the pod, if any
 */
export function ownerKeyForPod(pod: k8s.V1Pod): string | undefined {
  const namespace = pod.metadata?.namespace;
  const ref = controllerOwnerReference(pod);
  if (!namespace || !ref || ref.kind !== PODSET_KIND) {
    return undefined;
  }
  if (ref.apiVersion.split("/")[0] !== PODSET_GROUP) {
    return undefined;
  }
  return objectKey({ namespace, name: ref.name });
}

// Handlers stay registered across stop/start cycles
const wired = new WeakSet<object>();

function watch<T>(
  controller: PodSetController,
  informer: ResourceInformer<T>,
  resource: string,
  keyOf: (obj: T) => string | undefined,
) {
  if (wired.has(informer)) {
    return;
  }
  wired.add(informer);

  const enqueue = (verb: string) => (obj: T) => {
    const key = keyOf(obj);
    if (key === undefined) {
      return;
    }
    logger.debug(`${resource} ${verb}: enqueueing PodSet ${key}`);
    controller.queue.add(key);
  };

  informer.on("add", enqueue("added"));
  informer.on("update", enqueue("updated"));
  informer.on("delete", enqueue("deleted"));

  informer.on("error", (err: unknown) => {
    logger.error(`${resource} informer error: ${describeError(err)}`);
    // Attempt to restart the informer after a delay
    const timer = setTimeout(() => {
      controller.restartTimers.delete(timer);
      if (!controller.watchEnabled) {
        return;
      }
      logger.info(`Attempting to restart ${resource} informer...`);
      informer.start().catch((error: unknown) => {
        logger.error(`Failed to restart ${resource} informer: ${describeError(error)}`);
      });
    }, INFORMER_RESTART_DELAY_MS);
    controller.restartTimers.add(timer);
  });
}

export async function setupWatchers(this: PodSetController) {
  if (this.watchEnabled) {
    return;
  }

  watch(this, this.podSetInformer, "PodSet", podSetKey);
  watch(this, this.podInformer, "Pod", ownerKeyForPod);

  this.watchEnabled = true;
  await Promise.all([this.podSetInformer.start(), this.podInformer.start()]);
  logger.info(`Started watching PodSets and their pods in ${this.namespace}`);
}

export async function stopWatching(this: PodSetController) {
  if (!this.watchEnabled) {
    return;
  }
  this.watchEnabled = false;
  for (const timer of this.restartTimers) {
    clearTimeout(timer);
  }
  this.restartTimers.clear();
  await Promise.all([this.podSetInformer.stop(), this.podInformer.stop()]);
  logger.info("Stopped watching PodSets");
}
