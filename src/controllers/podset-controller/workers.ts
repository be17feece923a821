import { describeError, isConflict } from "../../utils/k8s-client/errors.js";
import logger from "../../utils/logger.js";
import { parseObjectKey } from "../../utils/object-key.js";
import type { PodSetController } from "./index.js";

/**
 * Reconcile one key and tell the queue what to do with it next
 */
export async function processKey(this: PodSetController, key: string) {
  const request = parseObjectKey(key);
  if (!request) {
    logger.error(`Dropping malformed reconcile key "${key}"`);
    this.queue.forget(key);
    return;
  }

  const signal = this.abortController.signal;
  try {
    const result = await this.reconcilePodSet(request, signal);
    if (result.requeue) {
      this.queue.addRateLimited(key);
    } else {
      this.queue.forget(key);
    }
  } catch (error) {
    if (signal.aborted) {
      logger.info(`Reconcile of PodSet ${key} interrupted by shutdown`);
      return;
    }
    if (isConflict(error)) {
      // Another writer got there first; the retry reads the new version
      logger.info(`PodSet ${key} changed while reconciling, retrying: ${describeError(error)}`);
    } else {
      logger.error(
        `Reconcile of PodSet ${key} failed (attempt ${this.queue.numRequeues(key) + 1}): ${describeError(error)}`,
      );
    }
    this.queue.addRateLimited(key);
  }
}

export async function runWorker(this: PodSetController, id: number) {
  logger.debug(`Worker ${id} started`);
  while (!this.abortController.signal.aborted) {
    const key = await this.queue.get();
    if (key === undefined) {
      break;
    }
    try {
      await processKey.call(this, key);
    } finally {
      this.queue.done(key);
    }
  }
  logger.debug(`Worker ${id} stopped`);
}
