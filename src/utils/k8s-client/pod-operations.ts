import type * as k8s from "@kubernetes/client-node";
import logger from "../logger.js";
import { describeError } from "./errors.js";
import type { K8sClientContext } from "./k8s-client-types.js";
import { abortable, requestOptions } from "./request-options.js";

/**
 * Render a label map as an equality-based label selector
 */
export function formatLabelSelector(labels: Record<string, string>): string {
  return Object.entries(labels)
    .map(([key, value]) => `${key}=${value}`)
    .join(",");
}

export const podOperations = {
  /**
   * Create a new Pod in the namespace named by its metadata
   */
  async createPod(
    this: K8sClientContext,
    pod: k8s.V1Pod,
    signal?: AbortSignal,
  ): Promise<k8s.V1Pod> {
    signal?.throwIfAborted();
    const namespace = pod.metadata?.namespace;
    if (!namespace) {
      throw new Error("Pod manifest has no namespace");
    }
    return abortable(
      this.k8sApi.createNamespacedPod(
        {
          namespace,
          body: pod,
        },
        requestOptions(signal),
      ),
      signal,
    );
  },

  /**
   * Delete a Pod by name
   */
  async deletePod(
    this: K8sClientContext,
    namespace: string,
    name: string,
    signal?: AbortSignal,
  ): Promise<void> {
    signal?.throwIfAborted();
    await abortable(
      this.k8sApi.deleteNamespacedPod(
        {
          namespace,
          name,
        },
        requestOptions(signal),
      ),
      signal,
    );
  },

  /**
   * List Pods by label selector
   */
  async listPods(
    this: K8sClientContext,
    namespace: string,
    labels: Record<string, string>,
    signal?: AbortSignal,
  ): Promise<k8s.V1Pod[]> {
    signal?.throwIfAborted();
    const labelSelector = formatLabelSelector(labels);
    try {
      const response = await abortable(
        this.k8sApi.listNamespacedPod(
          {
            namespace,
            labelSelector,
          },
          requestOptions(signal),
        ),
        signal,
      );
      return response.items;
    } catch (error) {
      if (!signal?.aborted) {
        logger.error(
          `Error listing pods in ${namespace} matching ${labelSelector}: ${describeError(error)}`,
        );
      }
      throw error;
    }
  },
};
