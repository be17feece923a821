import type { PodSet, PodSetStatus } from "../../models/types.js";
import logger from "../logger.js";
import { describeError, isNotFound } from "./errors.js";
import type { K8sClientContext } from "./k8s-client-types.js";
import { abortable, requestOptions } from "./request-options.js";

export const PODSET_GROUP = "app.github.com";
export const PODSET_VERSION = "v1alpha1";
export const PODSET_API_VERSION = `${PODSET_GROUP}/${PODSET_VERSION}`;
export const PODSET_KIND = "PodSet";
export const PODSET_PLURAL = "podsets";

export const customResourceOperations = {
  /**
   * Get a PodSet custom resource
   */
  async getPodSet(
    this: K8sClientContext,
    namespace: string,
    name: string,
    signal?: AbortSignal,
  ): Promise<PodSet | null> {
    signal?.throwIfAborted();
    try {
      const response: PodSet = await abortable(
        this.customApi.getNamespacedCustomObject(
          {
            group: PODSET_GROUP,
            version: PODSET_VERSION,
            namespace,
            plural: PODSET_PLURAL,
            name,
          },
          requestOptions(signal),
        ),
        signal,
      );
      return response;
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      if (!signal?.aborted) {
        logger.error(
          `Error retrieving PodSet ${namespace}/${name}: ${describeError(error)}`,
        );
      }
      throw error;
    }
  },

  /**
   * Replace the status subresource of a PodSet.
   *
   * The body carries the resourceVersion we read, so the API server rejects
   * the write with a 409 if the object changed since.
   */
  async updatePodSetStatus(
    this: K8sClientContext,
    podSet: PodSet,
    status: PodSetStatus,
    signal?: AbortSignal,
  ): Promise<PodSet> {
    signal?.throwIfAborted();
    const { namespace, name } = podSet.metadata;
    if (!namespace || !name) {
      throw new Error("PodSet metadata must carry a namespace and a name");
    }
    const response: PodSet = await abortable(
      this.customApi.replaceNamespacedCustomObjectStatus(
        {
          group: PODSET_GROUP,
          version: PODSET_VERSION,
          namespace,
          plural: PODSET_PLURAL,
          name,
          body: {
            ...podSet,
            status,
          },
        },
        requestOptions(signal),
      ),
      signal,
    );
    return response;
  },
};
