import type * as k8s from "@kubernetes/client-node";
import type { PodSet, PodSetStatus } from "../../models/types.js";

// Interface for the Kubernetes client context (used as 'this')
export interface K8sClientContext {
  k8sApi: Pick<
    k8s.CoreV1Api,
    "listNamespacedPod" | "createNamespacedPod" | "deleteNamespacedPod"
  >;
  customApi: Pick<
    k8s.CustomObjectsApi,
    "getNamespacedCustomObject" | "replaceNamespacedCustomObjectStatus"
  >;
}

/**
 * The slice of the cluster API the reconciler depends on.
 *
 * Every call accepts an optional signal and rejects with its reason once
 * the signal fires, whether before the request starts or while it is in
 * flight.
 */
export interface PodSetStore {
  /** Returns null when the PodSet does not exist. */
  getPodSet(
    namespace: string,
    name: string,
    signal?: AbortSignal,
  ): Promise<PodSet | null>;
  /**
   * Writes the status subresource. The stored resourceVersion of `podSet`
   * guards the write, so a concurrent modification fails with a conflict.
   */
  updatePodSetStatus(
    podSet: PodSet,
    status: PodSetStatus,
    signal?: AbortSignal,
  ): Promise<PodSet>;
  listPods(
    namespace: string,
    labels: Record<string, string>,
    signal?: AbortSignal,
  ): Promise<k8s.V1Pod[]>;
  createPod(pod: k8s.V1Pod, signal?: AbortSignal): Promise<k8s.V1Pod>;
  deletePod(namespace: string, name: string, signal?: AbortSignal): Promise<void>;
}
