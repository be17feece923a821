import * as k8s from "@kubernetes/client-node";
import { customResourceOperations } from "./custom-resource-operations.js";
import type { K8sClientContext, PodSetStore } from "./k8s-client-types.js";
import { podOperations } from "./pod-operations.js";

/**
 * Kubernetes client wrapper for interacting with the Kubernetes API
 */
export class KubernetesClient implements K8sClientContext, PodSetStore {
  public k8sApi: k8s.CoreV1Api;
  public customApi: k8s.CustomObjectsApi;

  // Mix in the operations
  public createPod: typeof podOperations.createPod;
  public deletePod: typeof podOperations.deletePod;
  public listPods: typeof podOperations.listPods;

  public getPodSet: typeof customResourceOperations.getPodSet;
  public updatePodSetStatus: typeof customResourceOperations.updatePodSetStatus;

  constructor(kc: k8s.KubeConfig) {
    this.k8sApi = kc.makeApiClient(k8s.CoreV1Api);
    this.customApi = kc.makeApiClient(k8s.CustomObjectsApi);

    this.createPod = podOperations.createPod.bind(this);
    this.deletePod = podOperations.deletePod.bind(this);
    this.listPods = podOperations.listPods.bind(this);

    // Bind custom resource operations
    this.getPodSet = customResourceOperations.getPodSet.bind(this);
    this.updatePodSetStatus =
      customResourceOperations.updatePodSetStatus.bind(this);
  }
}
