import type * as k8s from "@kubernetes/client-node";

// Custom Resource Definitions

// PodSet declares how many placeholder pods should be kept alive
export interface PodSet {
  apiVersion?: string;
  kind?: string;
  metadata: k8s.V1ObjectMeta;
  spec: PodSetSpec;
  status?: PodSetStatus;
}

// Specification for PodSet
export interface PodSetSpec {
  replicas: number;
}

// Status of PodSet, recomputed on every reconcile
export interface PodSetStatus {
  podNames?: string[];
}

// Identity of the PodSet a reconcile request targets
export interface ReconcileRequest {
  namespace: string;
  name: string;
}

// Outcome of one reconcile cycle; errors are thrown instead
export interface ReconcileResult {
  requeue: boolean;
}
