import type * as k8s from "@kubernetes/client-node";
import type { PodSet } from "../../models/types.js";
import type { PodSetStore } from "../../utils/k8s-client/k8s-client-types.js";
import type { WorkQueue } from "./work-queue.js";

// What the reconcile and sweep functions need from the controller ('this')
export interface PodSetControllerContext {
  store: PodSetStore;
  namespace: string;
}

// The part of a client-node informer the controller drives
export interface ResourceInformer<T> {
  on(verb: "add" | "update" | "delete", cb: (obj: T) => void): void;
  on(verb: "error", cb: (err: unknown) => void): void;
  start(): Promise<void>;
  stop(): Promise<void>;
}

export interface PodSetControllerOptions {
  store: PodSetStore;
  namespace: string;
  podSetInformer: ResourceInformer<PodSet>;
  podInformer: ResourceInformer<k8s.V1Pod>;
  queue: WorkQueue;
  workers: number;
}
