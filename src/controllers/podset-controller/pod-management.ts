import type * as k8s from "@kubernetes/client-node";
import type { PodSet } from "../../models/types.js";
import {
  PODSET_API_VERSION,
  PODSET_KIND,
} from "../../utils/k8s-client/custom-resource-operations.js";

// Pods are matched to their PodSet by these labels alone; changing them
// orphans every pod already running
export const POD_VERSION_LABEL = "v0.1";

export function podSetLabels(podSet: PodSet): Record<string, string> {
  return {
    app: podSet.metadata.name ?? "",
    version: POD_VERSION_LABEL,
  };
}

/**
 * Build the pod created when a PodSet scales up.
 *
 * The API server completes the name from `generateName`.
 */
export function newPodForPodSet(podSet: PodSet): k8s.V1Pod {
  return {
    apiVersion: "v1",
    kind: "Pod",
    metadata: {
      generateName: `${podSet.metadata.name}-pod-`,
      namespace: podSet.metadata.namespace,
      labels: podSetLabels(podSet),
    },
    spec: {
      containers: [
        {
          name: "busybox",
          image: "busybox",
          command: ["sleep", "3600"],
        },
      ],
    },
  };
}

export function controllerOwnerReference(
  object: k8s.V1Pod,
): k8s.V1OwnerReference | undefined {
  return object.metadata?.ownerReferences?.find((ref) => ref.controller === true);
}

/**
 * Make `owner` the managing controller of `object`.
 *
 * Throws if the owner has not been persisted yet (no uid) or if another
 * object already controls `object`.
 */
export function setControllerReference(owner: PodSet, object: k8s.V1Pod): void {
  const { name, uid } = owner.metadata;
  if (!name || !uid) {
    throw new Error("Cannot set controller reference: owner has no name or uid");
  }

  const existing = controllerOwnerReference(object);
  if (existing && existing.uid !== uid) {
    throw new Error(
      `Object ${object.metadata?.name ?? object.metadata?.generateName} is already controlled by ${existing.kind} ${existing.name}`,
    );
  }

  const reference: k8s.V1OwnerReference = {
    apiVersion: PODSET_API_VERSION,
    kind: PODSET_KIND,
    name,
    uid,
    controller: true,
    blockOwnerDeletion: true,
  };
  const metadata = object.metadata ?? {};
  const others = (metadata.ownerReferences ?? []).filter((ref) => ref.uid !== uid);
  metadata.ownerReferences = [...others, reference];
  object.metadata = metadata;
}
