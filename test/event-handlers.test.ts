import type * as k8s from "@kubernetes/client-node";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ownerKeyForPod, podSetKey } from "../src/controllers/podset-controller/event-handlers.js";
import { PodSetController } from "../src/controllers/podset-controller/index.js";
import { WorkQueue } from "../src/controllers/podset-controller/work-queue.js";
import type { PodSet } from "../src/models/types.js";
import { FakeInformer } from "./helpers/fake-informer.js";
import { FakeStore } from "./helpers/fake-store.js";

function ownedPod(
  ref: Partial<k8s.V1OwnerReference> = {},
  namespace: string | null = "default",
): k8s.V1Pod {
  return {
    metadata: {
      name: "web-pod-abcde",
      namespace: namespace ?? undefined,
      ownerReferences: [
        {
          apiVersion: "app.github.com/v1alpha1",
          kind: "PodSet",
          name: "web",
          uid: "uid-web",
          controller: true,
          ...ref,
        },
      ],
    },
  };
}

describe("ownerKeyForPod", () => {
  it("routes a pod to its controlling PodSet", () => {
    expect(ownerKeyForPod(ownedPod())).toBe("default/web");
  });

  it("ignores pods controlled by something else", () => {
    expect(ownerKeyForPod(ownedPod({ kind: "ReplicaSet", apiVersion: "apps/v1" }))).toBeUndefined();
    expect(ownerKeyForPod(ownedPod({ apiVersion: "example.com/v1" }))).toBeUndefined();
    expect(ownerKeyForPod(ownedPod({ controller: false }))).toBeUndefined();
  });

  it("ignores pods without owner or namespace", () => {
    expect(ownerKeyForPod({ metadata: { name: "loose", namespace: "default" } })).toBeUndefined();
    expect(ownerKeyForPod(ownedPod({}, null))).toBeUndefined();
  });
});

describe("podSetKey", () => {
  it("keys a PodSet by namespace and name", () => {
    const podSet: PodSet = { metadata: { name: "web", namespace: "prod" }, spec: { replicas: 1 } };
    expect(podSetKey(podSet)).toBe("prod/web");
  });
});

describe("PodSetController watchers", () => {
  let podSetInformer: FakeInformer<PodSet>;
  let podInformer: FakeInformer<k8s.V1Pod>;
  let queue: WorkQueue;
  let controller: PodSetController;

  beforeEach(() => {
    podSetInformer = new FakeInformer<PodSet>();
    podInformer = new FakeInformer<k8s.V1Pod>();
    queue = new WorkQueue();
    controller = new PodSetController({
      store: new FakeStore(),
      namespace: "default",
      podSetInformer,
      podInformer,
      queue,
      workers: 1,
    });
  });

  afterEach(async () => {
    vi.useRealTimers();
    await controller.shutdown();
  });

  it("enqueues PodSet events under the PodSet's own key", async () => {
    await controller.startWatching();

    podSetInformer.emit("add", { metadata: { name: "web", namespace: "default" }, spec: { replicas: 1 } });
    podSetInformer.emit("update", { metadata: { name: "web", namespace: "default" }, spec: { replicas: 2 } });
    podSetInformer.emit("delete", { metadata: { name: "api", namespace: "default" }, spec: { replicas: 1 } });

    expect(queue.len()).toBe(2);
    await expect(queue.get()).resolves.toBe("default/web");
    await expect(queue.get()).resolves.toBe("default/api");
  });

  it("enqueues the owner when an owned pod changes", async () => {
    await controller.startWatching();

    podInformer.emit("delete", ownedPod());
    podInformer.emit("update", { metadata: { name: "stray", namespace: "default" } });

    expect(queue.len()).toBe(1);
    await expect(queue.get()).resolves.toBe("default/web");
  });

  it("starts both informers once and stops them on shutdown", async () => {
    await controller.startWatching();
    await controller.startWatching();
    expect(podSetInformer.starts).toBe(1);
    expect(podInformer.starts).toBe(1);

    await controller.stopWatching();
    expect(podSetInformer.stops).toBe(1);
    expect(podInformer.stops).toBe(1);

    await controller.startWatching();
    expect(podInformer.listenerCount("add")).toBe(1);
  });

  it("restarts an informer after an error while watching", async () => {
    vi.useFakeTimers();
    await controller.startWatching();

    podInformer.fail(new Error("watch closed"));
    expect(podInformer.starts).toBe(1);
    await vi.advanceTimersByTimeAsync(5000);

    expect(podInformer.starts).toBe(2);
  });

  it("does not restart an informer once watching stopped", async () => {
    vi.useFakeTimers();
    await controller.startWatching();

    podInformer.fail(new Error("watch closed"));
    await controller.stopWatching();
    await vi.advanceTimersByTimeAsync(5000);

    expect(podInformer.starts).toBe(1);
  });
});
