import * as k8s from "@kubernetes/client-node";
import type { PodSet, ReconcileRequest } from "../../models/types.js";
import type { OperatorConfig } from "../../utils/config.js";
import {
  PODSET_GROUP,
  PODSET_PLURAL,
  PODSET_VERSION,
} from "../../utils/k8s-client/custom-resource-operations.js";
import { KubernetesClient } from "../../utils/k8s-client/index.js";
import type { PodSetStore } from "../../utils/k8s-client/k8s-client-types.js";
import { formatLabelSelector } from "../../utils/k8s-client/pod-operations.js";
import logger from "../../utils/logger.js";
import { startSweepTimer } from "./cleanup.js";
import type {
  PodSetControllerContext,
  PodSetControllerOptions,
  ResourceInformer,
} from "./controller-types.js";
import { setupWatchers, stopWatching } from "./event-handlers.js";
import { POD_VERSION_LABEL } from "./pod-management.js";
import { reconcilePodSet } from "./reconciliation.js";
import { WorkQueue } from "./work-queue.js";
import { runWorker } from "./workers.js";

export class PodSetController implements PodSetControllerContext {
  public store: PodSetStore;
  public namespace: string;
  public podSetInformer: ResourceInformer<PodSet>;
  public podInformer: ResourceInformer<k8s.V1Pod>;
  public queue: WorkQueue;
  public workerCount: number;
  public watchEnabled: boolean = false;
  public restartTimers = new Set<NodeJS.Timeout>();
  public abortController = new AbortController();

  private workers: Promise<void>[] = [];
  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(options: PodSetControllerOptions) {
    this.store = options.store;
    this.namespace = options.namespace;
    this.podSetInformer = options.podSetInformer;
    this.podInformer = options.podInformer;
    this.queue = options.queue;
    this.workerCount = options.workers;
  }

  // Event handling
  async startWatching() {
    return setupWatchers.call(this);
  }

  async stopWatching() {
    return stopWatching.call(this);
  }

  // Reconciliation
  async reconcilePodSet(request: ReconcileRequest, signal?: AbortSignal) {
    return reconcilePodSet.call(this, request, signal);
  }

  startWorkers() {
    if (this.workers.length > 0) {
      return;
    }
    for (let id = 0; id < this.workerCount; id++) {
      this.workers.push(runWorker.call(this, id));
    }
    logger.info(`Started ${this.workerCount} reconcile workers`);
  }

  // Cleanup
  startSweepTimer(intervalMinutes: number) {
    if (this.sweepTimer === null) {
      this.sweepTimer = startSweepTimer.call(
        this,
        intervalMinutes,
        this.abortController.signal,
      );
    }
  }

  isReady(): boolean {
    return this.watchEnabled && this.workers.length > 0 && !this.queue.isShuttingDown();
  }

  /**
   * Stop watching, interrupt in-flight reconciles and wait for every worker
   * to return
   */
  async shutdown() {
    if (this.sweepTimer !== null) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    await this.stopWatching();
    this.abortController.abort(new Error("controller shutting down"));
    this.queue.shutDown();
    await Promise.all(this.workers);
    this.workers = [];
    logger.info("PodSet controller stopped");
  }
}

/**
 * Wire a controller to the cluster described by `kc`
 */
export function createPodSetController(
  config: OperatorConfig,
  kc: k8s.KubeConfig,
): PodSetController {
  const { namespace } = config;
  const coreApi = kc.makeApiClient(k8s.CoreV1Api);
  const customObjectsApi = kc.makeApiClient(k8s.CustomObjectsApi);

  const podSetInformer = k8s.makeInformer<PodSet>(
    kc,
    `/apis/${PODSET_GROUP}/${PODSET_VERSION}/namespaces/${namespace}/${PODSET_PLURAL}`,
    () =>
      customObjectsApi.listNamespacedCustomObject({
        group: PODSET_GROUP,
        version: PODSET_VERSION,
        namespace,
        plural: PODSET_PLURAL,
      }),
  );

  // Only pods carrying the PodSet label contract matter
  const podSelector = formatLabelSelector({ version: POD_VERSION_LABEL });
  const podInformer = k8s.makeInformer<k8s.V1Pod>(
    kc,
    `/api/v1/namespaces/${namespace}/pods`,
    () => coreApi.listNamespacedPod({ namespace, labelSelector: podSelector }),
    podSelector,
  );

  return new PodSetController({
    store: new KubernetesClient(kc),
    namespace,
    podSetInformer,
    podInformer,
    queue: new WorkQueue({
      baseDelayMs: config.retryBaseDelayMs,
      maxDelayMs: config.retryMaxDelayMs,
    }),
    workers: config.workers,
  });
}
