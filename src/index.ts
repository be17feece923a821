import * as k8s from "@kubernetes/client-node";
import dotenv from "dotenv";
import {
  createPodSetController,
  type PodSetController,
} from "./controllers/podset-controller/index.js";
import { HttpServer } from "./services/http-server.js";
import { loadConfig } from "./utils/config.js";
import { describeError } from "./utils/k8s-client/errors.js";
import logger from "./utils/logger.js";

// Load environment variables
dotenv.config();

let shuttingDown = false;
let controller: PodSetController | null = null;
let server: HttpServer | null = null;

async function shutdown(signal: string) {
  if (shuttingDown) return;
  shuttingDown = true;

  logger.info(`Received ${signal}, shutting down...`);

  try {
    await controller?.shutdown();
    await server?.stop();
  } catch (error) {
    logger.error(`Error during shutdown: ${describeError(error)}`);
    process.exit(1);
  }

  logger.info("Exiting...");
  process.exit(0);
}

// Register shutdown handlers
process.on("SIGTERM", () => void shutdown("SIGTERM"));
process.on("SIGINT", () => void shutdown("SIGINT"));

async function main() {
  const config = loadConfig();
  logger.info(`Starting PodSet operator in namespace ${config.namespace}`);

  const kc = new k8s.KubeConfig();
  kc.loadFromDefault();

  controller = createPodSetController(config, kc);
  controller.startWorkers();
  await controller.startWatching();

  if (config.orphanSweepIntervalMinutes > 0) {
    controller.startSweepTimer(config.orphanSweepIntervalMinutes);
  }

  server = new HttpServer(controller, config.httpPort);
  await server.start();

  logger.info("PodSet operator is ready");
}

main().catch((err: unknown) => {
  logger.error(`Failed to start PodSet operator: ${describeError(err)}`);
  process.exit(1);
});
