import express, { type NextFunction, type Request, type Response } from "express";
import type { Server } from "node:http";
import logger from "../utils/logger.js";

// Anything that can report whether it is ready to serve
export interface ReadinessSource {
  isReady(): boolean;
}

export class HttpServer {
  private app: express.Application;
  private readiness: ReadinessSource;
  private port: number;
  private server: Server | null = null;

  constructor(readiness: ReadinessSource, port: number = 8080) {
    this.app = express();
    this.readiness = readiness;
    this.port = port;

    this.setupMiddleware();
    this.setupRoutes();
  }

  private setupMiddleware() {
    // Health checks hit these endpoints every few seconds, keep them out of info logs
    this.app.use((req: Request, res: Response, next: NextFunction) => {
      logger.debug(`${req.method} ${req.path}`);
      next();
    });
  }

  private setupRoutes() {
    // Health check endpoints
    this.app.get("/healthz", (req: Request, res: Response) => {
      res.status(200).send("OK");
    });

    this.app.get("/readyz", (req: Request, res: Response) => {
      if (!this.readiness.isReady()) {
        res.status(503).send("Not Ready");
        return;
      }
      res.status(200).send("Ready");
    });
  }

  /**
   * Start listening; resolves with the bound port (useful when port is 0)
   */
  start() {
    return new Promise<number>((resolve, reject) => {
      const server = this.app.listen(this.port, () => {
        const address = server.address();
        const port =
          address !== null && typeof address === "object" ? address.port : this.port;
        logger.info(`HTTP server listening on port ${port}`);
        resolve(port);
      });
      server.on("error", reject);
      this.server = server;
    });
  }

  stop() {
    return new Promise<void>((resolve, reject) => {
      const server = this.server;
      if (!server) {
        resolve();
        return;
      }
      this.server = null;
      server.close((err) => (err ? reject(err) : resolve()));
    });
  }
}
