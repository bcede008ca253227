import * as http from "node:http";
import express from "express";
import { INodeHost, IPeerClient, Logger } from "./interfaces";
import { createGatewayRouter } from "./api/gateway-routes";
import { createPeerRouter } from "./api/peer-routes";
import { errorHandler } from "./api/error-middleware";
import { NotFoundError } from "./lib/errors";
import type { DownloadCache } from "./lib/gallery/download-cache";
import type { MediaLibrary } from "./lib/gallery/media-library";
import type { FriendRegistry } from "./lib/registry";
import type { ContentSyncEngine } from "./lib/sync/content-sync-engine";
import type { NodeIdentity } from "./types/common";

export interface NodeHostOptions {
  identity: NodeIdentity; // Port 0 picks a free port on start
  bindAddress?: string; // Interface to listen on, default all
  library: MediaLibrary;
  registry: FriendRegistry;
  client: IPeerClient;
  cache: DownloadCache;
  engine: ContentSyncEngine;
  logger?: Logger;
}

/**
 * HTTP server of a node. Peers call the /peer routes; the local UI calls
 * the /api gateway. Both share one express app and port.
 */
export class NodeHost implements INodeHost {
  private app: express.Application;
  private server: http.Server | null = null;
  private identity: NodeIdentity;
  private bindAddress: string;
  private logger: Logger;

  constructor(options: NodeHostOptions) {
    this.identity = options.identity;
    this.bindAddress = options.bindAddress || "0.0.0.0";

    // Create a default logger that only shows warnings and errors if none provided
    this.logger = options.logger || {
      debug: (): void => {},
      info: (): void => {},
      warn: (message: string, ...args: unknown[]): void => console.warn(message, ...args),
      error: (message: string, ...args: unknown[]): void => console.error(message, ...args),
    };

    this.app = express();
    this.setupRoutes(options);
  }

  private setupRoutes(options: NodeHostOptions): void {
    const identity = (): NodeIdentity => this.identity;

    this.app.use(express.json({ limit: "1mb" }));

    this.app.use(
      "/peer",
      createPeerRouter({ identity, library: options.library, registry: options.registry })
    );

    this.app.use(
      "/api",
      createGatewayRouter({
        identity,
        library: options.library,
        registry: options.registry,
        client: options.client,
        cache: options.cache,
        engine: options.engine,
        logger: this.logger,
      })
    );

    this.app.use((req, _res, next) => {
      next(new NotFoundError(`No route for ${req.method} ${req.path}`));
    });

    this.app.use(errorHandler(this.logger));
  }

  /**
   * Express app, for mounting the node inside another server
   */
  public getApp(): express.Application {
    return this.app;
  }

  public getIdentity(): NodeIdentity {
    return this.identity;
  }

  /**
   * Start the HTTP server
   */
  public async start(): Promise<NodeIdentity> {
    if (this.server) {
      return this.identity;
    }

    return new Promise((resolve, reject) => {
      this.logger.debug(`Starting HTTP server on port ${this.identity.port || "random"}...`);

      const server = this.app.listen(this.identity.port, this.bindAddress, () => {
        const address = server.address();
        if (!address || typeof address === "string") {
          server.close();
          reject(new Error("Invalid server address"));
          return;
        }

        this.server = server;
        this.identity = { ...this.identity, port: address.port };
        this.logger.info(`🌐 Node ${this.identity.peerId} listening on ${this.bindAddress}:${address.port}`);
        resolve(this.identity);
      });

      server.on("error", (error) => {
        reject(error);
      });
    });
  }

  /**
   * Stop the HTTP server
   */
  public async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }

    this.logger.debug("🛑 Stopping HTTP server...");
    await new Promise<void>((resolve, reject) => {
      server.close((err) => {
        if (err) {
          this.logger.error("❌ Error stopping HTTP server:", err);
          reject(err);
        } else {
          this.server = null;
          this.logger.debug("✅ HTTP server stopped");
          resolve();
        }
      });
      server.closeAllConnections();
    });
  }
}
