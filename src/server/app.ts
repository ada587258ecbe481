import cors from "@fastify/cors";
import Fastify, { type FastifyInstance } from "fastify";

import { fastifyLoggerConfig } from "../logger.js";
import { errorHandler } from "./plugins/error-handler.js";
import { openapi } from "./plugins/openapi.js";
import { registerApiRoutes } from "./routes/index.js";

import type { ManualClusterStore } from "../services/clusters/manual-store.js";
import type { MergeEngine } from "../services/clusters/merge.js";
import type { DnsResolver } from "../services/dns/resolver.js";
import type { CacheStore } from "../services/sync/cache-store.js";
import type { SyncOrchestrator } from "../services/sync/orchestrator.js";

/** What the HTTP layer needs from the service graph */
export interface ApiServices {
  orchestrator: Pick<SyncOrchestrator, "syncData" | "getStatus" | "getSites">;
  cache: Pick<CacheStore, "load">;
  merge: Pick<MergeEngine, "getCombinedView">;
  resolver: Pick<DnsResolver, "getStats" | "resetStats">;
  manualStore: Pick<ManualClusterStore, "create" | "get" | "list" | "delete">;
}

export interface BuildServerOptions {
  /** Set false to keep request logs out of test output */
  logger?: boolean;
}

export async function buildServer(
  services: ApiServices,
  options: BuildServerOptions = {}
): Promise<FastifyInstance> {
  const app = Fastify({
    logger: options.logger === false ? false : fastifyLoggerConfig,
  });

  // Register plugins
  await app.register(cors, {
    origin: true,
  });

  // Register OpenAPI (must be before routes)
  await app.register(openapi);

  // Register error handler
  await app.register(errorHandler);

  // Register API routes
  await registerApiRoutes(app, services);

  // OpenAPI document endpoint
  app.get("/openapi.json", { schema: { hide: true } }, () => app.swagger());

  return app;
}
