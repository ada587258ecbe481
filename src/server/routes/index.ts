/**
 * API Routes Registration
 */

import { Type } from "@sinclair/typebox";

import { registerClusterRoutes } from "./clusters.js";
import { registerCombinedRoutes } from "./combined.js";
import { registerDnsRoutes } from "./dns.js";
import { registerVlanSyncRoutes } from "./vlan-sync.js";

import type { ApiServices } from "../app.js";
import type { FastifyInstance } from "fastify";

// Health check response schema
const HealthResponseSchema = Type.Object(
  {
    status: Type.Literal("ok"),
  },
  {
    examples: [{ status: "ok" }],
  }
);

/**
 * Register all API routes
 */
export async function registerApiRoutes(
  app: FastifyInstance,
  services: ApiServices
): Promise<void> {
  // Health check (no prefix)
  app.get(
    "/health",
    {
      schema: {
        summary: "Health check",
        description: "Returns the health status of the API",
        tags: ["Health"],
        response: {
          200: HealthResponseSchema,
        },
      },
    },
    () => ({ status: "ok" as const })
  );

  await app.register(
    (api) => {
      registerVlanSyncRoutes(api, services);
      registerCombinedRoutes(api, services);
      registerClusterRoutes(api, services);
      registerDnsRoutes(api, services);
    },
    { prefix: "/api" }
  );
}
