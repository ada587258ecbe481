/**
 * OpenAPI Plugin - Generates OpenAPI 3.0 specification
 */

import swagger from "@fastify/swagger";
import fp from "fastify-plugin";

import type { FastifyInstance } from "fastify";

function openapiPlugin(
  fastify: FastifyInstance,
  _opts: Record<string, unknown>,
  done: () => void
): void {
  void fastify.register(swagger, {
    openapi: {
      openapi: "3.0.3",
      info: {
        title: "Cluster Registry API",
        description:
          "Cluster inventory built from network segments synced from the VLAN Manager, " +
          "combined with manually entered clusters and their DNS-resolved load balancer addresses.",
        version: "1.0.0",
      },
      servers: [
        {
          url: "http://localhost:3000",
          description: "Local development server",
        },
      ],
      tags: [
        {
          name: "Sync",
          description:
            "Cached inventory data, on-demand sync and sync service status",
        },
        {
          name: "Clusters",
          description: "Manual clusters and the combined per-site view",
        },
        {
          name: "DNS",
          description: "Load balancer address resolution statistics",
        },
        {
          name: "Health",
          description: "Liveness",
        },
      ],
    },
  });

  done();
}

export const openapi = fp(openapiPlugin, { name: "openapi" });
