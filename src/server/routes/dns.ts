/**
 * DNS resolution statistics
 */

import { DnsStatsSchema } from "../../schemas/clusters.js";
import { MessageResponseSchema } from "../schemas/common.js";

import type { ApiServices } from "../app.js";
import type { FastifyInstance } from "fastify";

export function registerDnsRoutes(
  app: FastifyInstance,
  services: Pick<ApiServices, "resolver">
): void {
  const { resolver } = services;

  app.get(
    "/dns/stats",
    {
      schema: {
        summary: "Get DNS resolution statistics",
        description:
          "Request, success and failure counts with total and average lookup time in seconds",
        tags: ["DNS"],
        response: {
          200: DnsStatsSchema,
        },
      },
    },
    () => resolver.getStats()
  );

  app.post(
    "/dns/stats/reset",
    {
      schema: {
        summary: "Reset DNS resolution statistics",
        tags: ["DNS"],
        response: {
          200: MessageResponseSchema,
        },
      },
    },
    () => {
      resolver.resetStats();
      return { status: "success" as const, message: "DNS statistics reset" };
    }
  );
}
