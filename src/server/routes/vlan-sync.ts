/**
 * Inventory sync routes
 *
 * Read the cached dataset, trigger an on-demand sync and report the
 * state of the background sync loop.
 */

import { Type } from "@sinclair/typebox";

import { SyncedDatasetSchema } from "../../schemas/clusters.js";
import { NoDataError, SyncError } from "../plugins/error-handler.js";
import { ApiErrorSchema } from "../schemas/common.js";

import type { ApiServices } from "../app.js";
import type { FastifyInstance } from "fastify";

// ============================================================================
// Schemas
// ============================================================================

const SyncResponseSchema = Type.Object({
  status: Type.Literal("success"),
  message: Type.String(),
  data: SyncedDatasetSchema,
});

const SyncStatusSchema = Type.Object({
  serviceRunning: Type.Boolean(),
  syncIntervalSeconds: Type.Number(),
  cacheExists: Type.Boolean(),
  cacheAgeMinutes: Type.Union([Type.Number(), Type.Null()]),
  lastUpdated: Type.Union([Type.String({ format: "date-time" }), Type.Null()]),
  inventoryUrl: Type.String(),
});

const SiteListSchema = Type.Object({
  sites: Type.Array(Type.String()),
  count: Type.Number(),
});

// ============================================================================
// Route Registration
// ============================================================================

export function registerVlanSyncRoutes(
  app: FastifyInstance,
  services: Pick<ApiServices, "orchestrator" | "cache">
): void {
  const { orchestrator, cache } = services;

  // GET /vlan-sync/data - Latest cached dataset
  app.get(
    "/vlan-sync/data",
    {
      schema: {
        summary: "Get synced inventory data",
        description:
          "Returns the clusters, sites and statistics from the last successful sync",
        tags: ["Sync"],
        response: {
          200: SyncedDatasetSchema,
          503: ApiErrorSchema,
        },
      },
    },
    async () => {
      const data = await cache.load();
      if (data === null) {
        throw new NoDataError(
          "Inventory data not available and no cache exists"
        );
      }
      return data;
    }
  );

  // POST /vlan-sync/sync - Run one sync cycle now
  app.post(
    "/vlan-sync/sync",
    {
      schema: {
        summary: "Trigger a sync",
        description:
          "Runs one sync cycle immediately instead of waiting for the schedule",
        tags: ["Sync"],
        response: {
          200: SyncResponseSchema,
          500: ApiErrorSchema,
        },
      },
    },
    async () => {
      try {
        const data = await orchestrator.syncData();
        return {
          status: "success" as const,
          message: "Sync completed successfully",
          data,
        };
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new SyncError(`Sync failed: ${message}`);
      }
    }
  );

  // GET /vlan-sync/status - Background loop and cache state
  app.get(
    "/vlan-sync/status",
    {
      schema: {
        summary: "Get sync service status",
        tags: ["Sync"],
        response: {
          200: SyncStatusSchema,
        },
      },
    },
    () => orchestrator.getStatus()
  );

  // GET /vlan-sync/sites - Unique site names from the cache
  app.get(
    "/vlan-sync/sites",
    {
      schema: {
        summary: "List inventory sites",
        tags: ["Sync"],
        response: {
          200: SiteListSchema,
        },
      },
    },
    () => orchestrator.getSites()
  );
}
