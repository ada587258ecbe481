/**
 * Manual cluster routes
 *
 * CRUD over clusters entered by hand. Synced clusters are read-only and only
 * visible through /sites-combined.
 */

import { Type, type Static } from "@sinclair/typebox";

import { ManualClusterSchema } from "../../schemas/clusters.js";
import { NotFoundError } from "../plugins/error-handler.js";
import { ApiErrorSchema, IdParamSchema, type IdParam } from "../schemas/common.js";

import type { ApiServices } from "../app.js";
import type { FastifyInstance } from "fastify";

// ============================================================================
// Schemas
// ============================================================================

const CreateClusterBodySchema = Type.Object({
  clusterName: Type.String({ minLength: 1 }),
  site: Type.String({ minLength: 1 }),
  segments: Type.Array(Type.String(), { minItems: 1 }),
  domainName: Type.Optional(Type.String()),
  loadBalancerIP: Type.Optional(
    Type.Union([Type.Array(Type.String()), Type.String(), Type.Null()])
  ),
});

type CreateClusterBody = Static<typeof CreateClusterBodySchema>;

// ============================================================================
// Route Registration
// ============================================================================

export function registerClusterRoutes(
  app: FastifyInstance,
  services: Pick<ApiServices, "manualStore">
): void {
  const { manualStore } = services;

  // GET /clusters - All manual clusters
  app.get(
    "/clusters",
    {
      schema: {
        summary: "List manual clusters",
        description:
          "Returns manually entered clusters only. Use /sites-combined for the full view.",
        tags: ["Clusters"],
        response: {
          200: Type.Array(ManualClusterSchema),
        },
      },
    },
    () => manualStore.list()
  );

  // GET /clusters/:id - One manual cluster
  app.get<{ Params: IdParam }>(
    "/clusters/:id",
    {
      schema: {
        summary: "Get a manual cluster",
        tags: ["Clusters"],
        params: IdParamSchema,
        response: {
          200: ManualClusterSchema,
          404: ApiErrorSchema,
        },
      },
    },
    (request) => {
      const cluster = manualStore.get(request.params.id);
      if (cluster === undefined) {
        throw new NotFoundError(`Cluster with ID '${request.params.id}' not found`);
      }
      return cluster;
    }
  );

  // POST /clusters - Create a manual cluster
  app.post<{ Body: CreateClusterBody }>(
    "/clusters",
    {
      schema: {
        summary: "Create a manual cluster",
        description:
          "Validates the name and CIDR segments. Load balancer addresses are " +
          "resolved through DNS when none are given.",
        tags: ["Clusters"],
        body: CreateClusterBodySchema,
        response: {
          201: ManualClusterSchema,
          400: ApiErrorSchema,
          409: ApiErrorSchema,
        },
      },
    },
    async (request, reply) => {
      const cluster = await manualStore.create(request.body);
      return reply.status(201).send(cluster);
    }
  );

  // DELETE /clusters/:id - Remove a manual cluster
  app.delete<{ Params: IdParam }>(
    "/clusters/:id",
    {
      schema: {
        summary: "Delete a manual cluster",
        tags: ["Clusters"],
        params: IdParamSchema,
        response: {
          204: Type.Null(),
          404: ApiErrorSchema,
        },
      },
    },
    async (request, reply) => {
      if (!manualStore.delete(request.params.id)) {
        throw new NotFoundError(`Cluster with ID '${request.params.id}' not found`);
      }
      return reply.status(204).send();
    }
  );
}
