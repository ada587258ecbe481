/**
 * Merged site view over synced and manual clusters
 */

import { Type } from "@sinclair/typebox";

import { SiteViewSchema } from "../../schemas/clusters.js";

import type { ApiServices } from "../app.js";
import type { FastifyInstance } from "fastify";

export function registerCombinedRoutes(
  app: FastifyInstance,
  services: Pick<ApiServices, "merge">
): void {
  // GET /sites-combined - Sites with synced and manual clusters
  app.get(
    "/sites-combined",
    {
      schema: {
        summary: "Get sites with combined cluster data",
        description:
          "Groups synced and manually entered clusters by site. A synced cluster " +
          "replaces any manual cluster with the same name at the same site.",
        tags: ["Clusters"],
        response: {
          200: Type.Array(SiteViewSchema),
        },
      },
    },
    () => services.merge.getCombinedView()
  );
}
