/**
 * TypeBox schemas for clusters and the synced dataset.
 * Shared by the cache store (structural checks on load) and the HTTP API.
 */

import { Type } from "@sinclair/typebox";

export const ClusterSourceSchema = Type.Union([
  Type.Literal("synced"),
  Type.Literal("manual"),
]);

export const ClusterMetadataSchema = Type.Object({
  vlan_ids: Type.Array(Type.String()),
  epg_names: Type.Array(Type.String()),
  vrfs: Type.Array(Type.String()),
});

export const LoadBalancerIpSchema = Type.Union([
  Type.Array(Type.String()),
  Type.Null(),
]);

export const SyncedClusterSchema = Type.Object({
  clusterName: Type.String(),
  site: Type.String(),
  segments: Type.Array(Type.String()),
  domainName: Type.String(),
  source: ClusterSourceSchema,
  metadata: ClusterMetadataSchema,
  loadBalancerIP: Type.Optional(LoadBalancerIpSchema),
});

export const SyncStatsSchema = Type.Object({
  total_clusters: Type.Number(),
  total_sites: Type.Number(),
  total_segments: Type.Number(),
});

export const SyncedDatasetSchema = Type.Object({
  clusters: Type.Array(SyncedClusterSchema),
  sites: Type.Array(Type.String()),
  stats: Type.Optional(SyncStatsSchema),
});

export const CacheFileSchema = Type.Object({
  last_updated: Type.String(),
  data: SyncedDatasetSchema,
});

export const ClusterViewSchema = Type.Object({
  id: Type.String(),
  clusterName: Type.String(),
  site: Type.String(),
  segments: Type.Array(Type.String()),
  domainName: Type.String(),
  consoleUrl: Type.String(),
  createdAt: Type.String(),
  source: ClusterSourceSchema,
  loadBalancerIP: LoadBalancerIpSchema,
  metadata: Type.Union([ClusterMetadataSchema, Type.Null()]),
});

export const SiteViewSchema = Type.Object({
  site: Type.String(),
  clusterCount: Type.Number(),
  clusters: Type.Array(ClusterViewSchema),
});

export const ManualClusterSchema = Type.Object({
  id: Type.String(),
  clusterName: Type.String(),
  site: Type.String(),
  segments: Type.Array(Type.String()),
  domainName: Type.String(),
  consoleUrl: Type.String(),
  createdAt: Type.String(),
  source: ClusterSourceSchema,
  loadBalancerIP: Type.Optional(
    Type.Union([Type.Array(Type.String()), Type.String(), Type.Null()])
  ),
});

export const DnsStatsSchema = Type.Object({
  request_count: Type.Number(),
  success_count: Type.Number(),
  failure_count: Type.Number(),
  total_time_seconds: Type.Number(),
  average_time_seconds: Type.Number(),
});
