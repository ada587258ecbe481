/**
 * Domain types for the cluster registry
 */

// ============================================================================
// Inventory (VLAN Manager) Types
// ============================================================================

/**
 * Raw network segment as returned by `GET /segments?allocated=true`.
 * Only `segment`, `site` and `cluster_name` are needed to build a cluster;
 * everything else is optional metadata. Fields stay `unknown` because the
 * inventory payload is only checked structurally.
 */
export interface InventorySegment {
  /** CIDR, e.g. "10.0.0.0/24" */
  segment?: unknown;
  site?: unknown;
  /** May hold several names joined by commas */
  cluster_name?: unknown;
  released?: unknown;
  vlan_id?: unknown;
  epg_name?: unknown;
  vrf?: unknown;
  [key: string]: unknown;
}

// ============================================================================
// Cluster Types
// ============================================================================

export type ClusterSource = "synced" | "manual";

export interface ClusterMetadata {
  vlan_ids: string[];
  epg_names: string[];
  vrfs: string[];
}

/**
 * A cluster built from inventory segments. Identity is the pair
 * (clusterName, site); the same name may exist at several sites.
 */
export interface SyncedCluster {
  clusterName: string;
  site: string;
  segments: string[];
  domainName: string;
  source: ClusterSource;
  metadata: ClusterMetadata;
  loadBalancerIP?: string[] | null;
}

export interface ManualCluster {
  id: string;
  clusterName: string;
  site: string;
  segments: string[];
  domainName: string;
  consoleUrl: string;
  createdAt: string;
  source: ClusterSource;
  /** Older entries may carry a single address as a plain string */
  loadBalancerIP?: string[] | string | null;
}

export interface NewManualCluster {
  clusterName: string;
  site: string;
  segments: string[];
  domainName?: string;
  loadBalancerIP?: string[] | string | null;
}

// ============================================================================
// Synced Dataset & Cache File
// ============================================================================

export interface SyncStats {
  total_clusters: number;
  total_sites: number;
  total_segments: number;
}

export interface SyncedDataset {
  clusters: SyncedCluster[];
  sites: string[];
  stats?: SyncStats;
}

export interface CacheFile {
  last_updated: string;
  data: SyncedDataset;
}

// ============================================================================
// Merged View
// ============================================================================

export interface ClusterView {
  id: string;
  clusterName: string;
  site: string;
  segments: string[];
  domainName: string;
  consoleUrl: string;
  createdAt: string;
  source: ClusterSource;
  loadBalancerIP: string[] | null;
  metadata: ClusterMetadata | null;
}

export interface SiteView {
  site: string;
  clusterCount: number;
  clusters: ClusterView[];
}

// ============================================================================
// DNS & Status
// ============================================================================

export interface DnsStats {
  request_count: number;
  success_count: number;
  failure_count: number;
  total_time_seconds: number;
  average_time_seconds: number;
}

export interface SyncStatus {
  serviceRunning: boolean;
  syncIntervalSeconds: number;
  cacheExists: boolean;
  cacheAgeMinutes: number | null;
  lastUpdated: string | null;
  inventoryUrl: string;
}

export interface SiteList {
  sites: string[];
  count: number;
}
