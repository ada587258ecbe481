/**
 * Segment-to-cluster transformation
 *
 * Groups inventory segments into clusters keyed by (cluster name, site).
 * No I/O; skipped names are only logged at trace level.
 */

import { syncLogger } from "../../logger.js";

import type {
  ClusterMetadata,
  InventorySegment,
  SyncedCluster,
  SyncStats,
} from "../../types/index.js";

export interface TransformOptions {
  /** Required lowercase name prefix, e.g. "ocp4-" */
  clusterPrefix: string;
  defaultDomain: string;
}

/**
 * Lowercase and trim a cluster name
 */
export function normalizeClusterName(clusterName: string): string {
  return clusterName.toLowerCase().trim();
}

/**
 * A name is valid when its normalized form starts with the prefix
 */
export function isValidClusterName(
  clusterName: string,
  prefix: string
): boolean {
  return normalizeClusterName(clusterName).startsWith(prefix.toLowerCase());
}

/**
 * Composite identity of a cluster
 */
export function clusterKey(clusterName: string, site: string): string {
  return `${clusterName}@${site}`;
}

function readText(value: unknown): string | undefined {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed === "" ? undefined : trimmed;
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  return undefined;
}

// The inventory flags released segments as a boolean, 1 or "true"
export function isReleased(value: unknown): boolean {
  if (typeof value === "string") {
    return ["true", "1", "yes"].includes(value.trim().toLowerCase());
  }
  return value === true || value === 1;
}

function addUnique(list: string[], value: string | undefined): void {
  if (value !== undefined && !list.includes(value)) {
    list.push(value);
  }
}

function emptyMetadata(): ClusterMetadata {
  return { vlan_ids: [], epg_names: [], vrfs: [] };
}

/**
 * Transform inventory segments into clusters.
 *
 * - segments missing a cluster name, site or CIDR are skipped
 * - released segments are skipped
 * - comma-joined names fan out to one cluster each
 * - names without the required prefix are dropped, siblings are kept
 *
 * Output follows first-seen order of each (name, site) key.
 */
export function transformSegmentsToClusters(
  segments: readonly InventorySegment[],
  options: TransformOptions
): SyncedCluster[] {
  const clustersByKey = new Map<string, SyncedCluster>();

  for (const segment of segments) {
    const rawNames = readText(segment.cluster_name);
    const site = readText(segment.site);
    const cidr = readText(segment.segment);

    if (rawNames === undefined || site === undefined || cidr === undefined) {
      continue;
    }
    if (isReleased(segment.released)) {
      continue;
    }

    for (const part of rawNames.split(",")) {
      if (part.trim() === "") continue;

      if (!isValidClusterName(part, options.clusterPrefix)) {
        syncLogger.trace(
          { clusterName: part.trim(), prefix: options.clusterPrefix },
          "Skipping cluster without required prefix"
        );
        continue;
      }

      const clusterName = normalizeClusterName(part);
      const key = clusterKey(clusterName, site);

      let cluster = clustersByKey.get(key);
      if (cluster === undefined) {
        cluster = {
          clusterName,
          site,
          segments: [],
          domainName: options.defaultDomain,
          source: "synced",
          metadata: emptyMetadata(),
        };
        clustersByKey.set(key, cluster);
      }

      addUnique(cluster.segments, cidr);
      addUnique(cluster.metadata.vlan_ids, readText(segment.vlan_id));
      addUnique(cluster.metadata.epg_names, readText(segment.epg_name));
      addUnique(cluster.metadata.vrfs, readText(segment.vrf));
    }
  }

  return [...clustersByKey.values()];
}

/**
 * Summary counts stored alongside the synced dataset
 */
export function calculateStats(
  clusters: readonly SyncedCluster[],
  sites: readonly string[]
): SyncStats {
  return {
    total_clusters: clusters.length,
    total_sites: sites.length,
    total_segments: clusters.reduce(
      (total, cluster) => total + cluster.segments.length,
      0
    ),
  };
}
