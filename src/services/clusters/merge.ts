/**
 * Combined view over synced and manually entered clusters.
 *
 * Synced clusters always take precedence: a manual cluster whose
 * (clusterName, site) matches a synced one is left out entirely.
 */

import { dnsLogger } from "../../logger.js";
import { buildConsoleUrl } from "./console-url.js";
import { clusterKey } from "../sync/transformer.js";

import type {
  ClusterView,
  ManualCluster,
  SiteView,
  SyncedCluster,
} from "../../types/index.js";
import type { DnsResolver } from "../dns/resolver.js";
import type { CacheStore } from "../sync/cache-store.js";
import type { ManualClusterStore } from "./manual-store.js";

export interface MergeDependencies {
  cache: Pick<CacheStore, "load" | "getLastUpdated">;
  manualStore: Pick<ManualClusterStore, "list">;
  resolver: Pick<DnsResolver, "resolve" | "resolveMany" | "getStats" | "resetStats">;
}

export interface MergeOptions {
  consoleUrlTemplate: string;
  clock?: () => Date;
}

export function syncedClusterId(clusterName: string, site: string): string {
  return `synced-${clusterKey(clusterName, site)}`;
}

function normalizeAddresses(
  value: string[] | string | null | undefined
): string[] | null | undefined {
  if (typeof value === "string") {
    return value.trim() === "" ? null : [value];
  }
  return value;
}

export class MergeEngine {
  private readonly clock: () => Date;

  constructor(
    private readonly deps: MergeDependencies,
    private readonly options: MergeOptions
  ) {
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Build the site-grouped view. DNS statistics are reset at the start,
   * so the stats logged at the end cover this call only.
   */
  async getCombinedView(): Promise<SiteView[]> {
    const { cache, manualStore, resolver } = this.deps;
    resolver.resetStats();

    const dataset = await cache.load();
    const syncedAt =
      (await cache.getLastUpdated()) ?? this.clock().toISOString();
    const synced = dataset?.clusters ?? [];

    const addresses = await resolver.resolveMany(synced);
    const syncedViews = synced.map((cluster, index) =>
      this.toSyncedView(cluster, addresses[index] ?? null, syncedAt)
    );

    const syncedKeys = new Set(
      synced.map((cluster) => clusterKey(cluster.clusterName, cluster.site))
    );

    const survivors = manualStore
      .list()
      .filter(
        (cluster) => !syncedKeys.has(clusterKey(cluster.clusterName, cluster.site))
      );
    const manualViews = await Promise.all(
      survivors.map((cluster) => this.toManualView(cluster))
    );

    const view = groupBySite([...syncedViews, ...manualViews]);

    dnsLogger.info(
      { ...resolver.getStats(), sites: view.length },
      "Combined view DNS statistics"
    );
    return view;
  }

  private toSyncedView(
    cluster: SyncedCluster,
    loadBalancerIP: string[] | null,
    createdAt: string
  ): ClusterView {
    return {
      id: syncedClusterId(cluster.clusterName, cluster.site),
      clusterName: cluster.clusterName,
      site: cluster.site,
      segments: cluster.segments,
      domainName: cluster.domainName,
      consoleUrl: buildConsoleUrl(
        this.options.consoleUrlTemplate,
        cluster.clusterName,
        cluster.domainName
      ),
      createdAt,
      source: "synced",
      loadBalancerIP,
      metadata: cluster.metadata,
    };
  }

  private async toManualView(cluster: ManualCluster): Promise<ClusterView> {
    let loadBalancerIP = normalizeAddresses(cluster.loadBalancerIP);
    if (loadBalancerIP === undefined || loadBalancerIP === null) {
      loadBalancerIP = await this.deps.resolver.resolve(
        cluster.clusterName,
        cluster.domainName
      );
    }

    return {
      id: cluster.id,
      clusterName: cluster.clusterName,
      site: cluster.site,
      segments: cluster.segments,
      domainName: cluster.domainName,
      consoleUrl: cluster.consoleUrl,
      createdAt: cluster.createdAt,
      source: "manual",
      loadBalancerIP,
      metadata: null,
    };
  }
}

// Insertion order within a site is kept, so synced entries come first
function groupBySite(clusters: ClusterView[]): SiteView[] {
  const bySite = new Map<string, ClusterView[]>();
  for (const cluster of clusters) {
    const list = bySite.get(cluster.site);
    if (list === undefined) {
      bySite.set(cluster.site, [cluster]);
    } else {
      list.push(cluster);
    }
  }

  return [...bySite.keys()].sort().map((site) => {
    const siteClusters = bySite.get(site) ?? [];
    return { site, clusterCount: siteClusters.length, clusters: siteClusters };
  });
}
