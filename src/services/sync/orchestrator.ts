import { syncLogger } from "../../logger.js";
import { calculateStats, transformSegmentsToClusters } from "./transformer.js";

import type { InventoryClient } from "../../inventory/client.js";
import type {
  SiteList,
  SyncedDataset,
  SyncStatus,
} from "../../types/index.js";
import type { DnsResolver } from "../dns/resolver.js";
import type { CacheStore } from "./cache-store.js";

// ============================================================================
// Types
// ============================================================================

export interface SyncOrchestratorOptions {
  intervalSeconds: number;
  clusterPrefix: string;
  defaultDomain: string;
}

/** Collaborators, passed in so one graph is built per process */
export interface SyncDependencies {
  client: Pick<
    InventoryClient,
    "fetchAllocatedSegments" | "fetchSites" | "baseUrl"
  >;
  resolver: Pick<DnsResolver, "resolveMany">;
  cache: Pick<CacheStore, "load" | "save" | "getFileInfo">;
}

export function emptyDataset(): SyncedDataset {
  return { clusters: [], sites: [] };
}

// ============================================================================
// Sync Orchestrator
// ============================================================================

/**
 * Periodically pulls segments from the inventory, turns them into clusters
 * and stores the result in the cache. Two states: idle and running.
 *
 * Stopping only prevents the next cycle; a cycle already in flight always
 * runs to completion.
 */
export class SyncOrchestrator {
  private running = false;
  // Bumped by every start(); a loop exits once its own value is stale
  private generation = 0;
  private loop: Promise<void> | undefined;
  private wakeUp: (() => void) | undefined;

  constructor(
    private readonly deps: SyncDependencies,
    private readonly options: SyncOrchestratorOptions,
    private readonly clock: () => Date = () => new Date()
  ) {}

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Begin the sync loop. The first cycle starts immediately, or as soon
   * as a loop that is still stopping has exited.
   */
  start(): void {
    if (this.running) {
      return;
    }

    this.running = true;
    syncLogger.info(
      {
        intervalSeconds: this.options.intervalSeconds,
        inventoryUrl: this.deps.client.baseUrl,
      },
      "Inventory sync service started"
    );
    const generation = ++this.generation;
    const previous = this.loop ?? Promise.resolve();
    this.loop = previous.then(() => this.runLoop(generation));
  }

  /**
   * Stop scheduling cycles. Resolves once the loop has exited, which
   * includes waiting for an in-flight cycle.
   */
  async stop(): Promise<void> {
    if (!this.running) {
      await this.loop;
      return;
    }

    this.running = false;
    this.wakeUp?.();
    const loop = this.loop;
    await loop;
    if (this.loop === loop) {
      this.loop = undefined;
    }
    syncLogger.info("Inventory sync service stopped");
  }

  /**
   * Run one sync cycle and return the resulting dataset.
   *
   * Falls back to the cached dataset when the inventory returns no
   * segments, and to an empty dataset when there is no cache either.
   */
  async syncData(): Promise<SyncedDataset> {
    syncLogger.info("Starting inventory data sync");
    const { client, resolver, cache } = this.deps;

    const [segments, sites] = await Promise.all([
      client.fetchAllocatedSegments(),
      client.fetchSites(),
    ]);

    if (segments.length === 0) {
      syncLogger.warn("No segments fetched, attempting to load from cache");
      const cached = await cache.load();
      if (cached !== null) {
        syncLogger.info("Using cached data");
        return cached;
      }
      syncLogger.error("No cached data available");
      return emptyDataset();
    }

    const clusters = transformSegmentsToClusters(segments, {
      clusterPrefix: this.options.clusterPrefix,
      defaultDomain: this.options.defaultDomain,
    });

    const addresses = await resolver.resolveMany(clusters);
    clusters.forEach((cluster, index) => {
      cluster.loadBalancerIP = addresses[index] ?? null;
    });

    const stats = calculateStats(clusters, sites);
    const data: SyncedDataset = { clusters, sites, stats };

    const saved = await cache.save(data);
    if (!saved) {
      syncLogger.error("Sync result could not be cached");
    }

    syncLogger.info(
      {
        clusters: stats.total_clusters,
        sites: stats.total_sites,
        segments: stats.total_segments,
        resolved: addresses.filter((entry) => entry !== null).length,
      },
      "Sync complete"
    );

    return data;
  }

  /**
   * Cached dataset, or an empty one when nothing is cached
   */
  async loadFromCache(): Promise<SyncedDataset> {
    return (await this.deps.cache.load()) ?? emptyDataset();
  }

  async getStatus(): Promise<SyncStatus> {
    const { exists, modifiedAt } = await this.deps.cache.getFileInfo();

    const cacheAgeMinutes =
      modifiedAt !== null
        ? Math.round(
            ((this.clock().getTime() - modifiedAt.getTime()) / 60_000) * 100
          ) / 100
        : null;

    return {
      serviceRunning: this.running,
      syncIntervalSeconds: this.options.intervalSeconds,
      cacheExists: exists,
      cacheAgeMinutes,
      lastUpdated: modifiedAt?.toISOString() ?? null,
      inventoryUrl: this.deps.client.baseUrl,
    };
  }

  /**
   * Sorted, unique site names from the cache
   */
  async getSites(): Promise<SiteList> {
    const cached = await this.deps.cache.load();
    const sites = [...new Set(cached?.sites ?? [])].sort();
    return { sites, count: sites.length };
  }

  // ==========================================================================
  // Loop
  // ==========================================================================

  private isCurrent(generation: number): boolean {
    return this.running && this.generation === generation;
  }

  private async runLoop(generation: number): Promise<void> {
    while (this.isCurrent(generation)) {
      try {
        await this.syncData();
      } catch (error) {
        syncLogger.error(
          { error: error instanceof Error ? error.message : String(error) },
          "Error in sync loop"
        );
      }

      if (!this.isCurrent(generation)) break;
      await this.waitForNextCycle();
    }
  }

  private waitForNextCycle(): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.wakeUp = undefined;
        resolve();
      }, this.options.intervalSeconds * 1000);

      this.wakeUp = () => {
        clearTimeout(timer);
        this.wakeUp = undefined;
        resolve();
      };
    });
  }
}
