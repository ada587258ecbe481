/**
 * Service graph, built once per process and passed to the server and CLI
 */

import { InventoryClient } from "../inventory/client.js";
import { ManualClusterStore } from "./clusters/manual-store.js";
import { MergeEngine } from "./clusters/merge.js";
import { DnsResolver } from "./dns/resolver.js";
import { CacheStore } from "./sync/cache-store.js";
import { SyncOrchestrator } from "./sync/orchestrator.js";

import type { AppConfig } from "../config.js";

export interface Services {
  config: AppConfig;
  inventory: InventoryClient;
  resolver: DnsResolver;
  cache: CacheStore;
  orchestrator: SyncOrchestrator;
  manualStore: ManualClusterStore;
  merge: MergeEngine;
  /** Stops the sync loop and releases the HTTP connection pool */
  close: () => Promise<void>;
}

export function createServices(config: AppConfig): Services {
  const inventory = new InventoryClient({
    baseUrl: config.inventory.url,
    timeoutSeconds: config.inventory.timeoutSeconds,
    tlsVerify: config.inventory.tlsVerify,
  });

  const resolver = new DnsResolver({
    server: config.dns.server,
    timeoutSeconds: config.dns.timeoutSeconds,
    resolutionTemplate: config.dns.resolutionTemplate,
    defaultDomain: config.clusters.defaultDomain,
    concurrency: config.dns.concurrency,
  });

  const cache = new CacheStore(config.cache.file);

  const orchestrator = new SyncOrchestrator(
    { client: inventory, resolver, cache },
    {
      intervalSeconds: config.sync.intervalSeconds,
      clusterPrefix: config.clusters.namePrefix,
      defaultDomain: config.clusters.defaultDomain,
    }
  );

  const manualStore = new ManualClusterStore({
    clusterPrefix: config.clusters.namePrefix,
    defaultDomain: config.clusters.defaultDomain,
    consoleUrlTemplate: config.clusters.consoleUrlTemplate,
    resolver,
  });

  const merge = new MergeEngine(
    { cache, manualStore, resolver },
    { consoleUrlTemplate: config.clusters.consoleUrlTemplate }
  );

  return {
    config,
    inventory,
    resolver,
    cache,
    orchestrator,
    manualStore,
    merge,
    close: async () => {
      await orchestrator.stop();
      await inventory.close();
    },
  };
}
