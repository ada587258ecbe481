import { describe, it, expect, vi, beforeAll, afterAll, beforeEach } from "vitest";

import { buildServer, type ApiServices } from "../../../../src/server/app.js";
import { ManualClusterStore } from "../../../../src/services/clusters/manual-store.js";
import { sampleDataset } from "../../../fixtures/segments.js";

import type {
  DnsStats,
  SiteList,
  SiteView,
  SyncedDataset,
  SyncStatus,
} from "../../../../src/types/index.js";
import type { FastifyInstance } from "fastify";

const status: SyncStatus = {
  serviceRunning: true,
  syncIntervalSeconds: 300,
  cacheExists: true,
  cacheAgeMinutes: 2.5,
  lastUpdated: "2025-03-01T12:00:00.000Z",
  inventoryUrl: "http://inventory.test/api",
};

const dnsStats: DnsStats = {
  request_count: 4,
  success_count: 3,
  failure_count: 1,
  total_time_seconds: 0.5,
  average_time_seconds: 0.125,
};

const combinedView: SiteView[] = [
  {
    site: "site-a",
    clusterCount: 1,
    clusters: [
      {
        id: "synced-ocp4-alpha@site-a",
        clusterName: "ocp4-alpha",
        site: "site-a",
        segments: ["10.0.0.0/24"],
        domainName: "example.com",
        consoleUrl: "https://console.apps.ocp4-alpha.example.com",
        createdAt: "2025-03-01T12:00:00.000Z",
        source: "synced",
        loadBalancerIP: ["192.0.2.10"],
        metadata: { vlan_ids: ["100"], epg_names: [], vrfs: [] },
      },
    ],
  },
];

function createServices() {
  const orchestrator = {
    syncData: vi.fn<() => Promise<SyncedDataset>>(),
    getStatus: vi.fn<() => Promise<SyncStatus>>(),
    getSites: vi.fn<() => Promise<SiteList>>(),
  };
  const cache = { load: vi.fn<() => Promise<SyncedDataset | null>>() };
  const merge = { getCombinedView: vi.fn<() => Promise<SiteView[]>>() };
  const resolver = {
    getStats: vi.fn(() => dnsStats),
    resetStats: vi.fn(),
  };
  let nextId = 0;
  const manualStore = new ManualClusterStore({
    clusterPrefix: "ocp4-",
    defaultDomain: "example.com",
    consoleUrlTemplate: "https://console.apps.{cluster_name}.{domain_name}",
    resolver: { resolve: vi.fn(async () => ["192.0.2.30"]) },
    clock: () => new Date("2025-03-01T12:00:00.000Z"),
    generateId: () => `id-${String(++nextId)}`,
  });

  const services: ApiServices = {
    orchestrator,
    cache,
    merge,
    resolver,
    manualStore,
  };
  return { services, orchestrator, cache, merge, resolver, manualStore };
}

describe("server/routes", () => {
  let app: FastifyInstance;
  let fakes: ReturnType<typeof createServices>;

  beforeAll(async () => {
    fakes = createServices();
    app = await buildServer(fakes.services, { logger: false });
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe("GET /health", () => {
    it("should return ok", async () => {
      const response = await app.inject({ method: "GET", url: "/health" });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ status: "ok" });
    });
  });

  describe("GET /api/vlan-sync/data", () => {
    it("should return the cached dataset", async () => {
      fakes.cache.load.mockResolvedValueOnce(sampleDataset);

      const response = await app.inject({
        method: "GET",
        url: "/api/vlan-sync/data",
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual(sampleDataset);
    });

    it("should return 503 without a cache", async () => {
      fakes.cache.load.mockResolvedValueOnce(null);

      const response = await app.inject({
        method: "GET",
        url: "/api/vlan-sync/data",
      });

      expect(response.statusCode).toBe(503);
      expect(response.json()).toMatchObject({
        error: "NO_DATA",
        message: "Inventory data not available and no cache exists",
      });
    });
  });

  describe("POST /api/vlan-sync/sync", () => {
    it("should run a sync and return its data", async () => {
      fakes.orchestrator.syncData.mockResolvedValueOnce(sampleDataset);

      const response = await app.inject({
        method: "POST",
        url: "/api/vlan-sync/sync",
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        status: "success",
        message: "Sync completed successfully",
        data: sampleDataset,
      });
    });

    it("should report a failed sync", async () => {
      fakes.orchestrator.syncData.mockRejectedValueOnce(new Error("disk full"));

      const response = await app.inject({
        method: "POST",
        url: "/api/vlan-sync/sync",
      });

      expect(response.statusCode).toBe(500);
      expect(response.json()).toMatchObject({
        error: "SYNC_FAILED",
        message: "Sync failed: disk full",
      });
    });
  });

  describe("GET /api/vlan-sync/status", () => {
    it("should return the status report", async () => {
      fakes.orchestrator.getStatus.mockResolvedValueOnce(status);

      const response = await app.inject({
        method: "GET",
        url: "/api/vlan-sync/status",
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual(status);
    });
  });

  describe("GET /api/vlan-sync/sites", () => {
    it("should return the site list", async () => {
      fakes.orchestrator.getSites.mockResolvedValueOnce({
        sites: ["site-a", "site-b"],
        count: 2,
      });

      const response = await app.inject({
        method: "GET",
        url: "/api/vlan-sync/sites",
      });

      expect(response.json()).toEqual({ sites: ["site-a", "site-b"], count: 2 });
    });
  });

  describe("GET /api/sites-combined", () => {
    it("should return the merged view", async () => {
      fakes.merge.getCombinedView.mockResolvedValueOnce(combinedView);

      const response = await app.inject({
        method: "GET",
        url: "/api/sites-combined",
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual(combinedView);
    });
  });

  describe("DNS statistics", () => {
    it("should return the current statistics", async () => {
      const response = await app.inject({
        method: "GET",
        url: "/api/dns/stats",
      });

      expect(response.json()).toEqual(dnsStats);
    });

    it("should reset the statistics", async () => {
      const response = await app.inject({
        method: "POST",
        url: "/api/dns/stats/reset",
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        status: "success",
        message: "DNS statistics reset",
      });
      expect(fakes.resolver.resetStats).toHaveBeenCalledTimes(1);
    });
  });

  describe("manual clusters", () => {
    it("should create, read, list and delete a cluster", async () => {
      const created = await app.inject({
        method: "POST",
        url: "/api/clusters",
        payload: {
          clusterName: "ocp4-lab",
          site: "site-a",
          segments: ["10.10.0.0/24"],
        },
      });

      expect(created.statusCode).toBe(201);
      expect(created.json()).toEqual({
        id: "id-1",
        clusterName: "ocp4-lab",
        site: "site-a",
        segments: ["10.10.0.0/24"],
        domainName: "example.com",
        consoleUrl: "https://console.apps.ocp4-lab.example.com",
        createdAt: "2025-03-01T12:00:00.000Z",
        source: "manual",
        loadBalancerIP: ["192.0.2.30"],
      });

      const fetched = await app.inject({ method: "GET", url: "/api/clusters/id-1" });
      expect(fetched.json()).toMatchObject({ id: "id-1", clusterName: "ocp4-lab" });

      const list = await app.inject({ method: "GET", url: "/api/clusters" });
      expect(list.json()).toHaveLength(1);

      const deleted = await app.inject({
        method: "DELETE",
        url: "/api/clusters/id-1",
      });
      expect(deleted.statusCode).toBe(204);

      const missing = await app.inject({ method: "GET", url: "/api/clusters/id-1" });
      expect(missing.statusCode).toBe(404);
      expect(missing.json()).toMatchObject({
        error: "NOT_FOUND",
        message: "Cluster with ID 'id-1' not found",
      });
    });

    it("should reject a duplicate cluster with 409", async () => {
      const payload = {
        clusterName: "ocp4-dup",
        site: "site-a",
        segments: ["10.20.0.0/24"],
      };
      await app.inject({ method: "POST", url: "/api/clusters", payload });

      const response = await app.inject({
        method: "POST",
        url: "/api/clusters",
        payload,
      });

      expect(response.statusCode).toBe(409);
      expect(response.json()).toMatchObject({ error: "CONFLICT" });
    });

    it("should reject an invalid segment with 400", async () => {
      const response = await app.inject({
        method: "POST",
        url: "/api/clusters",
        payload: {
          clusterName: "ocp4-bad",
          site: "site-a",
          segments: ["not-a-cidr"],
        },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({
        error: "VALIDATION_ERROR",
        details: { invalidSegments: ["not-a-cidr"] },
      });
    });

    it("should reject a body missing required fields", async () => {
      const response = await app.inject({
        method: "POST",
        url: "/api/clusters",
        payload: { clusterName: "ocp4-x" },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({
        error: "VALIDATION_ERROR",
        message: "Invalid request parameters",
      });
    });

    it("should return 404 when deleting an unknown cluster", async () => {
      const response = await app.inject({
        method: "DELETE",
        url: "/api/clusters/nope",
      });

      expect(response.statusCode).toBe(404);
    });
  });

  describe("GET /openapi.json", () => {
    it("should describe the API", async () => {
      const response = await app.inject({ method: "GET", url: "/openapi.json" });

      expect(response.statusCode).toBe(200);
      const document = response.json();
      expect(document.info.title).toBe("Cluster Registry API");
      expect(Object.keys(document.paths)).toContain("/api/sites-combined");
    });
  });
});
