import { describe, it, expect, vi } from "vitest";

import {
  ConflictError,
  ValidationError,
} from "../../../../src/server/plugins/error-handler.js";
import { ManualClusterStore } from "../../../../src/services/clusters/manual-store.js";

function createStore(addresses: string[] | null = ["192.0.2.20"]) {
  const resolver = {
    resolve: vi
      .fn<(clusterName: string, domainName?: string | null) => Promise<string[] | null>>()
      .mockResolvedValue(addresses),
  };
  let nextId = 0;
  const store = new ManualClusterStore({
    clusterPrefix: "ocp4-",
    defaultDomain: "example.com",
    consoleUrlTemplate:
      "https://console-openshift-console.apps.{cluster_name}.{domain_name}",
    resolver,
    clock: () => new Date("2025-03-01T12:00:00.000Z"),
    generateId: () => `id-${String(++nextId)}`,
  });
  return { store, resolver };
}

const input = {
  clusterName: "OCP4-Lab",
  site: "site-a",
  segments: ["10.10.0.0/24"],
};

describe("services/clusters/manual-store", () => {
  describe("create", () => {
    it("should stamp id, timestamp, console URL and source", async () => {
      const { store } = createStore();

      await expect(store.create(input)).resolves.toEqual({
        id: "id-1",
        clusterName: "ocp4-lab",
        site: "site-a",
        segments: ["10.10.0.0/24"],
        domainName: "example.com",
        consoleUrl:
          "https://console-openshift-console.apps.ocp4-lab.example.com",
        createdAt: "2025-03-01T12:00:00.000Z",
        source: "manual",
        loadBalancerIP: ["192.0.2.20"],
      });
    });

    it("should resolve addresses against the given domain", async () => {
      const { store, resolver } = createStore();

      await store.create({ ...input, domainName: "corp.test" });

      expect(resolver.resolve).toHaveBeenCalledWith("ocp4-lab", "corp.test");
    });

    it("should keep supplied addresses without resolving", async () => {
      const { store, resolver } = createStore();

      const cluster = await store.create({
        ...input,
        loadBalancerIP: "192.0.2.99",
      });

      expect(cluster.loadBalancerIP).toEqual(["192.0.2.99"]);
      expect(resolver.resolve).not.toHaveBeenCalled();
    });

    it("should store null when the name does not resolve", async () => {
      const { store } = createStore(null);

      const cluster = await store.create(input);
      expect(cluster.loadBalancerIP).toBeNull();
    });

    it("should reject a name without the prefix", async () => {
      const { store } = createStore();

      await expect(
        store.create({ ...input, clusterName: "legacy-lab" })
      ).rejects.toBeInstanceOf(ValidationError);
    });

    it("should reject a name with invalid characters", async () => {
      const { store } = createStore();

      await expect(
        store.create({ ...input, clusterName: "ocp4-lab_01" })
      ).rejects.toThrow("Cluster name must be lowercase alphanumeric");
    });

    it("should reject invalid segments", async () => {
      const { store } = createStore();

      await expect(
        store.create({ ...input, segments: ["10.10.0.0/24", "10.10.0.0/40"] })
      ).rejects.toMatchObject({
        code: "VALIDATION_ERROR",
        details: { invalidSegments: ["10.10.0.0/40"] },
      });
    });

    it("should reject a duplicate name at the same site", async () => {
      const { store } = createStore();
      await store.create(input);

      await expect(store.create(input)).rejects.toBeInstanceOf(ConflictError);
    });

    it("should allow the same name at another site", async () => {
      const { store } = createStore();
      await store.create(input);

      await expect(
        store.create({ ...input, site: "site-b" })
      ).resolves.toMatchObject({ id: "id-2", site: "site-b" });
    });
  });

  describe("get, list, delete and exists", () => {
    it("should find created clusters", async () => {
      const { store } = createStore();
      const created = await store.create(input);

      expect(store.get("id-1")).toEqual(created);
      expect(store.list()).toEqual([created]);
      expect(store.exists("OCP4-LAB", "site-a")).toBe(true);
      expect(store.exists("ocp4-lab", "site-b")).toBe(false);
    });

    it("should delete by id", async () => {
      const { store } = createStore();
      await store.create(input);

      expect(store.delete("id-1")).toBe(true);
      expect(store.delete("id-1")).toBe(false);
      expect(store.get("id-1")).toBeUndefined();
      expect(store.list()).toEqual([]);
    });
  });
});
