import { describe, it, expect, vi, beforeEach } from "vitest";

const { fetchMock, agentOptions } = vi.hoisted(() => {
  const agentOptions: unknown[] = [];
  return { fetchMock: vi.fn(), agentOptions };
});

vi.mock("undici", () => ({
  fetch: fetchMock,
  Agent: class {
    constructor(options: unknown) {
      agentOptions.push(options);
    }
    close = vi.fn(async () => undefined);
  },
}));

import {
  buildRequestUrl,
  InventoryClient,
} from "../../../src/inventory/client.js";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function createClient(tlsVerify = true): InventoryClient {
  return new InventoryClient({
    baseUrl: "https://inventory.test/api/",
    timeoutSeconds: 5,
    tlsVerify,
  });
}

describe("inventory/client", () => {
  beforeEach(() => {
    fetchMock.mockReset();
    agentOptions.length = 0;
  });

  describe("buildRequestUrl", () => {
    it("should join base URL and endpoint", () => {
      expect(buildRequestUrl("http://inv.test/api/", "sites")).toBe(
        "http://inv.test/api/sites"
      );
    });

    it("should append query parameters", () => {
      expect(
        buildRequestUrl("http://inv.test/api", "/segments", { allocated: true })
      ).toBe("http://inv.test/api/segments?allocated=true");
    });
  });

  it("should disable certificate checks when TLS verification is off", () => {
    createClient(false);

    expect(agentOptions).toEqual([{ connect: { rejectUnauthorized: false } }]);
  });

  describe("fetchAllocatedSegments", () => {
    it("should request allocated segments", async () => {
      fetchMock.mockResolvedValue(
        jsonResponse([
          { segment: "10.0.0.0/24", site: "s1", cluster_name: "ocp4-a" },
        ])
      );

      const segments = await createClient().fetchAllocatedSegments();

      expect(segments).toEqual([
        { segment: "10.0.0.0/24", site: "s1", cluster_name: "ocp4-a" },
      ]);
      expect(fetchMock).toHaveBeenCalledWith(
        "https://inventory.test/api/segments?allocated=true",
        expect.objectContaining({ method: "GET" })
      );
    });

    it("should drop entries that are not objects", async () => {
      fetchMock.mockResolvedValue(
        jsonResponse([{ segment: "10.0.0.0/24" }, "junk", null, 3])
      );

      await expect(createClient().fetchAllocatedSegments()).resolves.toEqual([
        { segment: "10.0.0.0/24" },
      ]);
    });

    it("should return an empty list for a non-array payload", async () => {
      fetchMock.mockResolvedValue(jsonResponse({ segments: [] }));

      await expect(createClient().fetchAllocatedSegments()).resolves.toEqual(
        []
      );
    });

    it("should return an empty list on an error status", async () => {
      fetchMock.mockResolvedValue(jsonResponse({ detail: "down" }, 502));

      await expect(createClient().fetchAllocatedSegments()).resolves.toEqual(
        []
      );
    });
  });

  describe("fetchSites", () => {
    it("should return the site names", async () => {
      fetchMock.mockResolvedValue(jsonResponse({ sites: ["s1", "s2", 7] }));

      await expect(createClient().fetchSites()).resolves.toEqual(["s1", "s2"]);
      expect(fetchMock).toHaveBeenCalledWith(
        "https://inventory.test/api/sites",
        expect.anything()
      );
    });

    it("should return an empty list for an unexpected payload", async () => {
      fetchMock.mockResolvedValue(jsonResponse(["s1"]));

      await expect(createClient().fetchSites()).resolves.toEqual([]);
    });
  });

  describe("fetchFromApi", () => {
    it("should return null on a timeout", async () => {
      fetchMock.mockRejectedValue(
        new DOMException("The operation was aborted due to timeout", "TimeoutError")
      );

      await expect(createClient().fetchFromApi("/sites")).resolves.toBeNull();
    });

    it("should return null on a connection error", async () => {
      fetchMock.mockRejectedValue(new TypeError("fetch failed"));

      await expect(createClient().fetchFromApi("/sites")).resolves.toBeNull();
    });

    it("should return null on invalid JSON", async () => {
      fetchMock.mockResolvedValue(new Response("<html>", { status: 200 }));

      await expect(createClient().fetchFromApi("/sites")).resolves.toBeNull();
    });
  });
});
