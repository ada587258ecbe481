/**
 * HTTP client for the inventory (VLAN Manager) service.
 * Failures are logged and surface as empty results, never as exceptions.
 */

import { Agent, fetch } from "undici";

import { inventoryLogger } from "../logger.js";

import type { InventorySegment } from "../types/index.js";

export type QueryParams = Record<string, string | number | boolean>;

export interface InventoryClientOptions {
  /** Base URL, e.g. `https://vlan-manager.internal/api` */
  baseUrl: string;
  timeoutSeconds: number;
  /** false skips certificate verification (internal deployments) */
  tlsVerify: boolean;
}

/**
 * Build the full request URL from the base URL, an endpoint path and
 * optional query parameters.
 */
export function buildRequestUrl(
  baseUrl: string,
  endpoint: string,
  params?: QueryParams
): string {
  const path = endpoint.startsWith("/") ? endpoint : `/${endpoint}`;
  const url = `${baseUrl.replace(/\/+$/, "")}${path}`;

  if (params === undefined || Object.keys(params).length === 0) {
    return url;
  }

  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    search.set(key, String(value));
  }
  return `${url}?${search.toString()}`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * HTTP client for the VLAN Manager inventory service.
 *
 * Every call degrades to `null` (or an empty list) on transport errors,
 * timeouts and non-2xx responses, so callers never see an exception.
 */
export class InventoryClient {
  private readonly dispatcher: Agent;

  constructor(private readonly options: InventoryClientOptions) {
    this.dispatcher = new Agent({
      connect: { rejectUnauthorized: options.tlsVerify },
    });
  }

  get baseUrl(): string {
    return this.options.baseUrl;
  }

  /**
   * GET an endpoint and decode its JSON body. Returns null on any failure.
   */
  async fetchFromApi(
    endpoint: string,
    params?: QueryParams
  ): Promise<unknown> {
    const url = buildRequestUrl(this.options.baseUrl, endpoint, params);
    const timeoutMs = Math.round(this.options.timeoutSeconds * 1000);

    inventoryLogger.debug(
      { url, tlsVerify: this.options.tlsVerify },
      "Sending request to inventory"
    );

    const startTime = performance.now();
    try {
      const response = await fetch(url, {
        method: "GET",
        headers: { Accept: "application/json" },
        dispatcher: this.dispatcher,
        signal: AbortSignal.timeout(timeoutMs),
      });
      const duration = Math.round(performance.now() - startTime);

      if (!response.ok) {
        inventoryLogger.error(
          {
            url,
            status: response.status,
            statusText: response.statusText,
            duration: `${String(duration)}ms`,
          },
          "Inventory request failed"
        );
        // Drain the body so the connection can be reused
        await response.body?.cancel();
        return null;
      }

      const data = await response.json();
      inventoryLogger.debug(
        { url, status: response.status, duration: `${String(duration)}ms` },
        "Received response from inventory"
      );
      return data;
    } catch (error) {
      const name = error instanceof Error ? error.name : "Error";
      const message = error instanceof Error ? error.message : String(error);

      if (name === "TimeoutError" || name === "AbortError") {
        inventoryLogger.error(
          { url, timeoutMs },
          "Timed out fetching from inventory"
        );
      } else {
        inventoryLogger.error(
          { url, error: message, errorType: name },
          `Failed to fetch from inventory, check that it is reachable at ${this.options.baseUrl}`
        );
      }
      return null;
    }
  }

  /**
   * Fetch allocated (non-released) segments
   */
  async fetchAllocatedSegments(): Promise<InventorySegment[]> {
    const data = await this.fetchFromApi("/segments", { allocated: true });

    if (data === null) {
      return [];
    }
    if (!Array.isArray(data)) {
      inventoryLogger.error(
        { received: typeof data },
        "Unexpected segments payload, expected an array"
      );
      return [];
    }

    const segments = data.filter(isRecord);
    if (segments.length !== data.length) {
      inventoryLogger.debug(
        { dropped: data.length - segments.length },
        "Dropped non-object segment entries"
      );
    }

    inventoryLogger.info(
      { segmentCount: segments.length },
      "Fetched allocated segments"
    );
    return segments;
  }

  /**
   * Fetch the list of known site names
   */
  async fetchSites(): Promise<string[]> {
    const data = await this.fetchFromApi("/sites");

    if (!isRecord(data) || !Array.isArray(data.sites)) {
      if (data !== null) {
        inventoryLogger.error("Unexpected sites payload, expected { sites }");
      }
      return [];
    }

    const sites = data.sites.filter(
      (site): site is string => typeof site === "string"
    );
    inventoryLogger.info({ siteCount: sites.length }, "Fetched sites");
    return sites;
  }

  async close(): Promise<void> {
    await this.dispatcher.close();
  }
}
