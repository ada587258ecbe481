/**
 * Load balancer address resolution via DNS
 */

import { Resolver } from "node:dns/promises";

import PQueue from "p-queue";

import { dnsLogger } from "../../logger.js";
import { renderTemplate } from "../../utils/template.js";
import { normalizeClusterName } from "../sync/transformer.js";

import type { DnsStats } from "../../types/index.js";

/** Returns every A record for a hostname */
export type AddressLookup = (hostname: string) => Promise<string[]>;

export interface DnsResolverOptions {
  server: string;
  timeoutSeconds: number;
  /** Hostname template with {cluster_name} and {domain_name} placeholders */
  resolutionTemplate: string;
  defaultDomain: string;
  concurrency?: number;
  /** Replaces the resolver bound to `server`; used by tests */
  lookup?: AddressLookup;
}

export interface ResolveTarget {
  clusterName: string;
  domainName?: string | null;
}

// Answers meaning "this name has no address right now"
const NO_ADDRESS_CODES = new Set(["ENOTFOUND", "ENODATA", "ETIMEOUT"]);

function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    const { code } = error;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

export class DnsResolver {
  private readonly lookup: AddressLookup;
  private readonly concurrency: number;

  private requestCount = 0;
  private successCount = 0;
  private failureCount = 0;
  private totalTimeSeconds = 0;

  constructor(private readonly options: DnsResolverOptions) {
    this.concurrency = options.concurrency ?? 10;

    if (options.lookup !== undefined) {
      this.lookup = options.lookup;
    } else {
      // One try per lookup: DNS failures are never retried
      const resolver = new Resolver({
        timeout: Math.round(options.timeoutSeconds * 1000),
        tries: 1,
      });
      resolver.setServers([options.server]);
      this.lookup = (hostname) => resolver.resolve4(hostname);
    }
  }

  buildHostname(clusterName: string, domainName?: string | null): string {
    const domain =
      domainName !== undefined && domainName !== null && domainName !== ""
        ? domainName
        : this.options.defaultDomain;
    return renderTemplate(
      this.options.resolutionTemplate,
      normalizeClusterName(clusterName),
      domain
    );
  }

  /**
   * Resolve every address for a cluster's load balancer.
   * Returns null when the name has no address or the lookup fails.
   */
  async resolve(
    clusterName: string,
    domainName?: string | null
  ): Promise<string[] | null> {
    const hostname = this.buildHostname(clusterName, domainName);
    const startTime = performance.now();
    this.requestCount += 1;

    try {
      const addresses = await this.lookup(hostname);

      if (addresses.length === 0) {
        this.failureCount += 1;
        dnsLogger.debug({ hostname }, "No A records found");
        return null;
      }

      this.successCount += 1;
      dnsLogger.debug(
        { hostname, addresses, server: this.options.server },
        "Resolved load balancer address"
      );
      return addresses;
    } catch (error) {
      this.failureCount += 1;
      const code = errorCode(error);

      if (code !== undefined && NO_ADDRESS_CODES.has(code)) {
        dnsLogger.debug(
          { hostname, code, timeoutSeconds: this.options.timeoutSeconds },
          "DNS lookup returned no address"
        );
      } else {
        dnsLogger.warn(
          {
            hostname,
            code,
            error: error instanceof Error ? error.message : String(error),
          },
          "Unexpected DNS resolution error"
        );
      }
      return null;
    } finally {
      this.totalTimeSeconds += (performance.now() - startTime) / 1000;
    }
  }

  /**
   * Resolve a batch with bounded concurrency; results keep input order.
   */
  async resolveMany(
    targets: readonly ResolveTarget[]
  ): Promise<(string[] | null)[]> {
    const queue = new PQueue({ concurrency: this.concurrency });

    return Promise.all(
      targets.map((target) =>
        queue.add(() => this.resolve(target.clusterName, target.domainName), {
          throwOnTimeout: true,
        })
      )
    );
  }

  getStats(): DnsStats {
    return {
      request_count: this.requestCount,
      success_count: this.successCount,
      failure_count: this.failureCount,
      total_time_seconds: this.totalTimeSeconds,
      average_time_seconds:
        this.requestCount > 0 ? this.totalTimeSeconds / this.requestCount : 0,
    };
  }

  resetStats(): void {
    this.requestCount = 0;
    this.successCount = 0;
    this.failureCount = 0;
    this.totalTimeSeconds = 0;
    dnsLogger.debug("DNS statistics reset");
  }
}
