/**
 * In-memory store for manually entered clusters.
 * Entries live for the lifetime of the process and are untouched by syncs.
 */

import { randomUUID } from "node:crypto";

import { syncLogger } from "../../logger.js";
import {
  ConflictError,
  ValidationError,
} from "../../server/plugins/error-handler.js";
import { isValidCidr } from "../../utils/cidr.js";
import { buildConsoleUrl } from "./console-url.js";
import {
  clusterKey,
  isValidClusterName,
  normalizeClusterName,
} from "../sync/transformer.js";

import type { ManualCluster, NewManualCluster } from "../../types/index.js";
import type { DnsResolver } from "../dns/resolver.js";

const CLUSTER_NAME_PATTERN = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/;

export interface ManualClusterStoreOptions {
  clusterPrefix: string;
  defaultDomain: string;
  consoleUrlTemplate: string;
  resolver: Pick<DnsResolver, "resolve">;
  clock?: () => Date;
  generateId?: () => string;
}

function toAddressList(
  value: string[] | string | null | undefined
): string[] | null {
  if (value === undefined || value === null) return null;
  const list = (Array.isArray(value) ? value : [value]).filter(
    (address) => address.trim() !== ""
  );
  return list.length > 0 ? list : null;
}

export class ManualClusterStore {
  private readonly clusters = new Map<string, ManualCluster>();
  private readonly clock: () => Date;
  private readonly generateId: () => string;

  constructor(private readonly options: ManualClusterStoreOptions) {
    this.clock = options.clock ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  /**
   * Validate and add a cluster. Addresses are resolved up front unless
   * the caller supplied them.
   */
  async create(input: NewManualCluster): Promise<ManualCluster> {
    const clusterName = normalizeClusterName(input.clusterName);
    const site = input.site.trim();
    const domainName =
      input.domainName !== undefined && input.domainName.trim() !== ""
        ? input.domainName.trim()
        : this.options.defaultDomain;

    if (!isValidClusterName(clusterName, this.options.clusterPrefix)) {
      throw new ValidationError(
        `Cluster name '${input.clusterName}' must start with '${this.options.clusterPrefix}'`,
        { clusterName: input.clusterName }
      );
    }
    if (!CLUSTER_NAME_PATTERN.test(clusterName)) {
      throw new ValidationError(
        "Cluster name must be lowercase alphanumeric with inner hyphens",
        { clusterName: input.clusterName }
      );
    }
    if (site === "") {
      throw new ValidationError("Site must not be empty");
    }

    const invalidSegments = input.segments.filter(
      (segment) => !isValidCidr(segment)
    );
    if (input.segments.length === 0 || invalidSegments.length > 0) {
      throw new ValidationError("Segments must be valid CIDR notation", {
        invalidSegments,
      });
    }

    if (this.exists(clusterName, site)) {
      throw new ConflictError(
        `Cluster '${clusterName}' already exists in site '${site}'`,
        { clusterName, site }
      );
    }

    let loadBalancerIP = toAddressList(input.loadBalancerIP);
    if (loadBalancerIP === null) {
      loadBalancerIP = await this.options.resolver.resolve(
        clusterName,
        domainName
      );
    }

    const cluster: ManualCluster = {
      id: this.generateId(),
      clusterName,
      site,
      segments: [...new Set(input.segments.map((segment) => segment.trim()))],
      domainName,
      consoleUrl: buildConsoleUrl(
        this.options.consoleUrlTemplate,
        clusterName,
        domainName
      ),
      createdAt: this.clock().toISOString(),
      source: "manual",
      loadBalancerIP,
    };

    this.clusters.set(cluster.id, cluster);
    syncLogger.info(
      { id: cluster.id, cluster: clusterKey(clusterName, site) },
      "Created manual cluster"
    );
    return cluster;
  }

  get(id: string): ManualCluster | undefined {
    return this.clusters.get(id);
  }

  list(): ManualCluster[] {
    return [...this.clusters.values()];
  }

  delete(id: string): boolean {
    const deleted = this.clusters.delete(id);
    if (deleted) {
      syncLogger.info({ id }, "Deleted manual cluster");
    }
    return deleted;
  }

  exists(clusterName: string, site: string): boolean {
    const name = normalizeClusterName(clusterName);
    return this.list().some(
      (cluster) => cluster.clusterName === name && cluster.site === site
    );
  }
}
