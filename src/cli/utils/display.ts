/**
 * Display utilities for CLI output formatting
 */

import chalk from "chalk";
import CliTable3 from "cli-table3";

import type {
  DnsStats,
  SiteList,
  SiteView,
  SyncedDataset,
  SyncStatus,
} from "../../types/index.js";

function formatAddresses(addresses: string[] | null): string {
  return addresses !== null && addresses.length > 0
    ? addresses.join(", ")
    : chalk.gray("unresolved");
}

/**
 * Display the totals of a sync run or cached dataset
 */
export function displayDatasetSummary(data: SyncedDataset): void {
  const stats = data.stats;
  console.log(chalk.bold("\nDataset:"));
  console.log(`  Clusters: ${String(stats?.total_clusters ?? data.clusters.length)}`);
  console.log(`  Sites:    ${String(stats?.total_sites ?? data.sites.length)}`);
  if (stats !== undefined) {
    console.log(`  Segments: ${String(stats.total_segments)}`);
  }
  console.log();
}

export function displayStatus(status: SyncStatus): void {
  console.log(chalk.bold("\nSync Status:\n"));
  console.log(`  Inventory URL:  ${status.inventoryUrl}`);
  console.log(`  Sync interval:  ${String(status.syncIntervalSeconds)}s`);
  console.log(
    `  Cache:          ${status.cacheExists ? chalk.green("present") : chalk.yellow("missing")}`
  );
  console.log(
    `  Last updated:   ${status.lastUpdated ?? chalk.gray("never")}`
  );
  if (status.cacheAgeMinutes !== null) {
    console.log(`  Cache age:      ${String(status.cacheAgeMinutes)} min`);
  }
  console.log();
}

export function displaySites(list: SiteList): void {
  if (list.count === 0) {
    console.log(chalk.yellow("No sites in cache"));
    return;
  }

  console.log(chalk.bold(`\nSites (${String(list.count)}):\n`));
  for (const site of list.sites) {
    console.log(`  ${chalk.cyan(site)}`);
  }
  console.log();
}

/**
 * Display the merged view as one table per site
 */
export function displayCombinedView(sites: SiteView[]): void {
  if (sites.length === 0) {
    console.log(chalk.yellow("No clusters available"));
    return;
  }

  for (const site of sites) {
    console.log(
      chalk.bold(`\n${site.site} (${String(site.clusterCount)} clusters)`)
    );

    const table = new CliTable3({
      head: [
        chalk.cyan("Cluster"),
        chalk.cyan("Source"),
        chalk.cyan("Segments"),
        chalk.cyan("Load Balancer"),
      ],
      colWidths: [28, 9, 36, 32],
      wordWrap: true,
    });

    for (const cluster of site.clusters) {
      table.push([
        chalk.green(cluster.clusterName),
        cluster.source,
        cluster.segments.join("\n"),
        formatAddresses(cluster.loadBalancerIP),
      ]);
    }

    console.log(table.toString());
  }
  console.log();
}

export function displayDnsStats(stats: DnsStats): void {
  const table = new CliTable3({
    head: [chalk.cyan("Metric"), chalk.cyan("Value")],
  });

  table.push(
    ["Requests", String(stats.request_count)],
    ["Succeeded", String(stats.success_count)],
    ["Failed", String(stats.failure_count)],
    ["Total time (s)", stats.total_time_seconds.toFixed(4)],
    ["Average time (s)", stats.average_time_seconds.toFixed(4)]
  );

  console.log(table.toString());
}

export function displayAddresses(hostname: string, addresses: string[] | null): void {
  console.log(chalk.bold(`\n${hostname}`));
  if (addresses === null) {
    console.log(`  ${chalk.gray("no address")}`);
  } else {
    for (const address of addresses) {
      console.log(`  ${chalk.green(address)}`);
    }
  }
  console.log();
}
