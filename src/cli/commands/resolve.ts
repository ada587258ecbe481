import { displayAddresses, displayDnsStats } from "../utils/display.js";
import { errorMessage, withServices } from "../utils/services.js";

import type { Command } from "commander";

export function registerResolveCommand(program: Command): void {
  program
    .command("resolve <cluster>")
    .description("Look up the load balancer addresses of one cluster")
    .option("-d, --domain <domain>", "Domain name (defaults to DEFAULT_DOMAIN)")
    .action(async (cluster: string, options: { domain?: string }) => {
      try {
        await withServices(async ({ resolver }) => {
          const addresses = await resolver.resolve(cluster, options.domain);
          displayAddresses(
            resolver.buildHostname(cluster, options.domain),
            addresses
          );
          displayDnsStats(resolver.getStats());
        });
      } catch (error) {
        console.error(`Error: ${errorMessage(error)}`);
        process.exitCode = 1;
      }
    });
}
