import ora from "ora";

import { displayCombinedView, displayDnsStats } from "../utils/display.js";
import { errorMessage, withServices } from "../utils/services.js";

import type { Command } from "commander";

export function registerViewCommand(program: Command): void {
  program
    .command("view")
    .description(
      "Show clusters per site from the cache, with load balancer addresses"
    )
    .option("--stats", "Print DNS statistics for this run")
    .action(async (options: { stats?: boolean }) => {
      const spinner = ora("Resolving load balancers...").start();

      try {
        const { sites, stats } = await withServices(
          async ({ merge, resolver }) => ({
            sites: await merge.getCombinedView(),
            stats: resolver.getStats(),
          })
        );
        spinner.stop();

        displayCombinedView(sites);
        if (options.stats === true) {
          displayDnsStats(stats);
        }
      } catch (error) {
        spinner.fail(`Failed: ${errorMessage(error)}`);
        process.exitCode = 1;
      }
    });
}
