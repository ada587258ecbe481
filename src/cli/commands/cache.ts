import chalk from "chalk";

import { displayDatasetSummary } from "../utils/display.js";
import { errorMessage, withServices } from "../utils/services.js";

import type { Command } from "commander";

export function registerCacheCommand(program: Command): void {
  const cache = program.command("cache").description("Inspect the cache file");

  cache
    .command("show")
    .description("Show when the cache was written and what it holds")
    .action(async () => {
      try {
        await withServices(async ({ cache: store }) => {
          const data = await store.load();
          if (data === null) {
            console.log(chalk.yellow(`No cache at ${store.filePath}`));
            return;
          }

          const lastUpdated = await store.getLastUpdated();
          console.log(chalk.bold(`\nCache: ${store.filePath}`));
          console.log(`  Last updated: ${lastUpdated ?? chalk.gray("unknown")}`);
          displayDatasetSummary(data);
        });
      } catch (error) {
        console.error(`Error: ${errorMessage(error)}`);
        process.exitCode = 1;
      }
    });
}
