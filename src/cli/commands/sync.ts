import ora from "ora";

import { displayDatasetSummary } from "../utils/display.js";
import { errorMessage, withServices } from "../utils/services.js";

import type { Command } from "commander";

export function registerSyncCommand(program: Command): void {
  program
    .command("sync")
    .description("Run one inventory sync cycle and update the cache")
    .action(async () => {
      const spinner = ora("Syncing from inventory...").start();

      try {
        const data = await withServices(({ orchestrator }) =>
          orchestrator.syncData()
        );

        if (data.clusters.length === 0) {
          spinner.warn("No clusters available from inventory or cache");
        } else {
          spinner.succeed(
            `Sync finished with ${String(data.clusters.length)} clusters across ${String(data.sites.length)} sites`
          );
        }
        displayDatasetSummary(data);
      } catch (error) {
        spinner.fail(`Failed: ${errorMessage(error)}`);
        process.exitCode = 1;
      }
    });
}
