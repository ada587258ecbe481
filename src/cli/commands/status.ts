import { displaySites, displayStatus } from "../utils/display.js";
import { errorMessage, withServices } from "../utils/services.js";

import type { Command } from "commander";

export function registerStatusCommands(program: Command): void {
  program
    .command("status")
    .description("Show inventory URL, sync interval and cache age")
    .action(async () => {
      try {
        const status = await withServices(({ orchestrator }) =>
          orchestrator.getStatus()
        );
        displayStatus(status);
      } catch (error) {
        console.error(`Error: ${errorMessage(error)}`);
        process.exitCode = 1;
      }
    });

  program
    .command("sites")
    .description("List the sites in the cached dataset")
    .action(async () => {
      try {
        const sites = await withServices(({ orchestrator }) =>
          orchestrator.getSites()
        );
        displaySites(sites);
      } catch (error) {
        console.error(`Error: ${errorMessage(error)}`);
        process.exitCode = 1;
      }
    });
}
