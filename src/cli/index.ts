#!/usr/bin/env node

/**
 * Cluster Registry CLI
 *
 * Runs sync cycles and inspects the cache and DNS resolution from a shell.
 */

import { Command } from "commander";

import { registerCacheCommand } from "./commands/cache.js";
import { registerResolveCommand } from "./commands/resolve.js";
import { registerStatusCommands } from "./commands/status.js";
import { registerSyncCommand } from "./commands/sync.js";
import { registerViewCommand } from "./commands/view.js";

const program = new Command();

program
  .name("cluster-registry")
  .description("Cluster inventory sync and lookup CLI")
  .version("0.1.0");

// Register all commands
registerSyncCommand(program);
registerStatusCommands(program);
registerViewCommand(program);
registerResolveCommand(program);
registerCacheCommand(program);

program.action(() => {
  // Show help by default
  program.outputHelp();
});

await program.parseAsync();
