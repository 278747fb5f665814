#!/usr/bin/env node
import * as path from "node:path";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import chalk from "chalk";
import { getConfig } from "./config.js";
import { loadBatch } from "./batch.js";
import {
  runList,
  runResolve,
  runSetEnabled,
  type CommandContext,
} from "./commands.js";

async function createContext(argv: {
  config?: string;
  path?: string;
}): Promise<CommandContext> {
  const { config, root } = await getConfig({
    config: argv.config,
    path: argv.path,
  });
  return { config, root, print: (line) => console.log(line), chalk };
}

/**
 * The entry point of the `dockyard` command.
 */
async function main(): Promise<void> {
  await yargs(hideBin(process.argv))
    .scriptName("dockyard")
    .option("config", {
      type: "string",
      description: "Provide the entire configuration as a single JSON string.",
    })
    .option("path", {
      type: "string",
      description:
        "Specify an exact path to the configuration file (e.g., ./dockyard.json).",
    })
    .check((argv) => {
      const configSources = ["config", "path"].filter((key) => argv[key]);
      if (configSources.length > 1) {
        throw new Error(
          `Options --${configSources.join(" and --")} are mutually exclusive.`
        );
      }
      return true;
    })
    .command(
      "resolve <batch>",
      "Resolve a batch file and print the load order.",
      (y) =>
        y
          .positional("batch", {
            type: "string",
            demandOption: true,
            description: "Path to the batch JSON file.",
          })
          .option("cycles", {
            choices: ["break", "reject"] as const,
            description: "Override how cyclic load-order hints are handled.",
          }),
      async (argv) => {
        const context = await createContext(argv);
        const batch = await loadBatch(path.resolve(argv.batch));
        await runResolve(batch, context, { cycles: argv.cycles });
      }
    )
    .command(
      "enable <ownerId> <point>",
      "Enable a plugin for an extension point.",
      (y) =>
        y
          .positional("ownerId", { type: "string", demandOption: true })
          .positional("point", { type: "string", demandOption: true }),
      async (argv) => {
        await runSetEnabled(argv.ownerId, argv.point, true, await createContext(argv));
      }
    )
    .command(
      "disable <ownerId> <point>",
      "Disable a plugin for an extension point.",
      (y) =>
        y
          .positional("ownerId", { type: "string", demandOption: true })
          .positional("point", { type: "string", demandOption: true }),
      async (argv) => {
        await runSetEnabled(argv.ownerId, argv.point, false, await createContext(argv));
      }
    )
    .command("list", "List the manifest entries.", (y) => y, async (argv) => {
      await runList(await createContext(argv));
    })
    .demandCommand(1)
    .strict()
    .fail(false)
    .help()
    .alias("h", "help")
    .parseAsync();
}

main().catch((error: unknown) => {
  console.error(chalk.red(error instanceof Error ? error.message : String(error)));
  process.exit(1);
});
