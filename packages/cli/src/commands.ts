import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { ChalkInstance } from "chalk";
import {
  DescriptorResolver,
  createLogger,
  type CyclePolicy,
  type ResolutionResult,
} from "@dockyard/resolver";
import {
  DescriptorHost,
  ExtensionRegistry,
  LokiManifestStore,
  defineExtensionPoint,
  type HostConfig,
} from "@dockyard/host";
import type { Batch, BatchDescriptor, BatchPlugin } from "./batch.js";
import { formatReport } from "./report.js";
import { CommandError } from "./errors.js";

/**
 * Everything a command needs besides its own arguments.
 */
export type CommandContext = {
  config: HostConfig;
  /** Directory the manifest path is resolved against. */
  root: string;
  /** Receives each output line. */
  print: (line: string) => void;
  chalk: ChalkInstance;
};

export type ResolveOptions = {
  /** Overrides `config.cycles`. */
  cycles?: CyclePolicy;
};

/**
 * Opens the configured manifest file, creating its directory if needed.
 * Returns `undefined` when the manifest is kept in memory, since nothing
 * would outlive the command.
 */
export async function openManifest(
  context: CommandContext
): Promise<LokiManifestStore | undefined> {
  const { manifest, logLevel } = context.config;
  if (manifest.kind === "memory") return undefined;

  const manifestPath = path.resolve(context.root, manifest.path);
  await fs.mkdir(path.dirname(manifestPath), { recursive: true });
  return LokiManifestStore.createPersistent(
    manifestPath,
    createLogger("Manifest", { level: logLevel })
  );
}

async function requireManifest(
  context: CommandContext
): Promise<LokiManifestStore> {
  const manifest = await openManifest(context);
  if (!manifest) {
    throw new CommandError(
      'The manifest is kept in memory. Set manifest.kind to "file" to keep enablement state.'
    );
  }
  return manifest;
}

/**
 * Resolves a batch and prints the report. With a file manifest the batch's
 * plugins are synced into it first and only enabled ones are collected from.
 * @throws A `CyclicOrderError` if hints are cyclic under the `reject` policy.
 */
export async function runResolve(
  batch: Batch,
  context: CommandContext,
  options: ResolveOptions = {}
): Promise<ResolutionResult<BatchDescriptor>> {
  const level = context.config.logLevel;
  const manifest = await openManifest(context);

  try {
    if (manifest) {
      manifest.sync(
        batch.plugins.map((plugin) => ({
          ownerId: plugin.id,
          point: batch.point,
          system: plugin.system,
        }))
      );
      await manifest.save();
    }

    const registry = new ExtensionRegistry();
    const point = registry.define(
      defineExtensionPoint<BatchPlugin, BatchDescriptor>({
        name: batch.point,
        direction: batch.direction,
        collect: (plugin) => plugin.descriptors,
      })
    );
    const host = new DescriptorHost({
      registry,
      manifest,
      resolver: new DescriptorResolver({
        cycles: options.cycles ?? context.config.cycles,
        logger: createLogger("DescriptorResolver", { level }),
      }),
      logger: createLogger("DescriptorHost", { level }),
    });

    const result = host.resolveContext(point, batch.plugins);
    for (const line of formatReport(batch.point, result, context.chalk)) {
      context.print(line);
    }
    return result;
  } finally {
    await manifest?.close();
  }
}

/**
 * Enables or disables a plugin for one extension point.
 * @returns `true` if the manifest changed.
 * @throws A `CommandError` if the manifest is kept in memory.
 */
export async function runSetEnabled(
  ownerId: string,
  point: string,
  enabled: boolean,
  context: CommandContext
): Promise<boolean> {
  const { chalk, print } = context;
  const manifest = await requireManifest(context);

  try {
    const changed = manifest.setEnabled(ownerId, point, enabled);
    if (changed) {
      await manifest.save();
      print(chalk.green(`${enabled ? "Enabled" : "Disabled"} ${ownerId} for '${point}'.`));
    } else {
      print(chalk.yellow(`No change for ${ownerId} on '${point}'.`));
    }
    return changed;
  } finally {
    await manifest.close();
  }
}

/**
 * Prints every manifest entry.
 * @throws A `CommandError` if the manifest is kept in memory.
 */
export async function runList(context: CommandContext): Promise<void> {
  const { chalk, print } = context;
  const manifest = await requireManifest(context);

  try {
    const entries = manifest.entries();
    if (entries.length === 0) {
      print(chalk.gray("The manifest is empty."));
      return;
    }
    for (const entry of entries) {
      const state = entry.enabled ? chalk.green("enabled") : chalk.gray("disabled");
      print(`  ${entry.ownerId}  ${entry.point}  ${state}${entry.system ? " (system)" : ""}`);
    }
  } finally {
    await manifest.close();
  }
}
