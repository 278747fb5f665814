import { vi } from "vitest";
import { Chalk } from "chalk";
import { createLogger, type LogSink } from "@dockyard/resolver";
import { parseHostConfig, type HostConfigInput } from "@dockyard/host";
import type { CommandContext } from "../src/index.js";

export function recordingLogger(scope: string) {
  const sink = vi.fn<LogSink>();
  return { sink, logger: createLogger(scope, { level: "debug", sink }) };
}

/**
 * A command context with silent logging, uncoloured output and every printed
 * line collected in `lines`.
 */
export function commandContext(config: HostConfigInput = {}, root = process.cwd()) {
  const lines: string[] = [];
  const context: CommandContext = {
    config: parseHostConfig({ logLevel: "silent", ...config }),
    root,
    print: (line) => {
      lines.push(line);
    },
    chalk: new Chalk({ level: 0 }),
  };
  return { context, lines };
}
