import * as fs from "node:fs/promises";
import { z } from "zod";
import { ConfigError } from "./errors.js";

const manifestSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("memory") }),
  z.object({ kind: z.literal("file"), path: z.string().min(1) }),
]);

/**
 * The schema of the host configuration file (e.g., dockyard.json).
 * Every field is optional; missing fields fall back to the defaults.
 */
export const hostConfigSchema = z
  .object({
    logLevel: z
      .enum(["debug", "info", "warn", "error", "silent"])
      .default("info"),
    /** How cyclic load-order hints are handled. */
    cycles: z.enum(["break", "reject"]).default("break"),
    /** Where plugin enablement state is kept. */
    manifest: manifestSchema.default({ kind: "memory" }),
  })
  .strict();

export type HostConfig = z.infer<typeof hostConfigSchema>;
export type HostConfigInput = z.input<typeof hostConfigSchema>;
export type ManifestConfig = z.infer<typeof manifestSchema>;

/**
 * Validates a configuration object and fills in defaults.
 * @throws A `ConfigError` listing every problem found.
 */
export function parseHostConfig(input: unknown): HostConfig {
  const result = hostConfigSchema.safeParse(input ?? {});
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
    );
    throw new ConfigError(
      `Invalid host configuration: ${issues.join("; ")}`,
      issues,
      result.error
    );
  }
  return result.data;
}

/**
 * Reads a JSON configuration file and validates it.
 * @throws A `ConfigError` if the file cannot be read, is not JSON or does not validate.
 */
export async function loadHostConfig(configPath: string): Promise<HostConfig> {
  let content: string;
  try {
    content = await fs.readFile(configPath, "utf-8");
  } catch (error) {
    throw new ConfigError(
      `Failed to load config from ${configPath}: ${
        error instanceof Error ? error.message : String(error)
      }`,
      [],
      error
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(
      `Failed to parse config from ${configPath}: Invalid JSON format.`,
      [],
      error
    );
  }
  return parseHostConfig(raw);
}
