import * as fs from "node:fs/promises";
import { z } from "zod";
import { defineDescriptor, type Descriptor } from "@dockyard/resolver";
import type { Direction, Plugin } from "@dockyard/host";
import { BatchError } from "./errors.js";

const id = z.string().uuid();

const referenceSchema = z
  .object({
    ownerId: id,
    descriptorId: id,
    minVersion: z.string().min(1),
    /** Defaults to `minVersion`. */
    maxVersion: z.string().min(1).optional(),
  })
  .strict()
  .transform((ref) => ({ ...ref, maxVersion: ref.maxVersion ?? ref.minVersion }));

const descriptorSchema = z
  .object({
    descriptorId: id,
    version: z.string().min(1),
    label: z.string().optional(),
    dependsOn: z.array(referenceSchema).optional(),
    conflictsWith: z.array(referenceSchema).optional(),
    loadBefore: z.array(referenceSchema).optional(),
    loadAfter: z.array(referenceSchema).optional(),
  })
  .strict();

const pluginSchema = z
  .object({
    id,
    system: z.boolean().default(false),
    descriptors: z.array(descriptorSchema),
  })
  .strict();

/**
 * The schema of a batch file: the descriptors a set of plugins contribute to
 * one extension point. Descriptors take their `ownerId` from their plugin.
 */
export const batchSchema = z
  .object({
    point: z.string().min(1),
    direction: z.enum(["forward", "reverse"]).default("forward"),
    plugins: z.array(pluginSchema),
  })
  .strict();

export type BatchInput = z.input<typeof batchSchema>;

export type BatchDescriptor = Descriptor & {
  /** Display name used in reports. */
  readonly label?: string;
};

export interface BatchPlugin extends Plugin {
  readonly system: boolean;
  readonly descriptors: readonly BatchDescriptor[];
}

export type Batch = {
  point: string;
  direction: Direction;
  plugins: BatchPlugin[];
};

/**
 * Validates a batch and turns its entries into frozen descriptors.
 * @throws A `BatchError` listing every problem found.
 */
export function parseBatch(input: unknown): Batch {
  const result = batchSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
    );
    throw new BatchError(`Invalid batch: ${issues.join("; ")}`, issues, result.error);
  }

  const { point, direction, plugins } = result.data;
  try {
    return {
      point,
      direction,
      plugins: plugins.map((plugin) => ({
        id: plugin.id,
        system: plugin.system,
        descriptors: plugin.descriptors.map((descriptor) =>
          defineDescriptor({ ownerId: plugin.id, ...descriptor })
        ),
      })),
    };
  } catch (error) {
    if (error instanceof TypeError) {
      throw new BatchError(`Invalid batch: ${error.message}`, [error.message], error);
    }
    throw error;
  }
}

/**
 * Reads a batch from a JSON file.
 * @throws A `BatchError` if the file cannot be read, is not JSON or does not validate.
 */
export async function loadBatch(batchPath: string): Promise<Batch> {
  let content: string;
  try {
    content = await fs.readFile(batchPath, "utf-8");
  } catch (error) {
    throw new BatchError(
      `Failed to load batch from ${batchPath}: ${
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
    throw new BatchError(
      `Failed to parse batch from ${batchPath}: Invalid JSON format.`,
      [],
      error
    );
  }
  return parseBatch(raw);
}
