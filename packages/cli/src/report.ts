import type { ChalkInstance } from "chalk";
import { formatDescriptor, type ResolutionResult } from "@dockyard/resolver";
import type { BatchDescriptor } from "./batch.js";

function describe(descriptor: BatchDescriptor, chalk: ChalkInstance): string {
  const id = formatDescriptor(descriptor);
  return descriptor.label ? `${descriptor.label} ${chalk.gray(id)}` : id;
}

/**
 * Renders a resolution as report lines: the numbered load order, then every
 * diagnostic of the run.
 */
export function formatReport(
  point: string,
  { ordered, context }: ResolutionResult<BatchDescriptor>,
  chalk: ChalkInstance
): string[] {
  const total = context.descriptors.length + context.duplicates.length;
  const lines = [
    chalk.bold(`Load order for '${point}' (${ordered.length} of ${total}):`),
    ...ordered.map((d, i) => `  ${i + 1}. ${describe(d, chalk)}`),
  ];

  if (context.diagnostics.length > 0) {
    lines.push(chalk.bold("Diagnostics:"));
    for (const diagnostic of context.diagnostics) {
      lines.push(`  ${chalk.yellow(`[${diagnostic.kind}]`)} ${diagnostic.message}`);
    }
  }
  return lines;
}
