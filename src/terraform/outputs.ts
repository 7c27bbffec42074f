/**
 * `terraform output -json` parsing.
 */

import { z } from "zod";
import { TerraformCommandError } from "../errors.js";
import type { LabOutputs } from "../types.js";

const stringOutput = z.object({ value: z.string() });
const listOutput = z.object({ value: z.array(z.string()) });

const labOutputsSchema = z.object({
  resource_group_name: stringOutput,
  node_names: listOutput,
  node_private_ips: listOutput,
  node_public_ips: listOutput,
});

export function parseLabOutputs(json: unknown): LabOutputs {
  const parsed = labOutputsSchema.safeParse(json);
  if (!parsed.success) {
    const missing = [...new Set(parsed.error.issues.map((issue) => String(issue.path[0] ?? "(root)")))];
    throw new TerraformCommandError("output", 0, `missing or invalid outputs: ${missing.join(", ")}`);
  }

  const { resource_group_name, node_names, node_private_ips, node_public_ips } = parsed.data;
  if (node_private_ips.value.length !== node_names.value.length) {
    throw new TerraformCommandError(
      "output",
      0,
      `node_private_ips has ${node_private_ips.value.length} entries for ${node_names.value.length} nodes`,
    );
  }

  return {
    resourceGroup: resource_group_name.value,
    nodes: node_names.value.map((name, i) => ({
      name,
      resourceGroup: resource_group_name.value,
      privateIp: node_private_ips.value[i],
      publicIp: node_public_ips.value[i] || undefined,
    })),
  };
}

// ─── terraform validate -json ───────────────────────────────────

const validateSchema = z.object({
  valid: z.boolean(),
  diagnostics: z
    .array(
      z.object({
        severity: z.enum(["error", "warning"]),
        summary: z.string(),
        detail: z.string().optional(),
        range: z.object({ filename: z.string(), start: z.object({ line: z.number() }) }).optional(),
      }),
    )
    .default([]),
});

export type TfValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

/** Diagnostics of `terraform validate -json`, as `file:line: summary` lines. */
export function parseValidation(json: unknown): TfValidation {
  const parsed = validateSchema.safeParse(json);
  if (!parsed.success) throw new TerraformCommandError("validate", 0, "printed no validation result");

  const line = (d: z.infer<typeof validateSchema>["diagnostics"][number]): string => {
    const where = d.range ? `${d.range.filename}:${d.range.start.line}: ` : "";
    return `${where}${d.summary}${d.detail ? ` (${d.detail})` : ""}`;
  };
  const { valid, diagnostics } = parsed.data;
  return {
    valid,
    errors: diagnostics.filter((d) => d.severity === "error").map(line),
    warnings: diagnostics.filter((d) => d.severity === "warning").map(line),
  };
}
