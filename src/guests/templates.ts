/**
 * Guest template files and `{{placeholder}}` rendering.
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { LabError } from "../errors.js";

/** `templates/` at the package root, next to `src/` and `dist/`. */
export const TEMPLATE_ROOT = fileURLToPath(new URL("../../templates/", import.meta.url));

export const KICKSTART_TEMPLATES = {
  minimal: "kickstart/minimal.cfg",
  lab: "kickstart/lab.cfg",
} as const;

export const POSTINSTALL_TEMPLATE = "guest/postinstall.sh";
export const CLOUDINIT_DIAGNOSIS_TEMPLATE = "guest/diagnose-cloudinit.sh";

const PLACEHOLDER = /\{\{\s*([A-Za-z][A-Za-z0-9_]*)\s*\}\}/g;

export async function readTemplate(relativePath: string, root: string = TEMPLATE_ROOT): Promise<string> {
  return readFile(join(root, relativePath), "utf8");
}

/** Placeholder names in order of first use. */
export function listPlaceholders(template: string): string[] {
  const names: string[] = [];
  for (const match of template.matchAll(PLACEHOLDER)) {
    if (!names.includes(match[1])) names.push(match[1]);
  }
  return names;
}

/**
 * Replace every `{{name}}` with `values[name]`. A placeholder without a
 * value is an error; values the template does not use are ignored.
 */
export function renderTemplate(template: string, values: Readonly<Record<string, string>>, name = "template"): string {
  const unknown = listPlaceholders(template).filter((key) => !Object.hasOwn(values, key));
  if (unknown.length > 0) {
    throw new LabError(`${name} uses unknown placeholder(s): ${unknown.join(", ")}`, "TEMPLATE_PLACEHOLDER");
  }
  return template.replace(PLACEHOLDER, (_match, key: string) => values[key] ?? "");
}
