/**
 * Lab configuration loading: file, environment overrides, validation.
 */

import { existsSync } from "node:fs";
import { readFile, writeFile } from "node:fs/promises";
import { resolve } from "node:path";
import type { ZodIssue } from "zod";
import { ConfigValidationError, LabError } from "../errors.js";
import { labConfigSchema, type LabConfig, type LabConfigInput } from "./schema.js";

export const DEFAULT_CONFIG_PATH = "./s2dlab.config.json";

const REDACTED = "********";

export type LoadConfigOptions = {
  /** Explicit path; a missing explicit file is an error. */
  path?: string;
  env?: NodeJS.ProcessEnv;
};

export type LoadedConfig = {
  config: LabConfig;
  /** Absolute path of the file read, or null when only defaults were used. */
  source: string | null;
};

// =============================================================================
// Validation
// =============================================================================

export function formatIssue(issue: ZodIssue): string {
  const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
  if (issue.code === "unrecognized_keys") {
    return `${where}: unknown key(s) ${issue.keys.join(", ")}`;
  }
  return `${where}: ${issue.message}`;
}

/**
 * Validate a raw config object. Throws ConfigValidationError listing every issue.
 */
export function parseLabConfig(raw: unknown): LabConfig {
  const result = labConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigValidationError(result.error.issues.map(formatIssue));
  }
  return result.data;
}

/**
 * Like parseLabConfig, but returns the issue list instead of throwing.
 */
export function validateLabConfig(raw: unknown): string[] {
  const result = labConfigSchema.safeParse(raw);
  return result.success ? [] : result.error.issues.map(formatIssue);
}

// =============================================================================
// Environment Overrides
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(root: Record<string, unknown>, key: string): Record<string, unknown> {
  const existing = root[key];
  if (isRecord(existing)) {
    const copy = { ...existing };
    root[key] = copy;
    return copy;
  }
  const created: Record<string, unknown> = {};
  root[key] = created;
  return created;
}

/**
 * Layer environment variables over the file contents. The input is not mutated.
 */
export function applyEnvOverrides(raw: unknown, env: NodeJS.ProcessEnv): unknown {
  if (!isRecord(raw)) return raw;
  const root: Record<string, unknown> = { ...raw };

  if (env.AZURE_SUBSCRIPTION_ID) section(root, "azure").subscriptionId = env.AZURE_SUBSCRIPTION_ID;
  if (env.AZURE_TENANT_ID) section(root, "azure").tenantId = env.AZURE_TENANT_ID;
  if (env.S2DLAB_LOCATION) section(root, "azure").location = env.S2DLAB_LOCATION;
  if (env.S2DLAB_ADMIN_PASSWORD) section(root, "nodes").adminPassword = env.S2DLAB_ADMIN_PASSWORD;
  if (env.S2DLAB_LOG_LEVEL) section(root, "logging").level = env.S2DLAB_LOG_LEVEL;

  return root;
}

// =============================================================================
// Loading
// =============================================================================

export async function loadLabConfig(options: LoadConfigOptions = {}): Promise<LoadedConfig> {
  const env = options.env ?? process.env;
  const path = resolve(options.path ?? DEFAULT_CONFIG_PATH);

  let raw: unknown = {};
  let source: string | null = null;

  if (existsSync(path)) {
    const text = await readFile(path, "utf8");
    try {
      raw = JSON.parse(text);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigValidationError([`${path}: invalid JSON (${reason})`]);
    }
    source = path;
  } else if (options.path) {
    throw new LabError(`Config file not found: ${path}`, "CONFIG_NOT_FOUND");
  }

  return { config: parseLabConfig(applyEnvOverrides(raw, env)), source };
}

/**
 * The admin password has no default; commands that create VMs need it.
 */
export function requireAdminPassword(config: LabConfig): string {
  const password = config.nodes.adminPassword;
  if (!password) {
    throw new ConfigValidationError(["nodes.adminPassword: required (set it in the file or S2DLAB_ADMIN_PASSWORD)"]);
  }
  return password;
}

/** Values that must never be printed or logged. */
export function configSecrets(config: LabConfig): string[] {
  return [config.nodes.adminPassword, config.guests.rootPassword].filter(
    (value): value is string => typeof value === "string" && value.length > 0,
  );
}

export function redactConfig(config: LabConfig): LabConfig {
  return {
    ...config,
    nodes: {
      ...config.nodes,
      adminPassword: config.nodes.adminPassword ? REDACTED : undefined,
    },
    guests: {
      ...config.guests,
      rootPassword: config.guests.rootPassword ? REDACTED : undefined,
    },
  };
}

/**
 * Defaults written by `config init`. Secrets are left out.
 */
export function defaultConfigInput(): LabConfigInput {
  const defaults = parseLabConfig({});
  return {
    ...defaults,
    nodes: { ...defaults.nodes, adminPassword: undefined },
    guests: { ...defaults.guests, rootPassword: undefined },
  };
}

export async function writeDefaultConfig(path: string, options: { force?: boolean } = {}): Promise<string> {
  const target = resolve(path);
  if (existsSync(target) && !options.force) {
    throw new LabError(`${target} already exists (use --force to overwrite)`, "CONFIG_EXISTS");
  }
  await writeFile(target, `${JSON.stringify(defaultConfigInput(), null, 2)}\n`, "utf8");
  return target;
}
