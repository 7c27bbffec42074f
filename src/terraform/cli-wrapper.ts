/**
 * Terraform CLI wrapper. Executes `terraform` via child_process in the
 * lab's working directory and returns structured results.
 */

import { execFile, type ExecFileException } from "node:child_process";
import { TerraformCommandError } from "../errors.js";
import { getLabLogger } from "../logging/index.js";

export type TfCliOptions = {
  /** Directory holding the generated .tf files. */
  cwd: string;
  /** Path to the terraform binary (default: "terraform"). */
  terraformBin?: string;
  /** Extra environment, e.g. TF_VAR_admin_password. */
  env?: Record<string, string>;
  /** Timeout in ms (default: 60 minutes; VM creation is slow). */
  timeout?: number;
};

export type TfCliResult = {
  success: boolean;
  stdout: string;
  stderr: string;
  exitCode: number | null;
  /** Parsed JSON output when the command was asked for `-json`. */
  json?: unknown;
};

function exitCodeOf(error: ExecFileException): number | null {
  return typeof error.code === "number" ? error.code : null;
}

async function run(args: string[], opts: TfCliOptions, parseJson = false): Promise<TfCliResult> {
  const bin = opts.terraformBin ?? "terraform";
  const log = getLabLogger("terraform");
  log.debug(`${bin} ${args.join(" ")}`, { cwd: opts.cwd });

  const result = await new Promise<TfCliResult>((resolve) => {
    execFile(
      bin,
      args,
      {
        cwd: opts.cwd,
        env: { ...process.env, ...opts.env, TF_IN_AUTOMATION: "1" },
        timeout: opts.timeout ?? 3_600_000,
        maxBuffer: 50 * 1024 * 1024,
        encoding: "utf8",
      },
      (error, stdout, stderr) => {
        if (error) {
          resolve({ success: false, stdout, stderr: stderr || error.message, exitCode: exitCodeOf(error) });
        } else {
          resolve({ success: true, stdout, stderr, exitCode: 0 });
        }
      },
    );
  });

  if (parseJson && result.stdout.trim().length > 0) {
    try {
      result.json = JSON.parse(result.stdout);
    } catch (error) {
      log.warn(`terraform ${args[0]} printed output that is not JSON`, {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
  return result;
}

/** Throw TerraformCommandError for a failed result. */
export function ensureSuccess(command: string, result: TfCliResult): TfCliResult {
  if (!result.success) throw new TerraformCommandError(command, result.exitCode, result.stderr);
  return result;
}

// ─── Individual Commands ────────────────────────────────────────

export function tfInit(opts: TfCliOptions, flags?: { upgrade?: boolean }): Promise<TfCliResult> {
  const args = ["init", "-input=false", "-no-color"];
  if (flags?.upgrade) args.push("-upgrade");
  return run(args, opts);
}

export function tfValidate(opts: TfCliOptions): Promise<TfCliResult> {
  return run(["validate", "-json", "-no-color"], opts, true);
}

export function tfPlan(opts: TfCliOptions, flags?: { destroy?: boolean; out?: string }): Promise<TfCliResult> {
  const args = ["plan", "-input=false", "-no-color"];
  if (flags?.destroy) args.push("-destroy");
  if (flags?.out) args.push(`-out=${flags.out}`);
  return run(args, opts);
}

export function tfApply(opts: TfCliOptions, flags?: { autoApprove?: boolean; planFile?: string }): Promise<TfCliResult> {
  const args = ["apply", "-input=false", "-no-color"];
  if (flags?.autoApprove !== false) args.push("-auto-approve");
  if (flags?.planFile) args.push(flags.planFile);
  return run(args, opts);
}

export function tfDestroy(opts: TfCliOptions, flags?: { autoApprove?: boolean }): Promise<TfCliResult> {
  const args = ["destroy", "-input=false", "-no-color"];
  if (flags?.autoApprove !== false) args.push("-auto-approve");
  return run(args, opts);
}

export function tfOutput(opts: TfCliOptions): Promise<TfCliResult> {
  return run(["output", "-no-color", "-json"], opts, true);
}

export function tfVersion(opts: TfCliOptions): Promise<TfCliResult> {
  return run(["version", "-json"], opts, true);
}

/** Check that terraform runs and report its version. */
export async function isTerraformInstalled(terraformBin?: string): Promise<{ installed: boolean; version?: string }> {
  const result = await tfVersion({ cwd: ".", terraformBin });
  if (!result.success) return { installed: false };
  const json = result.json;
  const version =
    typeof json === "object" && json !== null && "terraform_version" in json && typeof json.terraform_version === "string"
      ? json.terraform_version
      : result.stdout.trim();
  return { installed: true, version };
}

/**
 * Environment for a lab run: the admin password only ever travels as
 * TF_VAR_admin_password, never on the command line or in a .tf file.
 */
export function labTerraformEnv(options: { adminPassword?: string; subscriptionId?: string }): Record<string, string> {
  const env: Record<string, string> = {};
  if (options.adminPassword) env.TF_VAR_admin_password = options.adminPassword;
  if (options.subscriptionId) env.ARM_SUBSCRIPTION_ID = options.subscriptionId;
  return env;
}
