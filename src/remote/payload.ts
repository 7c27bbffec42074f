/**
 * Result payload and error marker parsing for Run Command output.
 */

import type { ZodType, ZodTypeDef } from "zod";
import { RemoteCommandError } from "../errors.js";
import { ERROR_MARKER, RESULT_MARKER } from "../powershell/script.js";
import type { NodeTarget } from "../types.js";
import type { CommandResult, CommandRunner, RemoteScript } from "./types.js";

/** Run Command returns at most the last this-many bytes of stdout and of stderr. */
export const RUN_COMMAND_OUTPUT_LIMIT = 4096;

/** The part of `text` that Run Command hands back. */
export function clipToOutputLimit(text: string): string {
  const bytes = Buffer.from(text, "utf8");
  if (bytes.length <= RUN_COMMAND_OUTPUT_LIMIT) return text;
  return bytes.subarray(bytes.length - RUN_COMMAND_OUTPUT_LIMIT).toString("utf8");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse the last `##S2DLAB##` line of `stdout`. Returns undefined when there
 * is no such line or it was cut short (Azure keeps only the last 4 KB).
 */
export function extractPayload(stdout: string): unknown {
  const lines = stdout.split(/\r?\n/);
  for (let i = lines.length - 1; i >= 0; i--) {
    const line = lines[i].trim();
    if (!line.startsWith(RESULT_MARKER)) continue;
    try {
      return JSON.parse(line.slice(RESULT_MARKER.length).trim());
    } catch {
      return undefined;
    }
  }
  return undefined;
}

/** Message of the last `##S2DLAB-ERROR##` line in `stderr`. */
export function extractErrorMessage(stderr: string): string | undefined {
  const lines = stderr.split(/\r?\n/).map((l) => l.trim());
  for (let i = lines.length - 1; i >= 0; i--) {
    if (lines[i].startsWith(ERROR_MARKER)) return lines[i].slice(ERROR_MARKER.length).trim();
  }
  return undefined;
}

/**
 * Failure reported by a finished script: the error marker on stderr, or a
 * payload with `ok = false`. Undefined when the script succeeded.
 */
export function scriptFailure(stderr: string, payload: unknown): string | undefined {
  const marked = extractErrorMessage(stderr);
  if (marked !== undefined) return marked;
  if (isRecord(payload) && payload.ok === false) {
    return typeof payload.error === "string" ? payload.error : "script reported ok = false";
  }
  return undefined;
}

/**
 * Build a CommandResult from raw output, throwing `RemoteCommandError` on a
 * reported failure.
 */
export function toCommandResult(
  node: NodeTarget,
  script: RemoteScript,
  stdout: string,
  stderr: string,
  durationMs: number,
): CommandResult {
  const payload = extractPayload(stdout);
  const failure = scriptFailure(stderr, payload);
  if (failure !== undefined) {
    throw new RemoteCommandError(node.name, script.name, 1, failure);
  }
  return { exitCode: 0, stdout, stderr, payload, durationMs };
}

/**
 * Run a recipe and validate its payload. A missing payload is an error: every
 * recipe prints one.
 */
export async function runRecipe<T>(
  runner: CommandRunner,
  node: NodeTarget,
  script: RemoteScript,
  schema: ZodType<T, ZodTypeDef, unknown>,
): Promise<T> {
  const result = await runner.run(node, script);
  if (result.payload === undefined) {
    const clipped = Buffer.byteLength(result.stdout, "utf8") >= RUN_COMMAND_OUTPUT_LIMIT;
    throw new RemoteCommandError(
      node.name,
      script.name,
      result.exitCode,
      clipped
        ? `no result line in the last ${RUN_COMMAND_OUTPUT_LIMIT} bytes of output; the script printed too much`
        : "no result line in the output",
    );
  }
  const parsed = schema.safeParse(result.payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new RemoteCommandError(
      node.name,
      script.name,
      result.exitCode,
      `unexpected result: ${issue ? `${issue.path.join(".") || "(root)"}: ${issue.message}` : "invalid payload"}`,
    );
  }
  return parsed.data;
}
