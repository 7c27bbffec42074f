/**
 * In-process runner for dry runs and tests. Records every script and answers
 * with canned payloads per script name, clipped to the output Run Command
 * would return.
 */

import { ERROR_MARKER, RESULT_MARKER } from "../powershell/script.js";
import type { NodeTarget } from "../types.js";
import { clipToOutputLimit, toCommandResult } from "./payload.js";
import type { CommandResult, CommandRunner, RemoteScript } from "./types.js";

export type CannedAnswer = {
  /** Serialized as the result line. */
  payload?: Record<string, unknown>;
  /** Extra stdout printed before the result line. */
  stdout?: string;
  stderr?: string;
};

export type AnswerFn = (node: NodeTarget, script: RemoteScript) => CannedAnswer;

export type RecordedCall = {
  node: string;
  script: RemoteScript;
};

export class RecordingRunner implements CommandRunner {
  readonly calls: RecordedCall[] = [];
  private answers = new Map<string, Array<CannedAnswer | AnswerFn>>();

  constructor(private fallback: CannedAnswer = { payload: { ok: true } }) {}

  /**
   * Queue answers for a script name. `guest-shell` also matches
   * `guest-shell:<label>`. The last answer repeats once the queue is drained.
   */
  on(name: string, ...answers: Array<CannedAnswer | AnswerFn>): this {
    this.answers.set(name, answers);
    return this;
  }

  /** Answer that makes the script fail with a terminating error. */
  static failure(message: string): CannedAnswer {
    return { payload: { ok: false, error: message }, stderr: `${ERROR_MARKER} ${message}` };
  }

  scriptsRun(node?: string): string[] {
    return this.calls.filter((c) => node === undefined || c.node === node).map((c) => c.script.name);
  }

  async run(node: NodeTarget, script: RemoteScript): Promise<CommandResult> {
    this.calls.push({ node: node.name, script });

    const next = this.nextAnswer(script.name);
    const answer = typeof next === "function" ? next(node, script) : next;

    const lines: string[] = [];
    if (answer.stdout) lines.push(answer.stdout);
    if (answer.payload) lines.push(`${RESULT_MARKER} ${JSON.stringify({ ok: true, ...answer.payload })}`);

    return toCommandResult(node, script, clipToOutputLimit(lines.join("\n")), clipToOutputLimit(answer.stderr ?? ""), 0);
  }

  private nextAnswer(name: string): CannedAnswer | AnswerFn {
    const queue = this.answers.get(name) ?? this.answers.get(name.split(":")[0]);
    if (!queue || queue.length === 0) return this.fallback;
    return queue.length > 1 ? (queue.shift() ?? this.fallback) : queue[0];
  }
}
