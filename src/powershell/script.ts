/**
 * PowerShell script builder.
 *
 * Every script runs with `$ErrorActionPreference = 'Stop'` inside a
 * try/catch. Results travel back on a single stdout line:
 *
 *   ##S2DLAB## {"ok":true,...}
 *
 * A terminating error writes `##S2DLAB-ERROR## <message>` to stderr and
 * exits with code 1.
 */

import { psValue, type PsValue } from "./quote.js";

export const RESULT_MARKER = "##S2DLAB##";
export const ERROR_MARKER = "##S2DLAB-ERROR##";

export type ScriptKind = "powershell" | "shell";

export type PowerShellScript = {
  /** Recipe name, used in logs and errors. */
  name: string;
  lines: string[];
  kind: ScriptKind;
};

/** A raw PowerShell expression, written without quoting. */
export class PsExpr {
  constructor(readonly text: string) {}
}

export function ps(text: string): PsExpr {
  return new PsExpr(text);
}

export type ResultFields = Record<string, PsExpr | PsValue>;

const INDENT = "  ";

export class ScriptBuilder {
  private body: string[] = [];
  private depth = 1;

  constructor(private readonly name: string) {}

  /** Append lines at the current indentation. */
  line(...lines: string[]): this {
    for (const text of lines) this.body.push(text.length > 0 ? INDENT.repeat(this.depth) + text : "");
    return this;
  }

  comment(text: string): this {
    return this.line(`# ${text}`);
  }

  /** `$name = <literal>` */
  assign(variable: string, value: PsValue): this {
    return this.line(`$${variable} = ${psValue(value)}`);
  }

  /**
   * Open a block such as `if (...) {`; the callback fills its body.
   */
  block(header: string, fill: (b: this) => void): this {
    this.line(`${header} {`);
    this.depth++;
    fill(this);
    this.depth--;
    return this.line("}");
  }

  ifElse(condition: string, then: (b: this) => void, otherwise: (b: this) => void): this {
    this.line(`if (${condition}) {`);
    this.depth++;
    then(this);
    this.depth--;
    this.line("} else {");
    this.depth++;
    otherwise(this);
    this.depth--;
    return this.line("}");
  }

  /**
   * Emit the result payload. `ok` defaults to `$true`.
   */
  emitResult(fields: ResultFields): this {
    const entries: string[] = [];
    if (!("ok" in fields)) entries.push("ok = $true");
    for (const [key, value] of Object.entries(fields)) {
      entries.push(`${key} = ${value instanceof PsExpr ? value.text : psValue(value)}`);
    }
    return this.line(
      `Write-Output ('${RESULT_MARKER} ' + (@{ ${entries.join("; ")} } | ConvertTo-Json -Compress -Depth 6))`,
    );
  }

  build(): PowerShellScript {
    return {
      name: this.name,
      kind: "powershell",
      lines: [
        `# s2dlab: ${this.name}`,
        "$ErrorActionPreference = 'Stop'",
        "$ProgressPreference = 'SilentlyContinue'",
        "try {",
        ...this.body,
        "} catch {",
        `${INDENT}[Console]::Error.WriteLine('${ERROR_MARKER} ' + $_.Exception.Message)`,
        `${INDENT}Write-Output ('${RESULT_MARKER} ' + (@{ ok = $false; error = $_.Exception.Message } | ConvertTo-Json -Compress))`,
        `${INDENT}exit 1`,
        "}",
      ],
    };
  }
}

export function createScript(name: string): ScriptBuilder {
  return new ScriptBuilder(name);
}

/**
 * Plain shell script for Linux VMs (`RunShellScript`).
 */
export function createShellScript(name: string, body: string): PowerShellScript {
  return { name, kind: "shell", lines: ["#!/bin/bash", "set -euo pipefail", ...body.split(/\r?\n/)] };
}

export function renderScript(script: PowerShellScript): string {
  return `${script.lines.join("\n")}\n`;
}
