/**
 * Error types raised by the lab tooling.
 */

export class LabError extends Error {
  constructor(message: string, public code: string, public cause?: unknown) {
    super(message);
    this.name = "LabError";
  }
}

export class ConfigValidationError extends LabError {
  constructor(public issues: string[]) {
    super(`Invalid lab configuration:\n  - ${issues.join("\n  - ")}`, "INVALID_CONFIG");
    this.name = "ConfigValidationError";
  }
}

export class TerraformCommandError extends LabError {
  constructor(
    public command: string,
    public exitCode: number | null,
    public stderr: string,
  ) {
    super(`terraform ${command} failed (exit ${exitCode ?? "?"}): ${firstLine(stderr)}`, "TERRAFORM_FAILED");
    this.name = "TerraformCommandError";
  }
}

export class RemoteCommandError extends LabError {
  constructor(
    public node: string,
    public script: string,
    public exitCode: number,
    public stderr: string,
  ) {
    super(`${script} failed on ${node}: ${firstLine(stderr) || `exit code ${exitCode}`}`, "REMOTE_COMMAND_FAILED");
    this.name = "RemoteCommandError";
  }
}

export class SddlParseError extends LabError {
  constructor(message: string, public input: string, public position: number) {
    super(`${message} at position ${position}`, "SDDL_PARSE");
    this.name = "SddlParseError";
  }
}

export class StepExecutionError extends LabError {
  constructor(public stepId: string, message: string, cause?: unknown) {
    super(`Step "${stepId}": ${message}`, "STEP_FAILED", cause);
    this.name = "StepExecutionError";
  }
}

function firstLine(text: string): string {
  const line = text.split(/\r?\n/).find((l) => l.trim().length > 0);
  return line?.trim() ?? "";
}
