import { describe, it, expect, vi, beforeEach } from "vitest";
import { ensureSuccess, isTerraformInstalled, labTerraformEnv, tfApply, tfInit, tfOutput } from "./cli-wrapper.js";
import { TerraformCommandError } from "../errors.js";
import { LabLoggerImpl, MemoryTransport, setGlobalLabLogger } from "../logging/index.js";

type ExecCallback = (error: Error | null, stdout: string, stderr: string) => void;

const { execFileMock } = vi.hoisted(() => ({ execFileMock: vi.fn() }));

vi.mock("node:child_process", () => ({ execFile: execFileMock }));

function answer(error: Error | null, stdout: string, stderr = "") {
  execFileMock.mockImplementationOnce((_file: string, _args: string[], _opts: unknown, callback: ExecCallback) => {
    callback(error, stdout, stderr);
  });
}

describe("terraform CLI wrapper", () => {
  const opts = { cwd: "/lab/terraform", env: { TF_VAR_admin_password: "test-secret" } };

  beforeEach(() => {
    execFileMock.mockReset();
    setGlobalLabLogger(new LabLoggerImpl({ subsystem: "s2dlab", transports: [new MemoryTransport()] }));
  });

  it("runs init non-interactively in the working directory", async () => {
    answer(null, "Terraform has been successfully initialized!");
    const result = await tfInit(opts);

    expect(result).toEqual({
      success: true,
      stdout: "Terraform has been successfully initialized!",
      stderr: "",
      exitCode: 0,
    });
    const [file, args, options] = execFileMock.mock.calls[0];
    expect(file).toBe("terraform");
    expect(args).toEqual(["init", "-input=false", "-no-color"]);
    expect(options).toMatchObject({
      cwd: "/lab/terraform",
      env: expect.objectContaining({ TF_IN_AUTOMATION: "1", TF_VAR_admin_password: "test-secret" }),
    });
  });

  it("auto-approves apply unless told not to", async () => {
    answer(null, "");
    answer(null, "");
    await tfApply(opts);
    await tfApply({ ...opts, terraformBin: "/usr/local/bin/terraform" }, { autoApprove: false });
    expect(execFileMock.mock.calls[0][1]).toEqual(["apply", "-input=false", "-no-color", "-auto-approve"]);
    expect(execFileMock.mock.calls[1][0]).toBe("/usr/local/bin/terraform");
    expect(execFileMock.mock.calls[1][1]).toEqual(["apply", "-input=false", "-no-color"]);
  });

  it("reports failures with the exit code and stderr", async () => {
    answer(Object.assign(new Error("Command failed"), { code: 1 }), "", "Error: Invalid provider configuration");
    const result = await tfApply(opts);
    expect(result).toEqual({
      success: false,
      stdout: "",
      stderr: "Error: Invalid provider configuration",
      exitCode: 1,
    });
    expect(() => ensureSuccess("apply", result)).toThrow(TerraformCommandError);
    expect(() => ensureSuccess("apply", result)).toThrow("terraform apply failed (exit 1): Error: Invalid provider configuration");
  });

  it("parses output -json", async () => {
    answer(null, '{"resource_group_name":{"sensitive":false,"type":"string","value":"rg-s2d-lab"}}');
    const result = await tfOutput(opts);
    expect(execFileMock.mock.calls[0][1]).toEqual(["output", "-no-color", "-json"]);
    expect(result.json).toEqual({ resource_group_name: { sensitive: false, type: "string", value: "rg-s2d-lab" } });
  });

  it("detects a missing binary", async () => {
    answer(Object.assign(new Error("spawn terraform ENOENT"), { code: "ENOENT" }), "", "");
    expect(await isTerraformInstalled()).toEqual({ installed: false });
  });

  it("reads the installed version", async () => {
    answer(null, '{"terraform_version":"1.9.5","platform":"linux_amd64"}');
    expect(await isTerraformInstalled()).toEqual({ installed: true, version: "1.9.5" });
  });
});

describe("labTerraformEnv", () => {
  it("passes secrets through TF_VAR variables only", () => {
    expect(labTerraformEnv({ adminPassword: "test-secret", subscriptionId: "sub-1" })).toEqual({
      TF_VAR_admin_password: "test-secret",
      ARM_SUBSCRIPTION_ID: "sub-1",
    });
    expect(labTerraformEnv({})).toEqual({});
  });
});
