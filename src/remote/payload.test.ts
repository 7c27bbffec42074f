import { describe, it, expect } from "vitest";
import { z } from "zod";
import { clipToOutputLimit, extractErrorMessage, extractPayload, runRecipe, scriptFailure } from "./payload.js";
import { RecordingRunner } from "./recording-runner.js";
import { createScript } from "../powershell/script.js";
import { RemoteCommandError } from "../errors.js";
import type { NodeTarget } from "../types.js";

const node: NodeTarget = { name: "s2dlab-node1", resourceGroup: "rg-s2d-lab", privateIp: "10.10.1.10" };

describe("extractPayload", () => {
  it("parses the last result line", () => {
    const stdout = [
      "Installing...",
      '##S2DLAB## {"ok":true,"step":1}',
      "noise",
      '  ##S2DLAB## {"ok":true,"step":2}\r',
      "",
    ].join("\n");
    expect(extractPayload(stdout)).toEqual({ ok: true, step: 2 });
  });

  it("returns undefined without a result line", () => {
    expect(extractPayload("just output\n")).toBeUndefined();
  });

  it("returns undefined for a truncated result line", () => {
    expect(extractPayload('##S2DLAB## {"ok":true,"warn')).toBeUndefined();
  });
});

describe("scriptFailure", () => {
  it("prefers the stderr marker", () => {
    expect(extractErrorMessage("warning\n##S2DLAB-ERROR## Access denied\n")).toBe("Access denied");
    expect(scriptFailure("##S2DLAB-ERROR## Access denied", { ok: false, error: "other" })).toBe("Access denied");
  });

  it("falls back to ok = false in the payload", () => {
    expect(scriptFailure("", { ok: false, error: "boom" })).toBe("boom");
    expect(scriptFailure("", { ok: false })).toBe("script reported ok = false");
  });

  it("treats plain stderr as success", () => {
    expect(scriptFailure("WARNING: something", { ok: true })).toBeUndefined();
  });
});

describe("RecordingRunner", () => {
  const script = createScript("configure-winrm").build();

  it("records calls and answers with the fallback", async () => {
    const runner = new RecordingRunner();
    const result = await runner.run(node, script);
    expect(result.payload).toEqual({ ok: true });
    expect(runner.scriptsRun("s2dlab-node1")).toEqual(["configure-winrm"]);
    expect(runner.scriptsRun("s2dlab-node2")).toEqual([]);
  });

  it("plays queued answers in order and repeats the last", async () => {
    const runner = new RecordingRunner().on("configure-winrm", { payload: { n: 1 } }, { payload: { n: 2 } });
    const payloads = [];
    for (let i = 0; i < 3; i++) payloads.push((await runner.run(node, script)).payload);
    expect(payloads).toEqual([{ ok: true, n: 1 }, { ok: true, n: 2 }, { ok: true, n: 2 }]);
  });

  it("matches labelled script names by their prefix", async () => {
    const runner = new RecordingRunner().on("guest-shell", (_node, s) => ({ payload: { name: s.name } }));
    const result = await runner.run(node, createScript("guest-shell:postinstall").build());
    expect(result.payload).toEqual({ ok: true, name: "guest-shell:postinstall" });
  });

  it("throws RemoteCommandError for a failure answer", async () => {
    const runner = new RecordingRunner().on("configure-winrm", RecordingRunner.failure("WinRM service missing"));
    await expect(runner.run(node, script)).rejects.toThrow(
      new RemoteCommandError("s2dlab-node1", "configure-winrm", 1, "WinRM service missing"),
    );
    await expect(runner.run(node, script)).rejects.toThrow("configure-winrm failed on s2dlab-node1: WinRM service missing");
  });
});

describe("clipToOutputLimit", () => {
  it("keeps the last 4096 bytes", () => {
    const text = `${"a".repeat(1000)}${"b".repeat(4096)}`;
    expect(clipToOutputLimit(text)).toBe("b".repeat(4096));
    expect(clipToOutputLimit("short")).toBe("short");
  });
});

describe("runRecipe", () => {
  const schema = z.object({ changed: z.boolean() });
  const script = createScript("create-cluster").build();

  it("returns the validated payload", async () => {
    const runner = new RecordingRunner().on("create-cluster", { payload: { changed: true } });
    expect(await runRecipe(runner, node, script, schema)).toEqual({ changed: true });
  });

  it("rejects a missing payload", async () => {
    const runner = new RecordingRunner().on("create-cluster", { stdout: "cut off" });
    await expect(runRecipe(runner, node, script, schema)).rejects.toThrow(
      "create-cluster failed on s2dlab-node1: no result line in the output",
    );
  });

  it("explains a result line lost to the output limit", async () => {
    const output = Array.from({ length: 80 }, (_, i) => `cloud-init[${1000 + i}]: ${"x".repeat(90)}`);
    const runner = new RecordingRunner().on("create-cluster", { payload: { changed: true, output } });

    await expect(runRecipe(runner, node, script, schema)).rejects.toThrow(
      "create-cluster failed on s2dlab-node1: no result line in the last 4096 bytes of output; the script printed too much",
    );
  });

  it("rejects a payload of the wrong shape", async () => {
    const runner = new RecordingRunner().on("create-cluster", { payload: { changed: "yes" } });
    await expect(runRecipe(runner, node, script, schema)).rejects.toThrow(
      "create-cluster failed on s2dlab-node1: unexpected result: changed: Expected boolean, received string",
    );
  });
});
