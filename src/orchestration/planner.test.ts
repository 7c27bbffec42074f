import { describe, it, expect, beforeEach } from "vitest";
import {
  validatePlan,
  topologicalSort,
  flattenLayers,
  stepDependencies,
  isOutputRef,
  parseOutputRef,
  resolveStepParams,
  evaluateCondition,
} from "./planner.js";
import { registerStepType, clearStepRegistry } from "./registry.js";
import type { ExecutionPlan, PlanStep, StepStatus } from "./types.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function step(id: string, type: string, params: Record<string, unknown> = {}, dependsOn: string[] = []): PlanStep {
  return { id, type, name: id, params, dependsOn };
}

function plan(steps: PlanStep[], globalParams: Record<string, unknown> = {}): ExecutionPlan {
  return { id: "plan-1", name: "Test", description: "", steps, globalParams, createdAt: "2026-01-01T00:00:00.000Z" };
}

function registerTestSteps(): void {
  const handler = { execute: async () => ({}) };
  registerStepType(
    {
      id: "features",
      label: "Features",
      description: "",
      category: "host",
      parameters: [{ name: "node", type: "string", description: "", required: true }],
      outputs: [
        { name: "restartRequired", type: "boolean", description: "" },
        { name: "installed", type: "array", description: "" },
      ],
    },
    handler,
  );
  registerStepType(
    {
      id: "consume",
      label: "Consume",
      description: "",
      category: "host",
      parameters: [
        { name: "input", type: "string", description: "", required: true },
        { name: "mode", type: "string", description: "", required: true, default: "fast" },
      ],
      outputs: [],
    },
    handler,
  );
}

function codes(p: ExecutionPlan): string[] {
  return validatePlan(p).issues.map((i) => i.code);
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

describe("validatePlan", () => {
  beforeEach(() => {
    clearStepRegistry();
    registerTestSteps();
  });

  it("accepts a well-formed plan", () => {
    const result = validatePlan(
      plan([
        step("f", "features", { node: "n1" }),
        step("c", "consume", { input: "f.outputs.installed" }, ["f"]),
      ]),
    );
    expect(result).toEqual({ valid: true, issues: [] });
  });

  it("reports unknown step types", () => {
    expect(codes(plan([step("x", "nope")]))).toEqual(["UNKNOWN_STEP_TYPE"]);
  });

  it("reports missing required params but not ones with a default", () => {
    expect(codes(plan([step("f", "features")]))).toEqual(["MISSING_PARAM"]);
    expect(codes(plan([step("c", "consume", { input: "x" })]))).toEqual([]);
  });

  it("reports references to undefined globals", () => {
    expect(codes(plan([step("f", "features", { node: "$global.node" })]))).toEqual(["MISSING_GLOBAL"]);
    expect(codes(plan([step("f", "features", { node: "$global.node" })], { node: "n1" }))).toEqual([]);
  });

  it("reports self and unknown dependencies", () => {
    expect(codes(plan([step("f", "features", { node: "n1" }, ["f"])]))).toEqual(["SELF_DEP"]);
    expect(codes(plan([step("f", "features", { node: "n1" }, ["ghost"])]))).toEqual(["INVALID_DEP"]);
  });

  it("checks output references", () => {
    expect(codes(plan([step("c", "consume", { input: "ghost.outputs.x" })]))).toEqual(["UNKNOWN_OUTPUT_STEP"]);
    expect(
      codes(plan([step("f", "features", { node: "n1" }), step("c", "consume", { input: "f.outputs.nope" }, ["f"])])),
    ).toEqual(["INVALID_OUTPUT_NAME"]);
  });

  it("warns about an output reference without a declared dependency", () => {
    const result = validatePlan(
      plan([step("f", "features", { node: "n1" }), step("c", "consume", { input: "f.outputs.installed" })]),
    );
    expect(result.valid).toBe(true);
    expect(result.issues).toEqual([
      expect.objectContaining({ severity: "warning", code: "UNDECLARED_DEP", stepId: "c" }),
    ]);
  });

  it("checks conditions", () => {
    const missingStep = step("c", "consume", { input: "x" });
    missingStep.condition = { stepId: "ghost", check: "succeeded" };
    expect(codes(plan([missingStep]))).toEqual(["INVALID_CONDITION_STEP"]);

    const noOutput = step("c", "consume", { input: "x" }, ["f"]);
    noOutput.condition = { stepId: "f", check: "output-truthy" };
    expect(codes(plan([step("f", "features", { node: "n1" }), noOutput]))).toEqual(["INVALID_CONDITION"]);

    const badOutput = step("c", "consume", { input: "x" }, ["f"]);
    badOutput.condition = { stepId: "f", check: "output-truthy", outputName: "nope" };
    expect(codes(plan([step("f", "features", { node: "n1" }), badOutput]))).toEqual(["INVALID_OUTPUT_NAME"]);
  });

  it("reports cycles with their path", () => {
    const result = validatePlan(
      plan([step("a", "features", { node: "n1" }, ["b"]), step("b", "features", { node: "n1" }, ["a"])]),
    );
    expect(result.valid).toBe(false);
    expect(result.issues.find((i) => i.code === "CYCLE")?.message).toBe("Circular dependency detected: a -> b -> a");
  });

  it("reports duplicate step IDs", () => {
    expect(codes(plan([step("f", "features", { node: "n1" }), step("f", "features", { node: "n2" })]))).toEqual([
      "DUPLICATE_ID",
    ]);
  });
});

// ---------------------------------------------------------------------------
// Ordering
// ---------------------------------------------------------------------------

describe("topologicalSort", () => {
  it("layers steps so dependencies come first, keeping plan order within a layer", () => {
    const steps = [
      step("c", "t", {}, ["a", "b"]),
      step("b", "t"),
      step("a", "t"),
      step("d", "t", { x: "c.outputs.y" }),
    ];
    const layers = topologicalSort(steps);
    expect(layers.map((l) => l.map((s) => s.id))).toEqual([["b", "a"], ["c"], ["d"]]);
    expect(flattenLayers(layers).map((s) => s.id)).toEqual(["b", "a", "c", "d"]);
  });

  it("orders a step after the step its condition names", () => {
    const gated = step("restart", "t");
    gated.condition = { stepId: "features", check: "output-truthy", outputName: "restartRequired" };
    const order = flattenLayers(topologicalSort([gated, step("features", "t")]));
    expect(order.map((s) => s.id)).toEqual(["features", "restart"]);
  });

  it("throws on a cycle", () => {
    expect(() => topologicalSort([step("a", "t", {}, ["b"]), step("b", "t", {}, ["a"])])).toThrow(/Cycle detected/);
  });
});

describe("stepDependencies", () => {
  it("collects dependsOn, output references and the condition step", () => {
    const s = step("s", "t", { a: "x.outputs.one", b: "plain", c: 3 }, ["y"]);
    s.condition = { stepId: "z", check: "failed" };
    expect([...stepDependencies(s)].sort()).toEqual(["x", "y", "z"]);
  });
});

// ---------------------------------------------------------------------------
// References
// ---------------------------------------------------------------------------

describe("output references", () => {
  it("recognizes and parses references", () => {
    expect(isOutputRef("node1-features.outputs.restartRequired")).toBe(true);
    expect(isOutputRef("not a ref")).toBe(false);
    expect(isOutputRef("a.outputs.")).toBe(false);
    expect(parseOutputRef("ssh-key.outputs.publicKey")).toEqual({ sourceStepId: "ssh-key", outputName: "publicKey" });
    expect(parseOutputRef("C:\\Lab\\ISO")).toBeNull();
  });
});

describe("resolveStepParams", () => {
  const outputs = new Map<string, Record<string, unknown>>([["s2d", { poolName: "S2D on s2dlab-clu" }]]);

  it("resolves output references, globals and literals", () => {
    const s = step("v", "t", { pool: "s2d.outputs.poolName", cluster: "$global.clusterName", size: 200, path: "C:\\x" });
    expect(resolveStepParams(s, outputs, { clusterName: "s2dlab-clu" })).toEqual({
      pool: "S2D on s2dlab-clu",
      cluster: "s2dlab-clu",
      size: 200,
      path: "C:\\x",
    });
  });

  it("keeps an unknown global reference as written", () => {
    expect(resolveStepParams(step("v", "t", { a: "$global.nope" }), outputs, {})).toEqual({ a: "$global.nope" });
  });

  it("throws when the source step has no outputs", () => {
    expect(() => resolveStepParams(step("v", "t", { a: "ghost.outputs.x" }), outputs, {})).toThrow(
      'Cannot resolve "ghost.outputs.x": step "ghost" has no outputs yet',
    );
  });

  it("throws when the output is missing", () => {
    expect(() => resolveStepParams(step("v", "t", { a: "s2d.outputs.health" }), outputs, {})).toThrow(
      'Cannot resolve "s2d.outputs.health": output "health" not found in step "s2d"',
    );
  });
});

// ---------------------------------------------------------------------------
// Conditions
// ---------------------------------------------------------------------------

describe("evaluateCondition", () => {
  const states = new Map<string, { status: StepStatus }>([
    ["ok", { status: "succeeded" }],
    ["bad", { status: "failed" }],
  ]);
  const outputs = new Map<string, Record<string, unknown>>([["ok", { restartRequired: false, mode: "x" }]]);

  it("checks step status", () => {
    expect(evaluateCondition({ stepId: "ok", check: "succeeded" }, states, outputs)).toBe(true);
    expect(evaluateCondition({ stepId: "bad", check: "succeeded" }, states, outputs)).toBe(false);
    expect(evaluateCondition({ stepId: "bad", check: "failed" }, states, outputs)).toBe(true);
  });

  it("checks outputs", () => {
    expect(evaluateCondition({ stepId: "ok", check: "output-truthy", outputName: "restartRequired" }, states, outputs)).toBe(
      false,
    );
    expect(
      evaluateCondition({ stepId: "ok", check: "output-equals", outputName: "mode", expectedValue: "x" }, states, outputs),
    ).toBe(true);
    expect(evaluateCondition({ stepId: "bad", check: "output-truthy", outputName: "mode" }, states, outputs)).toBe(false);
  });
});
