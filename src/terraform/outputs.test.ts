import { describe, it, expect } from "vitest";
import { parseLabOutputs, parseValidation } from "./outputs.js";
import { TerraformCommandError } from "../errors.js";

function output(value: unknown) {
  return { sensitive: false, type: "string", value };
}

describe("parseLabOutputs", () => {
  it("maps terraform outputs to node targets", () => {
    const outputs = parseLabOutputs({
      resource_group_name: output("rg-s2d-lab"),
      node_names: output(["s2dlab-node1", "s2dlab-node2"]),
      node_private_ips: output(["10.10.1.10", "10.10.1.11"]),
      node_public_ips: output(["20.0.0.1", ""]),
    });
    expect(outputs).toEqual({
      resourceGroup: "rg-s2d-lab",
      nodes: [
        { name: "s2dlab-node1", resourceGroup: "rg-s2d-lab", privateIp: "10.10.1.10", publicIp: "20.0.0.1" },
        { name: "s2dlab-node2", resourceGroup: "rg-s2d-lab", privateIp: "10.10.1.11", publicIp: undefined },
      ],
    });
  });

  it("names missing outputs", () => {
    expect(() => parseLabOutputs({ resource_group_name: output("rg") })).toThrow(
      new TerraformCommandError("output", 0, "missing or invalid outputs: node_names, node_private_ips, node_public_ips"),
    );
  });

  it("rejects an empty state", () => {
    expect(() => parseLabOutputs({})).toThrow(TerraformCommandError);
  });

  it("rejects mismatched address lists", () => {
    expect(() =>
      parseLabOutputs({
        resource_group_name: output("rg"),
        node_names: output(["a", "b"]),
        node_private_ips: output(["10.10.1.10"]),
        node_public_ips: output([]),
      }),
    ).toThrow("node_private_ips has 1 entries for 2 nodes");
  });
});

describe("parseValidation", () => {
  it("splits diagnostics into errors and warnings", () => {
    const result = parseValidation({
      format_version: "1.0",
      valid: false,
      error_count: 1,
      warning_count: 1,
      diagnostics: [
        {
          severity: "error",
          summary: "Reference to undeclared input variable",
          detail: 'An input variable with the name "admin_pass" has not been declared.',
          range: { filename: "main.tf", start: { line: 42, column: 3 } },
        },
        { severity: "warning", summary: "Deprecated attribute" },
      ],
    });
    expect(result).toEqual({
      valid: false,
      errors: [
        'main.tf:42: Reference to undeclared input variable (An input variable with the name "admin_pass" has not been declared.)',
      ],
      warnings: ["Deprecated attribute"],
    });
  });

  it("accepts a valid result without diagnostics", () => {
    expect(parseValidation({ valid: true })).toEqual({ valid: true, errors: [], warnings: [] });
  });

  it("rejects output that is not a validation result", () => {
    expect(() => parseValidation(undefined)).toThrow("printed no validation result");
  });
});
