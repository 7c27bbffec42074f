import { describe, it, expect } from "vitest";
import { createTheme, supportsColor } from "./theme.js";

describe("theme", () => {
  it("colors text on a terminal", () => {
    expect(supportsColor({ isTTY: true }, {})).toBe(true);
    expect(createTheme(true).error("boom")).toBe("\x1b[31mboom\x1b[0m");
  });

  it("writes plain text when output is piped", () => {
    expect(supportsColor({}, {})).toBe(false);
    expect(supportsColor({ isTTY: false }, {})).toBe(false);
    expect(createTheme(false).success("done")).toBe("done");
  });

  it("honours NO_COLOR", () => {
    expect(supportsColor({ isTTY: true }, { NO_COLOR: "1" })).toBe(false);
    expect(supportsColor({ isTTY: true }, { NO_COLOR: "" })).toBe(true);
  });
});
