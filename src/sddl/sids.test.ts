import { describe, it, expect } from "vitest";
import { isSidAlias, isStringSid, resolveSidAlias, sameSid, sidDisplayName, sidToAlias } from "./sids.js";
import { grantAccess } from "./editor.js";
import { formatSddl, parseSddl } from "./parser.js";

describe("SID aliases", () => {
  it("resolves well-known aliases in any case", () => {
    expect(resolveSidAlias("AU")).toBe("S-1-5-11");
    expect(resolveSidAlias("rm")).toBe("S-1-5-32-580");
  });

  it("passes string SIDs through in upper case", () => {
    expect(resolveSidAlias("s-1-5-21-1004336348-1177238915-682003330-1001")).toBe(
      "S-1-5-21-1004336348-1177238915-682003330-1001",
    );
  });

  it("resolves domain-relative aliases only with a domain SID", () => {
    expect(resolveSidAlias("DA")).toBeUndefined();
    expect(resolveSidAlias("DA", { domainSid: "S-1-5-21-1-2-3" })).toBe("S-1-5-21-1-2-3-512");
  });

  it("does not treat object prototype keys as aliases", () => {
    expect(resolveSidAlias("constructor")).toBeUndefined();
    expect(isSidAlias("constructor")).toBe(false);
    expect(isSidAlias("toString")).toBe(false);
  });

  it("knows aliases and string SIDs apart", () => {
    expect(isSidAlias("ba")).toBe(true);
    expect(isSidAlias("DU")).toBe(true);
    expect(isSidAlias("XX")).toBe(false);
    expect(isStringSid("S-1-5-32-544")).toBe(true);
    expect(isStringSid("BA")).toBe(false);
    expect(isStringSid("S-1-")).toBe(false);
  });

  it("maps well-known SIDs back to aliases", () => {
    expect(sidToAlias("S-1-5-11")).toBe("AU");
    expect(sidToAlias("s-1-5-32-544")).toBe("BA");
    expect(sidToAlias("S-1-5-21-1-2-3-1001")).toBe("S-1-5-21-1-2-3-1001");
  });

  it("names principals for display", () => {
    expect(sidDisplayName("RM")).toBe("Remote Management Users");
    expect(sidDisplayName("S-1-5-32-544")).toBe("Administrators");
    expect(sidDisplayName("DA")).toBe("Domain Admins");
    expect(sidDisplayName("S-1-5-21-1-2-3-1001")).toBeUndefined();
  });

  it("treats an alias and its string SID as the same principal", () => {
    expect(sameSid("AU", "S-1-5-11")).toBe(true);
    expect(sameSid("s-1-5-11", "au")).toBe(true);
    expect(sameSid("AU", "BU")).toBe(false);
    expect(sameSid("DA", "da")).toBe(true);
  });

  it("merges a grant for a string SID into the alias entry", () => {
    const sd = grantAccess(parseSddl("D:(A;;CC;;;AU)"), "S-1-5-11", 0x20);
    expect(formatSddl(sd)).toBe("D:(A;;CCWP;;;AU)");
  });
});
