import { LabError } from "../errors.js";
import { isWmiPermissionName } from "../sddl/index.js";
import type { WmiPermissionName } from "../config/schema.js";

/** Commander parser for repeatable, comma separated options such as `--permissions Enable,MethodExecute`. */
export function parseList(value: string, previous: string[] = []): string[] {
  return [
    ...previous,
    ...value
      .split(",")
      .map((v) => v.trim())
      .filter((v) => v.length > 0),
  ];
}

export function parseWmiPermissions(names: readonly string[]): WmiPermissionName[] {
  if (names.length === 0) throw new LabError("--permissions needs at least one permission", "INVALID_PERMISSIONS");
  const permissions: WmiPermissionName[] = [];
  for (const name of names) {
    if (!isWmiPermissionName(name)) throw new LabError(`Unknown WMI permission ${name}`, "INVALID_PERMISSIONS");
    permissions.push(name);
  }
  return permissions;
}
