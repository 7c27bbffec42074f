/**
 * HCL rendering for the generated Terraform configuration.
 */

/** A raw HCL expression (`var.location`, `azurerm_subnet.lab.id`), written unquoted. */
export class HclExpr {
  constructor(readonly text: string) {}
}

export function hclRef(text: string): HclExpr {
  return new HclExpr(text);
}

export type HclValue =
  | string
  | number
  | boolean
  | null
  | HclExpr
  | HclValue[]
  | { [key: string]: HclValue };

export type HclBlock = {
  type: string;
  labels?: string[];
  attributes?: Record<string, HclValue>;
  blocks?: HclBlock[];
  /** Rendered last, after nested blocks. */
  dependsOn?: HclExpr[];
};

const INDENT = "  ";
const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function quoteHcl(value: string): string {
  const escaped = value
    .replace(/\\/g, "\\\\")
    .replace(/"/g, '\\"')
    .replace(/\n/g, "\\n")
    .replace(/\r/g, "\\r")
    .replace(/\t/g, "\\t")
    .replace(/\$\{/g, () => "$${")
    .replace(/%\{/g, "%%{");
  return `"${escaped}"`;
}

function isExprOrScalar(value: HclValue): boolean {
  return value === null || value instanceof HclExpr || typeof value !== "object";
}

/**
 * Format a value. Objects span lines, indented relative to `depth`.
 */
export function formatValue(value: HclValue, depth = 0): string {
  if (value === null) return "null";
  if (value instanceof HclExpr) return value.text;
  if (typeof value === "string") return quoteHcl(value);
  if (typeof value === "number") {
    if (!Number.isFinite(value)) throw new RangeError(`Cannot write ${value} in HCL`);
    return String(value);
  }
  if (typeof value === "boolean") return String(value);
  if (Array.isArray(value)) {
    if (value.every(isExprOrScalar)) return `[${value.map((v) => formatValue(v, depth)).join(", ")}]`;
    const pad = INDENT.repeat(depth + 1);
    return `[\n${value.map((v) => `${pad}${formatValue(v, depth + 1)},`).join("\n")}\n${INDENT.repeat(depth)}]`;
  }

  const entries = Object.entries(value);
  if (entries.length === 0) return "{}";
  const keys = entries.map(([key]) => (IDENTIFIER.test(key) ? key : quoteHcl(key)));
  return `{\n${formatAssignments(keys, entries.map(([, v]) => v), depth + 1)}\n${INDENT.repeat(depth)}}`;
}

/** `key = value` lines with the equals signs aligned. */
function formatAssignments(keys: string[], values: HclValue[], depth: number): string {
  const width = Math.max(...keys.map((k) => k.length));
  const pad = INDENT.repeat(depth);
  return keys.map((key, i) => `${pad}${key.padEnd(width)} = ${formatValue(values[i], depth)}`).join("\n");
}

export function renderBlock(block: HclBlock, depth = 0): string {
  const pad = INDENT.repeat(depth);
  const header = [block.type, ...(block.labels ?? []).map(quoteHcl)].join(" ");
  const attributes = Object.entries(block.attributes ?? {});
  const nested = block.blocks ?? [];
  const dependsOn = block.dependsOn ?? [];

  if (attributes.length === 0 && nested.length === 0 && dependsOn.length === 0) {
    return `${pad}${header} {}`;
  }

  const sections: string[] = [];
  if (attributes.length > 0) {
    sections.push(formatAssignments(attributes.map(([k]) => k), attributes.map(([, v]) => v), depth + 1));
  }
  for (const child of nested) sections.push(renderBlock(child, depth + 1));
  if (dependsOn.length > 0) {
    sections.push(`${INDENT.repeat(depth + 1)}depends_on = ${formatValue(dependsOn, depth + 1)}`);
  }

  return `${pad}${header} {\n${sections.join("\n\n")}\n${pad}}`;
}

/** Blocks separated by blank lines, with a trailing newline. */
export function renderFile(blocks: HclBlock[], header?: string): string {
  const parts = blocks.map((b) => renderBlock(b));
  if (header) parts.unshift(header.split("\n").map((line) => `# ${line}`).join("\n"));
  return `${parts.join("\n\n")}\n`;
}
