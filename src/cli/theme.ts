const COLORS = {
  reset: "\x1b[0m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  gray: "\x1b[90m",
} as const;

export type Theme = Record<"error" | "success" | "warn" | "info" | "muted", (s: string) => string>;

/** Colors only on a terminal, and never with `NO_COLOR` set. */
export function supportsColor(
  stream: { isTTY?: boolean } = process.stdout,
  env: NodeJS.ProcessEnv = process.env,
): boolean {
  if (env.NO_COLOR !== undefined && env.NO_COLOR !== "") return false;
  return stream.isTTY === true;
}

export function createTheme(colors: boolean): Theme {
  const paint = (color: string) => (s: string) => (colors ? `${color}${s}${COLORS.reset}` : s);
  return {
    error: paint(COLORS.red),
    success: paint(COLORS.green),
    warn: paint(COLORS.yellow),
    info: paint(COLORS.blue),
    muted: paint(COLORS.gray),
  };
}

export const theme: Theme = createTheme(supportsColor());
