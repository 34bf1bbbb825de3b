const ANSI_ESCAPE_PATTERN = /\u001B(?:[@-Z\\-_]|\[[0-?]*[ -/]*[@-~])/g;
const OSC_SEQUENCE_PATTERN = /\u001B\][^\u0007\u001B]*(?:\u0007|\u001B\\)/g;

export const ANSI = {
  reset: "\u001B[0m",
  bold: "\u001B[1m",
  green: "\u001B[32m",
  red: "\u001B[31m",
  cyan: "\u001B[36m",
  yellow: "\u001B[33m",
  gray: "\u001B[90m"
} as const;

export function stripAnsi(value: string): string {
  return value.replace(OSC_SEQUENCE_PATTERN, "").replace(ANSI_ESCAPE_PATTERN, "");
}

export function splitLines(output: string): string[] {
  return output.split(/\r?\n/);
}

export function parsePositiveInt(raw: string | undefined): number | null {
  if (!raw || !/^\d+$/.test(raw)) return null;
  const value = Number.parseInt(raw, 10);
  if (!Number.isSafeInteger(value) || value < 1) return null;
  return value;
}

export function parseNonNegativeInt(raw: string | undefined): number | null {
  if (!raw || !/^\d+$/.test(raw)) return null;
  const value = Number.parseInt(raw, 10);
  return Number.isSafeInteger(value) ? value : null;
}

export function parseSeconds(raw: string | undefined): number | undefined {
  if (!raw) return undefined;
  const value = Number.parseFloat(raw);
  return Number.isFinite(value) && value >= 0 ? value : undefined;
}

export function visibleLength(value: string): number {
  return Array.from(value).length;
}

export function defaultColorize(): boolean {
  return Boolean(process.stdout.isTTY) && process.env.NO_COLOR === undefined && process.env.TERM !== "dumb";
}

export function paint(text: string, color: string, colorize: boolean): string {
  if (!colorize || text.length === 0) return text;
  return `${color}${text}${ANSI.reset}`;
}
