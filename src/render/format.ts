const ANSI = {
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  magenta: "\x1b[35m",
  cyan: "\x1b[36m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
} as const;

export type Color = keyof typeof ANSI;

export type Paint = (text: string, color: Color) => string;

export function createPaint(enabled: boolean): Paint {
  return enabled ? (text, color) => `${ANSI[color]}${text}\x1b[0m` : (text) => text;
}

export function formatTokens(count: number): string {
  if (count >= 1_000_000) return `${(count / 1_000_000).toFixed(2)}M`;
  if (count >= 1_000) return `${(count / 1_000).toFixed(1)}K`;
  return String(count);
}

export function formatCost(cost: number, digits = 4): string {
  return `$${cost.toFixed(digits)}`;
}

export function formatCount(count: number): string {
  return count.toLocaleString("en-US");
}

/** MM/DD in local time. */
export function formatDay(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${month}/${day}`;
}

export function formatDuration(seconds: number): string {
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  return `${hours}h ${String(minutes).padStart(2, "0")}m`;
}

export const BAR_WIDTH = 20;

/** Percent is clamped to 100 for display. */
export function progressBar(percent: number): string {
  const clamped = Math.min(Math.max(percent, 0), 100);
  const filled = Math.floor(clamped / (100 / BAR_WIDTH));
  return "█".repeat(filled) + "░".repeat(BAR_WIDTH - filled);
}

export function levelColor(percent: number): Color {
  if (percent < 70) return "green";
  if (percent < 90) return "yellow";
  return "red";
}

export function shortModelName(model: string): string {
  return model.replaceAll("claude-", "").replaceAll("-20", " ").slice(0, 25);
}
