import chalk from "chalk";
import Table from "cli-table3";
import type { RunSummary } from "../types";

const colors = {
  accent: chalk.cyan,
  muted: chalk.gray,
  success: chalk.green,
  value: chalk.white.bold,
};

/**
 * Start banner, drawn with the same box glyphs the tool flattens.
 */
export function createBanner(title: string = "ASCII-SCRUB"): string {
  const tagline = "terminal escapes out, box glyphs to ASCII";
  const width = Math.max(title.length, tagline.length) + 4;
  const row = (text: string, paint: (s: string) => string) =>
    `${colors.accent("║")}  ${paint(text.padEnd(width - 4))}  ${colors.accent("║")}`;

  return [
    colors.accent(`╔${"═".repeat(width)}╗`),
    row(title, colors.value),
    row(tagline, colors.muted),
    colors.accent(`╚${"═".repeat(width)}╝`),
  ].join("\n");
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  return `${(ms / 1000).toFixed(2)}s`;
}

export function createSummaryTable(summary: RunSummary): string {
  const table = new Table({
    head: [colors.accent.bold("METRIC"), colors.accent.bold("VALUE")],
    style: {
      head: [],
      border: ["gray"],
    },
  });

  table.push(
    ["Input", summary.inputPath],
    ["Output", summary.outputPath],
    ["Lines", colors.value(summary.lines.toString())],
    ["Escape sequences removed", colors.value(summary.escapesRemoved.toString())],
    ["Glyphs replaced", colors.value(summary.glyphsReplaced.toString())],
    ["Duration", colors.success(formatDuration(summary.durationMs))],
  );

  return table.toString();
}
