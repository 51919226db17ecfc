import type { Command } from "commander";
import type { ChalkInstance } from "chalk";
import { addDays, format, parseISO } from "date-fns";
import type { DateHorizon, TimelineEntry } from "@waypoint/core";
import { fail, openEngine } from "../engine.js";

function horizonFrom(opts: { start?: string; end?: string; days: string }): DateHorizon {
  const start = opts.start ? parseISO(opts.start) : new Date();
  const days = Number.parseInt(opts.days, 10);
  const end = opts.end ? parseISO(opts.end) : addDays(start, Number.isFinite(days) ? days : 14);
  return { start, end };
}

function printEntry(chalk: ChalkInstance, entry: TimelineEntry): void {
  const span = `${format(parseISO(entry.start), "MMM d")} → ${format(parseISO(entry.end), "MMM d")}`;
  const confidence = entry.confidence === null ? "" : chalk.dim(` ${Math.round(entry.confidence * 100)}%`);
  console.log(`    ${chalk.dim(span.padEnd(16))} ${chalk.cyan(entry.kind.padEnd(10))} ${entry.title}${confidence}`);
  if (entry.metric_summary) console.log(`      ${chalk.dim(entry.metric_summary)}`);
  if (entry.intelligence?.recommended_action) {
    console.log(`      ${chalk.yellow("→")} ${entry.intelligence.recommended_action}`);
  }
}

export function registerTimeline(program: Command): void {
  program
    .command("timeline")
    .description("Project goals onto a date horizon")
    .option("-g, --goal <id>", "Only this goal")
    .option("--start <date>", "Horizon start (YYYY-MM-DD, default today)")
    .option("--end <date>", "Horizon end (YYYY-MM-DD)")
    .option("-d, --days <n>", "Horizon length when --end is not given", "14")
    .option("--enrich", "Annotate entries with the reasoning service")
    .action(async (opts: { goal?: string; start?: string; end?: string; days: string; enrich?: boolean }) => {
      const chalk = (await import("chalk")).default;
      try {
        const engine = openEngine();
        const horizon = horizonFrom(opts);
        const rows = opts.goal
          ? [
              {
                goal: engine.goal(opts.goal),
                entries: await engine.timelineEntries(opts.goal, horizon, { enrich: opts.enrich ?? false }),
              },
            ]
          : engine.timeline(horizon);

        console.log(
          chalk.bold(`\nTimeline ${format(horizon.start, "yyyy-MM-dd")} → ${format(horizon.end, "yyyy-MM-dd")}\n`)
        );
        if (rows.every((row) => row.entries.length === 0)) {
          console.log(chalk.yellow("  Nothing scheduled in this horizon."));
        }
        for (const row of rows) {
          if (row.entries.length === 0) continue;
          console.log(`  ${chalk.bold(row.goal.title)}`);
          for (const entry of row.entries) {
            printEntry(chalk, entry);
          }
        }
        console.log();
      } catch (err) {
        fail("Timeline failed", err);
      }
    });
}
