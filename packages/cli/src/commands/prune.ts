import type { Command } from "commander";
import { fail, openEngine } from "../engine.js";

export function registerPrune(program: Command): void {
  program
    .command("prune")
    .description("Trim archived lock snapshots per goal")
    .option("-m, --max <n>", "Snapshots to keep per goal (default: snapshots.max_per_goal)")
    .action(async (opts: { max?: string }) => {
      const chalk = (await import("chalk")).default;
      const max = opts.max === undefined ? undefined : Number.parseInt(opts.max, 10);
      if (max !== undefined && (!Number.isInteger(max) || max < 0)) {
        fail("Prune failed", new Error("--max must be a non-negative integer"));
      }
      try {
        const result = await openEngine().pruneSnapshots(max);
        console.log(
          `${chalk.green("Pruned")} ${result.removed} snapshot${result.removed === 1 ? "" : "s"} across ${result.goals} goal${result.goals === 1 ? "" : "s"}`
        );
      } catch (err) {
        fail("Prune failed", err);
      }
    });
}
