import type { Command } from "commander";
import { fail, formatPercent, openEngine } from "../engine.js";

export function registerLifecycle(program: Command): void {
  program
    .command("lock <id>")
    .description("Freeze a goal's title and body")
    .action(async (id: string) => {
      const chalk = (await import("chalk")).default;
      try {
        const goal = await openEngine().lock(id);
        console.log(`${chalk.yellow("Locked")} ${goal.title}`);
        if (goal.locked_snapshot) console.log(chalk.dim(`  ${goal.locked_snapshot.rationale}`));
      } catch (err) {
        fail("Locking failed", err);
      }
    });

  program
    .command("unlock <id>")
    .description("Make a locked goal editable again")
    .option("--reason <text>", "Why the goal is being unlocked", "")
    .action(async (id: string, opts: { reason: string }) => {
      const chalk = (await import("chalk")).default;
      try {
        const goal = await openEngine().unlock(id, opts.reason);
        console.log(`${chalk.green("Unlocked")} ${goal.title}`);
      } catch (err) {
        fail("Unlocking failed", err);
      }
    });

  program
    .command("breakdown <id>")
    .description("Split a goal into subgoals proposed by the reasoning service")
    .action(async (id: string) => {
      const ora = (await import("ora")).default;
      const chalk = (await import("chalk")).default;

      const spinner = ora("Breaking down goal...").start();

      try {
        const result = await openEngine().breakDown(id);
        spinner.succeed(
          `${chalk.green("Created")} ${result.createdGoals.length} subgoals (${result.atomicTaskCount} atomic, ${result.dependencyCount} dependencies)`
        );
        for (const dropped of result.droppedDependencies) {
          console.log(chalk.yellow(`  Dropped ${dropped.prerequisite} -> ${dropped.dependent}: ${dropped.reason}`));
        }
      } catch (err) {
        spinner.fail(`Failed: ${err instanceof Error ? err.message : String(err)}`);
        process.exit(1);
      }
    });

  program
    .command("activate <id>")
    .description("Schedule focus sessions and mark the goal active")
    .action(async (id: string) => {
      const ora = (await import("ora")).default;
      const chalk = (await import("chalk")).default;

      const spinner = ora("Planning focus sessions...").start();

      try {
        const result = await openEngine().activate(id);
        spinner.succeed(`${chalk.green("Activated")} ${result.goal.title}`);
        for (const link of result.links) {
          console.log(`  ${chalk.dim(link.start)}  ${link.title}`);
        }
        for (const tip of result.tips) {
          console.log(chalk.dim(`  Tip: ${tip}`));
        }
      } catch (err) {
        spinner.fail(`Failed: ${err instanceof Error ? err.message : String(err)}`);
        process.exit(1);
      }
    });

  program
    .command("complete <id>")
    .description("Mark a goal completed")
    .action(async (id: string) => {
      const chalk = (await import("chalk")).default;
      try {
        const result = await openEngine().complete(id);
        console.log(`${chalk.green("Completed")} ${result.goal.title}`);
        if (result.parentProgress !== null) {
          console.log(chalk.dim(`  Parent progress: ${formatPercent(result.parentProgress)}`));
        }
      } catch (err) {
        fail("Completing failed", err);
      }
    });

  program
    .command("archive <id>")
    .description("Archive a goal")
    .option("--reason <text>", "Rationale recorded in the revision history")
    .action(async (id: string, opts: { reason?: string }) => {
      const chalk = (await import("chalk")).default;
      try {
        const goal = await openEngine().deactivate(id, "archived", opts.reason ?? null);
        console.log(`${chalk.dim("Archived")} ${goal.title}`);
      } catch (err) {
        fail("Archiving failed", err);
      }
    });

  const roadmap = program.command("roadmap").description("Work through a goal one step at a time");

  roadmap
    .command("start <id>")
    .description("Start a roadmap; without --step the first step is proposed")
    .option("-s, --step <title>", "Title of the first step")
    .option("--final", "The first step is also the last")
    .action(async (id: string, opts: { step?: string; final?: boolean }) => {
      const ora = (await import("ora")).default;
      const chalk = (await import("chalk")).default;

      const spinner = ora("Starting roadmap...").start();

      try {
        const step = await openEngine().startRoadmap(
          id,
          opts.step ? { title: opts.step, isFinalStep: opts.final === true } : undefined
        );
        spinner.succeed(`${chalk.green("First step:")} ${step.title}`);
      } catch (err) {
        spinner.fail(`Failed: ${err instanceof Error ? err.message : String(err)}`);
        process.exit(1);
      }
    });

  roadmap
    .command("next <id>")
    .description("Complete the current step and open the next one")
    .action(async (id: string) => {
      const ora = (await import("ora")).default;
      const chalk = (await import("chalk")).default;

      const spinner = ora("Completing step...").start();

      try {
        const result = await openEngine().completeCurrentStep(id);
        spinner.succeed(`${chalk.green("Done:")} ${result.completed_step.title}`);
        if (result.goal_completed) {
          console.log(chalk.bold("Roadmap complete."));
        } else if (result.new_step) {
          console.log(`${chalk.cyan("Next:")} ${result.new_step.title}`);
          if (result.new_step.body) console.log(chalk.dim(`  ${result.new_step.body}`));
        }
        for (const warning of result.warnings) {
          console.log(chalk.yellow(`  ${warning.message}`));
        }
        console.log(chalk.dim(`  Progress: ${formatPercent(result.progress)}`));
      } catch (err) {
        spinner.fail(`Failed: ${err instanceof Error ? err.message : String(err)}`);
        process.exit(1);
      }
    });
}
