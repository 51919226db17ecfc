import type { Command } from "commander";
import type { ChalkInstance } from "chalk";
import type { GoalTreeNode } from "@waypoint/core";
import { fail, formatPercent, openEngine } from "../engine.js";

const STATE_COLORS = {
  draft: "gray",
  active: "green",
  completed: "cyan",
  archived: "dim",
} as const;

function printNode(chalk: ChalkInstance, node: GoalTreeNode, depth: number): void {
  const { goal } = node;
  const indent = "  ".repeat(depth + 1);
  const state = chalk[STATE_COLORS[goal.state]](goal.state);
  const lock = goal.is_locked ? chalk.yellow(" [locked]") : "";
  const roadmap = goal.has_sequential_steps ? chalk.magenta(" [roadmap]") : "";
  console.log(
    `${indent}${chalk.cyan(goal.id.slice(0, 10))}  ${goal.emoji ? `${goal.emoji} ` : ""}${goal.title}  ${chalk.dim(formatPercent(node.progress))}  ${state}${lock}${roadmap}`
  );
  for (const child of node.children) {
    printNode(chalk, child, depth + 1);
  }
}

export function registerGoals(program: Command): void {
  program
    .command("goals")
    .description("Show the goal tree with aggregated progress")
    .option("-r, --root <id>", "Only show the subtree under this goal")
    .action(async (opts: { root?: string }) => {
      const chalk = (await import("chalk")).default;
      try {
        const engine = openEngine();
        const tree = engine.tree(opts.root);
        if (tree.length === 0) {
          console.log(chalk.yellow("No goals yet."));
          return;
        }
        console.log(chalk.bold("\nGoals\n"));
        for (const node of tree) {
          printNode(chalk, node, 0);
        }
        console.log();
      } catch (err) {
        fail("Listing goals failed", err);
      }
    });

  program
    .command("add <title>")
    .description("Create a draft goal")
    .option("-p, --parent <id>", "Parent goal id")
    .option("-c, --category <category>", "Category")
    .option("--priority <priority>", "now, next or later")
    .action(async (title: string, opts: { parent?: string; category?: string; priority?: string }) => {
      const ora = (await import("ora")).default;
      const chalk = (await import("chalk")).default;
      const priority =
        opts.priority === "now" || opts.priority === "next" || opts.priority === "later"
          ? opts.priority
          : undefined;

      const spinner = ora("Creating goal...").start();

      try {
        const goal = await openEngine().createGoal({
          title,
          parentId: opts.parent ?? null,
          category: opts.category,
          priority,
        });
        spinner.succeed(`${chalk.green("Created")} ${chalk.cyan(goal.id)}  ${goal.title}`);
      } catch (err) {
        spinner.fail(`Failed: ${err instanceof Error ? err.message : String(err)}`);
        process.exit(1);
      }
    });

  program
    .command("show <id>")
    .description("Show a goal with its children, steps and dependencies")
    .action(async (id: string) => {
      const chalk = (await import("chalk")).default;
      try {
        const detail = openEngine().detail(id);
        const { goal } = detail;
        console.log(chalk.bold(`\n${goal.title}\n`));
        console.log(`  Id:        ${chalk.cyan(goal.id)}`);
        console.log(`  State:     ${goal.state}${goal.is_locked ? chalk.yellow(" (locked)") : ""}`);
        console.log(`  Kind:      ${goal.kind}`);
        console.log(`  Priority:  ${goal.priority}`);
        console.log(`  Progress:  ${formatPercent(detail.progress)}`);
        if (goal.target_date) console.log(`  Target:    ${goal.target_date}`);
        if (goal.body) console.log(`\n  ${goal.body.split("\n").join("\n  ")}`);

        if (detail.children.length > 0) {
          console.log(chalk.bold("\n  Subgoals:"));
          for (const child of detail.children) {
            console.log(`    ${chalk.cyan(child.id.slice(0, 10))}  ${child.title}  ${chalk.dim(child.state)}`);
          }
        }
        if (detail.steps.length > 0) {
          console.log(chalk.bold("\n  Steps:"));
          detail.steps.forEach((step, i) => {
            const marker = step.step_status === "current" ? chalk.green("→") : chalk.dim("✓");
            console.log(`    ${marker} ${i + 1}. ${step.title}`);
          });
        }
        if (detail.dependencies.incoming.length > 0) {
          console.log(chalk.bold("\n  Depends on:"));
          for (const dep of detail.dependencies.incoming) {
            console.log(`    ${chalk.cyan(dep.prerequisite_id.slice(0, 10))}  ${chalk.dim(dep.kind)}`);
          }
        }
        console.log();
      } catch (err) {
        fail("Showing goal failed", err);
      }
    });

  program
    .command("revisions <id>")
    .description("Show the revision history of a goal")
    .action(async (id: string) => {
      const chalk = (await import("chalk")).default;
      try {
        const revisions = openEngine().revisionHistory(id);
        if (revisions.length === 0) {
          console.log(chalk.yellow("No revisions."));
          return;
        }
        for (const rev of revisions) {
          console.log(`  ${chalk.dim(rev.created_at)}  ${chalk.bold(rev.summary)}`);
          if (rev.rationale) console.log(`    ${rev.rationale}`);
        }
      } catch (err) {
        fail("Reading revisions failed", err);
      }
    });
}
