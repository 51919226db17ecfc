#!/usr/bin/env tsx

import { Command } from "commander";
import { registerGoals } from "./commands/goals.js";
import { registerLifecycle } from "./commands/lifecycle.js";
import { registerTimeline } from "./commands/timeline.js";
import { registerPrune } from "./commands/prune.js";
import { registerServe } from "./commands/serve.js";

const program = new Command();

program
  .name("waypoint")
  .description("Waypoint: goal graph with roadmaps, progress and timelines")
  .version("0.1.0");

registerGoals(program);
registerLifecycle(program);
registerTimeline(program);
registerPrune(program);
registerServe(program);

program.parse();
