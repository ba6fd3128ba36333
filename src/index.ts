#!/usr/bin/env node
import { Command } from "commander";
import { registerBaselineCommand } from "./commands/baseline.js";
import { registerDetectCommand } from "./commands/detect.js";
import { registerHealthCommand } from "./commands/health.js";
import { registerInitCommand } from "./commands/init.js";
import { registerListCommand } from "./commands/list.js";
import { registerRunCommand } from "./commands/run.js";
import { registerValidateCommand } from "./commands/validate.js";

const program = new Command();

program
	.name("qgates")
	.description("Scoped static-analysis gates with baseline tracking")
	.version("0.1.0");

registerRunCommand(program);
registerDetectCommand(program);
registerListCommand(program);
registerValidateCommand(program);
registerHealthCommand(program);
registerBaselineCommand(program);
registerInitCommand(program);

// Default action: help
if (process.argv.length < 3) {
	process.argv.push("--help");
}

await program.parseAsync(process.argv);
