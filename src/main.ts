#!/usr/bin/env node
import { CommanderError } from "commander";
import { buildProgram } from "./cli/program.js";

const program = buildProgram({
	stdin: process.stdin,
	stdout: process.stdout,
	stderr: process.stderr,
	cwd: process.cwd(),
});

try {
	await program.parseAsync(process.argv);
} catch (err) {
	// commander has already printed its own usage errors and help
	if (err instanceof CommanderError) {
		process.exit(err.exitCode);
	}
	if (err instanceof Error) {
		if (process.env.TOPICSITE_DEBUG === "1" && err.stack) {
			console.error(err.stack);
		} else {
			console.error(`Error: ${err.message}`);
		}
		process.exit(1);
	}
	console.error("Error: unknown failure");
	process.exit(1);
}
