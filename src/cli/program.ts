import { resolve } from "node:path";
import { Command, Option } from "commander";
import type { AppConfig } from "../config/types.js";
import { createLogger, type Logger, levelFromVerbosity } from "../logging/logger.js";
import { Manager } from "../manager.js";

const READ_OUTPUT_FORMATS = ["text", "json"] as const;
const WRITE_OUTPUT_FORMATS = ["default", "path"] as const;

type ReadOutputFormat = (typeof READ_OUTPUT_FORMATS)[number];
type WriteOutputFormat = (typeof WRITE_OUTPUT_FORMATS)[number];

export interface CliIO {
	stdin: NodeJS.ReadableStream;
	stdout: NodeJS.WritableStream;
	stderr: NodeJS.WritableStream;
	cwd: string;
}

/**
 * Build the topicsite command tree. Streams and working directory are
 * injected so the CLI runs in-process.
 */
export function buildProgram(io: CliIO): Command {
	const program = new Command();
	const print = (line: string) => {
		io.stdout.write(`${line}\n`);
	};
	const logger = (): Logger =>
		createLogger({
			level: levelFromVerbosity(program.opts<{ verbose: number }>().verbose),
			sink: (line) => io.stderr.write(`${line}\n`),
		});
	const workDir = (): string => {
		const directory = program.opts<{ directory?: string }>().directory;
		return resolve(io.cwd, directory ?? ".");
	};
	const load = (config: string | undefined): Promise<Manager> =>
		Manager.Load(config ? resolve(io.cwd, config) : workDir(), logger());

	program
		.name("topicsite")
		.description("Generate topic-organized content sites")
		.option("-C, --directory <path>", "Run as if started in this path")
		.option(
			"-v, --verbose",
			"Increase log level. Default: INFO. -v = DEBUG, -vv = TRACE",
			increaseVerbosity,
			0,
		)
		.exitOverride()
		.configureOutput({
			writeOut: (str) => io.stdout.write(str),
			writeErr: (str) => io.stderr.write(str),
		});

	program
		.command("new")
		.description("Generate a site directory tree and configuration from prompted input")
		.action(async () => {
			const log = logger();
			log.info("Logging started");
			const manager = await Manager.Generate(workDir(), io.stdin, {
				output: io.stdout,
				logger: log,
			});
			print(`Created site '${manager.Config().site.name}' in ${manager.RootPath()}`);
		});

	program
		.command("check")
		.description("Load and validate a site configuration")
		.argument("[config]", "Path to config.yaml (default: nearest one above the working directory)")
		.addOption(outputOption(READ_OUTPUT_FORMATS, "text"))
		.action(async (config: string | undefined, opts: { output: ReadOutputFormat }) => {
			const manager = await load(config);
			if (opts.output === "json") {
				print(JSON.stringify(manager.Config(), null, 2));
				return;
			}
			for (const line of summarize(manager.Config(), manager.ConfigPath())) {
				print(line);
			}
		});

	program
		.command("list")
		.alias("ls")
		.description("List a topic's posts, newest first")
		.argument("[topic]", "Topic name or slug", "main")
		.option("--config <path>", "Path to config.yaml")
		.addOption(outputOption(READ_OUTPUT_FORMATS, "text"))
		.action(async (topic: string, opts: { config?: string; output: ReadOutputFormat }) => {
			const manager = await load(opts.config);
			const paths = await manager.ContentPaths(topic);
			if (opts.output === "json") {
				print(JSON.stringify(paths, null, 2));
				return;
			}
			for (const path of paths) {
				print(path);
			}
		});

	program
		.command("post")
		.description("Create a new post in a topic")
		.argument("<topic>", "Topic name or slug")
		.argument("<title>", "Post title")
		.option("--content <text>", "Post body")
		.option("--config <path>", "Path to config.yaml")
		.addOption(outputOption(WRITE_OUTPUT_FORMATS, "default"))
		.action(
			async (
				topic: string,
				title: string,
				opts: { content?: string; config?: string; output: WriteOutputFormat },
			) => {
				const manager = await load(opts.config);
				const path = await manager.CreatePost(topic, title, opts.content);
				print(opts.output === "path" ? path : `Created ${path}`);
			},
		);

	return program;
}

function outputOption(formats: readonly string[], fallback: string): Option {
	return new Option("-o, --output <format>", "Output format").choices(formats).default(fallback);
}

function increaseVerbosity(_value: string, previous: number): number {
	return previous + 1;
}

function summarize(config: AppConfig, configPath: string): string[] {
	return [
		`Config: ${configPath}`,
		`Site: ${config.site.name}`,
		`Author: ${config.site.author}`,
		`Template: ${config.site.template}`,
		`Topics: ${config.site.topics.join(", ")}`,
		`Server: ${config.server.bind}:${config.server.port}`,
		`Templates: ${config.docpaths.templates}`,
		`Webroot: ${config.docpaths.webroot}`,
	];
}
