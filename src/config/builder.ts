import { join, resolve } from "node:path";
import { LinePrompter } from "../cli/prompt.js";
import { trimWhitespace } from "../content/slug.js";
import { GenerationError } from "../errors.js";
import { type Logger, silentLogger } from "../logging/logger.js";
import { createSiteTree } from "../storage/site-tree.js";
import { writeProtected } from "../storage/protected-write.js";
import { serializeAppConfig } from "./app-config.js";
import { defaultServer, docPathsFor } from "./doc-paths.js";
import { type AppConfig, CONFIG_FILENAME, DEFAULT_TEMPLATE, type Site } from "./types.js";

export const SITE_NAME_PROMPT = "Please enter a name for the site: ";
export const AUTHOR_PROMPT = "Please enter the site author's name: ";
export const TOPICS_PROMPT = "Please enter comma-separated site topics: ";

export interface GenerateOptions {
	/** Where prompts are written. Defaults to stdout. */
	output?: NodeJS.WritableStream;
	logger?: Logger;
}

/**
 * Split comma-separated topics, trimming each segment. Empty segments stay.
 */
export function splitTopics(csv: string): string[] {
	return csv.split(",").map(trimWhitespace);
}

/**
 * Ask for name, author and topics, in that order.
 */
export async function readSiteFromInput(
	prompter: LinePrompter,
	logger: Logger = silentLogger,
): Promise<Site> {
	const name = await prompter.ask(SITE_NAME_PROMPT);
	const author = await prompter.ask(AUTHOR_PROMPT);
	const topicsRaw = await prompter.ask(TOPICS_PROMPT);
	logger.debug(`Creating topic list from: ${topicsRaw}`);
	const site: Site = { name, author, template: DEFAULT_TEMPLATE, topics: splitTopics(topicsRaw) };
	logger.trace(`Site: ${JSON.stringify(site)}`);
	return site;
}

/**
 * Build a new site configuration from interactive input, create the site
 * tree under `baseDir` and write `<baseDir>/config.yaml`.
 *
 * There is no rollback: a failure leaves whatever was already created, and a
 * previous config.yaml is overwritten on success.
 */
export async function generateAppConfig(
	baseDir: string,
	input: NodeJS.ReadableStream,
	options: GenerateOptions = {},
): Promise<AppConfig> {
	const logger = options.logger ?? silentLogger;
	const base = resolve(baseDir);
	logger.info("Generating new site configuration");

	const docpaths = docPathsFor(base);
	logger.trace(`Site DocPaths: ${JSON.stringify(docpaths)}`);

	const prompter = new LinePrompter(input, options.output ?? process.stdout);
	let site: Site;
	try {
		site = await readSiteFromInput(prompter, logger);
	} finally {
		prompter.close();
	}

	const config: AppConfig = { site, server: defaultServer(), docpaths };

	try {
		await createSiteTree(config, logger);
	} catch (err) {
		throw new GenerationError("create-paths", `failed while creating site paths: ${describe(err)}`, {
			cause: err,
		});
	}

	try {
		await writeAppConfig(config, base, logger);
	} catch (err) {
		throw new GenerationError(
			"write-config",
			`failed to write site config to disk: ${describe(err)}`,
			{ cause: err },
		);
	}

	return config;
}

/**
 * Serialize `config` into `<baseDir>/config.yaml` with owner-only access.
 */
export async function writeAppConfig(
	config: AppConfig,
	baseDir: string,
	logger: Logger = silentLogger,
): Promise<string> {
	logger.info("Writing site configuration to disk");
	const configPath = join(resolve(baseDir), CONFIG_FILENAME);
	await writeProtected(serializeAppConfig(config), configPath, logger);
	return configPath;
}

function describe(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}
