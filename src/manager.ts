import { stat } from "node:fs/promises";
import { dirname, join, resolve } from "node:path";
import { loadAppConfig } from "./config/app-config.js";
import { type GenerateOptions, generateAppConfig } from "./config/builder.js";
import { findSiteConfig } from "./config/root-discovery.js";
import { type AppConfig, CONFIG_FILENAME, type TopicEntry } from "./config/types.js";
import { createPost, postsDir, siteTopics } from "./content/post.js";
import { resolveContentPaths } from "./content/resolver.js";
import { type Logger, silentLogger } from "./logging/logger.js";

export class Manager {
	private constructor(
		private readonly rootPath: string,
		private readonly configPath: string,
		private readonly config: AppConfig,
		private readonly logger: Logger,
	) {}

	/**
	 * Load a site from a config file, or from the nearest config.yaml at or
	 * above a directory.
	 */
	static async Load(pathOrDir: string, logger: Logger = silentLogger): Promise<Manager> {
		const target = resolve(pathOrDir);
		const configPath = (await isDirectory(target)) ? await findSiteConfig(target) : target;
		const config = await loadAppConfig(configPath, logger);
		return new Manager(dirname(configPath), configPath, config, logger);
	}

	static async Generate(
		baseDir: string,
		input: NodeJS.ReadableStream,
		options: GenerateOptions = {},
	): Promise<Manager> {
		const logger = options.logger ?? silentLogger;
		const config = await generateAppConfig(baseDir, input, { ...options, logger });
		const rootPath = resolve(baseDir);
		return new Manager(rootPath, join(rootPath, CONFIG_FILENAME), config, logger);
	}

	Config(): AppConfig {
		return this.config;
	}

	RootPath(): string {
		return this.rootPath;
	}

	ConfigPath(): string {
		return this.configPath;
	}

	Topics(): TopicEntry[] {
		return siteTopics(this.config);
	}

	/**
	 * Markdown posts of a topic, newest first.
	 */
	async ContentPaths(topic: string): Promise<string[]> {
		return await resolveContentPaths("*.md", {
			cwd: postsDir(this.config, topic),
			logger: this.logger,
		});
	}

	async CreatePost(topic: string, title: string, body?: string): Promise<string> {
		return await createPost(this.config, topic, title, { body, logger: this.logger });
	}
}

async function isDirectory(path: string): Promise<boolean> {
	try {
		return (await stat(path)).isDirectory();
	} catch {
		return false;
	}
}
