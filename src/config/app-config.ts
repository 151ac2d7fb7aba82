import { readFile } from "node:fs/promises";
import { parse, stringify } from "yaml";
import { ConfigParseError, ioError } from "../errors.js";
import { type Logger, silentLogger } from "../logging/logger.js";
import type { AppConfig, DocPaths, Server, Site } from "./types.js";

const HEADER_COMMENT = "# topicsite site configuration\n";

const SITE_KEYS = ["name", "author", "template", "topics"] as const;
const SERVER_KEYS = ["bind", "port"] as const;
const DOCPATHS_KEYS = ["templates", "webroot"] as const;
const ROOT_KEYS = ["site", "server", "docpaths"] as const;

/**
 * Parse config.yaml content into an AppConfig.
 * Missing, mistyped and unknown fields are errors; nothing is defaulted.
 */
export function parseAppConfig(content: string, path?: string): AppConfig {
	let data: unknown;
	try {
		data = parse(content);
	} catch (err) {
		const detail = err instanceof Error ? err.message : String(err);
		throw new ConfigParseError(`failed to parse configuration: ${detail}`, path, { cause: err });
	}

	if (data === null || data === undefined) {
		throw new ConfigParseError("configuration document is empty", path);
	}
	const root = expectTable(data, "configuration", path);
	checkKeys(root, ROOT_KEYS, "configuration", path);

	const siteTable = expectTable(root.site, "site", path);
	checkKeys(siteTable, SITE_KEYS, "site", path);
	const site: Site = {
		name: expectString(siteTable.name, "site.name", path),
		author: expectString(siteTable.author, "site.author", path),
		template: expectString(siteTable.template, "site.template", path),
		topics: expectStringList(siteTable.topics, "site.topics", path),
	};

	const serverTable = expectTable(root.server, "server", path);
	checkKeys(serverTable, SERVER_KEYS, "server", path);
	const server: Server = {
		bind: expectString(serverTable.bind, "server.bind", path),
		port: expectPort(serverTable.port, "server.port", path),
	};

	const docpathsTable = expectTable(root.docpaths, "docpaths", path);
	checkKeys(docpathsTable, DOCPATHS_KEYS, "docpaths", path);
	const docpaths: DocPaths = {
		templates: expectString(docpathsTable.templates, "docpaths.templates", path),
		webroot: expectString(docpathsTable.webroot, "docpaths.webroot", path),
	};

	return { site, server, docpaths };
}

/**
 * Serialize an AppConfig to config.yaml content, keys in schema order.
 */
export function serializeAppConfig(config: AppConfig): string {
	const data = {
		site: {
			name: config.site.name,
			author: config.site.author,
			template: config.site.template,
			topics: [...config.site.topics],
		},
		server: {
			bind: config.server.bind,
			port: config.server.port,
		},
		docpaths: {
			templates: config.docpaths.templates,
			webroot: config.docpaths.webroot,
		},
	};
	return HEADER_COMMENT + stringify(data, { lineWidth: 0 });
}

/**
 * Read and parse the configuration file at `path`.
 */
export async function loadAppConfig(path: string, logger: Logger = silentLogger): Promise<AppConfig> {
	logger.debug(`Loading site configuration from ${path}`);
	let raw: string;
	try {
		raw = await readFile(path, "utf8");
	} catch (err) {
		throw ioError(path, "failed reading", err);
	}
	logger.trace("Parsing configuration YAML");
	return parseAppConfig(raw, path);
}

function expectTable(value: unknown, where: string, path?: string): Record<string, unknown> {
	if (value === undefined) {
		throw new ConfigParseError(`missing field '${where}'`, path);
	}
	if (value === null || typeof value !== "object" || Array.isArray(value)) {
		throw new ConfigParseError(`'${where}' must be a table`, path);
	}
	return Object.fromEntries(Object.entries(value));
}

function checkKeys(
	table: Record<string, unknown>,
	allowed: readonly string[],
	where: string,
	path?: string,
): void {
	for (const key of Object.keys(table)) {
		if (!allowed.includes(key)) {
			throw new ConfigParseError(`unknown field '${key}' in ${where}`, path);
		}
	}
}

function expectString(value: unknown, where: string, path?: string): string {
	if (value === undefined) {
		throw new ConfigParseError(`missing field '${where}'`, path);
	}
	if (typeof value !== "string") {
		throw new ConfigParseError(`'${where}' must be a string`, path);
	}
	return value;
}

function expectStringList(value: unknown, where: string, path?: string): string[] {
	if (value === undefined) {
		throw new ConfigParseError(`missing field '${where}'`, path);
	}
	if (!Array.isArray(value)) {
		throw new ConfigParseError(`'${where}' must be a list of strings`, path);
	}
	return value.map((entry, index) => expectString(entry, `${where}[${index}]`, path));
}

function expectPort(value: unknown, where: string, path?: string): number {
	if (value === undefined) {
		throw new ConfigParseError(`missing field '${where}'`, path);
	}
	if (typeof value !== "number" || !Number.isInteger(value) || value < 0 || value > 65535) {
		throw new ConfigParseError(`'${where}' must be an integer between 0 and 65535`, path);
	}
	return value;
}
