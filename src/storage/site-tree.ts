import { mkdir } from "node:fs/promises";
import { join } from "node:path";
import type { AppConfig } from "../config/types.js";
import { slugify } from "../content/slug.js";
import { ioError } from "../errors.js";
import { type Logger, silentLogger } from "../logging/logger.js";

/**
 * Directories that make up a site tree, in creation order: the templates
 * directory, the static and main sections, then an `ext`/`posts` pair per topic.
 */
export function siteTreeDirectories(config: AppConfig): string[] {
	const { templates, webroot } = config.docpaths;
	const dirs = [
		templates,
		join(webroot, "static", "ext"),
		join(webroot, "main", "ext"),
		join(webroot, "main", "posts"),
	];
	for (const topic of config.site.topics) {
		const slug = slugify(topic);
		dirs.push(join(webroot, slug, "ext"), join(webroot, slug, "posts"));
	}
	return dirs;
}

/**
 * Create the site tree. Existing directories are left alone; missing parents
 * are created. Directories made before a failure stay on disk.
 */
export async function createSiteTree(
	config: AppConfig,
	logger: Logger = silentLogger,
): Promise<string[]> {
	logger.info("Creating site filesystem tree");
	const dirs = siteTreeDirectories(config);
	for (const dir of dirs) {
		logger.trace(`Creating directory ${dir}`);
		try {
			await mkdir(dir, { recursive: true });
		} catch (err) {
			throw ioError(dir, "failed creating directory", err);
		}
	}
	return dirs;
}
