import { stat } from "node:fs/promises";
import { dirname, join, resolve } from "node:path";
import { SiteIOError } from "../errors.js";
import { CONFIG_FILENAME } from "./types.js";

/**
 * Path of the config.yaml governing `startDir`: the first one found in
 * `startDir` or any of its ancestors. A directory named config.yaml does not
 * count.
 */
export async function findSiteConfig(startDir: string): Promise<string> {
	const start = resolve(startDir);
	for (let dir = start; ; dir = dirname(dir)) {
		const candidate = join(dir, CONFIG_FILENAME);
		if (await isFile(candidate)) {
			return candidate;
		}
		if (dirname(dir) === dir) {
			break;
		}
	}
	throw new SiteIOError(
		start,
		`site is not initialized (no ${CONFIG_FILENAME} in '${start}' or above). Run \`topicsite new\`.`,
	);
}

async function isFile(path: string): Promise<boolean> {
	try {
		return (await stat(path)).isFile();
	} catch {
		return false;
	}
}
