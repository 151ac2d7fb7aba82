import { stat } from "node:fs/promises";
import { dirname, join, resolve } from "node:path";
import { glob } from "glob";
import { PreconditionError } from "../errors.js";
import { type Logger, silentLogger } from "../logging/logger.js";

export interface ResolveOptions {
	/**
	 * Literal directory the pattern is relative to. Glob characters in it are
	 * not expanded, and matches come back as absolute paths.
	 */
	cwd?: string;
	logger?: Logger;
}

/**
 * Expand a glob pattern into existing paths, most recent first.
 *
 * Content files carry sortable, time-ascending name prefixes, so reverse
 * lexical order of the full path lists the newest entry first. The pattern's
 * parent directory must exist; a missing parent is a caller error rather than
 * an empty result. Unreadable entries are skipped. Nothing is cached.
 */
export async function resolveContentPaths(
	pattern: string,
	options: ResolveOptions = {},
): Promise<string[]> {
	const logger = options.logger ?? silentLogger;
	const shown = options.cwd === undefined ? pattern : join(options.cwd, pattern);
	logger.trace(`Verifying parent exists for pattern: ${shown}`);
	const parent =
		options.cwd === undefined ? dirname(pattern) : resolve(options.cwd, dirname(pattern));
	if (!(await isPresent(parent))) {
		throw new PreconditionError(shown, `no valid parent path for '${shown}'`);
	}

	logger.debug(`Building topic content list from ${shown}`);
	const matches = await glob(pattern, {
		dot: true,
		windowsPathsNoEscape: process.platform === "win32",
		cwd: options.cwd,
		absolute: options.cwd !== undefined,
	});
	for (const match of matches) {
		logger.trace(`Adding '${match}' to topic content list`);
	}

	logger.trace("Reversing topic content list for newest-first rendering");
	return matches.sort(compareLexical).reverse();
}

function compareLexical(a: string, b: string): number {
	if (a < b) {
		return -1;
	}
	return a > b ? 1 : 0;
}

async function isPresent(path: string): Promise<boolean> {
	try {
		await stat(path);
		return true;
	} catch {
		return false;
	}
}
