import { join, resolve } from "node:path";
import { DEFAULT_BIND, DEFAULT_PORT, type DocPaths, type Server } from "./types.js";

/**
 * Derive the template and webroot directories from a site base directory.
 */
export function docPathsFor(baseDir: string): DocPaths {
	const base = resolve(baseDir);
	return {
		templates: join(base, "site", "templates"),
		webroot: join(base, "site", "webroot"),
	};
}

export function defaultServer(): Server {
	return { bind: DEFAULT_BIND, port: DEFAULT_PORT };
}
