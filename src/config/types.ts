/**
 * File name of the site configuration, relative to the site's base directory.
 */
export const CONFIG_FILENAME = "config.yaml";

/**
 * Template reference written by the interactive generator.
 */
export const DEFAULT_TEMPLATE = "default.tmpl";

export const DEFAULT_BIND = "0.0.0.0";
export const DEFAULT_PORT = 9090;

/**
 * Site identity and topic list. Topic order is the order the author entered.
 */
export interface Site {
	name: string;
	author: string;
	template: string;
	topics: string[];
}

/**
 * Network binding consumed by the serving layer.
 */
export interface Server {
	bind: string;
	/** Unsigned 16-bit port. */
	port: number;
}

/**
 * Absolute template and webroot directories, both under one base directory.
 */
export interface DocPaths {
	templates: string;
	webroot: string;
}

export interface AppConfig {
	site: Site;
	server: Server;
	docpaths: DocPaths;
}

/**
 * Topic as seen by consumers of the webroot: display name plus directory slug.
 */
export interface TopicEntry {
	name: string;
	slug: string;
}
