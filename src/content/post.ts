import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import { monotonicFactory } from "ulidx";
import type { AppConfig, TopicEntry } from "../config/types.js";
import { ioError, UnknownTopicError } from "../errors.js";
import { type Logger, silentLogger } from "../logging/logger.js";
import { slugify, trimWhitespace } from "./slug.js";

/** Section that every site has, next to its configured topics. */
export const MAIN_TOPIC = "main";

const nextPostID = monotonicFactory();

/**
 * Topics with a posts directory: `main` first, then the configured topics.
 */
export function siteTopics(config: AppConfig): TopicEntry[] {
	return [
		{ name: MAIN_TOPIC, slug: MAIN_TOPIC },
		...config.site.topics.map((name) => ({ name, slug: slugify(name) })),
	];
}

/**
 * Look a topic up by display name or slug.
 */
export function findTopic(config: AppConfig, topic: string): TopicEntry {
	const wanted = slugify(trimWhitespace(topic));
	const found = siteTopics(config).find((entry) => entry.name === topic || entry.slug === wanted);
	if (!found) {
		throw new UnknownTopicError(topic);
	}
	return found;
}

/**
 * Directory holding the posts of `topic`.
 */
export function postsDir(config: AppConfig, topic: string): string {
	return join(config.docpaths.webroot, findTopic(config, topic).slug, "posts");
}

/**
 * Post file name: a lower-case ULID, so names sort by creation time, then the
 * slugified title.
 */
export function postFilename(title: string, id: string = nextPostID().toLowerCase()): string {
	const trimmed = trimWhitespace(title);
	if (trimmed === "") {
		throw new Error("post title must not be empty");
	}
	if (/[/\\]/.test(trimmed)) {
		throw new Error("post title must not contain path separators");
	}
	return `${id}-${slugify(trimmed)}.md`;
}

export interface CreatePostOptions {
	body?: string;
	id?: string;
	logger?: Logger;
}

/**
 * Create a Markdown post under the topic's posts directory. Never overwrites.
 */
export async function createPost(
	config: AppConfig,
	topic: string,
	title: string,
	options: CreatePostOptions = {},
): Promise<string> {
	const logger = options.logger ?? silentLogger;
	const path = join(postsDir(config, topic), postFilename(title, options.id));
	const heading = `# ${trimWhitespace(title)}\n`;
	const content = options.body ? `${heading}\n${options.body.trimEnd()}\n` : heading;

	logger.debug(`Creating post ${path}`);
	try {
		await writeFile(path, content, { encoding: "utf8", flag: "wx", mode: 0o644 });
	} catch (err) {
		throw ioError(path, "failed creating post", err);
	}
	return path;
}
