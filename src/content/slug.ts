const WHITESPACE = /\p{White_Space}/gu;
const EDGE_WHITESPACE = /^\p{White_Space}+|\p{White_Space}+$/gu;

/**
 * Slugify a topic name: ASCII letters are lowercased and every Unicode
 * White_Space character becomes one hyphen. Nothing is trimmed or collapsed.
 *
 * Every topic-to-path mapping goes through this function.
 */
export function slugify(topic: string): string {
	return topic.replace(/[A-Z]/g, (ch) => ch.toLowerCase()).replace(WHITESPACE, "-");
}

/**
 * Strip leading and trailing Unicode White_Space, the same set `slugify`
 * replaces. Unlike `String.prototype.trim`, U+FEFF is kept and U+0085 removed.
 */
export function trimWhitespace(value: string): string {
	return value.replace(EDGE_WHITESPACE, "");
}
