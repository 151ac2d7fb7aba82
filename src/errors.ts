/**
 * Filesystem operation failed. `path` names the file or directory involved.
 */
export class SiteIOError extends Error {
	constructor(
		public readonly path: string,
		message: string,
		options?: ErrorOptions,
	) {
		super(message, options);
		this.name = "SiteIOError";
	}
}

/**
 * Configuration document is malformed or does not match the AppConfig schema.
 */
export class ConfigParseError extends Error {
	constructor(
		message: string,
		public readonly path?: string,
		options?: ErrorOptions,
	) {
		super(message, options);
		this.name = "ConfigParseError";
	}
}

/**
 * A content pattern's parent directory does not exist.
 */
export class PreconditionError extends Error {
	constructor(
		public readonly pattern: string,
		message: string,
	) {
		super(message);
		this.name = "PreconditionError";
	}
}

export class InputError extends Error {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = "InputError";
	}
}

/**
 * Wrap an unknown rejection as a SiteIOError naming `path`.
 */
export function ioError(path: string, action: string, err: unknown): SiteIOError {
	const detail = err instanceof Error ? err.message : String(err);
	return new SiteIOError(path, `${action} '${path}': ${detail}`, { cause: err });
}

export type GenerationStage = "create-paths" | "write-config";

/**
 * Interactive site generation failed partway. `stage` names the step; side
 * effects of earlier steps remain.
 */
export class GenerationError extends Error {
	constructor(
		public readonly stage: GenerationStage,
		message: string,
		options?: ErrorOptions,
	) {
		super(message, options);
		this.name = "GenerationError";
	}
}

/**
 * A topic name or slug that is neither `main` nor one of the site's topics.
 */
export class UnknownTopicError extends Error {
	constructor(public readonly topic: string) {
		super(`unknown topic: ${topic}`);
		this.name = "UnknownTopicError";
	}
}
