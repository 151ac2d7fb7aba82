export { loadAppConfig, parseAppConfig, serializeAppConfig } from "./config/app-config.js";
export {
	type GenerateOptions,
	generateAppConfig,
	readSiteFromInput,
	splitTopics,
	writeAppConfig,
} from "./config/builder.js";
export { defaultServer, docPathsFor } from "./config/doc-paths.js";
export { findSiteConfig } from "./config/root-discovery.js";
export * from "./config/types.js";
export { createPost, findTopic, MAIN_TOPIC, postFilename, postsDir, siteTopics } from "./content/post.js";
export { type ResolveOptions, resolveContentPaths } from "./content/resolver.js";
export { slugify, trimWhitespace } from "./content/slug.js";
export * from "./errors.js";
export * from "./logging/logger.js";
export { Manager } from "./manager.js";
export { createSiteTree, siteTreeDirectories } from "./storage/site-tree.js";
export {
	type ProtectionStrategy,
	posixModeProtection,
	readOnlyFlagProtection,
	selectProtection,
	writeProtected,
} from "./storage/protected-write.js";
