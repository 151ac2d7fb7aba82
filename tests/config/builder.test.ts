import { mkdir, readFile, stat, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { PassThrough } from "node:stream";
import { describe, expect, test } from "vitest";
import { parseAppConfig } from "../../src/config/app-config.js";
import {
	AUTHOR_PROMPT,
	generateAppConfig,
	SITE_NAME_PROMPT,
	splitTopics,
	TOPICS_PROMPT,
} from "../../src/config/builder.js";
import { GenerationError, InputError, SiteIOError } from "../../src/errors.js";
import { captureStream, exists, inputOf, tempDir } from "../cli/test-utils.js";

async function isDir(path: string): Promise<boolean> {
	return (await stat(path)).isDirectory();
}

describe("splitTopics", () => {
	test("trims each segment", () => {
		expect(splitTopics("One, Two,  Three")).toEqual(["One", "Two", "Three"]);
	});

	test("keeps inner whitespace", () => {
		expect(splitTopics("One, Two, Three, And More")).toEqual(["One", "Two", "Three", "And More"]);
	});

	test("trims next-line but not byte-order marks", () => {
		expect(splitTopics("\u0085One\u0085,\uFEFFTwo")).toEqual(["One", "\uFEFFTwo"]);
	});

	test("keeps empty segments", () => {
		expect(splitTopics("One, Two,")).toEqual(["One", "Two", ""]);
		expect(splitTopics("")).toEqual([""]);
	});
});

describe("generateAppConfig", () => {
	test("builds config, tree and config file from input", async () => {
		const root = await tempDir("generate");
		const output = captureStream();
		const config = await generateAppConfig(root, inputOf("MySite\nAlice\nFoo, Bar\n"), {
			output: output.stream,
		});

		expect(config).toEqual({
			site: { name: "MySite", author: "Alice", template: "default.tmpl", topics: ["Foo", "Bar"] },
			server: { bind: "0.0.0.0", port: 9090 },
			docpaths: {
				templates: join(root, "site", "templates"),
				webroot: join(root, "site", "webroot"),
			},
		});
		expect(output.text()).toBe(`${SITE_NAME_PROMPT}\n${AUTHOR_PROMPT}\n${TOPICS_PROMPT}\n`);

		for (const dir of [
			"site/templates",
			"site/webroot/static/ext",
			"site/webroot/main/ext",
			"site/webroot/main/posts",
			"site/webroot/foo/ext",
			"site/webroot/foo/posts",
			"site/webroot/bar/ext",
			"site/webroot/bar/posts",
		]) {
			expect(await isDir(join(root, dir))).toBe(true);
		}

		const raw = await readFile(join(root, "config.yaml"), "utf8");
		expect(parseAppConfig(raw)).toEqual(config);
	});

	test("trims answers and slugifies multi-word topics", async () => {
		const root = await tempDir("generate-trim");
		const config = await generateAppConfig(
			root,
			inputOf("  Site Name  \r\n\tAuthor Name\r\nOne, Two, Three, And More\r\n"),
			{ output: captureStream().stream },
		);
		expect(config.site.name).toBe("Site Name");
		expect(config.site.author).toBe("Author Name");
		expect(config.site.topics).toEqual(["One", "Two", "Three", "And More"]);
		expect(await isDir(join(root, "site", "webroot", "and-more", "posts"))).toBe(true);
	});

	test("reads missing lines as empty answers", async () => {
		const root = await tempDir("generate-eof");
		const config = await generateAppConfig(root, inputOf("OnlyName\n"), {
			output: captureStream().stream,
		});
		expect(config.site.name).toBe("OnlyName");
		expect(config.site.author).toBe("");
		expect(config.site.topics).toEqual([""]);
	});

	test("overwrites an existing config file", async () => {
		const root = await tempDir("generate-twice");
		await generateAppConfig(root, inputOf("First\nAlice\nFoo\n"), { output: captureStream().stream });
		await generateAppConfig(root, inputOf("Second\nBob\nBar\n"), { output: captureStream().stream });

		const config = parseAppConfig(await readFile(join(root, "config.yaml"), "utf8"));
		expect(config.site.name).toBe("Second");
		expect(await isDir(join(root, "site", "webroot", "foo", "posts"))).toBe(true);
	});

	test("reports tree creation failures", async () => {
		const root = await tempDir("generate-tree-fail");
		await writeFile(join(root, "site"), "blocking file", "utf8");

		const err = await generateAppConfig(root, inputOf("MySite\nAlice\nFoo\n"), {
			output: captureStream().stream,
		}).catch((e: unknown) => e);

		expect(err).toBeInstanceOf(GenerationError);
		expect(err instanceof GenerationError ? err.stage : undefined).toBe("create-paths");
		expect(err instanceof Error ? err.message : "").toMatch(/^failed while creating site paths: /);
		expect(err instanceof Error ? err.cause : undefined).toBeInstanceOf(SiteIOError);
	});

	test("reports config persistence failures and leaves the tree", async () => {
		const root = await tempDir("generate-write-fail");
		await mkdir(join(root, "config.yaml"));

		const err = await generateAppConfig(root, inputOf("MySite\nAlice\nFoo\n"), {
			output: captureStream().stream,
		}).catch((e: unknown) => e);

		expect(err).toBeInstanceOf(GenerationError);
		expect(err instanceof GenerationError ? err.stage : undefined).toBe("write-config");
		expect(err instanceof Error ? err.message : "").toMatch(/^failed to write site config to disk: /);
		expect(await isDir(join(root, "site", "webroot", "foo", "ext"))).toBe(true);
	});

	test("fails with InputError and creates nothing when input breaks", async () => {
		const root = await tempDir("generate-input-fail");
		const input = new PassThrough();
		input.destroy(new Error("stdin closed"));

		const err = await generateAppConfig(root, input, { output: captureStream().stream }).catch(
			(e: unknown) => e,
		);
		expect(err).toBeInstanceOf(InputError);
		expect(await exists(join(root, "site"))).toBe(false);
		expect(await exists(join(root, "config.yaml"))).toBe(false);
	});
});
