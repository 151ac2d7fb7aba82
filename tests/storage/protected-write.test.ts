import { readFile, stat, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { describe, expect, test } from "vitest";
import { SiteIOError } from "../../src/errors.js";
import {
	posixModeProtection,
	readOnlyFlagProtection,
	selectProtection,
	withTrailingNewline,
	writeProtected,
} from "../../src/storage/protected-write.js";
import { tempDir } from "../cli/test-utils.js";

describe("writeProtected", () => {
	test("appends a trailing newline", async () => {
		const path = join(await tempDir("write"), "out.txt");
		await writeProtected("line1", path);
		expect(await readFile(path, "utf8")).toBe("line1\n");
	});

	test("does not double an existing trailing newline", async () => {
		const path = join(await tempDir("write-nl"), "out.txt");
		await writeProtected("line1\n", path);
		expect(await readFile(path, "utf8")).toBe("line1\n");
	});

	test("truncates an existing file", async () => {
		const path = join(await tempDir("write-trunc"), "out.txt");
		await writeFile(path, "a much longer previous content\n", "utf8");
		await writeProtected("short", path);
		expect(await readFile(path, "utf8")).toBe("short\n");
	});

	test("creates the file without group or other access", async () => {
		const path = join(await tempDir("write-mode"), "config.yaml");
		await writeProtected("secret: value", path);
		const mode = (await stat(path)).mode & 0o777;
		if (process.platform === "win32") {
			// only the read-only flag exists there
			expect(mode & 0o222).toBe(0);
			return;
		}
		expect(mode & 0o077).toBe(0);
		expect(mode & 0o600).toBe(0o600);
	});

	test("names the path when the destination cannot be opened", async () => {
		const path = join(await tempDir("write-missing"), "no-such-dir", "out.txt");
		const err = await writeProtected("x", path).catch((e: unknown) => e);
		expect(err).toBeInstanceOf(SiteIOError);
		expect(err instanceof SiteIOError ? err.path : undefined).toBe(path);
		expect(err instanceof Error ? err.message : "").toContain(`failed to open for writing '${path}'`);
	});
});

describe("protection strategies", () => {
	test("selects read-only flag on win32 and mode bits elsewhere", () => {
		expect(selectProtection("win32").name).toBe("read-only-flag");
		expect(selectProtection("linux").name).toBe("posix-mode");
		expect(selectProtection("darwin")).toBe(posixModeProtection);
	});

	test("read-only flag strategy clears write bits after writing", async () => {
		const path = join(await tempDir("write-ro"), "out.txt");
		await writeProtected("content", path, undefined, readOnlyFlagProtection);
		expect(await readFile(path, "utf8")).toBe("content\n");
		expect((await stat(path)).mode & 0o222).toBe(0);
	});

	test("withTrailingNewline only adds a missing newline", () => {
		expect(withTrailingNewline("")).toBe("\n");
		expect(withTrailingNewline("a")).toBe("a\n");
		expect(withTrailingNewline("a\n")).toBe("a\n");
		expect(withTrailingNewline("a\r\n")).toBe("a\r\n");
	});
});
