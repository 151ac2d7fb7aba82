import { chmod, type FileHandle, open } from "node:fs/promises";
import { ioError } from "../errors.js";
import { type Logger, silentLogger } from "../logging/logger.js";

/**
 * Owner-exclusive write access, best effort where the platform has no
 * permission bits.
 */
export interface ProtectionStrategy {
	readonly name: "posix-mode" | "read-only-flag";
	write(content: string, dest: string, logger: Logger): Promise<void>;
}

/**
 * Opens the file with creation mode 0600 so it never exists with group or
 * other access. An existing file keeps its mode and is truncated.
 */
export const posixModeProtection: ProtectionStrategy = {
	name: "posix-mode",
	async write(content, dest, logger) {
		logger.trace(`Opening '${dest}' to write`);
		const handle = await openForWrite(dest, 0o600);
		try {
			await writeContent(handle, content, dest);
		} finally {
			await handle.close();
		}
		logger.trace("Content written to destination");
	},
};

/**
 * Writes normally, then clears the write bits. Guards against accidental
 * overwrite, not against readers.
 */
export const readOnlyFlagProtection: ProtectionStrategy = {
	name: "read-only-flag",
	async write(content, dest, logger) {
		logger.trace(`Opening '${dest}' to write`);
		const handle = await openForWrite(dest, 0o666);
		try {
			await writeContent(handle, content, dest);
		} finally {
			await handle.close();
		}
		logger.trace("Content written to destination");
		logger.trace("Setting read-only on destination file");
		try {
			await chmod(dest, 0o444);
		} catch (err) {
			throw ioError(dest, "failed setting read-only on", err);
		}
	},
};

export function selectProtection(platform: NodeJS.Platform = process.platform): ProtectionStrategy {
	return platform === "win32" ? readOnlyFlagProtection : posixModeProtection;
}

/**
 * Write `content` to `dest` with restricted permissions, ending it with a
 * newline when it has none.
 */
export async function writeProtected(
	content: string,
	dest: string,
	logger: Logger = silentLogger,
	strategy: ProtectionStrategy = selectProtection(),
): Promise<void> {
	logger.debug(`Writing protected file: ${dest}`);
	await strategy.write(content, dest, logger);
}

async function openForWrite(dest: string, mode: number): Promise<FileHandle> {
	try {
		return await open(dest, "w", mode);
	} catch (err) {
		throw ioError(dest, "failed to open for writing", err);
	}
}

async function writeContent(handle: FileHandle, content: string, dest: string): Promise<void> {
	try {
		await handle.writeFile(withTrailingNewline(content), "utf8");
	} catch (err) {
		throw ioError(dest, "failure writing", err);
	}
}

export function withTrailingNewline(content: string): string {
	return content.endsWith("\n") ? content : `${content}\n`;
}
