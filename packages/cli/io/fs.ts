import { randomUUID } from "node:crypto"
import { mkdir, readFile, rename, rm, stat, writeFile } from "node:fs/promises"
import path from "node:path"
import type { AbsolutePath } from "@agent-setup/core"
import type { IoResult } from "@/io/types"
import type { IoError } from "@/types/errors"

export type { IoError, IoResult } from "@/io/types"

type Stats = Awaited<ReturnType<typeof stat>>

function ioFailure(
	targetPath: string,
	operation: string,
	message: string,
	error?: unknown,
): { ok: false; error: IoError } {
	return {
		error: {
			message,
			operation,
			path: toAbsolutePath(targetPath),
			rawError: error instanceof Error ? error : undefined,
			type: "io",
		},
		ok: false,
	}
}

/** `null` when nothing exists at the path. */
export async function safeStat(targetPath: string): Promise<IoResult<Stats | null>> {
	try {
		return { ok: true, value: await stat(targetPath) }
	} catch (error) {
		if (hasErrorCode(error, "ENOENT") || hasErrorCode(error, "ENOTDIR")) {
			return { ok: true, value: null }
		}
		return ioFailure(targetPath, "stat", `Unable to access ${targetPath}.`, error)
	}
}

export async function pathExists(targetPath: string): Promise<IoResult<boolean>> {
	const stats = await safeStat(targetPath)
	return stats.ok ? { ok: true, value: stats.value !== null } : stats
}

export async function ensureDir(targetPath: string): Promise<IoResult<void>> {
	const stats = await safeStat(targetPath)
	if (!stats.ok) {
		return stats
	}
	if (stats.value) {
		return stats.value.isDirectory()
			? { ok: true, value: undefined }
			: ioFailure(targetPath, "mkdir", `Expected directory at ${targetPath}.`)
	}

	try {
		await mkdir(targetPath, { recursive: true })
		return { ok: true, value: undefined }
	} catch (error) {
		return ioFailure(targetPath, "mkdir", `Unable to create ${targetPath}.`, error)
	}
}

export async function readTextFile(targetPath: string): Promise<IoResult<string>> {
	const contents = await readOptionalTextFile(targetPath)
	if (!contents.ok) {
		return contents
	}
	return contents.value === null
		? ioFailure(targetPath, "readFile", `${targetPath} does not exist.`)
		: { ok: true, value: contents.value }
}

/**
 * Read a file that may legitimately be missing; a missing file is `null`.
 */
export async function readOptionalTextFile(
	targetPath: string,
): Promise<IoResult<string | null>> {
	try {
		return { ok: true, value: await readFile(targetPath, "utf8") }
	} catch (error) {
		if (hasErrorCode(error, "ENOENT")) {
			return { ok: true, value: null }
		}
		return ioFailure(targetPath, "readFile", `Unable to read ${targetPath}.`, error)
	}
}

export async function writeTextFile(
	targetPath: string,
	contents: string,
	options: { mode?: number } = {},
): Promise<IoResult<void>> {
	try {
		await writeFile(targetPath, contents, { encoding: "utf8", mode: options.mode })
		return { ok: true, value: undefined }
	} catch (error) {
		return ioFailure(targetPath, "writeFile", `Unable to write ${targetPath}.`, error)
	}
}

/**
 * Replace a file's contents through a sibling temp file and a rename, so
 * concurrent readers see either the old or the new document.
 */
export async function replaceTextFile(
	targetPath: string,
	contents: string,
): Promise<IoResult<void>> {
	const tempPath = `${targetPath}.${process.pid}.${randomUUID()}.tmp`
	const written = await writeTextFile(tempPath, contents, { mode: 0o600 })
	if (!written.ok) {
		return written
	}

	try {
		await rename(tempPath, targetPath)
		return { ok: true, value: undefined }
	} catch (error) {
		await rm(tempPath, { force: true })
		return ioFailure(targetPath, "rename", `Unable to replace ${targetPath}.`, error)
	}
}

/**
 * Create a file only if nothing exists at the path yet.
 * Returns `false` when the path was already taken.
 */
export async function createTextFile(
	targetPath: string,
	contents: string,
): Promise<IoResult<boolean>> {
	try {
		await writeFile(targetPath, contents, { encoding: "utf8", flag: "wx" })
		return { ok: true, value: true }
	} catch (error) {
		if (hasErrorCode(error, "EEXIST")) {
			return { ok: true, value: false }
		}
		return ioFailure(targetPath, "writeFile", `Unable to create ${targetPath}.`, error)
	}
}

export async function removePath(targetPath: string): Promise<IoResult<void>> {
	try {
		await rm(targetPath, { force: true, recursive: true })
		return { ok: true, value: undefined }
	} catch (error) {
		return ioFailure(targetPath, "rm", `Unable to remove ${targetPath}.`, error)
	}
}

export function toAbsolutePath(value: string): AbsolutePath {
	const resolved = path.isAbsolute(value) ? path.normalize(value) : path.resolve(value)
	return resolved as AbsolutePath
}

export function hasErrorCode(error: unknown, code: string): boolean {
	return (
		typeof error === "object" &&
		error !== null &&
		"code" in error &&
		(error as { code?: unknown }).code === code
	)
}
