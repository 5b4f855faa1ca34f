import type { Result } from "@agent-setup/core"
import {
	readOptionalTextFile,
	replaceTextFile,
	toAbsolutePath,
} from "@/io/fs"
import type { IoError, ParseError } from "@/types/errors"

export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject

export interface JsonObject {
	[key: string]: JsonValue
}

type JsonDocumentError = IoError | ParseError

export function isJsonObject(value: unknown): value is JsonObject {
	return typeof value === "object" && value !== null && !Array.isArray(value)
}

/**
 * Read a JSON document whose root must be an object.
 * A missing file is `null`.
 */
export async function readJsonObject(
	filePath: string,
): Promise<Result<JsonObject | null, JsonDocumentError>> {
	const contents = await readOptionalTextFile(filePath)
	if (!contents.ok) {
		return contents
	}

	if (contents.value === null) {
		return { ok: true, value: null }
	}

	let parsed: unknown
	try {
		parsed = JSON.parse(contents.value)
	} catch (error) {
		return {
			error: {
				message: `Invalid JSON in ${filePath}.`,
				path: toAbsolutePath(filePath),
				rawError: error instanceof Error ? error : undefined,
				source: "json",
				type: "parse",
			},
			ok: false,
		}
	}

	if (!isJsonObject(parsed)) {
		return {
			error: {
				message: `Expected a JSON object in ${filePath}.`,
				path: toAbsolutePath(filePath),
				source: "json",
				type: "parse",
			},
			ok: false,
		}
	}

	return { ok: true, value: parsed }
}

/**
 * Look up the value at a key path, or `undefined` when any segment is missing.
 */
export function getAtPath(document: JsonObject, keys: string[]): JsonValue | undefined {
	let current: JsonValue | undefined = document
	for (const key of keys) {
		if (!isJsonObject(current)) {
			return undefined
		}
		current = current[key]
	}
	return current
}

/**
 * Shallow-merge `patch` into the object at `keys`, creating intermediate
 * objects as needed. Returns a new document; the input is not modified.
 */
export function mergeAtPath(
	document: JsonObject,
	keys: string[],
	patch: JsonObject,
): JsonObject {
	const [head, ...rest] = keys
	if (head === undefined) {
		return { ...document, ...patch }
	}

	const child = document[head]
	const base = isJsonObject(child) ? child : {}
	return { ...document, [head]: mergeAtPath(base, rest, patch) }
}

/**
 * Read-merge-write: parse the document, apply `update`, and write it back
 * only when the result differs. Existing keys outside the update survive,
 * and a missing document is created only when there is something to write.
 */
export async function updateJsonObject(
	filePath: string,
	update: (document: JsonObject) => JsonObject,
): Promise<Result<boolean, JsonDocumentError>> {
	const current = await readJsonObject(filePath)
	if (!current.ok) {
		return current
	}

	const before = current.value ?? {}
	const after = update(before)
	if (JSON.stringify(before) === JSON.stringify(after)) {
		return { ok: true, value: false }
	}

	const written = await replaceTextFile(filePath, `${JSON.stringify(after, null, 2)}\n`)
	if (!written.ok) {
		return written
	}

	return { ok: true, value: true }
}
