import path from "node:path"
import { ensureDir, pathExists, removePath, writeTextFile } from "@/io/fs"
import type { IoResult } from "@/io/types"

/**
 * The completion marker is an empty file; only its presence matters.
 */
export async function markerExists(markerPath: string): Promise<boolean> {
	const exists = await pathExists(markerPath)
	return exists.ok && exists.value
}

export async function writeMarker(markerPath: string): Promise<IoResult<void>> {
	const dir = await ensureDir(path.dirname(markerPath))
	if (!dir.ok) {
		return dir
	}

	return writeTextFile(markerPath, "")
}

export async function removeMarker(markerPath: string): Promise<IoResult<void>> {
	return removePath(markerPath)
}
