import { readFile } from "node:fs/promises"
import { join } from "node:path"
import { describe, expect, it } from "vitest"
import { getAtPath, mergeAtPath, readJsonObject, updateJsonObject } from "@/io/json"
import { exists, withTempDir, writeFixture } from "@/tests/helpers"

describe("mergeAtPath", () => {
	it("creates intermediate objects and keeps siblings", () => {
		const document = { mcpServers: { other: { type: "stdio" } }, theme: "dark" }

		const merged = mergeAtPath(document, ["mcpServers", "notes"], { headers: { A: "1" } })

		expect(merged).toEqual({
			mcpServers: { notes: { headers: { A: "1" } }, other: { type: "stdio" } },
			theme: "dark",
		})
		expect(document.mcpServers).toEqual({ other: { type: "stdio" } })
	})

	it("replaces non-object values on the path", () => {
		expect(mergeAtPath({ mcpServers: "broken" }, ["mcpServers"], { a: 1 })).toEqual({
			mcpServers: { a: 1 },
		})
	})
})

describe("getAtPath", () => {
	it("returns undefined for missing segments", () => {
		expect(getAtPath({ a: { b: 1 } }, ["a", "b"])).toBe(1)
		expect(getAtPath({ a: { b: 1 } }, ["a", "c", "d"])).toBeUndefined()
	})
})

describe("readJsonObject", () => {
	it("returns null for a missing file", async () => {
		expect(await readJsonObject("/nonexistent/config.json")).toEqual({ ok: true, value: null })
	})

	it("rejects a non-object root", async () => {
		await withTempDir(async (dir) => {
			const file = join(dir, "list.json")
			await writeFixture(file, "[1, 2]")

			const result = await readJsonObject(file)

			expect(result.ok).toBe(false)
			if (result.ok) return
			expect(result.error.type).toBe("parse")
		})
	})
})

describe("updateJsonObject", () => {
	it("writes the merged document and preserves other keys", async () => {
		await withTempDir(async (dir) => {
			const file = join(dir, "config.json")
			await writeFixture(file, JSON.stringify({ numStartups: 3 }))

			const result = await updateJsonObject(file, (document) =>
				mergeAtPath(document, ["mcpServers", "notes"], { headers: { A: "1" } }),
			)

			expect(result).toEqual({ ok: true, value: true })
			expect(JSON.parse(await readFile(file, "utf8"))).toEqual({
				mcpServers: { notes: { headers: { A: "1" } } },
				numStartups: 3,
			})
		})
	})

	it("does not write when nothing changes", async () => {
		await withTempDir(async (dir) => {
			const file = join(dir, "config.json")

			const result = await updateJsonObject(file, (document) => document)

			expect(result).toEqual({ ok: true, value: false })
			expect(await exists(file)).toBe(false)
		})
	})
})
