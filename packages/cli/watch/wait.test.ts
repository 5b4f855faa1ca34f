import { mkdir, writeFile } from "node:fs/promises"
import { join } from "node:path"
import { describe, expect, it, vi } from "vitest"
import { abs, withTempDir } from "@/tests/helpers"
import {
	createFsEventsWaiter,
	createPollingWaiter,
	selectChangeWaiter,
	watchTargetFor,
	watchTargetsFor,
} from "@/watch/wait"

const unwatchable = () => {
	throw new Error("inotify unavailable")
}

describe("createPollingWaiter", () => {
	it("sleeps for the full wait and reports no change", async () => {
		const timer = vi.fn(async (_ms: number) => {})
		const waiter = createPollingWaiter(timer)

		expect(await waiter.waitForChange([{ dir: "/home/dev/.claude" }], 250)).toBe(false)
		expect(timer).toHaveBeenCalledWith(250)
	})
})

describe("createFsEventsWaiter", () => {
	it("resolves when the directory changes", async () => {
		await withTempDir(async (dir) => {
			const waiter = createFsEventsWaiter()

			const pending = waiter.waitForChange([{ dir }], 5000)
			await writeFile(join(dir, ".credentials.json"), "{}")

			expect(await pending).toBe(true)
		})
	})

	it("ignores other entries in a directory narrowed to one file", async () => {
		await withTempDir(async (dir) => {
			const waiter = createFsEventsWaiter()
			let settled = false

			const pending = waiter
				.waitForChange([{ dir, filename: ".claude.json" }], 5000)
				.then((changed) => {
					settled = true
					return changed
				})
			await writeFile(join(dir, ".bash_history"), "ls\n")
			await new Promise((resolve) => setTimeout(resolve, 100))
			expect(settled).toBe(false)

			await writeFile(join(dir, ".claude.json"), "{}")
			expect(await pending).toBe(true)
		})
	})

	it("resolves on the first of several directories to change", async () => {
		await withTempDir(async (home) => {
			const credentials = join(home, ".claude")
			await mkdir(credentials)
			const waiter = createFsEventsWaiter()

			const pending = waiter.waitForChange(
				[{ dir: credentials }, { dir: home, filename: ".claude.json" }],
				5000,
			)
			await writeFile(join(home, ".claude.json"), "{}")

			expect(await pending).toBe(true)
		})
	})

	it("falls back to a timed wait when the directory cannot be watched", async () => {
		const waiter = createFsEventsWaiter(unwatchable)

		expect(await waiter.waitForChange([{ dir: "/nowhere" }], 10)).toBe(false)
	})
})

describe("selectChangeWaiter", () => {
	it("uses fs events for a watchable directory", async () => {
		await withTempDir(async (dir) => {
			expect(selectChangeWaiter(dir).kind).toBe("fs-events")
		})
	})

	it("polls when watching is unavailable", () => {
		expect(selectChangeWaiter("/home/dev/.claude", unwatchable).kind).toBe("polling")
	})
})

describe("watchTargetFor", () => {
	it("watches the credential file's directory", () => {
		expect(watchTargetFor("/home/dev/.claude/.credentials.json")).toBe("/home/dev/.claude")
	})
})

describe("watchTargetsFor", () => {
	it("watches the credential directory and the general config file", () => {
		expect(
			watchTargetsFor({
				configFile: abs("/home/dev/.claude.json"),
				credentialsFile: abs("/home/dev/.claude/.credentials.json"),
			}),
		).toEqual([
			{ dir: "/home/dev/.claude" },
			{ dir: "/home/dev", filename: ".claude.json" },
		])
	})
})
