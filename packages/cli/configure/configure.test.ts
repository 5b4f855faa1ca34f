import { readFile } from "node:fs/promises"
import { describe, expect, it, vi } from "vitest"
import { runConfigure } from "@/configure/configure"
import type { CredentialProbe } from "@/credentials/probe"
import type { SetupConfig } from "@/env"
import { buildTestConfig, exists, FakeRegistry, scriptedProbe, withTempDir } from "@/tests/helpers"
import type { Sleep } from "@/utils/sleep"

const MARKET = "claude-plugins-official"

function configureWith(config: SetupConfig, registry: FakeRegistry, probe: CredentialProbe) {
	return runConfigure(
		{ force: false },
		{ config, probe, registry, sleep: vi.fn<Sleep>(async () => {}), templates: [] },
	)
}

describe("runConfigure", () => {
	it("sets everything up once credentials exist and writes the marker", async () => {
		await withTempDir(async (home) => {
			const config = buildTestConfig(home)
			const registry = new FakeRegistry()

			const report = await configureWith(config, registry, scriptedProbe(["token"]))

			expect(report.complete).toBe(true)
			expect(report.marketplace).toEqual({ name: MARKET, status: "added" })
			expect(report.plugins?.map((item) => item.status)).toEqual(["added", "added", "added"])
			expect(report.endpoints).toEqual([
				{ name: "filesystem", status: "added" },
				{ name: "figma-desktop", status: "added" },
			])
			expect(await exists(config.paths.markerFile)).toBe(true)
		})
	})

	it("makes no changes on a second run", async () => {
		await withTempDir(async (home) => {
			const config = buildTestConfig(home)
			const registry = new FakeRegistry()
			const probe = scriptedProbe(["token"])

			await configureWith(config, registry, probe)
			registry.calls.length = 0
			const report = await configureWith(config, registry, probe)

			expect(registry.callsTo("addMarketplace")).toEqual([])
			expect(registry.callsTo("installPlugin")).toEqual([])
			expect(registry.callsTo("addEndpoint")).toEqual([])
			expect(report.complete).toBe(true)
			expect(report.plugins?.every((item) => item.status === "skipped")).toBe(true)
		})
	})

	it("skips a plugin that is already installed", async () => {
		await withTempDir(async (home) => {
			const config = buildTestConfig(home)
			const registry = new FakeRegistry()
			registry.plugins.add(`security-guidance@${MARKET}`)

			const report = await configureWith(config, registry, scriptedProbe(["oauth"]))

			expect(report.plugins).toContainEqual({
				name: `security-guidance@${MARKET}`,
				status: "skipped",
			})
			expect(registry.callsTo("installPlugin").map((call) => call.target)).toEqual([
				`commit-commands@${MARKET}`,
				`pr-review-toolkit@${MARKET}`,
			])
		})
	})

	it("registers endpoints but leaves plugins alone without credentials", async () => {
		await withTempDir(async (home) => {
			const config = buildTestConfig(home)
			const registry = new FakeRegistry()

			const report = await configureWith(config, registry, scriptedProbe(["unauthenticated"]))

			expect(report.marketplace).toBeNull()
			expect(report.plugins).toBeNull()
			expect(report.complete).toBe(false)
			expect(registry.callsTo("listPlugins")).toEqual([])
			expect(registry.endpoints.has("filesystem")).toBe(true)
			expect(await exists(config.paths.markerFile)).toBe(false)
		})
	})

	it("attempts plugins when forced but does not mark completion", async () => {
		await withTempDir(async (home) => {
			const config = buildTestConfig(home)
			const registry = new FakeRegistry()

			const report = await runConfigure(
				{ force: true },
				{
					config,
					probe: scriptedProbe(["unauthenticated"]),
					registry,
					sleep: vi.fn<Sleep>(async () => {}),
					templates: [],
				},
			)

			expect(report.plugins?.map((item) => item.status)).toEqual(["added", "added", "added"])
			expect(report.complete).toBe(false)
			expect(await exists(config.paths.markerFile)).toBe(false)
		})
	})

	it("withholds the marker when a plugin fails", async () => {
		await withTempDir(async (home) => {
			const config = buildTestConfig(home)
			const registry = new FakeRegistry().fail("installPlugin", "permanent", {
				target: `pr-review-toolkit@${MARKET}`,
			})

			const report = await configureWith(config, registry, scriptedProbe(["token"]))

			expect(report.plugins).toContainEqual({
				name: `pr-review-toolkit@${MARKET}`,
				reason: "permanent",
				status: "failed",
			})
			expect(report.complete).toBe(false)
			expect(await exists(config.paths.markerFile)).toBe(false)
		})
	})

	it("does not let invalid extras block completion", async () => {
		await withTempDir(async (home) => {
			const config = buildTestConfig(home, { CLAUDE_EXTRA_PLUGINS: "bad name!" })
			const registry = new FakeRegistry()

			const report = await configureWith(config, registry, scriptedProbe(["token"]))

			expect(report.plugins?.[0]).toMatchObject({ name: "bad name!", status: "invalid" })
			expect(report.complete).toBe(true)
		})
	})

	it("references the bearer token in inline endpoint headers when one exists", async () => {
		await withTempDir(async (home) => {
			const config = buildTestConfig(home, {
				CLAUDE_USER_MCPS: "notes=https://notes.example.com/mcp",
			})
			const registry = new FakeRegistry()
			const probe = scriptedProbe(["token"], { bearer: "test-secret" })

			await configureWith(config, registry, probe)

			const document = JSON.parse(await readFile(config.paths.configFile, "utf8"))
			expect(document.mcpServers.notes.headers).toEqual({
				Authorization: "Bearer ${ANTHROPIC_AUTH_TOKEN}",
			})
		})
	})
})
