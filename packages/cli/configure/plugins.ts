import {
	CORE_PLUGINS,
	formatPluginKey,
	LSP_PLUGINS,
	type LspToolchain,
	type MarketplaceId,
	type PluginRecord,
	parsePluginEntry,
} from "@agent-setup/core"
import { consola } from "consola"
import type { ItemOutcome } from "@/configure/report"
import type { FeatureFlags } from "@/env"
import type { RegistryClient } from "@/registry/types"
import type { Sleep } from "@/utils/sleep"

/** Delay after each failed attempt while a marketplace propagates. */
export const INSTALL_RETRY_DELAYS_MS = [2000, 4000, 8000, 16_000] as const

export interface DesiredPlugins {
	plugins: PluginRecord[]
	rejected: ItemOutcome[]
}

/**
 * Core plugins, language servers for enabled toolchains, then extra entries.
 * Duplicates keep their first position; malformed extras are rejected here.
 */
export function resolveDesiredPlugins(options: {
	marketplace: MarketplaceId
	features: FeatureFlags
	extras: readonly string[]
}): DesiredPlugins {
	const toolchains: LspToolchain[] = ["python", "node", "rust", "kotlin"]
	const entries = [
		...CORE_PLUGINS,
		...toolchains
			.filter((toolchain) => options.features[toolchain])
			.map((toolchain) => LSP_PLUGINS[toolchain]),
		...options.extras,
	]

	const plugins: PluginRecord[] = []
	const rejected: ItemOutcome[] = []
	const seen = new Set<string>()

	for (const entry of entries) {
		const parsed = parsePluginEntry(entry, options.marketplace)
		if (!parsed.ok) {
			rejected.push({ name: entry, reason: parsed.error.message, status: "invalid" })
			continue
		}

		const key = formatPluginKey(parsed.value)
		if (!seen.has(key)) {
			seen.add(key)
			plugins.push(parsed.value)
		}
	}

	return { plugins, rejected }
}

/**
 * Install every plugin the registry does not already list. One failing
 * plugin never stops the others.
 */
export async function installPlugins(
	plugins: PluginRecord[],
	registry: RegistryClient,
	sleep: Sleep,
): Promise<ItemOutcome[]> {
	const listed = await registry.listPlugins()
	const installed = new Set(listed.ok ? listed.value : [])
	if (!listed.ok) {
		consola.warn(`Could not list installed plugins (${listed.error.kind}).`)
	}

	const outcomes: ItemOutcome[] = []
	for (const plugin of plugins) {
		const key = formatPluginKey(plugin)
		if (installed.has(key)) {
			consola.info(`Plugin ${key} already installed.`)
			outcomes.push({ name: key, status: "skipped" })
			continue
		}

		outcomes.push(await installWithRetry(plugin, registry, sleep))
	}

	return outcomes
}

/**
 * A "not found in marketplace" failure means the marketplace was registered
 * moments ago and has not propagated: retry with exponential backoff.
 * Any other failure is final for this plugin.
 */
export async function installWithRetry(
	plugin: PluginRecord,
	registry: RegistryClient,
	sleep: Sleep,
): Promise<ItemOutcome> {
	const key = formatPluginKey(plugin)
	consola.start(`Installing plugin ${key}...`)

	for (const delay of INSTALL_RETRY_DELAYS_MS) {
		const result = await registry.installPlugin(plugin)
		if (result.ok) {
			consola.success(`Installed plugin ${key}.`)
			return { name: key, status: "added" }
		}

		if (result.error.kind === "conflict") {
			consola.info(`Plugin ${key} already installed.`)
			return { name: key, status: "skipped" }
		}

		if (result.error.kind !== "transient") {
			consola.warn(`Failed to install plugin ${key} (${result.error.kind}).`)
			return { name: key, reason: result.error.kind, status: "failed" }
		}

		consola.info(`Plugin ${key} not yet in marketplace; waiting ${delay / 1000}s.`)
		await sleep(delay)
	}

	consola.warn(`Gave up on plugin ${key} after ${INSTALL_RETRY_DELAYS_MS.length} attempts.`)
	return { name: key, reason: "not found in marketplace", status: "failed" }
}
