import { buildDefaultEndpoints } from "@agent-setup/core"
import { consola } from "consola"
import { detectPlatformEndpoints } from "@/configure/autodetect"
import { collectEndpoints, registerEndpoints } from "@/configure/endpoints"
import { ensureMarketplace } from "@/configure/marketplace"
import { installPlugins, resolveDesiredPlugins } from "@/configure/plugins"
import type { ConfigureReport, ItemOutcome } from "@/configure/report"
import { materializeTemplates, TEMPLATE_UNITS, type TemplateUnit } from "@/configure/templates"
import type { CredentialProbe } from "@/credentials/probe"
import type { SetupConfig } from "@/env"
import { writeMarker } from "@/io/marker"
import type { RegistryClient } from "@/registry/types"
import { listRemoteUrls, type RemoteReader } from "@/utils/git"
import { type Sleep, sleep as defaultSleep } from "@/utils/sleep"

export interface ConfigureDeps {
	config: SetupConfig
	registry: RegistryClient
	probe: CredentialProbe
	sleep?: Sleep
	readRemotes?: RemoteReader
	templates?: TemplateUnit[]
}

export interface ConfigureOptions {
	/** Attempt marketplace and plugin steps even without detected credentials. */
	force: boolean
}

/**
 * Bring the assistant's configuration up to date. Every step is idempotent
 * and a failing step never stops the next one, so this is safe to run any
 * number of times from any trigger. The completion marker is written only
 * when an authenticated run registered the marketplace and no plugin failed.
 */
export async function runConfigure(
	options: ConfigureOptions,
	deps: ConfigureDeps,
): Promise<ConfigureReport> {
	const { config, registry } = deps
	const credentials = await deps.probe.probe()
	const authenticated = credentials !== "unauthenticated"

	let marketplace: ItemOutcome | null = null
	let plugins: ItemOutcome[] | null = null

	if (authenticated || options.force) {
		marketplace = await ensureMarketplace(
			config.marketplace,
			config.paths.knownMarketplacesFile,
			registry,
		)

		const desired = resolveDesiredPlugins({
			extras: config.extraPlugins,
			features: config.features,
			marketplace: config.marketplace,
		})
		for (const rejected of desired.rejected) {
			consola.warn(`Rejected plugin "${rejected.name}": ${rejected.reason ?? "invalid"}`)
		}
		const installed = await installPlugins(
			desired.plugins,
			registry,
			deps.sleep ?? defaultSleep,
		)
		plugins = [...desired.rejected, ...installed]
	} else {
		consola.info("No credentials yet; skipping marketplace and plugin setup.")
	}

	const collected = collectEndpoints({
		admin: config.endpoints.admin,
		defaults: buildDefaultEndpoints(config.paths.workspaceDir),
		user: config.endpoints.user,
	})

	if (config.autoDetect.enabled) {
		const detected = await detectPlatformEndpoints({
			depth: config.autoDetect.depth,
			readRemotes: deps.readRemotes ?? listRemoteUrls,
			root: config.autoDetect.root,
			tokens: config.autoDetect.tokens,
		})
		for (const spec of detected) {
			if (!collected.specs.some((existing) => existing.name === spec.name)) {
				collected.specs.push(spec)
			}
		}
	}

	const bearerAvailable =
		config.endpoints.autoAuth && (await deps.probe.bearerToken()) !== null
	const registered = await registerEndpoints(collected.specs, {
		autoAuth: config.endpoints.autoAuth,
		bearerAvailable,
		configFile: config.paths.configFile,
		registry,
	})

	const templates = await materializeTemplates(
		deps.templates ?? TEMPLATE_UNITS,
		config.features,
		config.paths,
	)

	let complete =
		authenticated &&
		marketplace !== null &&
		marketplace.status !== "failed" &&
		plugins !== null &&
		plugins.every((plugin) => plugin.status !== "failed")

	if (complete) {
		const marker = await writeMarker(config.paths.markerFile)
		if (!marker.ok) {
			consola.warn(`Could not write completion marker: ${marker.error.message}`)
			complete = false
		}
	}

	return {
		complete,
		credentials,
		endpoints: [...collected.rejected, ...registered],
		marketplace,
		plugins,
		templates,
	}
}
