import { buildDefaultEndpoints, formatPluginKey, listCatalogServers } from "@agent-setup/core"
import { consola } from "consola"
import { CommandResult, printOutcome } from "@/commands/types"
import { collectEndpoints } from "@/configure/endpoints"
import { resolveDesiredPlugins } from "@/configure/plugins"
import { markerExists } from "@/io/marker"
import { loadRuntime, type Runtime } from "@/runtime"

export async function statusCommand(): Promise<void> {
	consola.info("agent-setup status")

	const runtime = loadRuntime()
	if (runtime.status !== "completed") {
		printOutcome(runtime)
		return
	}

	const result = await statusWithRuntime(runtime.value)
	printOutcome(result)
}

export interface StatusSummary {
	credentials: string
	complete: boolean
	plugins: string[]
	endpoints: string[]
	invalid: string[]
}

export async function statusWithRuntime(
	runtime: Runtime,
): Promise<CommandResult<StatusSummary>> {
	const { config } = runtime
	const credentials = await runtime.probe.probe()
	const complete = await markerExists(config.paths.markerFile)

	const desired = resolveDesiredPlugins({
		extras: config.extraPlugins,
		features: config.features,
		marketplace: config.marketplace,
	})
	const endpoints = collectEndpoints({
		admin: config.endpoints.admin,
		defaults: buildDefaultEndpoints(config.paths.workspaceDir),
		user: config.endpoints.user,
	})

	const summary: StatusSummary = {
		complete,
		credentials,
		endpoints: endpoints.specs.map(
			(spec) => `${spec.name} (${spec.transport}, ${spec.provenance})`,
		),
		invalid: [...desired.rejected, ...endpoints.rejected].map((item) => item.name),
		plugins: desired.plugins.map(formatPluginKey),
	}

	const catalog = listCatalogServers().map(
		(server) => `${server.name}${server.envDocs ? ` [${server.envDocs}]` : ""}`,
	)

	consola.info(
		[
			`Credentials: ${summary.credentials}`,
			`Setup complete: ${summary.complete ? "yes" : "no"}`,
			`Plugins: ${summary.plugins.join(", ")}`,
			`Endpoints: ${summary.endpoints.join(", ")}`,
			...(summary.invalid.length > 0
				? [`Invalid entries: ${summary.invalid.join(", ")}`]
				: []),
			`Known endpoints: ${catalog.join(", ")}`,
		].join("\n"),
	)

	return CommandResult.completed(summary)
}
