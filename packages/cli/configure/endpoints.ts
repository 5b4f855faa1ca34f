import {
	AUTH_TOKEN_REFERENCE,
	type HttpEndpointSpec,
	parseEndpointEntry,
	type ServiceEndpointSpec,
} from "@agent-setup/core"
import { consola } from "consola"
import type { ItemOutcome } from "@/configure/report"
import {
	getAtPath,
	isJsonObject,
	type JsonObject,
	mergeAtPath,
	updateJsonObject,
} from "@/io/json"
import type { RegistryClient } from "@/registry/types"

export interface EndpointSources {
	defaults: ServiceEndpointSpec[]
	admin: readonly string[]
	user: readonly string[]
}

export interface CollectedEndpoints {
	specs: ServiceEndpointSpec[]
	rejected: ItemOutcome[]
}

/**
 * Resolve defaults, administrator entries and user entries, in that order.
 * The first spec for a name wins; invalid entries never reach the registry.
 */
export function collectEndpoints(sources: EndpointSources): CollectedEndpoints {
	const specs: ServiceEndpointSpec[] = []
	const rejected: ItemOutcome[] = []

	const accept = (spec: ServiceEndpointSpec, origin: string) => {
		if (specs.some((existing) => existing.name === spec.name)) {
			consola.info(`Endpoint ${spec.name} from ${origin} list is already defined; ignoring.`)
			return
		}
		specs.push(spec)
	}

	for (const spec of sources.defaults) {
		accept(spec, "default")
	}

	const lists: Array<[string, readonly string[]]> = [
		["administrator", sources.admin],
		["user", sources.user],
	]
	for (const [origin, entries] of lists) {
		for (const entry of entries) {
			const parsed = parseEndpointEntry(entry)
			if (!parsed.ok) {
				consola.warn(`Rejected ${origin} endpoint "${entry}": ${parsed.error.message}`)
				rejected.push({ name: entry, reason: parsed.error.message, status: "invalid" })
				continue
			}
			accept(parsed.value, origin)
		}
	}

	return { rejected, specs }
}

export interface HeaderOptions {
	/** Whether `Authorization` may be injected at all. */
	autoAuth: boolean
	/** Whether a bearer token is available to reference. */
	bearerAvailable: boolean
}

function hasHeader(headers: Record<string, unknown>, name: string): boolean {
	const lowered = name.toLowerCase()
	return Object.keys(headers).some((key) => key.toLowerCase() === lowered)
}

/**
 * Merge an HTTP endpoint's headers into `mcpServers.<name>.headers`.
 * Existing headers survive unless a new header has the same name (in any case).
 * `Authorization` is injected as a reference to the token, and only for inline
 * URL entries that do not already carry one.
 */
export function applyEndpointHeaders(
	document: JsonObject,
	spec: HttpEndpointSpec,
	options: HeaderOptions,
): JsonObject {
	const current = getAtPath(document, ["mcpServers", spec.name, "headers"])
	const existing: JsonObject = isJsonObject(current) ? current : {}

	const incoming: Record<string, string> = { ...spec.headers }
	if (
		spec.provenance === "url" &&
		options.autoAuth &&
		options.bearerAvailable &&
		!hasHeader(spec.headers, "authorization") &&
		!hasHeader(existing, "authorization")
	) {
		incoming.Authorization = `Bearer ${AUTH_TOKEN_REFERENCE}`
	}

	if (Object.keys(incoming).length === 0) {
		return document
	}

	const merged: JsonObject = {}
	for (const [key, value] of Object.entries(existing)) {
		if (!hasHeader(incoming, key)) {
			merged[key] = value
		}
	}
	Object.assign(merged, incoming)

	return mergeAtPath(document, ["mcpServers", spec.name], { headers: merged })
}

export interface RegisterOptions extends HeaderOptions {
	registry: RegistryClient
	/** The JSON document holding user-scoped `mcpServers`. */
	configFile: string
}

/**
 * Query, then add each endpoint that is not registered yet. The registry's
 * add is not idempotent, so a conflict from a concurrent run counts as present.
 */
export async function registerEndpoints(
	specs: ServiceEndpointSpec[],
	options: RegisterOptions,
): Promise<ItemOutcome[]> {
	const listed = await options.registry.listEndpoints()
	const present = new Set(listed.ok ? listed.value : [])
	if (!listed.ok) {
		consola.warn(`Could not list endpoints (${listed.error.kind}).`)
	}

	const outcomes: ItemOutcome[] = []
	for (const spec of specs) {
		const outcome = present.has(spec.name)
			? { name: spec.name, status: "skipped" as const }
			: await addEndpoint(spec, options.registry)

		if (outcome.status === "failed" || spec.transport !== "http") {
			outcomes.push(outcome)
			continue
		}

		const headers = await updateJsonObject(options.configFile, (document) =>
			applyEndpointHeaders(document, spec, options),
		)
		if (!headers.ok) {
			consola.warn(`Failed to write headers for endpoint ${spec.name}: ${headers.error.message}`)
			outcomes.push({ name: spec.name, reason: "headers not written", status: "failed" })
			continue
		}
		if (headers.value) {
			consola.info(`Updated headers for endpoint ${spec.name}.`)
		}
		outcomes.push(outcome)
	}

	return outcomes
}

async function addEndpoint(
	spec: ServiceEndpointSpec,
	registry: RegistryClient,
): Promise<ItemOutcome> {
	const added = await registry.addEndpoint(spec)
	if (added.ok) {
		consola.success(`Registered endpoint ${spec.name}.`)
		return { name: spec.name, status: "added" }
	}

	if (added.error.kind === "conflict") {
		consola.info(`Endpoint ${spec.name} already registered.`)
		return { name: spec.name, status: "skipped" }
	}

	consola.warn(`Failed to register endpoint ${spec.name} (${added.error.kind}).`)
	return { name: spec.name, reason: added.error.kind, status: "failed" }
}
