import { type MarketplaceId, marketplaceNameFromId } from "@agent-setup/core"
import { consola } from "consola"
import type { ItemOutcome } from "@/configure/report"
import { readJsonObject } from "@/io/json"
import type { RegistryClient } from "@/registry/types"

/**
 * Register the marketplace unless the local record or the registry already
 * knows it. A concurrent registration surfacing as a conflict counts as present.
 */
export async function ensureMarketplace(
	id: MarketplaceId,
	knownMarketplacesFile: string,
	registry: RegistryClient,
): Promise<ItemOutcome> {
	const name = marketplaceNameFromId(id)

	const known = await readJsonObject(knownMarketplacesFile)
	if (known.ok && known.value && name in known.value) {
		consola.info(`Marketplace ${name} already registered.`)
		return { name, status: "skipped" }
	}

	const listed = await registry.listMarketplaces()
	if (listed.ok && listed.value.includes(name)) {
		consola.info(`Marketplace ${name} already registered.`)
		return { name, status: "skipped" }
	}
	if (!listed.ok) {
		consola.warn(`Could not list marketplaces (${listed.error.kind}); adding ${id} anyway.`)
	}

	consola.start(`Registering marketplace ${id}...`)
	const added = await registry.addMarketplace(id)
	if (added.ok) {
		consola.success(`Registered marketplace ${name}.`)
		return { name, status: "added" }
	}
	if (added.error.kind === "conflict") {
		return { name, status: "skipped" }
	}

	consola.warn(`Failed to register marketplace ${id} (${added.error.kind}).`)
	return { name, reason: added.error.kind, status: "failed" }
}
