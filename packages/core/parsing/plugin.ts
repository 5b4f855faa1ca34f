import type { MarketplaceId } from "../types/branded"
import { coerceMarketplaceId, coercePluginName } from "../types/coerce"
import type { PluginRecord } from "../types/endpoint"
import type { Result, ValidationError } from "../types/error"

/**
 * The name the assistant CLI registers a marketplace under:
 * the repository part of an `owner/repo` id, or the id itself.
 */
export function marketplaceNameFromId(id: MarketplaceId | string): string {
	return id.slice(id.lastIndexOf("/") + 1)
}

/**
 * Parse `name` or `name@marketplace` into a plugin record.
 * Bare names are installed from the default marketplace.
 */
export function parsePluginEntry(
	entry: string,
	defaultMarketplace: MarketplaceId,
): Result<PluginRecord, ValidationError> {
	const trimmed = entry.trim()
	const at = trimmed.indexOf("@")
	const rawName = at === -1 ? trimmed : trimmed.slice(0, at)
	const rawMarketplace = at === -1 ? undefined : trimmed.slice(at + 1)

	const name = coercePluginName(rawName)
	if (!name) {
		return {
			error: {
				field: "plugin",
				message: `Invalid plugin name "${rawName}".`,
				source: "manual",
				type: "validation",
			},
			ok: false,
		}
	}

	if (rawMarketplace === undefined) {
		return {
			ok: true,
			value: { marketplace: marketplaceNameFromId(defaultMarketplace), name },
		}
	}

	const marketplace = coerceMarketplaceId(rawMarketplace)
	if (!marketplace) {
		return {
			error: {
				field: "marketplace",
				message: `Invalid marketplace "${rawMarketplace}" for plugin "${name}".`,
				source: "manual",
				type: "validation",
			},
			ok: false,
		}
	}

	return { ok: true, value: { marketplace: marketplaceNameFromId(marketplace), name } }
}

export function formatPluginKey(plugin: PluginRecord): string {
	return `${plugin.name}@${plugin.marketplace}`
}
