import type {
	MarketplaceId,
	PluginRecord,
	Result,
	ServiceEndpointSpec,
} from "@agent-setup/core"
import type { RegistryError } from "@/types/errors"

export type RegistryResult<T> = Result<T, RegistryError>

/**
 * Client side of the assistant's plugin and endpoint registry.
 * Listings are never cached; every caller queries before it mutates.
 */
export interface RegistryClient {
	/** Names of the registered marketplaces. */
	listMarketplaces(): Promise<RegistryResult<string[]>>
	addMarketplace(id: MarketplaceId): Promise<RegistryResult<void>>
	/** Installed plugins as `name@marketplace` keys. */
	listPlugins(): Promise<RegistryResult<string[]>>
	installPlugin(plugin: PluginRecord): Promise<RegistryResult<void>>
	/** Names of the registered service endpoints. */
	listEndpoints(): Promise<RegistryResult<string[]>>
	addEndpoint(spec: ServiceEndpointSpec): Promise<RegistryResult<void>>
}
