/**
 * @agent-setup/core
 *
 * Shared types, validation, and the endpoint catalog for assistant setup.
 */

export {
	buildCatalogEndpoint,
	buildDefaultEndpoints,
	type CatalogServer,
	findPlatformForHost,
	listCatalogServers,
	lookupCatalogServer,
	type PackageRunner,
	type PlatformDefinition,
	type PlatformId,
} from "./catalog/servers"
export {
	AUTH_TOKEN_REFERENCE,
	CORE_PLUGINS,
	DEFAULT_MARKETPLACE_ID,
	ENDPOINT_NAME_PATTERN,
	LSP_PLUGINS,
	type LspToolchain,
} from "./constants"
export {
	derivePassthroughName,
	parseEndpointEntry,
	splitList,
} from "./parsing/endpoint"
export {
	formatPluginKey,
	marketplaceNameFromId,
	parsePluginEntry,
} from "./parsing/plugin"
export type {
	AbsolutePath,
	EndpointName,
	EndpointUrl,
	MarketplaceId,
	NonEmptyString,
	PackageId,
	PluginName,
} from "./types/branded"
export {
	coerceAbsolutePath,
	coerceEndpointName,
	coerceEndpointUrl,
	coerceMarketplaceId,
	coercePackageId,
	coercePluginName,
	isHeaderName,
	isHeaderValue,
	isLoopbackHost,
} from "./types/coerce"
export type {
	EndpointProvenance,
	EndpointTransport,
	HttpEndpointSpec,
	PluginRecord,
	ServiceEndpointSpec,
	StdioEndpointSpec,
} from "./types/endpoint"
export type {
	BaseError,
	CoreError,
	IoError,
	NotFoundError,
	ParseError,
	Result,
	ValidationError,
} from "./types/error"
