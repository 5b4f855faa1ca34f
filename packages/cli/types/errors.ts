import type {
	BaseError,
	IoError,
	NotFoundError,
	ParseError,
	ValidationError,
} from "@agent-setup/core"

export type { IoError, NotFoundError, ParseError, ValidationError }

export type RegistryOperation =
	| "listMarketplaces"
	| "addMarketplace"
	| "listPlugins"
	| "installPlugin"
	| "listEndpoints"
	| "addEndpoint"

/**
 * - `transient`: the marketplace has not propagated yet; worth retrying
 * - `conflict`: the item already exists; callers treat it as success
 * - `unauthorized`: the assistant CLI is not logged in
 * - `unavailable`: the CLI could not be run or timed out
 * - `permanent`: anything else
 */
export type RegistryErrorKind =
	| "transient"
	| "conflict"
	| "unauthorized"
	| "unavailable"
	| "permanent"

export interface RegistryError extends BaseError {
	type: "registry"
	kind: RegistryErrorKind
	operation: RegistryOperation
	target?: string
}

export type SetupError =
	| ValidationError
	| ParseError
	| IoError
	| NotFoundError
	| RegistryError
