/**
 * Branded types used across core.
 */

declare const NonEmptyStringBrand: unique symbol
declare const AbsolutePathBrand: unique symbol
declare const EndpointNameBrand: unique symbol
declare const EndpointUrlBrand: unique symbol
declare const PluginNameBrand: unique symbol
declare const MarketplaceIdBrand: unique symbol
declare const PackageIdBrand: unique symbol

type Brand<T, B extends symbol> = T & { readonly [K in B]: true }

export type NonEmptyString = Brand<string, typeof NonEmptyStringBrand>
export type AbsolutePath = Brand<string, typeof AbsolutePathBrand>
/** Matches `^[a-zA-Z0-9][a-zA-Z0-9_-]*$`. */
export type EndpointName = Brand<string, typeof EndpointNameBrand>
/** An `https://` URL, or an `http://` URL on a loopback host, normalized. */
export type EndpointUrl = Brand<string, typeof EndpointUrlBrand>
export type PluginName = Brand<string, typeof PluginNameBrand>
/** Repository-style marketplace id (`owner/repo`) or a bare marketplace name. */
export type MarketplaceId = Brand<string, typeof MarketplaceIdBrand>
/** npm-style package identifier, optionally scoped and versioned. */
export type PackageId = Brand<string, typeof PackageIdBrand>

