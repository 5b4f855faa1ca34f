import path from "node:path"
import { ENDPOINT_NAME_PATTERN } from "../constants"
import type {
	AbsolutePath,
	EndpointName,
	EndpointUrl,
	MarketplaceId,
	PackageId,
	PluginName,
} from "./branded"

export function coerceAbsolutePath(
	value: string,
	basePath?: string,
): AbsolutePath | null {
	const trimmed = value.trim()
	if (trimmed.length === 0) return null

	let resolved: string
	if (path.isAbsolute(trimmed)) {
		resolved = path.normalize(trimmed)
	} else if (basePath) {
		resolved = path.resolve(basePath, trimmed)
	} else {
		return null
	}

	return resolved as AbsolutePath
}

export function coerceEndpointName(value: string): EndpointName | null {
	const trimmed = value.trim()
	if (!ENDPOINT_NAME_PATTERN.test(trimmed)) return null
	return trimmed as EndpointName
}

// `host.docker.internal` is deliberately absent: it routes over the bridge network.
const LOOPBACK_HOSTS: ReadonlySet<string> = new Set(["localhost", "[::1]"])

const IPV4_LOOPBACK = /^127(?:\.\d{1,3}){3}$/

export function isLoopbackHost(hostname: string): boolean {
	const lowered = hostname.toLowerCase()
	return LOOPBACK_HOSTS.has(lowered) || IPV4_LOOPBACK.test(lowered)
}

/**
 * Coerce a string to EndpointUrl.
 * Accepts `https://` anywhere and `http://` only on loopback hosts.
 * A path without query or fragment gets a trailing slash, since redirects
 * from `/mcp` to `/mcp/` drop custom headers.
 */
export function coerceEndpointUrl(value: string): EndpointUrl | null {
	const trimmed = value.trim()
	if (!trimmed.includes("://")) return null

	let parsed: URL
	try {
		parsed = new URL(trimmed)
	} catch {
		return null
	}

	if (parsed.protocol === "http:") {
		if (!isLoopbackHost(parsed.hostname)) return null
	} else if (parsed.protocol !== "https:") {
		return null
	}

	if (!parsed.search && !parsed.hash && !parsed.pathname.endsWith("/")) {
		parsed.pathname = `${parsed.pathname}/`
	}

	return parsed.toString() as EndpointUrl
}

const PLUGIN_NAME_PATTERN = /^[a-zA-Z0-9][a-zA-Z0-9._-]*$/

export function coercePluginName(value: string): PluginName | null {
	const trimmed = value.trim()
	if (!PLUGIN_NAME_PATTERN.test(trimmed)) return null
	return trimmed as PluginName
}

const MARKETPLACE_ID_PATTERN = /^[A-Za-z0-9][\w.-]*(?:\/[A-Za-z0-9][\w.-]*)?$/

export function coerceMarketplaceId(value: string): MarketplaceId | null {
	const trimmed = value.trim()
	if (!MARKETPLACE_ID_PATTERN.test(trimmed)) return null
	return trimmed as MarketplaceId
}

const PACKAGE_ID_PATTERN =
	/^(?:@[a-z0-9][\w.-]*\/)?[a-z0-9][\w.-]*(?:\/[a-z0-9][\w.-]*)*(?:@[\w.^~<>=-]+)?$/i

export function coercePackageId(value: string): PackageId | null {
	const trimmed = value.trim()
	if (!PACKAGE_ID_PATTERN.test(trimmed)) return null
	return trimmed as PackageId
}

const HEADER_NAME_PATTERN = /^[A-Za-z0-9-]+$/

export function isHeaderName(value: string): boolean {
	return HEADER_NAME_PATTERN.test(value)
}

export function isHeaderValue(value: string): boolean {
	return value.length > 0 && !/[\r\n]/.test(value)
}
