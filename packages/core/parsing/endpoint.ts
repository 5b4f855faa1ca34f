import { buildCatalogEndpoint, lookupCatalogServer } from "../catalog/servers"
import type { EndpointName, NonEmptyString, PackageId } from "../types/branded"
import {
	coerceEndpointName,
	coerceEndpointUrl,
	coercePackageId,
	isHeaderName,
	isHeaderValue,
} from "../types/coerce"
import type {
	HttpEndpointSpec,
	ServiceEndpointSpec,
	StdioEndpointSpec,
} from "../types/endpoint"
import type { Result, ValidationError } from "../types/error"

type EndpointResult<T> = Result<T, ValidationError>

/**
 * Split a comma-separated list, trimming entries and dropping empty ones.
 */
export function splitList(raw: string | undefined): string[] {
	if (!raw) {
		return []
	}

	return raw
		.split(",")
		.map((entry) => entry.trim())
		.filter((entry) => entry.length > 0)
}

/**
 * Resolve one endpoint entry to a spec.
 *
 * - `name=url[|Header:Value]*` is an HTTP endpoint given inline.
 * - A name from the catalog resolves to its stdio definition.
 * - Anything else is a package identifier launched with `npx -y`.
 *
 * Names and URLs are validated here, before anything is registered.
 */
export function parseEndpointEntry(entry: string): EndpointResult<ServiceEndpointSpec> {
	const trimmed = entry.trim()
	if (!trimmed) {
		return invalid("endpoint", "Endpoint entry must not be empty.")
	}

	const separator = trimmed.indexOf("=")
	if (separator !== -1) {
		return parseUrlEntry(trimmed.slice(0, separator), trimmed.slice(separator + 1))
	}

	const known = lookupCatalogServer(trimmed)
	if (known) {
		return { ok: true, value: buildCatalogEndpoint(known) }
	}

	return parsePassthroughEntry(trimmed)
}

function parseUrlEntry(rawName: string, rest: string): EndpointResult<HttpEndpointSpec> {
	const name = coerceEndpointName(rawName)
	if (!name) {
		return invalid(
			"name",
			`Invalid endpoint name "${rawName.trim()}": must match ^[a-zA-Z0-9][a-zA-Z0-9_-]*$.`,
		)
	}

	const [rawUrl = "", ...rawHeaders] = rest.split("|")
	const url = coerceEndpointUrl(rawUrl)
	if (!url) {
		return invalid(
			"url",
			`Invalid URL for endpoint "${name}": must be https:// or http:// on a loopback host.`,
		)
	}

	const headers = parseHeaders(name, rawHeaders)
	if (!headers.ok) {
		return headers
	}

	return {
		ok: true,
		value: {
			headers: headers.value,
			name,
			provenance: "url",
			transport: "http",
			url,
		},
	}
}

function parseHeaders(
	name: EndpointName,
	rawHeaders: string[],
): EndpointResult<Record<string, string>> {
	const headers: Record<string, string> = {}

	for (const raw of rawHeaders) {
		if (!raw.trim()) {
			continue
		}

		const colon = raw.indexOf(":")
		const headerName = colon > 0 ? raw.slice(0, colon).trim() : ""
		const headerValue = colon > 0 ? raw.slice(colon + 1).trim() : ""
		if (!isHeaderName(headerName) || !isHeaderValue(headerValue)) {
			return invalid(
				"headers",
				`Invalid header for endpoint "${name}": expected Name:Value.`,
			)
		}

		// Header names are case-insensitive; the last occurrence wins.
		for (const existing of Object.keys(headers)) {
			if (existing.toLowerCase() === headerName.toLowerCase()) {
				delete headers[existing]
			}
		}
		headers[headerName] = headerValue
	}

	return { ok: true, value: headers }
}

function parsePassthroughEntry(entry: string): EndpointResult<StdioEndpointSpec> {
	const pkg = coercePackageId(entry)
	if (!pkg) {
		return invalid(
			"package",
			`Unknown endpoint "${entry}" is not a valid package identifier.`,
		)
	}

	const derived = derivePassthroughName(pkg)
	const name = coerceEndpointName(derived)
	if (!name) {
		return invalid(
			"name",
			`Cannot derive a valid endpoint name from package "${pkg}".`,
		)
	}

	return {
		ok: true,
		value: {
			args: ["-y", pkg],
			command: "npx" as NonEmptyString,
			env: {},
			name,
			provenance: "passthrough",
			transport: "stdio",
		},
	}
}

/**
 * Endpoint name for a package: its last path segment without a version suffix.
 * `@scope/server-x@1.2` becomes `server-x`.
 */
export function derivePassthroughName(pkg: PackageId | string): string {
	const lastSegment = pkg.slice(pkg.lastIndexOf("/") + 1)
	const versionAt = lastSegment.indexOf("@", 1)
	return versionAt === -1 ? lastSegment : lastSegment.slice(0, versionAt)
}

function invalid(field: string, message: string): { ok: false; error: ValidationError } {
	return {
		error: { field, message, source: "manual", type: "validation" },
		ok: false,
	}
}
