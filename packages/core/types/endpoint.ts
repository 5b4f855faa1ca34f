import type {
	EndpointName,
	EndpointUrl,
	NonEmptyString,
	PluginName,
} from "./branded"

export type EndpointTransport = "stdio" | "http"

/**
 * How an endpoint entry was resolved:
 * - `registry`: a known name looked up in the catalog
 * - `url`: an inline `name=url|Header:Value` entry
 * - `passthrough`: an unknown package launched with a generic runner
 */
export type EndpointProvenance = "registry" | "url" | "passthrough"

interface EndpointBase {
	name: EndpointName
	provenance: EndpointProvenance
}

export interface StdioEndpointSpec extends EndpointBase {
	transport: "stdio"
	command: NonEmptyString
	args: string[]
	/** Values are `${VAR}` references, never secrets. */
	env: Record<string, string>
}

export interface HttpEndpointSpec extends EndpointBase {
	transport: "http"
	url: EndpointUrl
	headers: Record<string, string>
}

export type ServiceEndpointSpec = StdioEndpointSpec | HttpEndpointSpec

export interface PluginRecord {
	name: PluginName
	/** Marketplace name as the assistant CLI knows it, e.g. `claude-plugins-official`. */
	marketplace: string
}
