import type { EndpointName, EndpointUrl, NonEmptyString } from "../types/branded"
import type {
	HttpEndpointSpec,
	ServiceEndpointSpec,
	StdioEndpointSpec,
} from "../types/endpoint"

export type PackageRunner = "npx" | "uvx"

export interface CatalogServer {
	name: string
	runner: PackageRunner
	package: string
	/** Variables passed through to the server process as `${VAR}` references. */
	env: string[]
	/** Human-readable list of the variables the server reads, optional ones marked. */
	envDocs: string
}

// =============================================================================
// Registry-known servers
// =============================================================================

const CATALOG: CatalogServer[] = [
	{
		env: ["BRAVE_API_KEY"],
		envDocs: "BRAVE_API_KEY",
		name: "brave-search",
		package: "@modelcontextprotocol/server-brave-search",
		runner: "npx",
	},
	{
		env: [],
		envDocs: "",
		name: "fetch",
		package: "@modelcontextprotocol/server-fetch",
		runner: "npx",
	},
	{
		env: [],
		envDocs: "MEMORY_FILE_PATH (optional)",
		name: "memory",
		package: "@modelcontextprotocol/server-memory",
		runner: "npx",
	},
	{
		env: [],
		envDocs: "",
		name: "sequential-thinking",
		package: "@modelcontextprotocol/server-sequential-thinking",
		runner: "npx",
	},
	{
		env: [],
		envDocs: "",
		name: "git",
		package: "@modelcontextprotocol/server-git",
		runner: "npx",
	},
	{
		env: ["SENTRY_ACCESS_TOKEN"],
		envDocs: "SENTRY_ACCESS_TOKEN",
		name: "sentry",
		package: "@sentry/mcp-server",
		runner: "npx",
	},
	{
		env: ["PERPLEXITY_API_KEY"],
		envDocs: "PERPLEXITY_API_KEY",
		name: "perplexity",
		package: "@perplexity-ai/mcp-server",
		runner: "npx",
	},
	{
		env: ["KAGI_API_KEY"],
		envDocs: "KAGI_API_KEY",
		name: "kagi",
		package: "kagimcp",
		runner: "uvx",
	},
]

export function listCatalogServers(): CatalogServer[] {
	return [...CATALOG]
}

export function lookupCatalogServer(name: string): CatalogServer | undefined {
	return CATALOG.find((entry) => entry.name === name)
}

export function buildCatalogEndpoint(server: CatalogServer): StdioEndpointSpec {
	return {
		args: server.runner === "npx" ? ["-y", server.package] : [server.package],
		command: server.runner as NonEmptyString,
		env: Object.fromEntries(server.env.map((name) => [name, `\${${name}}`])),
		name: server.name as EndpointName,
		provenance: "registry",
		transport: "stdio",
	}
}

// =============================================================================
// Always-on defaults
// =============================================================================

export function buildDefaultEndpoints(workspaceDir: string): ServiceEndpointSpec[] {
	const filesystem: StdioEndpointSpec = {
		args: ["-y", "@modelcontextprotocol/server-filesystem", workspaceDir],
		command: "npx" as NonEmptyString,
		env: {},
		name: "filesystem" as EndpointName,
		provenance: "registry",
		transport: "stdio",
	}

	const figma: HttpEndpointSpec = {
		headers: {},
		name: "figma-desktop" as EndpointName,
		provenance: "registry",
		transport: "http",
		url: "http://host.docker.internal:3845/mcp/" as EndpointUrl,
	}

	return [filesystem, figma]
}

// =============================================================================
// Hosting platforms detected from repository remotes
// =============================================================================

export type PlatformId = "github" | "gitlab"

export interface PlatformDefinition {
	id: PlatformId
	hostnames: string[]
	tokenVariable: string
	endpoint: ServiceEndpointSpec
}

const PLATFORMS: PlatformDefinition[] = [
	{
		endpoint: {
			headers: { Authorization: "Bearer ${GITHUB_TOKEN}" },
			name: "github" as EndpointName,
			provenance: "registry",
			transport: "http",
			url: "https://api.githubcopilot.com/mcp/" as EndpointUrl,
		},
		hostnames: ["github.com"],
		id: "github",
		tokenVariable: "GITHUB_TOKEN",
	},
	{
		endpoint: {
			args: ["-y", "@modelcontextprotocol/server-gitlab"],
			command: "npx" as NonEmptyString,
			env: { GITLAB_PERSONAL_ACCESS_TOKEN: "${GITLAB_TOKEN}" },
			name: "gitlab" as EndpointName,
			provenance: "registry",
			transport: "stdio",
		},
		hostnames: ["gitlab.com"],
		id: "gitlab",
		tokenVariable: "GITLAB_TOKEN",
	},
]

export function findPlatformForHost(hostname: string): PlatformDefinition | undefined {
	const lowered = hostname.toLowerCase()
	return PLATFORMS.find((platform) => platform.hostnames.includes(lowered))
}
