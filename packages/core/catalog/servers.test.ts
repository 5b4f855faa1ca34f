import { describe, expect, it } from "vitest"
import { ENDPOINT_NAME_PATTERN } from "../constants"
import {
	buildDefaultEndpoints,
	findPlatformForHost,
	listCatalogServers,
	lookupCatalogServer,
} from "./servers"

describe("catalog", () => {
	it("lists every registry-known server under a valid endpoint name", () => {
		const names = listCatalogServers().map((server) => server.name)

		expect(names).toEqual([
			"brave-search",
			"fetch",
			"memory",
			"sequential-thinking",
			"git",
			"sentry",
			"perplexity",
			"kagi",
		])
		for (const name of names) {
			expect(ENDPOINT_NAME_PATTERN.test(name)).toBe(true)
		}
	})

	it("documents required variables", () => {
		expect(lookupCatalogServer("sentry")?.envDocs).toBe("SENTRY_ACCESS_TOKEN")
		expect(lookupCatalogServer("fetch")?.envDocs).toBe("")
	})

	it("returns undefined for unknown names", () => {
		expect(lookupCatalogServer("unknown")).toBeUndefined()
	})
})

describe("buildDefaultEndpoints", () => {
	it("points the filesystem server at the workspace", () => {
		const [filesystem, figma] = buildDefaultEndpoints("/workspace")

		expect(filesystem).toMatchObject({
			args: ["-y", "@modelcontextprotocol/server-filesystem", "/workspace"],
			name: "filesystem",
			transport: "stdio",
		})
		expect(figma).toMatchObject({
			headers: {},
			name: "figma-desktop",
			transport: "http",
			url: "http://host.docker.internal:3845/mcp/",
		})
	})
})

describe("findPlatformForHost", () => {
	it("matches hosting platforms case-insensitively", () => {
		expect(findPlatformForHost("GitHub.com")?.id).toBe("github")
		expect(findPlatformForHost("gitlab.com")?.tokenVariable).toBe("GITLAB_TOKEN")
	})

	it("ignores unknown hosts", () => {
		expect(findPlatformForHost("git.example.com")).toBeUndefined()
	})
})
