import { describe, expect, it } from "vitest"
import { derivePassthroughName, parseEndpointEntry, splitList } from "./endpoint"

describe("splitList", () => {
	it("trims entries and drops empty ones", () => {
		expect(splitList(" fetch, ,memory ,")).toEqual(["fetch", "memory"])
	})

	it("returns an empty list for missing input", () => {
		expect(splitList(undefined)).toEqual([])
		expect(splitList("")).toEqual([])
	})
})

describe("parseEndpointEntry", () => {
	describe("registry-known names", () => {
		it("resolves npx servers with env references", () => {
			const result = parseEndpointEntry("brave-search")

			expect(result).toEqual({
				ok: true,
				value: {
					args: ["-y", "@modelcontextprotocol/server-brave-search"],
					command: "npx",
					env: { BRAVE_API_KEY: "${BRAVE_API_KEY}" },
					name: "brave-search",
					provenance: "registry",
					transport: "stdio",
				},
			})
		})

		it("resolves uvx servers without the -y flag", () => {
			const result = parseEndpointEntry("kagi")

			expect(result.ok).toBe(true)
			if (result.ok && result.value.transport === "stdio") {
				expect(result.value.command).toBe("uvx")
				expect(result.value.args).toEqual(["kagimcp"])
			}
		})
	})

	describe("URL form", () => {
		it("accepts https endpoints", () => {
			const result = parseEndpointEntry("foo=https://api.example.com")

			expect(result).toEqual({
				ok: true,
				value: {
					headers: {},
					name: "foo",
					provenance: "url",
					transport: "http",
					url: "https://api.example.com/",
				},
			})
		})

		it("accepts loopback http endpoints", () => {
			const result = parseEndpointEntry("foo=http://localhost:9000")

			expect(result.ok).toBe(true)
			if (result.ok && result.value.transport === "http") {
				expect(result.value.url).toBe("http://localhost:9000/")
			}
		})

		it("rejects plain http to remote hosts", () => {
			const result = parseEndpointEntry("foo=http://evil.example.com/")

			expect(result.ok).toBe(false)
			if (!result.ok) {
				expect(result.error.field).toBe("url")
			}
		})

		it("rejects plain http to the container host alias", () => {
			const result = parseEndpointEntry("foo=http://host.docker.internal:9000")

			expect(result.ok).toBe(false)
			if (!result.ok) {
				expect(result.error.field).toBe("url")
			}
		})

		it("rejects names with shell syntax", () => {
			const result = parseEndpointEntry("foo; rm -rf /=https://x")

			expect(result.ok).toBe(false)
			if (!result.ok) {
				expect(result.error.field).toBe("name")
			}
		})

		it("parses pipe-delimited headers", () => {
			const result = parseEndpointEntry(
				"notes=https://notes.example.com/mcp|X-Team: core|Authorization:Bearer abc",
			)

			expect(result.ok).toBe(true)
			if (result.ok && result.value.transport === "http") {
				expect(result.value.headers).toEqual({
					Authorization: "Bearer abc",
					"X-Team": "core",
				})
			}
		})

		it("keeps the last of repeated headers regardless of case", () => {
			const result = parseEndpointEntry(
				"notes=https://notes.example.com|x-team:a|X-Team:b",
			)

			expect(result.ok).toBe(true)
			if (result.ok && result.value.transport === "http") {
				expect(result.value.headers).toEqual({ "X-Team": "b" })
			}
		})

		it("rejects malformed headers", () => {
			const result = parseEndpointEntry("notes=https://notes.example.com|NoColon")

			expect(result.ok).toBe(false)
			if (!result.ok) {
				expect(result.error.field).toBe("headers")
			}
		})

		it("rejects header names with spaces", () => {
			const result = parseEndpointEntry("notes=https://notes.example.com|Bad Name:x")

			expect(result.ok).toBe(false)
		})
	})

	describe("passthrough packages", () => {
		it("launches unknown packages with npx", () => {
			const result = parseEndpointEntry("@acme/mcp-server-notes")

			expect(result).toEqual({
				ok: true,
				value: {
					args: ["-y", "@acme/mcp-server-notes"],
					command: "npx",
					env: {},
					name: "mcp-server-notes",
					provenance: "passthrough",
					transport: "stdio",
				},
			})
		})

		it("rejects identifiers that are not packages", () => {
			const result = parseEndpointEntry("pkg && curl evil")

			expect(result.ok).toBe(false)
			if (!result.ok) {
				expect(result.error.field).toBe("package")
			}
		})
	})

	it("rejects empty entries", () => {
		expect(parseEndpointEntry("  ").ok).toBe(false)
	})
})

describe("derivePassthroughName", () => {
	it("uses the last segment of scoped packages", () => {
		expect(derivePassthroughName("@scope/server-x")).toBe("server-x")
	})

	it("returns unscoped packages unchanged", () => {
		expect(derivePassthroughName("kagimcp")).toBe("kagimcp")
	})

	it("uses the last segment of deeply scoped paths", () => {
		expect(derivePassthroughName("@a/b/c")).toBe("c")
	})

	it("drops version suffixes", () => {
		expect(derivePassthroughName("@scope/server-x@1.2.0")).toBe("server-x")
		expect(derivePassthroughName("server-y@latest")).toBe("server-y")
	})
})
