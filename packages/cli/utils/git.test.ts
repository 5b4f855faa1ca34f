import { describe, expect, it } from "vitest"
import { extractRemoteHost, parseRemoteOutput } from "@/utils/git"

describe("parseRemoteOutput", () => {
	it("returns each URL once", () => {
		const output = [
			"origin\tgit@github.com:acme/app.git (fetch)",
			"origin\tgit@github.com:acme/app.git (push)",
			"mirror\thttps://gitlab.com/acme/app.git (fetch)",
			"",
		].join("\n")

		expect(parseRemoteOutput(output)).toEqual([
			"git@github.com:acme/app.git",
			"https://gitlab.com/acme/app.git",
		])
	})
})

describe("extractRemoteHost", () => {
	it.each([
		["https://github.com/acme/app.git", "github.com"],
		["https://user@GitLab.com/acme/app", "gitlab.com"],
		["ssh://git@github.com:22/acme/app.git", "github.com"],
		["git@github.com:acme/app.git", "github.com"],
		["github.com:acme/app.git", "github.com"],
	])("reads the host of %s", (remote, host) => {
		expect(extractRemoteHost(remote)).toBe(host)
	})

	it("returns null for local paths", () => {
		expect(extractRemoteHost("/srv/git/app.git")).toBeNull()
		expect(extractRemoteHost("../app")).toBeNull()
	})
})
