import { describe, expect, it } from "vitest"
import { formatErrorChain } from "@/commands/types"
import { abs } from "@/tests/helpers"
import type { IoError, RegistryError } from "@/types/errors"

describe("formatErrorChain", () => {
	it("prints details and nested causes", () => {
		const cause: RegistryError = {
			kind: "unavailable",
			message: "claude is not installed",
			operation: "listPlugins",
			type: "registry",
		}
		const error: IoError = {
			cause,
			message: "Unable to write /home/dev/.claude.json.",
			operation: "writeFile",
			path: abs("/home/dev/.claude.json"),
			type: "io",
		}

		expect(formatErrorChain(error)).toBe(
			[
				"[io] Unable to write /home/dev/.claude.json. (path=/home/dev/.claude.json, operation=writeFile)",
				"Caused by:",
				"  [registry] claude is not installed (operation=listPlugins, kind=unavailable)",
			].join("\n"),
		)
	})
})
