import { execFile } from "node:child_process"
import { promisify } from "node:util"
import {
	formatPluginKey,
	type MarketplaceId,
	type PluginRecord,
	type ServiceEndpointSpec,
} from "@agent-setup/core"
import { classifyFailure, toCommandFailure } from "@/registry/classify"
import type { RegistryClient, RegistryResult } from "@/registry/types"
import type { RegistryOperation } from "@/types/errors"

const execFileAsync = promisify(execFile)

const COMMAND_TIMEOUT_MS = 120_000

/**
 * Runs the assistant CLI with `args` and resolves with stdout; rejects on failure.
 * `env` is laid over the process environment.
 */
export type CommandRunner = (args: string[], env: Record<string, string>) => Promise<string>

export const runClaudeCommand: CommandRunner = async (args, env) => {
	const { stdout } = await execFileAsync("claude", args, {
		encoding: "utf8",
		env: { ...process.env, ...env },
		timeout: COMMAND_TIMEOUT_MS,
	})
	return stdout
}

/** Looks up the token to hand to the CLI at call time; `null` when there is none. */
export type TokenSource = () => Promise<string | null>

/**
 * RegistryClient over the `claude` CLI. Every failure is classified here,
 * so callers only ever branch on `error.kind`.
 *
 * The bearer token is read per call and passed as `ANTHROPIC_AUTH_TOKEN` to
 * the CLI process only, so a token written after startup is picked up.
 */
export function createClaudeRegistry(
	run: CommandRunner = runClaudeCommand,
	bearerToken: TokenSource = async () => null,
): RegistryClient {
	async function invoke(
		operation: RegistryOperation,
		args: string[],
		target?: string,
	): Promise<RegistryResult<string>> {
		const token = await bearerToken()
		const env: Record<string, string> = token ? { ANTHROPIC_AUTH_TOKEN: token } : {}
		try {
			return { ok: true, value: await run(args, env) }
		} catch (error) {
			const failure = toCommandFailure(error)
			return {
				error: {
					kind: classifyFailure(failure),
					message: `Failed to run: claude ${args.join(" ")}`,
					operation,
					rawError: error instanceof Error ? error : undefined,
					target,
					type: "registry",
				},
				ok: false,
			}
		}
	}

	async function invokeVoid(
		operation: RegistryOperation,
		args: string[],
		target: string,
	): Promise<RegistryResult<void>> {
		const result = await invoke(operation, args, target)
		if (!result.ok) {
			return result
		}
		return { ok: true, value: undefined }
	}

	return {
		addEndpoint: (spec) => invokeVoid("addEndpoint", buildAddEndpointArgs(spec), spec.name),
		addMarketplace: (id: MarketplaceId) =>
			invokeVoid("addMarketplace", ["plugin", "marketplace", "add", id], id),
		installPlugin: (plugin: PluginRecord) => {
			const key = formatPluginKey(plugin)
			return invokeVoid("installPlugin", ["plugin", "install", key], key)
		},
		async listEndpoints() {
			const result = await invoke("listEndpoints", ["mcp", "list"])
			return result.ok ? { ok: true, value: parseEndpointList(result.value) } : result
		},
		async listMarketplaces() {
			const result = await invoke("listMarketplaces", ["plugin", "marketplace", "list"])
			return result.ok ? { ok: true, value: parseMarketplaceList(result.value) } : result
		},
		async listPlugins() {
			const result = await invoke("listPlugins", ["plugin", "list"])
			return result.ok ? { ok: true, value: parsePluginList(result.value) } : result
		},
	}
}

/**
 * User-scoped `claude mcp add` arguments. HTTP headers are not passed here;
 * they are merged into the config document afterwards.
 */
export function buildAddEndpointArgs(spec: ServiceEndpointSpec): string[] {
	if (spec.transport === "http") {
		return ["mcp", "add", "--scope", "user", "--transport", "http", spec.name, spec.url]
	}

	const envArgs = Object.entries(spec.env).flatMap(([key, value]) => [
		"--env",
		`${key}=${value}`,
	])
	return [
		"mcp",
		"add",
		"--scope",
		"user",
		"--transport",
		"stdio",
		...envArgs,
		spec.name,
		"--",
		spec.command,
		...spec.args,
	]
}

// "  ❯ commit-commands@claude-plugins-official - Git commit helpers"
const PLUGIN_LINE = /^\s*❯\s+(\S+@\S+)/

export function parsePluginList(output: string): string[] {
	return collectMatches(output, PLUGIN_LINE)
}

// "  ❯ claude-plugins-official" optionally followed by its source
const MARKETPLACE_LINE = /^\s*❯\s+([^\s(]+)/

export function parseMarketplaceList(output: string): string[] {
	return collectMatches(output, MARKETPLACE_LINE)
}

// "filesystem: npx -y @modelcontextprotocol/server-filesystem /workspace - ✓ Connected"
const ENDPOINT_LINE = /^([a-zA-Z0-9][a-zA-Z0-9_-]*):\s/

export function parseEndpointList(output: string): string[] {
	return collectMatches(output, ENDPOINT_LINE)
}

function collectMatches(output: string, pattern: RegExp): string[] {
	const matches: string[] = []
	for (const line of output.split("\n")) {
		const value = pattern.exec(line)?.[1]
		if (value && !matches.includes(value)) {
			matches.push(value)
		}
	}
	return matches
}
