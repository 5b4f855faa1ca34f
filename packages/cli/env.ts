import { readFileSync } from "node:fs"
import path from "node:path"
import { fileURLToPath } from "node:url"
import {
	type AbsolutePath,
	coerceAbsolutePath,
	coerceMarketplaceId,
	DEFAULT_MARKETPLACE_ID,
	type MarketplaceId,
	type Result,
	splitList,
	type ValidationError,
} from "@agent-setup/core"
import dotenv from "dotenv"
import { z } from "zod"
import { hasErrorCode } from "@/io/fs"

export const DEFAULT_FEATURES_FILE = "/etc/container/config/enabled-features.conf"

const DEFAULT_TEMPLATES_DIR = fileURLToPath(new URL("./templates", import.meta.url))

type EnvSource = Record<string, string | undefined>

const BOOLEAN_WORDS: Record<string, boolean> = {
	"0": false,
	"1": true,
	false: false,
	no: false,
	off: false,
	on: true,
	true: true,
	yes: true,
}

const optionalStr = () =>
	z
		.string()
		.optional()
		.transform((value) => {
			const trimmed = value?.trim()
			return trimmed ? trimmed : undefined
		})

const flag = (fallback: boolean) =>
	optionalStr()
		.refine((value) => value === undefined || value.toLowerCase() in BOOLEAN_WORDS, {
			message: "Expected true or false.",
		})
		.transform((value) =>
			value === undefined ? fallback : (BOOLEAN_WORDS[value.toLowerCase()] ?? fallback),
		)

const positiveInt = (fallback: number) =>
	optionalStr()
		.pipe(z.coerce.number().int().positive().optional())
		.transform((value) => value ?? fallback)

export const schema = z.object({
	ANTHROPIC_AUTH_TOKEN: optionalStr(),
	CLAUDE_AUTH_WATCHER_POLL_INTERVAL: positiveInt(10),
	CLAUDE_AUTH_WATCHER_TIMEOUT: positiveInt(14_400),
	CLAUDE_AUTO_DETECT_DEPTH: positiveInt(3),
	CLAUDE_AUTO_DETECT_MCPS: flag(true),
	CLAUDE_EXTRA_MCPS: optionalStr(),
	CLAUDE_EXTRA_MCPS_DEFAULT: optionalStr(),
	CLAUDE_EXTRA_PLUGINS: optionalStr(),
	CLAUDE_EXTRA_PLUGINS_DEFAULT: optionalStr(),
	CLAUDE_MCP_AUTO_AUTH: flag(true),
	CLAUDE_USER_MCPS: optionalStr(),
	GITHUB_TOKEN: optionalStr(),
	GITLAB_TOKEN: optionalStr(),
	HOME: z.string().trim().min(1, "HOME must be set."),
	INCLUDE_ANDROID_DEV: flag(false),
	INCLUDE_AWS: flag(false),
	INCLUDE_CLOUDFLARE: flag(false),
	INCLUDE_DOCKER: flag(false),
	INCLUDE_GCLOUD: flag(false),
	INCLUDE_GOLANG_DEV: flag(false),
	INCLUDE_JAVA_DEV: flag(false),
	INCLUDE_KOTLIN_DEV: flag(false),
	INCLUDE_KUBERNETES: flag(false),
	INCLUDE_NODE_DEV: flag(false),
	INCLUDE_PYTHON_DEV: flag(false),
	INCLUDE_RUBY_DEV: flag(false),
	INCLUDE_RUST_DEV: flag(false),
	INCLUDE_TERRAFORM: flag(false),
	OP_ANTHROPIC_AUTH_TOKEN_REF: optionalStr(),
	OP_SERVICE_ACCOUNT_TOKEN: optionalStr(),
	SETUP_TEMPLATES_DIR: optionalStr(),
	SETUP_TOKEN_FILE: optionalStr(),
	SETUP_WORKSPACE_DIR: optionalStr(),
})

export interface FeatureFlags {
	readonly python: boolean
	readonly node: boolean
	readonly rust: boolean
	readonly ruby: boolean
	readonly golang: boolean
	readonly java: boolean
	readonly kotlin: boolean
	readonly android: boolean
	readonly docker: boolean
	readonly kubernetes: boolean
	readonly terraform: boolean
	readonly aws: boolean
	readonly gcloud: boolean
	readonly cloudflare: boolean
}

export interface SetupPaths {
	readonly homeDir: AbsolutePath
	/** `~/.claude`, the assistant's configuration root */
	readonly claudeDir: AbsolutePath
	/** `~/.claude.json`: account field and user-scoped `mcpServers` */
	readonly configFile: AbsolutePath
	readonly credentialsFile: AbsolutePath
	readonly knownMarketplacesFile: AbsolutePath
	readonly markerFile: AbsolutePath
	readonly hookCounterFile: AbsolutePath
	readonly skillsDir: AbsolutePath
	readonly agentsDir: AbsolutePath
	readonly tokenFile: AbsolutePath
	readonly templatesDir: AbsolutePath
	readonly workspaceDir: AbsolutePath
}

export interface AuthSources {
	readonly token?: string
	readonly secretRef?: string
	readonly resolverToken?: string
}

export interface SetupConfig {
	readonly paths: SetupPaths
	readonly auth: AuthSources
	readonly marketplace: MarketplaceId
	readonly extraPlugins: readonly string[]
	readonly endpoints: {
		readonly admin: readonly string[]
		readonly user: readonly string[]
		readonly autoAuth: boolean
	}
	readonly autoDetect: {
		readonly enabled: boolean
		readonly root: AbsolutePath
		readonly depth: number
		/** Names of platform token variables that are set, e.g. `GITHUB_TOKEN`. */
		readonly tokens: readonly string[]
	}
	readonly features: FeatureFlags
	readonly watcher: {
		readonly timeoutMs: number
		readonly pollIntervalMs: number
		readonly probeRetryDelayMs: number
	}
}

const PROBE_RETRY_DELAY_MS = 10_000

/**
 * Build the immutable configuration from one environment snapshot.
 * Values from `features` (the build-time features file) are overridden
 * by `env`.
 */
export function loadConfig(
	env: EnvSource,
	features: EnvSource = {},
): Result<SetupConfig, ValidationError> {
	const parsed = schema.safeParse({ ...features, ...env })
	if (!parsed.success) {
		const field = parsed.error.issues[0]?.path.join(".") ?? "env"
		return {
			error: {
				field,
				message: "Invalid setup configuration.",
				source: "zod",
				type: "validation",
				zodError: parsed.error,
			},
			ok: false,
		}
	}

	const values = parsed.data
	const homeDir = coerceAbsolutePath(values.HOME)
	if (!homeDir) {
		return invalid("HOME", `HOME must be an absolute path: ${values.HOME}`)
	}

	const workspaceDir = coerceAbsolutePath(values.SETUP_WORKSPACE_DIR ?? "/workspace")
	if (!workspaceDir) {
		return invalid("SETUP_WORKSPACE_DIR", "SETUP_WORKSPACE_DIR must be an absolute path.")
	}

	const templatesDir = coerceAbsolutePath(
		values.SETUP_TEMPLATES_DIR ?? DEFAULT_TEMPLATES_DIR,
		homeDir,
	)
	const tokenFile = coerceAbsolutePath(
		values.SETUP_TOKEN_FILE ?? "/dev/shm/anthropic-auth-token",
		homeDir,
	)
	if (!templatesDir || !tokenFile) {
		return invalid("paths", "Template and token paths must not be empty.")
	}

	const claudeDir = join(homeDir, ".claude")
	const marketplace =
		coerceMarketplaceId(DEFAULT_MARKETPLACE_ID) ?? (DEFAULT_MARKETPLACE_ID as MarketplaceId)

	const config: SetupConfig = {
		auth: {
			resolverToken: values.OP_SERVICE_ACCOUNT_TOKEN,
			secretRef: values.OP_ANTHROPIC_AUTH_TOKEN_REF,
			token: values.ANTHROPIC_AUTH_TOKEN,
		},
		autoDetect: {
			depth: values.CLAUDE_AUTO_DETECT_DEPTH,
			enabled: values.CLAUDE_AUTO_DETECT_MCPS,
			root: workspaceDir,
			tokens: [
				...(values.GITHUB_TOKEN ? ["GITHUB_TOKEN"] : []),
				...(values.GITLAB_TOKEN ? ["GITLAB_TOKEN"] : []),
			],
		},
		endpoints: {
			admin: splitList(values.CLAUDE_EXTRA_MCPS ?? values.CLAUDE_EXTRA_MCPS_DEFAULT),
			autoAuth: values.CLAUDE_MCP_AUTO_AUTH,
			user: splitList(values.CLAUDE_USER_MCPS),
		},
		extraPlugins: splitList(
			values.CLAUDE_EXTRA_PLUGINS ?? values.CLAUDE_EXTRA_PLUGINS_DEFAULT,
		),
		features: {
			android: values.INCLUDE_ANDROID_DEV,
			aws: values.INCLUDE_AWS,
			cloudflare: values.INCLUDE_CLOUDFLARE,
			docker: values.INCLUDE_DOCKER,
			gcloud: values.INCLUDE_GCLOUD,
			golang: values.INCLUDE_GOLANG_DEV,
			java: values.INCLUDE_JAVA_DEV,
			kotlin: values.INCLUDE_KOTLIN_DEV,
			kubernetes: values.INCLUDE_KUBERNETES,
			node: values.INCLUDE_NODE_DEV,
			python: values.INCLUDE_PYTHON_DEV,
			ruby: values.INCLUDE_RUBY_DEV,
			rust: values.INCLUDE_RUST_DEV,
			terraform: values.INCLUDE_TERRAFORM,
		},
		marketplace,
		paths: {
			agentsDir: join(claudeDir, "agents"),
			claudeDir,
			configFile: join(homeDir, ".claude.json"),
			credentialsFile: join(claudeDir, ".credentials.json"),
			homeDir,
			hookCounterFile: join(claudeDir, ".prompt-hook-counter"),
			knownMarketplacesFile: join(claudeDir, "plugins", "known_marketplaces.json"),
			markerFile: join(claudeDir, ".container-setup-complete"),
			skillsDir: join(claudeDir, "skills"),
			templatesDir,
			tokenFile,
			workspaceDir,
		},
		watcher: {
			pollIntervalMs: values.CLAUDE_AUTH_WATCHER_POLL_INTERVAL * 1000,
			probeRetryDelayMs: PROBE_RETRY_DELAY_MS,
			timeoutMs: values.CLAUDE_AUTH_WATCHER_TIMEOUT * 1000,
		},
	}

	return { ok: true, value: Object.freeze(config) }
}

/**
 * Parse the build-time features file (`KEY=VALUE` lines, `#` comments).
 * A missing file contributes nothing.
 */
export function readFeaturesFile(filePath: string): Result<EnvSource, ValidationError> {
	let contents: string
	try {
		contents = readFileSync(filePath, "utf8")
	} catch (error) {
		if (hasErrorCode(error, "ENOENT")) {
			return { ok: true, value: {} }
		}
		return {
			error: {
				field: "SETUP_FEATURES_FILE",
				message: `Unable to read features file ${filePath}.`,
				rawError: error instanceof Error ? error : undefined,
				source: "manual",
				type: "validation",
			},
			ok: false,
		}
	}

	return { ok: true, value: dotenv.parse(contents) }
}

/**
 * The process-wide configuration: features file first, then the environment.
 */
export function readSetupConfig(
	env: EnvSource = process.env,
): Result<SetupConfig, ValidationError> {
	const featuresPath = env.SETUP_FEATURES_FILE?.trim() || DEFAULT_FEATURES_FILE
	const features = readFeaturesFile(featuresPath)
	if (!features.ok) {
		return features
	}

	return loadConfig(env, features.value)
}

function join(base: AbsolutePath, ...segments: string[]): AbsolutePath {
	return path.join(base, ...segments) as AbsolutePath
}

function invalid(field: string, message: string): { ok: false; error: ValidationError } {
	return {
		error: { field, message, source: "manual", type: "validation" },
		ok: false,
	}
}
