/**
 * Shared constants for plugin and endpoint setup.
 */

/** Endpoint names are passed to the assistant CLI as bare arguments. */
export const ENDPOINT_NAME_PATTERN = /^[a-zA-Z0-9][a-zA-Z0-9_-]*$/

/** Marketplace every default plugin is installed from */
export const DEFAULT_MARKETPLACE_ID = "anthropics/claude-plugins-official"

/** Plugins installed in every container */
export const CORE_PLUGINS = [
	"commit-commands",
	"pr-review-toolkit",
	"security-guidance",
] as const

/** Reference written into Authorization headers instead of the token itself */
export const AUTH_TOKEN_REFERENCE = "${ANTHROPIC_AUTH_TOKEN}"

/** Language-server plugins, keyed by the toolchain that enables them */
export const LSP_PLUGINS = {
	kotlin: "kotlin-lsp",
	node: "typescript-lsp",
	python: "pyright-lsp",
	rust: "rust-analyzer-lsp",
} as const

export type LspToolchain = keyof typeof LSP_PLUGINS
