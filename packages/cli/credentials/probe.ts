import { resolveWithOnePassword, type SecretResolver } from "@/credentials/secret"
import type { AuthSources, SetupPaths } from "@/env"
import { readOptionalTextFile } from "@/io/fs"
import { isJsonObject, readJsonObject } from "@/io/json"

export type CredentialState = "unauthenticated" | "token" | "oauth"

export interface CredentialProbe {
	probe(): Promise<CredentialState>
	/**
	 * The token the assistant CLI authenticates with: the environment variable,
	 * the token file, or the resolved secret reference, in that order.
	 */
	bearerToken(): Promise<string | null>
}

export interface CredentialProbeOptions {
	auth: AuthSources
	paths: Pick<SetupPaths, "configFile" | "credentialsFile" | "tokenFile">
	resolveSecret?: SecretResolver
}

const OAUTH_MARKER_FIELD = "claudeAiOauth"
const OAUTH_ACCOUNT_FIELD = "oauthAccount"

/**
 * Checks, in order: a direct token, a resolvable secret reference, the OAuth
 * credential file, then the account field of the general config file.
 * Read failures of any kind count as unauthenticated.
 */
export function createCredentialProbe(options: CredentialProbeOptions): CredentialProbe {
	const resolveSecret = options.resolveSecret ?? resolveWithOnePassword
	let resolvedToken: string | null = null

	async function readDirectToken(): Promise<string | null> {
		if (options.auth.token) {
			return options.auth.token
		}

		const contents = await readOptionalTextFile(options.paths.tokenFile)
		const token = contents.ok ? contents.value?.trim() : undefined
		return token ? token : null
	}

	async function resolveReference(): Promise<string | null> {
		if (resolvedToken) {
			return resolvedToken
		}

		const { resolverToken, secretRef } = options.auth
		if (!secretRef || !resolverToken) {
			return null
		}

		resolvedToken = await resolveSecret(secretRef, resolverToken)
		return resolvedToken
	}

	async function hasOAuthCredentials(): Promise<boolean> {
		const credentials = await readJsonObject(options.paths.credentialsFile)
		if (!credentials.ok || !credentials.value) {
			return false
		}

		const marker = credentials.value[OAUTH_MARKER_FIELD]
		return marker !== undefined && marker !== null
	}

	async function hasOAuthAccount(): Promise<boolean> {
		const config = await readJsonObject(options.paths.configFile)
		if (!config.ok || !config.value) {
			return false
		}

		// `"oauthAccount": null` is written on logout and must not count.
		const account = config.value[OAUTH_ACCOUNT_FIELD]
		if (account === undefined || account === null || account === "") {
			return false
		}
		if (isJsonObject(account)) {
			return Object.keys(account).length > 0
		}
		return true
	}

	async function bearerToken(): Promise<string | null> {
		return (await readDirectToken()) ?? (await resolveReference())
	}

	return {
		bearerToken,
		async probe() {
			if ((await bearerToken()) !== null) {
				return "token"
			}
			if ((await hasOAuthCredentials()) || (await hasOAuthAccount())) {
				return "oauth"
			}
			return "unauthenticated"
		},
	}
}
