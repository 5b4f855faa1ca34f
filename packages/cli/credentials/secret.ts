import { execFile } from "node:child_process"
import { promisify } from "node:util"

const execFileAsync = promisify(execFile)

const RESOLVE_TIMEOUT_MS = 15_000

/**
 * Resolves a secret reference (e.g. `op://vault/item/field`) to its value,
 * or `null` when it cannot be resolved yet.
 */
export type SecretResolver = (reference: string, resolverToken: string) => Promise<string | null>

export const resolveWithOnePassword: SecretResolver = async (reference, resolverToken) => {
	try {
		const { stdout } = await execFileAsync("op", ["read", reference], {
			encoding: "utf8",
			env: { ...process.env, OP_SERVICE_ACCOUNT_TOKEN: resolverToken },
			timeout: RESOLVE_TIMEOUT_MS,
		})
		const value = stdout.trim()
		return value ? value : null
	} catch {
		// A missing CLI or an unreachable vault means "not available yet".
		return null
	}
}
