import type { RegistryErrorKind } from "@/types/errors"

const TRANSIENT_PATTERNS = [/not found in marketplace/i]

const CONFLICT_PATTERNS = [
	/already exists/i,
	/already installed/i,
	/already configured/i,
	/already added/i,
]

const UNAUTHORIZED_PATTERNS = [
	/not logged in/i,
	/please (?:log|sign) ?in/i,
	/unauthori[sz]ed/i,
	/authentication (?:failed|required)/i,
	/invalid api key/i,
]

const UNAVAILABLE_CODES = new Set(["ENOENT", "ETIMEDOUT", "EACCES"])

export interface CommandFailure {
	/** `code` from the spawn error, or the process exit code. */
	code?: string | number
	killed?: boolean
	output: string
}

/**
 * Map a failed CLI invocation onto an error kind. The CLI exposes no error
 * codes, so this is a match on its wording; the "not found in marketplace"
 * pattern is what drives install retries.
 */
export function classifyFailure(failure: CommandFailure): RegistryErrorKind {
	if (typeof failure.code === "string" && UNAVAILABLE_CODES.has(failure.code)) {
		return "unavailable"
	}
	if (failure.killed) {
		return "unavailable"
	}

	const { output } = failure
	if (TRANSIENT_PATTERNS.some((pattern) => pattern.test(output))) {
		return "transient"
	}
	if (CONFLICT_PATTERNS.some((pattern) => pattern.test(output))) {
		return "conflict"
	}
	if (UNAUTHORIZED_PATTERNS.some((pattern) => pattern.test(output))) {
		return "unauthorized"
	}
	return "permanent"
}

/**
 * Normalize whatever `execFile` rejected with into a `CommandFailure`.
 */
export function toCommandFailure(error: unknown): CommandFailure {
	if (!(error instanceof Error)) {
		return { output: String(error) }
	}

	// execFile attaches these to the Error it rejects with.
	const details = error as Error & {
		code?: unknown
		killed?: unknown
		stderr?: unknown
		stdout?: unknown
	}
	const code =
		typeof details.code === "string" || typeof details.code === "number"
			? details.code
			: undefined
	const output = [details.stderr, details.stdout, error.message]
		.filter((part): part is string => typeof part === "string" && part.length > 0)
		.join("\n")

	return { code, killed: details.killed === true, output }
}
