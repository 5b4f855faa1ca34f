import { execFile } from "node:child_process"
import { promisify } from "node:util"
import type { Result } from "@agent-setup/core"
import { toAbsolutePath } from "@/io/fs"
import type { IoError } from "@/types/errors"

const execFileAsync = promisify(execFile)

const GIT_TIMEOUT_MS = 5000

export type RemoteReader = (repoPath: string) => Promise<Result<string[], IoError>>

/**
 * List the distinct fetch/push URLs configured for a repository.
 */
export const listRemoteUrls: RemoteReader = async (repoPath) => {
	try {
		const { stdout } = await execFileAsync("git", ["-C", repoPath, "remote", "-v"], {
			encoding: "utf8",
			timeout: GIT_TIMEOUT_MS,
		})
		return { ok: true, value: parseRemoteOutput(stdout) }
	} catch (error) {
		return {
			error: {
				message: `Unable to list remotes for ${repoPath}.`,
				operation: "git remote",
				path: toAbsolutePath(repoPath),
				rawError: error instanceof Error ? error : undefined,
				type: "io",
			},
			ok: false,
		}
	}
}

// Lines look like: "origin\tgit@github.com:owner/repo.git (fetch)"
export function parseRemoteOutput(output: string): string[] {
	const urls = new Set<string>()
	for (const line of output.split("\n")) {
		const [, url] = line.trim().split(/\s+/)
		if (url) {
			urls.add(url)
		}
	}
	return [...urls]
}

/**
 * Hostname of a remote URL, for both URL (`https://host/...`, `ssh://git@host:22/...`)
 * and scp-like (`git@host:owner/repo`) forms.
 */
export function extractRemoteHost(remoteUrl: string): string | null {
	const trimmed = remoteUrl.trim()
	if (trimmed.includes("://")) {
		try {
			const hostname = new URL(trimmed).hostname
			return hostname ? hostname.toLowerCase() : null
		} catch {
			return null
		}
	}

	const scpLike = /^(?:[^@/\s]+@)?([^:/\s]+):/.exec(trimmed)
	return scpLike?.[1] ? scpLike[1].toLowerCase() : null
}
