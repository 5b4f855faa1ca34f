import type { Dirent } from "node:fs"
import { readdir } from "node:fs/promises"
import path from "node:path"
import {
	findPlatformForHost,
	type PlatformDefinition,
	type ServiceEndpointSpec,
} from "@agent-setup/core"
import { consola } from "consola"
import { extractRemoteHost, type RemoteReader } from "@/utils/git"

const SKIPPED_DIRECTORIES = new Set(["node_modules"])

/**
 * Repositories under `root`, at most `maxDepth` levels down. A directory
 * holding `.git` is a repository and is not descended further. Hidden
 * directories and `node_modules` are never entered; unreadable ones are skipped.
 */
export async function findRepositories(root: string, maxDepth: number): Promise<string[]> {
	const repositories: string[] = []

	async function visit(dir: string, depth: number): Promise<void> {
		let entries: Dirent[]
		try {
			entries = await readdir(dir, { withFileTypes: true })
		} catch {
			// Unreadable directories are not scanned.
			return
		}

		if (entries.some((entry) => entry.name === ".git")) {
			repositories.push(dir)
			return
		}

		if (depth >= maxDepth) {
			return
		}

		const children = entries
			.filter(
				(entry) =>
					entry.isDirectory() &&
					!entry.name.startsWith(".") &&
					!SKIPPED_DIRECTORIES.has(entry.name),
			)
			.map((entry) => entry.name)
			.sort()
		for (const child of children) {
			await visit(path.join(dir, child), depth + 1)
		}
	}

	await visit(root, 0)
	return repositories
}

export interface DetectOptions {
	root: string
	depth: number
	/** Names of the platform token variables that are set. */
	tokens: readonly string[]
	readRemotes: RemoteReader
}

/**
 * Endpoints for hosting platforms found in repository remotes. Detection is
 * advisory: a platform without its token only produces a hint.
 */
export async function detectPlatformEndpoints(
	options: DetectOptions,
): Promise<ServiceEndpointSpec[]> {
	const repositories = await findRepositories(options.root, options.depth)
	const detected = new Map<string, PlatformDefinition>()

	for (const repo of repositories) {
		const remotes = await options.readRemotes(repo)
		if (!remotes.ok) {
			consola.warn(remotes.error.message)
			continue
		}

		for (const remote of remotes.value) {
			const host = extractRemoteHost(remote)
			const platform = host ? findPlatformForHost(host) : undefined
			if (platform && !detected.has(platform.id)) {
				detected.set(platform.id, platform)
			}
		}
	}

	const endpoints: ServiceEndpointSpec[] = []
	for (const platform of detected.values()) {
		if (!options.tokens.includes(platform.tokenVariable)) {
			consola.info(
				`Detected ${platform.id} repositories; set ${platform.tokenVariable} to register the ${platform.endpoint.name} endpoint.`,
			)
			continue
		}

		consola.info(`Detected ${platform.id} repositories.`)
		endpoints.push(platform.endpoint)
	}

	return endpoints
}
