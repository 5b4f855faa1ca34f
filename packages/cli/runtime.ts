import { CommandResult } from "@/commands/types"
import { type CredentialProbe, createCredentialProbe } from "@/credentials/probe"
import { readSetupConfig, type SetupConfig } from "@/env"
import { createClaudeRegistry, runClaudeCommand } from "@/registry/claude"
import type { RegistryClient } from "@/registry/types"

export interface Runtime {
	config: SetupConfig
	probe: CredentialProbe
	registry: RegistryClient
}

export function createRuntime(config: SetupConfig): Runtime {
	const probe = createCredentialProbe({ auth: config.auth, paths: config.paths })
	return {
		config,
		probe,
		registry: createClaudeRegistry(runClaudeCommand, () => probe.bearerToken()),
	}
}

/**
 * Read the configuration once for this process and wire the real collaborators.
 */
export function loadRuntime(env: NodeJS.ProcessEnv = process.env): CommandResult<Runtime> {
	const config = readSetupConfig(env)
	if (!config.ok) {
		return CommandResult.failed(config.error)
	}

	return CommandResult.completed(createRuntime(config.value))
}
