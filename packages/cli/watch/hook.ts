import { spawn } from "node:child_process"
import path from "node:path"
import { consola } from "consola"
import type { CredentialProbe } from "@/credentials/probe"
import type { SetupPaths } from "@/env"
import { ensureDir, readOptionalTextFile, writeTextFile } from "@/io/fs"
import { markerExists } from "@/io/marker"

const log = consola.withTag("hook")

/** Only every Nth prompt does any real work. */
export const HOOK_SAMPLE_INTERVAL = 5

export type HookOutcome = "completed" | "not_sampled" | "unauthenticated" | "launched"

export type ConfigureLauncher = () => void

export interface PromptHookDeps {
	paths: Pick<SetupPaths, "hookCounterFile" | "markerFile">
	probe: CredentialProbe
	launch: ConfigureLauncher
}

/**
 * One prompt tick. On a sampled tick with credentials and no marker, start a
 * configure run in the background and return without waiting for it.
 */
export async function runPromptHook(deps: PromptHookDeps): Promise<HookOutcome> {
	if (await markerExists(deps.paths.markerFile)) {
		return "completed"
	}

	const tick = await advanceCounter(deps.paths.hookCounterFile)
	if (tick !== 0) {
		return "not_sampled"
	}

	if ((await deps.probe.probe()) === "unauthenticated") {
		return "unauthenticated"
	}

	log.info("Credentials found; finishing assistant setup in the background.")
	deps.launch()
	return "launched"
}

/**
 * Advance the persisted counter modulo the sample interval and return the new
 * value. A missing or corrupt counter starts from zero.
 */
export async function advanceCounter(counterFile: string): Promise<number> {
	const current = await readOptionalTextFile(counterFile)
	const parsed = current.ok && current.value !== null ? Number.parseInt(current.value, 10) : 0
	const previous = Number.isInteger(parsed) && parsed >= 0 ? parsed : 0
	const next = (previous + 1) % HOOK_SAMPLE_INTERVAL

	const dir = await ensureDir(path.dirname(counterFile))
	const written = dir.ok ? await writeTextFile(counterFile, `${next}\n`) : dir
	if (!written.ok) {
		log.debug(written.error.message)
	}

	return next
}

/**
 * Re-run this CLI as `configure`, detached from the prompt's process group
 * with its output discarded.
 */
export const launchDetachedConfigure: ConfigureLauncher = () => {
	const entry = process.argv[1]
	if (!entry) {
		log.warn("Cannot locate the CLI entry point; skipping background configure.")
		return
	}

	const child = spawn(process.execPath, [...process.execArgv, entry, "configure"], {
		detached: true,
		env: process.env,
		stdio: "ignore",
	})
	child.on("error", (error) => log.debug(error.message))
	child.unref()
}
