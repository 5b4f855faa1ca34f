import { consola } from "consola"
import type { ConfigureOptions } from "@/configure/configure"
import type { ConfigureReport } from "@/configure/report"
import type { CredentialProbe, CredentialState } from "@/credentials/probe"
import type { SetupConfig } from "@/env"
import { markerExists } from "@/io/marker"
import type { RegistryClient } from "@/registry/types"
import { type Sleep, sleep as defaultSleep } from "@/utils/sleep"
import { type ChangeWaiter, watchTargetsFor } from "@/watch/wait"

const log = consola.withTag("watch")

export type WatchPhase = "idle" | "waiting" | "configuring" | "done" | "timed_out" | "failed"

export type WatchOutcome =
	| { phase: "done"; alreadyComplete: true }
	| {
			phase: "done"
			alreadyComplete: false
			credentials: CredentialState
			report: ConfigureReport
	  }
	| { phase: "timed_out"; waitedMs: number }
	| { phase: "failed"; report: ConfigureReport }

export interface WatcherDeps {
	config: SetupConfig
	probe: CredentialProbe
	registry: RegistryClient
	waiter: ChangeWaiter
	configure: (options: ConfigureOptions) => Promise<ConfigureReport>
	sleep?: Sleep
	now?: () => number
	/** Overrides `config.watcher.timeoutMs`. */
	timeoutMs?: number
	onPhase?: (phase: WatchPhase) => void
}

/**
 * Wait for credentials, then configure once.
 *
 * idle → waiting → configuring → done, ending early in `done` when the
 * completion marker already exists, or in `timed_out` when no credentials
 * show up before the deadline. The marker itself is written by the
 * configure run.
 */
export async function runWatcher(deps: WatcherDeps): Promise<WatchOutcome> {
	const { config } = deps
	const now = deps.now ?? Date.now
	const sleep = deps.sleep ?? defaultSleep
	const enter = (phase: WatchPhase) => {
		log.debug(`Phase: ${phase}`)
		deps.onPhase?.(phase)
	}

	enter("idle")
	if (await markerExists(config.paths.markerFile)) {
		log.info("Setup already complete.")
		enter("done")
		return { alreadyComplete: true, phase: "done" }
	}

	enter("waiting")
	const timeoutMs = deps.timeoutMs ?? config.watcher.timeoutMs
	const started = now()
	const deadline = started + timeoutMs
	const targets = watchTargetsFor(config.paths)
	log.info(
		`Waiting up to ${Math.round(timeoutMs / 1000)}s for credentials (${deps.waiter.kind}).`,
	)

	let credentials = await deps.probe.probe()
	while (credentials === "unauthenticated") {
		const remaining = deadline - now()
		if (remaining <= 0) {
			log.warn("Timed out waiting for credentials.")
			enter("timed_out")
			return { phase: "timed_out", waitedMs: now() - started }
		}

		await deps.waiter.waitForChange(targets, Math.min(config.watcher.pollIntervalMs, remaining))
		credentials = await deps.probe.probe()
	}

	log.success(`Credentials detected (${credentials}).`)

	// A prompt hook may have finished setup while this process was waiting.
	if (await markerExists(config.paths.markerFile)) {
		enter("done")
		return { alreadyComplete: true, phase: "done" }
	}

	enter("configuring")
	await awaitRegistry(deps.registry, sleep, config.watcher.probeRetryDelayMs)

	const report = await deps.configure({ force: false })
	if (!report.complete) {
		log.warn("Setup did not complete; it will be retried on a later trigger.")
		enter("failed")
		return { phase: "failed", report }
	}

	log.success("Setup complete.")
	enter("done")
	return { alreadyComplete: false, credentials, phase: "done", report }
}

/**
 * One cheap listing to see whether the registry answers yet. On failure wait
 * once and try again, then carry on regardless: configure retries on its own.
 */
async function awaitRegistry(
	registry: RegistryClient,
	sleep: Sleep,
	retryDelayMs: number,
): Promise<void> {
	const first = await registry.listPlugins()
	if (first.ok) {
		return
	}

	log.info(`Registry not ready (${first.error.kind}); retrying in ${retryDelayMs / 1000}s.`)
	await sleep(retryDelayMs)

	const second = await registry.listPlugins()
	if (!second.ok) {
		log.warn(`Registry still not ready (${second.error.kind}); configuring anyway.`)
	}
}
