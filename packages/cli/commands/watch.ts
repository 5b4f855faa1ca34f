import { consola } from "consola"
import { CommandResult, printOutcome } from "@/commands/types"
import { runConfigure } from "@/configure/configure"
import { ensureDir } from "@/io/fs"
import { loadRuntime, type Runtime } from "@/runtime"
import { selectChangeWaiter, watchTargetFor } from "@/watch/wait"
import { runWatcher, type WatchOutcome } from "@/watch/watcher"

export async function watchCommand(options: { timeout?: string }): Promise<void> {
	const timeoutMs = parseTimeout(options.timeout)
	if (!timeoutMs.ok) {
		printOutcome(timeoutMs.result)
		return
	}

	const runtime = loadRuntime()
	if (runtime.status !== "completed") {
		printOutcome(runtime)
		return
	}

	const result = await watchWithRuntime(runtime.value, timeoutMs.value)
	printOutcome(result, { exitOnFailure: false, success: "Setup complete." })
}

export async function watchWithRuntime(
	runtime: Runtime,
	timeoutMs: number | undefined,
): Promise<CommandResult<WatchOutcome>> {
	const target = watchTargetFor(runtime.config.paths.credentialsFile)
	const dir = await ensureDir(target)
	if (!dir.ok) {
		consola.warn(`${dir.error.message} Falling back to polling.`)
	}

	const outcome = await runWatcher({
		...runtime,
		configure: (options) => runConfigure(options, runtime),
		timeoutMs,
		waiter: selectChangeWaiter(target),
	})

	switch (outcome.phase) {
		case "done":
			return outcome.alreadyComplete
				? CommandResult.unchanged("Setup already complete.")
				: CommandResult.completed(outcome)
		case "timed_out":
			return CommandResult.unchanged(
				"No credentials appeared; run `agent-setup configure` after logging in.",
			)
		case "failed":
			return CommandResult.unchanged(
				"Setup did not complete; it will be retried from the prompt hook.",
			)
	}
}

function parseTimeout(
	raw: string | undefined,
): { ok: true; value: number | undefined } | { ok: false; result: CommandResult<never> } {
	if (raw === undefined) {
		return { ok: true, value: undefined }
	}

	const seconds = Number(raw)
	if (!Number.isInteger(seconds) || seconds <= 0) {
		return {
			ok: false,
			result: CommandResult.failed({
				field: "timeout",
				message: `--timeout must be a positive number of seconds, got "${raw}".`,
				source: "manual",
				type: "validation",
			}),
		}
	}

	return { ok: true, value: seconds * 1000 }
}
