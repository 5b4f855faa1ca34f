import { confirm, isCancel } from "@clack/prompts"
import { consola } from "consola"
import { CommandResult, printOutcome } from "@/commands/types"
import { markerExists, removeMarker } from "@/io/marker"
import { loadRuntime, type Runtime } from "@/runtime"

export async function resetCommand(options: { yes: boolean }): Promise<void> {
	consola.info("agent-setup reset")

	const runtime = loadRuntime()
	if (runtime.status !== "completed") {
		printOutcome(runtime)
		return
	}

	const result = await resetWithRuntime(runtime.value, options)
	printOutcome(result, { success: "Completion marker removed." })
}

/**
 * Remove the completion marker so the watcher and prompt hook run setup again.
 */
export async function resetWithRuntime(
	runtime: Runtime,
	options: { yes: boolean },
): Promise<CommandResult<void>> {
	const { markerFile } = runtime.config.paths
	if (!(await markerExists(markerFile))) {
		return CommandResult.unchanged("Setup has not completed; nothing to reset.")
	}

	if (!options.yes) {
		const shouldReset = await confirm({
			initialValue: false,
			message: "Remove the completion marker so setup runs again?",
		})
		if (isCancel(shouldReset) || !shouldReset) {
			return CommandResult.cancelled()
		}
	}

	const removed = await removeMarker(markerFile)
	if (!removed.ok) {
		return CommandResult.failed(removed.error)
	}

	return CommandResult.completed(undefined)
}
