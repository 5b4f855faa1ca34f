import { printOutcome } from "@/commands/types"
import { loadRuntime } from "@/runtime"
import { launchDetachedConfigure, runPromptHook } from "@/watch/hook"

export async function hookCommand(): Promise<void> {
	const runtime = loadRuntime()
	if (runtime.status !== "completed") {
		// A broken configuration must not fail the user's prompt.
		printOutcome(runtime, { exitOnFailure: false })
		return
	}

	await runPromptHook({
		launch: launchDetachedConfigure,
		paths: runtime.value.config.paths,
		probe: runtime.value.probe,
	})
}
