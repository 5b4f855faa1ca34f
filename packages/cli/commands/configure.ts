import { consola } from "consola"
import { CommandResult, printOutcome } from "@/commands/types"
import { type ConfigureOptions, runConfigure } from "@/configure/configure"
import { type ConfigureReport, summarizeReport } from "@/configure/report"
import { loadRuntime, type Runtime } from "@/runtime"

export async function configureCommand(options: ConfigureOptions): Promise<void> {
	consola.info("agent-setup configure")

	const runtime = loadRuntime()
	if (runtime.status !== "completed") {
		printOutcome(runtime)
		return
	}

	const result = await configureWithRuntime(runtime.value, options)
	// Partial failures are reported, never signalled through the exit code.
	printOutcome(result, { exitOnFailure: false, success: "Setup complete." })
}

export async function configureWithRuntime(
	runtime: Runtime,
	options: ConfigureOptions,
): Promise<CommandResult<ConfigureReport>> {
	consola.start(options.force ? "Configuring (forced)..." : "Configuring...")

	const report = await runConfigure(options, runtime)
	consola.info(summarizeReport(report).join("\n"))

	if (report.complete) {
		return CommandResult.completed(report)
	}

	return CommandResult.unchanged(
		report.credentials === "unauthenticated"
			? "Setup will finish once credentials are available."
			: "Setup finished with failures; run `agent-setup configure` again to retry.",
	)
}
