#!/usr/bin/env tsx

import { Command } from "commander"
import { configureCommand } from "@/commands/configure"
import { hookCommand } from "@/commands/hook"
import { resetCommand } from "@/commands/reset"
import { statusCommand } from "@/commands/status"
import { watchCommand } from "@/commands/watch"
import pkg from "./package.json" with { type: "json" }

async function main(): Promise<void> {
	const program = new Command()

	program
		.name("agent-setup")
		.description("Finish code-assistant setup once credentials are available")
		.version(pkg.version, "-V, --version", "Output the version number")
		.showHelpAfterError()
		.showSuggestionAfterError()

	program
		.command("configure")
		.description("Register the marketplace, plugins, endpoints and templates")
		.option("--force", "Attempt plugin setup even without detected credentials")
		.action(async (options: { force?: boolean }) => {
			await configureCommand({ force: Boolean(options.force) })
		})

	program
		.command("watch")
		.description("Wait for credentials in the background, then configure once")
		.option("--timeout <seconds>", "Give up after this many seconds")
		.action(async (options: { timeout?: string }) => {
			await watchCommand({ timeout: options.timeout })
		})

	program
		.command("hook", { hidden: true })
		.description("Prompt hook: occasionally re-check credentials and configure")
		.action(async () => {
			await hookCommand()
		})

	program
		.command("status")
		.description("Show credential state, completion and desired configuration")
		.action(async () => {
			await statusCommand()
		})

	program
		.command("reset")
		.description("Remove the completion marker so setup runs again")
		.option("--yes", "Skip the confirmation prompt")
		.action(async (options: { yes?: boolean }) => {
			await resetCommand({ yes: Boolean(options.yes) })
		})

	if (process.argv.length <= 2) {
		program.outputHelp()
		return
	}

	await program.parseAsync(process.argv)
}

void main()
