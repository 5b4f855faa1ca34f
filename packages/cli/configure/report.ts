import type { CredentialState } from "@/credentials/probe"

/**
 * - `added`: the item was installed, registered or written by this run
 * - `skipped`: it was already present
 * - `invalid`: the entry was rejected before any registry call
 * - `failed`: the registry or filesystem operation failed
 */
export type ItemStatus = "added" | "skipped" | "invalid" | "failed"

export interface ItemOutcome {
	name: string
	status: ItemStatus
	reason?: string
}

export interface ConfigureReport {
	credentials: CredentialState
	/** `null` when the step did not run for lack of credentials. */
	marketplace: ItemOutcome | null
	plugins: ItemOutcome[] | null
	endpoints: ItemOutcome[]
	templates: ItemOutcome[]
	/** Whether this run counts as a completed setup and wrote the marker. */
	complete: boolean
}

export function countByStatus(items: ItemOutcome[]): Record<ItemStatus, number> {
	const counts: Record<ItemStatus, number> = { added: 0, failed: 0, invalid: 0, skipped: 0 }
	for (const item of items) {
		counts[item.status] += 1
	}
	return counts
}

export function formatCounts(label: string, items: ItemOutcome[]): string {
	const counts = countByStatus(items)
	const parts = [`${counts.added} added`, `${counts.skipped} already present`]
	if (counts.invalid > 0) {
		parts.push(`${counts.invalid} invalid`)
	}
	if (counts.failed > 0) {
		parts.push(`${counts.failed} failed`)
	}
	return `${label}: ${parts.join(", ")}`
}

/**
 * Human-readable summary lines. The report drives terminal output only.
 */
export function summarizeReport(report: ConfigureReport): string[] {
	const lines = [`Credentials: ${report.credentials}`]

	if (report.marketplace) {
		lines.push(`Marketplace ${report.marketplace.name}: ${report.marketplace.status}`)
	} else {
		lines.push("Marketplace and plugins: skipped until credentials are available")
	}

	if (report.plugins) {
		lines.push(formatCounts("Plugins", report.plugins))
	}
	lines.push(formatCounts("Endpoints", report.endpoints))
	lines.push(formatCounts("Templates", report.templates))

	const problems = [
		...(report.marketplace ? [report.marketplace] : []),
		...(report.plugins ?? []),
		...report.endpoints,
		...report.templates,
	].filter((item) => item.status === "failed" || item.status === "invalid")
	for (const item of problems) {
		lines.push(`  ${item.status}: ${item.name}${item.reason ? ` (${item.reason})` : ""}`)
	}

	return lines
}
