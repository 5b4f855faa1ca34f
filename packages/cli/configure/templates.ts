import path from "node:path"
import { consola } from "consola"
import type { ItemOutcome } from "@/configure/report"
import type { FeatureFlags, SetupPaths } from "@/env"
import { createTextFile, ensureDir, pathExists, readTextFile } from "@/io/fs"

export type TemplateKind = "skill" | "agent"

export type TemplateSource =
	| { type: "static" }
	| { type: "generated"; render: (features: FeatureFlags) => string }

export interface TemplateUnit {
	kind: TemplateKind
	id: string
	source: TemplateSource
	enabled: (features: FeatureFlags) => boolean
}

const always = () => true

const hasCloudTooling = (features: FeatureFlags) =>
	features.kubernetes ||
	features.terraform ||
	features.aws ||
	features.gcloud ||
	features.cloudflare

const staticUnit = (
	kind: TemplateKind,
	id: string,
	enabled: (features: FeatureFlags) => boolean = always,
): TemplateUnit => ({ enabled, id, kind, source: { type: "static" } })

export const TEMPLATE_UNITS: TemplateUnit[] = [
	{
		enabled: always,
		id: "container-environment",
		kind: "skill",
		source: { render: renderContainerEnvironment, type: "generated" },
	},
	staticUnit("skill", "git-workflow"),
	staticUnit("skill", "testing-patterns"),
	staticUnit("skill", "code-quality"),
	staticUnit("skill", "development-workflow"),
	staticUnit("skill", "error-handling"),
	staticUnit("skill", "documentation-authoring"),
	staticUnit("skill", "shell-scripting"),
	staticUnit("skill", "skill-authoring"),
	staticUnit("skill", "agent-authoring"),
	staticUnit("skill", "docker-development", (features) => features.docker),
	staticUnit("skill", "cloud-infrastructure", hasCloudTooling),
	staticUnit("agent", "code-reviewer"),
	staticUnit("agent", "test-writer"),
	staticUnit("agent", "refactorer"),
	staticUnit("agent", "debugger"),
]

const LANGUAGE_LABELS: Array<[keyof FeatureFlags, string]> = [
	["python", "Python"],
	["node", "Node.js"],
	["rust", "Rust"],
	["ruby", "Ruby"],
	["golang", "Go"],
	["java", "Java"],
	["kotlin", "Kotlin"],
	["android", "Android SDK"],
]

const TOOL_LABELS: Array<[keyof FeatureFlags, string]> = [
	["docker", "Docker"],
	["kubernetes", "Kubernetes (kubectl, helm)"],
	["terraform", "Terraform"],
	["aws", "AWS CLI"],
	["gcloud", "Google Cloud SDK"],
	["cloudflare", "Cloudflare (wrangler)"],
]

export function renderContainerEnvironment(features: FeatureFlags): string {
	const list = (labels: Array<[keyof FeatureFlags, string]>) => {
		const enabled = labels.filter(([flag]) => features[flag]).map(([, label]) => `- ${label}`)
		return enabled.length > 0 ? enabled.join("\n") : "- None"
	}

	return [
		"---",
		"name: container-environment",
		"description: Toolchains and tools installed in this development container",
		"---",
		"",
		"# Container Environment",
		"",
		"Prefer the toolchains below; anything not listed is not installed.",
		"",
		"## Languages",
		"",
		list(LANGUAGE_LABELS),
		"",
		"## Tools",
		"",
		list(TOOL_LABELS),
		"",
	].join("\n")
}

export function templateTarget(
	unit: Pick<TemplateUnit, "id" | "kind">,
	paths: Pick<SetupPaths, "agentsDir" | "skillsDir">,
): string {
	return unit.kind === "skill"
		? path.join(paths.skillsDir, unit.id, "SKILL.md")
		: path.join(paths.agentsDir, `${unit.id}.md`)
}

export function templateSource(
	unit: Pick<TemplateUnit, "id" | "kind">,
	templatesDir: string,
): string {
	return unit.kind === "skill"
		? path.join(templatesDir, "skills", unit.id, "SKILL.md")
		: path.join(templatesDir, "agents", unit.id, `${unit.id}.md`)
}

/**
 * Write each enabled unit whose target does not exist yet. Existing files are
 * never compared or updated.
 */
export async function materializeTemplates(
	units: TemplateUnit[],
	features: FeatureFlags,
	paths: Pick<SetupPaths, "agentsDir" | "skillsDir" | "templatesDir">,
): Promise<ItemOutcome[]> {
	const outcomes: ItemOutcome[] = []

	for (const unit of units) {
		if (!unit.enabled(features)) {
			continue
		}
		outcomes.push(await materializeUnit(unit, features, paths))
	}

	return outcomes
}

async function materializeUnit(
	unit: TemplateUnit,
	features: FeatureFlags,
	paths: Pick<SetupPaths, "agentsDir" | "skillsDir" | "templatesDir">,
): Promise<ItemOutcome> {
	const name = `${unit.kind}:${unit.id}`
	const target = templateTarget(unit, paths)

	const exists = await pathExists(target)
	if (!exists.ok) {
		return { name, reason: exists.error.message, status: "failed" }
	}
	if (exists.value) {
		return { name, status: "skipped" }
	}

	let contents: string
	if (unit.source.type === "generated") {
		contents = unit.source.render(features)
	} else {
		const read = await readTextFile(templateSource(unit, paths.templatesDir))
		if (!read.ok) {
			consola.warn(read.error.message)
			return { name, reason: "template missing", status: "failed" }
		}
		contents = read.value
	}

	const dir = await ensureDir(path.dirname(target))
	if (!dir.ok) {
		return { name, reason: dir.error.message, status: "failed" }
	}

	const created = await createTextFile(target, contents)
	if (!created.ok) {
		consola.warn(created.error.message)
		return { name, reason: created.error.message, status: "failed" }
	}
	if (!created.value) {
		return { name, status: "skipped" }
	}

	consola.success(`Installed ${unit.kind} ${unit.id}.`)
	return { name, status: "added" }
}
