import { type FSWatcher, watch } from "node:fs"
import path from "node:path"
import type { SetupPaths } from "@/env"

/** A directory to watch, optionally narrowed to one entry in it. */
export interface WatchTarget {
	dir: string
	filename?: string
}

/**
 * Blocks until something changes at one of `targets` or `maxWaitMs` elapses.
 * Resolves `true` for a notification, `false` on timeout. Callers re-check
 * state either way; a notification is only a hint.
 */
export interface ChangeWaiter {
	readonly kind: "fs-events" | "polling"
	waitForChange(targets: readonly WatchTarget[], maxWaitMs: number): Promise<boolean>
}

type Timer = (ms: number) => Promise<void>

const defaultTimer: Timer = (ms) => new Promise((resolve) => setTimeout(resolve, ms))

export function createPollingWaiter(timer: Timer = defaultTimer): ChangeWaiter {
	return {
		kind: "polling",
		async waitForChange(_targets, maxWaitMs) {
			await timer(maxWaitMs)
			return false
		},
	}
}

type WatchFactory = (dir: string, onChange: (filename: string | null) => void) => FSWatcher

const defaultWatchFactory: WatchFactory = (dir, onChange) =>
	watch(dir, { persistent: true }, (_event, filename) => onChange(filename))

/**
 * Waits on `fs.watch` notifications for the target directories, bounded by
 * `maxWaitMs`. A notification without a filename counts for every target.
 * Directories that cannot be watched degrade to a plain timed wait.
 */
export function createFsEventsWaiter(createWatcher: WatchFactory = defaultWatchFactory): ChangeWaiter {
	return {
		kind: "fs-events",
		waitForChange(targets, maxWaitMs) {
			return new Promise((resolve) => {
				const watchers: FSWatcher[] = []
				let settled = false

				const finish = (changed: boolean) => {
					if (settled) {
						return
					}
					settled = true
					clearTimeout(timeout)
					for (const watcher of watchers) {
						watcher.close()
					}
					resolve(changed)
				}

				const timeout = setTimeout(() => finish(false), maxWaitMs)

				for (const target of targets) {
					try {
						const watcher = createWatcher(target.dir, (filename) => {
							if (!target.filename || filename === null || filename === target.filename) {
								finish(true)
							}
						})
						watcher.on("error", () => watcher.close())
						watchers.push(watcher)
					} catch {
						// Not watchable (missing directory, no inotify): the timer still bounds the wait.
					}
				}
			})
		},
	}
}

/**
 * Choose the backend once: fs events when the directory can be watched
 * on this host, polling otherwise.
 */
export function selectChangeWaiter(
	target: string,
	createWatcher: WatchFactory = defaultWatchFactory,
): ChangeWaiter {
	try {
		const probe = createWatcher(target, () => {})
		probe.close()
		return createFsEventsWaiter(createWatcher)
	} catch {
		return createPollingWaiter()
	}
}

/** The directory whose changes signal a login: the credential file's parent. */
export function watchTargetFor(credentialsFile: string): string {
	return path.dirname(credentialsFile)
}

/**
 * Everything a login may write: the credential directory, and the general
 * config file whose account field also records an OAuth login.
 */
export function watchTargetsFor(
	paths: Pick<SetupPaths, "configFile" | "credentialsFile">,
): WatchTarget[] {
	return [
		{ dir: watchTargetFor(paths.credentialsFile) },
		{ dir: path.dirname(paths.configFile), filename: path.basename(paths.configFile) },
	]
}
