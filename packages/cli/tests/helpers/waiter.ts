/**
 * A change waiter that never sees a change and instead advances a fake clock
 * by the requested wait.
 */

import { vi } from "vitest"
import type { ChangeWaiter, WatchTarget } from "@/watch/wait"

export function fakeClock(start = 1_000_000) {
	let current = start
	const waiter = {
		kind: "polling" as const,
		waitForChange: vi.fn(async (_targets: readonly WatchTarget[], maxWaitMs: number) => {
			current += maxWaitMs
			return false
		}),
	} satisfies ChangeWaiter
	return { now: () => current, waiter }
}
