/**
 * In-process RegistryClient
 *
 * Keeps marketplaces, plugins and endpoints in memory, records every call,
 * and fails operations on demand with a chosen error kind.
 */

import {
	formatPluginKey,
	type MarketplaceId,
	marketplaceNameFromId,
	type PluginRecord,
	type ServiceEndpointSpec,
} from "@agent-setup/core"
import type { RegistryClient, RegistryResult } from "@/registry/types"
import type { RegistryErrorKind, RegistryOperation } from "@/types/errors"

export interface RegistryCall {
	operation: RegistryOperation
	target?: string
}

interface PlannedFailure {
	operation: RegistryOperation
	kind: RegistryErrorKind
	target?: string
	remaining: number
}

export class FakeRegistry implements RegistryClient {
	readonly marketplaces = new Set<string>()
	readonly plugins = new Set<string>()
	readonly endpoints = new Map<string, ServiceEndpointSpec>()
	readonly calls: RegistryCall[] = []
	private readonly failures: PlannedFailure[] = []

	/**
	 * Make the next `times` calls of `operation` (optionally only for `target`) fail.
	 */
	fail(
		operation: RegistryOperation,
		kind: RegistryErrorKind,
		options: { target?: string; times?: number } = {},
	): this {
		this.failures.push({
			kind,
			operation,
			remaining: options.times ?? Number.POSITIVE_INFINITY,
			target: options.target,
		})
		return this
	}

	callsTo(operation: RegistryOperation): RegistryCall[] {
		return this.calls.filter((call) => call.operation === operation)
	}

	async listMarketplaces(): Promise<RegistryResult<string[]>> {
		return this.respond("listMarketplaces", undefined, () => [...this.marketplaces])
	}

	async addMarketplace(id: MarketplaceId): Promise<RegistryResult<void>> {
		const name = marketplaceNameFromId(id)
		return this.respondAdd("addMarketplace", id, this.marketplaces.has(name), () => {
			this.marketplaces.add(name)
		})
	}

	async listPlugins(): Promise<RegistryResult<string[]>> {
		return this.respond("listPlugins", undefined, () => [...this.plugins])
	}

	async installPlugin(plugin: PluginRecord): Promise<RegistryResult<void>> {
		const key = formatPluginKey(plugin)
		return this.respondAdd("installPlugin", key, this.plugins.has(key), () => {
			this.plugins.add(key)
		})
	}

	async listEndpoints(): Promise<RegistryResult<string[]>> {
		return this.respond("listEndpoints", undefined, () => [...this.endpoints.keys()])
	}

	async addEndpoint(spec: ServiceEndpointSpec): Promise<RegistryResult<void>> {
		return this.respondAdd("addEndpoint", spec.name, this.endpoints.has(spec.name), () => {
			this.endpoints.set(spec.name, spec)
		})
	}

	private respond<T>(
		operation: RegistryOperation,
		target: string | undefined,
		produce: () => T,
	): RegistryResult<T> {
		this.calls.push({ operation, target })
		const planned = this.failures.find(
			(failure) =>
				failure.operation === operation &&
				failure.remaining > 0 &&
				(failure.target === undefined || failure.target === target),
		)
		if (planned) {
			planned.remaining -= 1
			return {
				error: {
					kind: planned.kind,
					message: `${operation} failed`,
					operation,
					target,
					type: "registry",
				},
				ok: false,
			}
		}
		return { ok: true, value: produce() }
	}

	private respondAdd(
		operation: RegistryOperation,
		target: string,
		exists: boolean,
		add: () => void,
	): RegistryResult<void> {
		const result = this.respond(operation, target, () => undefined)
		if (!result.ok) {
			return result
		}
		if (exists) {
			return {
				error: {
					kind: "conflict",
					message: `${target} already exists`,
					operation,
					target,
					type: "registry",
				},
				ok: false,
			}
		}
		add()
		return result
	}
}
