/**
 * Guard registry: the fixed table of guards and their enabled state
 */

import { ConfigError, createLogger, describeError, DuplicateGuardError, GuardFault } from '@hookwarden/core'

import type { ResolvedConfig } from './config.js'
import { builtinGuards } from './guards/index.js'
import { describePattern } from './patterns.js'
import type { Decision, Guard, HookEvent, ToolName } from './types.js'

const logger = createLogger('registry')

export interface GuardInfo {
	name: string;
	description: string;
	tools: readonly ToolName[] | '*';
	enabled: boolean;
	patterns: string[];
}

/**
 * Shell guards also see any event that carries a command, whatever the host
 * called the tool
 */
function appliesTo(guard: Guard, event: HookEvent): boolean {
	if (guard.tools === '*' || guard.tools.includes(event.toolName)) {return true}
	return event.command !== undefined && guard.tools.includes('Bash')
}

export class GuardRegistry {
	private readonly guards: Guard[] = []
	private readonly disabled = new Set<string>()

	register(guard: Guard): this {
		if (this.has(guard.name)) {
			throw new DuplicateGuardError(guard.name)
		}
		this.guards.push(guard)
		return this
	}

	has(name: string): boolean {
		return this.guards.some(guard => guard.name === name)
	}

	enable(name: string): void {
		this.assertKnown(name)
		this.disabled.delete(name)
	}

	disable(name: string): void {
		this.assertKnown(name)
		this.disabled.add(name)
	}

	isEnabled(name: string): boolean {
		return this.has(name) && !this.disabled.has(name)
	}

	/**
	 * Run every enabled guard that covers the event's tool, in registration
	 * order. A guard that throws yields a blocking decision.
	 */
	evaluate(event: HookEvent): Decision[] {
		const decisions: Decision[] = []

		for (const guard of this.guards) {
			if (this.disabled.has(guard.name) || !appliesTo(guard, event)) {continue}

			try {
				decisions.push(guard.check(event))
			} catch (error) {
				const fault = new GuardFault(guard.name, { cause: error })
				logger.error({ guard: guard.name, tool: event.toolName, err: describeError(error) }, fault.message)
				decisions.push({
					guardName: guard.name,
					blocked: true,
					severity: 'block',
					reason: 'guard internal error'
				})
			}
		}

		return decisions
	}

	list(): GuardInfo[] {
		return this.guards.map(guard => ({
			name: guard.name,
			description: guard.description,
			tools: guard.tools,
			enabled: !this.disabled.has(guard.name),
			patterns: guard.patterns.map(describePattern)
		}))
	}

	private assertKnown(name: string): void {
		if (!this.has(name)) {
			throw new ConfigError(`unknown guard "${ name }"`)
		}
	}
}

/**
 * Registry of the built-in guards with `config.disabledGuards` applied
 */
export function createRegistry(config: ResolvedConfig): GuardRegistry {
	const registry = new GuardRegistry()
	for (const guard of builtinGuards(config)) {
		registry.register(guard)
	}
	for (const name of config.disabledGuards) {
		registry.disable(name)
	}
	return registry
}
