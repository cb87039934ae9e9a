/**
 * hookwarden guards - list guards and whether they run
 */

import { createRegistry, loadGuardConfig } from '@hookwarden/guard'

import type { CliContext } from '../context.js'

export async function runGuards(args: string[], ctx: CliContext): Promise<number> {
	const registry = createRegistry(loadGuardConfig(ctx.cwd, ctx.env))
	const guards = registry.list()

	if (args.includes('--json')) {
		ctx.stdout(JSON.stringify(guards, null, 2))
		return 0
	}

	const verbose = args.includes('--verbose') || args.includes('-v')
	for (const guard of guards) {
		const tools = guard.tools === '*' ? 'all tools' : guard.tools.join(', ')
		ctx.stdout(`${ guard.enabled ? '[x]' : '[ ]' } ${ guard.name.padEnd(20) } ${ guard.description } (${ tools })`)
		if (verbose) {
			for (const pattern of guard.patterns) {
				ctx.stdout(`      ${ pattern }`)
			}
		}
	}
	return 0
}
