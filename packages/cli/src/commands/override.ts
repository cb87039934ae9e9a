/**
 * hookwarden override - operator side of override codes
 *
 * Usage:
 *   hookwarden override issue [--ttl <minutes>] [--note <text>]
 *   hookwarden override list [--json]
 *   hookwarden override revoke <code>
 *   hookwarden override purge [--days <n>]
 */

import { describeError } from '@hookwarden/core'
import { loadGuardConfig, normalizeCode, type OverrideCode, OverrideStore } from '@hookwarden/guard'

import { type CliContext, optionValue, positionals } from '../context.js'

const DAY_MS = 24 * 60 * 60 * 1000

function showHelp(ctx: CliContext): void {
	ctx.stdout(`
hookwarden override - manage single-use override codes

Usage:
  hookwarden override issue [--ttl <minutes>] [--note <text>]
  hookwarden override list [--json]
  hookwarden override revoke <code>
  hookwarden override purge [--days <n>]

A code unblocks one blocked tool call. Set it as HOOK_OVERRIDE_CODE in the
environment the agent's hooks run in; it is used up by the first blocked call.
`)
}

function status(code: OverrideCode, now: number): string {
	if (code.consumed) {return 'used'}
	if (code.expiresAt <= now) {return 'expired'}
	return 'active'
}

function positiveNumber(value: string | undefined, name: string): number | undefined {
	if (value === undefined) {return undefined}
	const parsed = Number(value)
	if (!Number.isFinite(parsed) || parsed <= 0) {
		throw new Error(`--${ name } must be a positive number, got "${ value }"`)
	}
	return parsed
}

export async function runOverride(args: string[], ctx: CliContext): Promise<number> {
	const [ action, ...rest ] = positionals(args, [ 'ttl', 'note', 'days' ])
	if (!action || args.includes('--help') || args.includes('-h')) {
		showHelp(ctx)
		return action ? 0 : 1
	}

	const config = loadGuardConfig(ctx.cwd, ctx.env)
	const store = new OverrideStore(config.overrideStore, { now: () => ctx.now().getTime() })
	try {
		switch (action) {
			case 'issue': {
				const ttlMinutes = positiveNumber(optionValue(args, 'ttl'), 'ttl') ?? config.overrideTtlMinutes
				const issued = store.issue({ ttlMinutes, note: optionValue(args, 'note') })
				ctx.stdout(issued.code)
				ctx.stderr(`expires ${ new Date(issued.expiresAt).toISOString() } (single use)`)
				return 0
			}

			case 'list': {
				const codes = store.list()
				if (args.includes('--json')) {
					ctx.stdout(JSON.stringify(codes, null, 2))
					return 0
				}
				if (codes.length === 0) {
					ctx.stdout('No override codes')
					return 0
				}
				const now = ctx.now().getTime()
				for (const code of codes) {
					const note = code.note ? `  ${ code.note }` : ''
					ctx.stdout(`${ code.code }  ${ status(code, now).padEnd(7) }  expires ${ new Date(code.expiresAt).toISOString() }${ note }`)
				}
				return 0
			}

			case 'revoke': {
				const code = rest[0]
				if (!code) {
					ctx.stderr('Usage: hookwarden override revoke <code>')
					return 1
				}
				if (!store.revoke(code)) {
					ctx.stderr(`${ normalizeCode(code) } is not an active code`)
					return 1
				}
				ctx.stderr(`Revoked ${ normalizeCode(code) }`)
				return 0
			}

			case 'purge': {
				const days = positiveNumber(optionValue(args, 'days'), 'days') ?? 7
				const removed = store.purge(ctx.now().getTime() - days * DAY_MS)
				ctx.stderr(`Removed ${ removed } code${ removed === 1 ? '' : 's' }`)
				return 0
			}

			default:
				ctx.stderr(`Unknown override action: ${ action }`)
				return 1
		}
	} catch (error) {
		ctx.stderr(`hookwarden override: ${ describeError(error) }`)
		return 1
	} finally {
		store.close()
	}
}
