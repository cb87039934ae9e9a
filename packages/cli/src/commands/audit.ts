/**
 * hookwarden audit - read side of the audit log
 *
 * Usage:
 *   hookwarden audit verify           # exit 1 if any line is corrupt
 *   hookwarden audit stats [--json]
 */

import { describeError } from '@hookwarden/core'
import { AuditLog, type AuditStats, loadGuardConfig } from '@hookwarden/guard'

import { type CliContext, positionals } from '../context.js'

function formatCounts(counts: Record<string, number>): string[] {
	return Object.entries(counts)
		.sort(([ a, x ], [ b, y ]) => y - x || a.localeCompare(b))
		.map(([ key, count ]) => `    ${ key.padEnd(22) } ${ count }`)
}

export function formatStats(stats: AuditStats): string[] {
	const lines = [
		`Files:       ${ stats.files }`,
		`Records:     ${ stats.total }`,
		`  allowed:     ${ stats.allowed }`,
		`  blocked:     ${ stats.blocked }`,
		`  overridden:  ${ stats.overridden }`,
		`  with warnings: ${ stats.warned }`,
		`Corrupt:     ${ stats.corrupt }`
	]
	if (stats.first && stats.last) {
		lines.push(`Range:       ${ stats.first } .. ${ stats.last }`)
	}

	const byGuard = formatCounts(stats.byGuard)
	if (byGuard.length > 0) {
		lines.push('  Blocks by guard:', ...byGuard)
	}
	const byTool = formatCounts(stats.byTool)
	if (byTool.length > 0) {
		lines.push('  Events by tool:', ...byTool)
	}
	return lines
}

export async function runAudit(args: string[], ctx: CliContext): Promise<number> {
	const [ action ] = positionals(args)
	const config = loadGuardConfig(ctx.cwd, ctx.env)
	const log = new AuditLog(config.auditLog)

	try {
		switch (action) {
			case 'verify': {
				const result = await log.verify()
				for (const corrupt of result.corrupt) {
					ctx.stdout(`${ corrupt.file }:${ corrupt.line }: ${ corrupt.error }`)
				}
				ctx.stderr(`${ result.records } valid record${ result.records === 1 ? '' : 's' }, ${ result.corrupt.length } corrupt, in ${ result.files } file${ result.files === 1 ? '' : 's' }`)
				return result.valid ? 0 : 1
			}

			case 'stats': {
				const stats = await log.stats()
				if (args.includes('--json')) {
					ctx.stdout(JSON.stringify(stats, null, 2))
				} else {
					for (const line of formatStats(stats)) {
						ctx.stdout(line)
					}
				}
				return 0
			}

			default:
				ctx.stderr('Usage: hookwarden audit verify | hookwarden audit stats [--json]')
				return 1
		}
	} catch (error) {
		ctx.stderr(`hookwarden audit: ${ describeError(error) }`)
		return 1
	}
}
