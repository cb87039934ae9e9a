/**
 * hookwarden CLI - unified entry point
 *
 * Usage:
 *   hookwarden pre        # PreToolUse hook (blocks unsafe tool calls)
 *   hookwarden override   # Issue, list, revoke override codes
 *   hookwarden audit      # Verify the audit log, show stats
 *   hookwarden guards     # List guards
 *   hookwarden init       # Register the hook in this repo
 */

import { describeError } from '@hookwarden/core'
import { readFileSync } from 'fs'
import { dirname, join } from 'path'
import { fileURLToPath } from 'url'
import { z } from 'zod'

import { runAudit } from './commands/audit.js'
import { runGuards } from './commands/guards.js'
import { runInit } from './commands/init.js'
import { runOverride } from './commands/override.js'
import { runPre } from './commands/pre.js'
import { type CliContext, processContext } from './context.js'

const __dirname = dirname(fileURLToPath(import.meta.url))

function getVersion(): string {
	try {
		const pkg = z.object({ version: z.string() }).safeParse(
			JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf-8'))
		)
		return pkg.success ? pkg.data.version : '0.0.0'
	} catch {
		return '0.0.0'
	}
}

function showHelp(ctx: CliContext): void {
	ctx.stdout(`
hookwarden - policy guard for AI coding agent tool calls

Usage:
  hookwarden pre                 PreToolUse hook (reads the tool call on stdin)
  hookwarden override <action>   issue | list | revoke <code> | purge
  hookwarden audit <action>      verify | stats [--json]
  hookwarden guards              List guards and whether they are enabled
  hookwarden init [--force]      Register the hook and write .claude/hookwarden.json

Options:
  --help, -h      Show this help message
  --version, -v   Show version

Examples:
  hookwarden init
  hookwarden override issue --ttl 15 --note "regenerate fixtures"
  HOOK_OVERRIDE_CODE=OVR-XXXX-XXXX <agent>     # hand the code to the agent's hooks
  hookwarden audit stats
`)
}

/**
 * Run one command; resolves to the process exit code
 */
export async function runCli(argv: string[], ctx: CliContext = processContext()): Promise<number> {
	const [ command, ...args ] = argv

	try {
		switch (command) {
			case 'pre':
				return await runPre(ctx)
			case 'override':
				return await runOverride(args, ctx)
			case 'audit':
				return await runAudit(args, ctx)
			case 'guards':
				return await runGuards(args, ctx)
			case 'init':
				return await runInit(args, ctx)
			case '--help':
			case '-h':
			case undefined:
				showHelp(ctx)
				return 0
			case '--version':
			case '-v':
				ctx.stdout(getVersion())
				return 0
			default:
				ctx.stderr(`Unknown command: ${ command }`)
				ctx.stderr('Run "hookwarden --help" for usage')
				return 1
		}
	} catch (error) {
		ctx.stderr(`Error: ${ describeError(error) }`)
		return 1
	}
}
