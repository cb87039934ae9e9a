/**
 * hookwarden pre - PreToolUse hook
 *
 * Reads the tool call from stdin, runs the guards and answers with an exit
 * code: 0 allow, 2 block, 1 when the check could not run. Reasons go to
 * stderr; stdout stays empty.
 */

import { describeError, EXIT, type ExitCode } from '@hookwarden/core'
import {
	AuditLog,
	createRegistry,
	intercept,
	loadGuardConfig,
	OverrideStore,
	type GuardRegistry,
	type ResolvedConfig
} from '@hookwarden/guard'

import type { CliContext } from '../context.js'

/** Environment variable the operator sets on the host to pass an override code */
export const OVERRIDE_ENV = 'HOOK_OVERRIDE_CODE'

export async function runPre(ctx: CliContext): Promise<ExitCode> {
	let raw: string
	let config: ResolvedConfig
	let registry: GuardRegistry
	try {
		raw = ctx.readStdin()
		config = loadGuardConfig(ctx.cwd, ctx.env)
		registry = createRegistry(config)
	} catch (error) {
		ctx.stderr(`hookwarden pre: ${ describeError(error) }`)
		return EXIT.ERROR
	}

	const opened: OverrideStore[] = []
	try {
		const result = await intercept(raw, {
			registry,
			openOverrides: () => {
				const store = new OverrideStore(config.overrideStore, { now: () => ctx.now().getTime() })
				opened.push(store)
				return store
			},
			audit: new AuditLog(config.auditLog, {
				timeoutMs: config.lockTimeoutMs,
				staleMs: config.staleLockMs
			}),
			overrideCode: ctx.env[OVERRIDE_ENV],
			cwd: ctx.cwd,
			now: ctx.now
		})

		for (const line of result.report) {
			ctx.stderr(line)
		}
		return result.exitCode
	} catch (error) {
		ctx.stderr(`hookwarden pre: ${ describeError(error) }`)
		return EXIT.ERROR
	} finally {
		for (const store of opened) {
			store.close()
		}
	}
}
