/**
 * Diagnostic logging for hookwarden
 *
 * Hooks talk to their host over stdout and exit codes, so every log line goes
 * to stderr (fd 2), written synchronously so nothing is lost when the process
 * exits right after a verdict.
 */

import pino from 'pino'

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent'

const LOG_LEVELS: readonly LogLevel[] = [ 'trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent' ]

function isLogLevel(value: string): value is LogLevel {
	return LOG_LEVELS.some(level => level === value)
}

/**
 * Resolve the log level from HOOKWARDEN_LOG_LEVEL (default: warn)
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
	const fromEnv = env.HOOKWARDEN_LOG_LEVEL?.trim().toLowerCase()
	if (fromEnv && isLogLevel(fromEnv)) {
		return fromEnv
	}
	return 'warn'
}

let root: pino.Logger | null = null

function getRootLogger(): pino.Logger {
	if (!root) {
		root = pino(
			{
				name: 'hookwarden',
				level: resolveLogLevel(),
				timestamp: pino.stdTimeFunctions.isoTime,
				formatters: {
					level: label => ({ level: label }),
					bindings: bindings => ({ pid: bindings.pid, name: bindings.name })
				}
			},
			pino.destination({ fd: 2, sync: true })
		)
	}
	return root
}

export type Logger = pino.Logger

/**
 * Child logger tagged with a component name
 */
export function createLogger(component: string): Logger {
	return getRootLogger().child({ component })
}

