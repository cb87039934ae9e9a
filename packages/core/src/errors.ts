/**
 * Error taxonomy shared by every hookwarden package
 */

export type ErrorCode =
	| 'INPUT_ERROR'
	| 'GUARD_FAULT'
	| 'OVERRIDE_ERROR'
	| 'LOG_WRITE_FAILURE'
	| 'LOCK_TIMEOUT'
	| 'DUPLICATE_GUARD'
	| 'CONFIG_ERROR'

export class HookwardenError extends Error {
	readonly code: ErrorCode

	constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
		super(message, options)
		this.name = new.target.name
		this.code = code
	}
}

/** Malformed or unreadable hook payload */
export class InputError extends HookwardenError {
	constructor(message: string, options?: { cause?: unknown }) {
		super('INPUT_ERROR', message, options)
	}
}

/** A guard failed while checking an event */
export class GuardFault extends HookwardenError {
	readonly guardName: string

	constructor(guardName: string, options?: { cause?: unknown }) {
		super('GUARD_FAULT', `guard ${ guardName } failed: ${ describeError(options?.cause) }`, options)
		this.guardName = guardName
	}
}

/** Missing, expired or reused override code. Never escapes the override store. */
export class OverrideError extends HookwardenError {
	constructor(message: string, options?: { cause?: unknown }) {
		super('OVERRIDE_ERROR', message, options)
	}
}

export class LogWriteFailure extends HookwardenError {
	constructor(message: string, options?: { cause?: unknown }) {
		super('LOG_WRITE_FAILURE', message, options)
	}
}

export class LockTimeoutError extends HookwardenError {
	readonly lockPath: string

	constructor(lockPath: string, timeoutMs: number) {
		super('LOCK_TIMEOUT', `could not acquire ${ lockPath } within ${ timeoutMs }ms`)
		this.lockPath = lockPath
	}
}

export class DuplicateGuardError extends HookwardenError {
	constructor(name: string) {
		super('DUPLICATE_GUARD', `guard "${ name }" is already registered`)
	}
}

export class ConfigError extends HookwardenError {
	constructor(message: string, options?: { cause?: unknown }) {
		super('CONFIG_ERROR', message, options)
	}
}

/**
 * Message of any thrown value
 */
export function describeError(error: unknown): string {
	if (error instanceof Error) {return error.message}
	return String(error)
}
