/**
 * Cross-process exclusive lock backed by a lock file
 *
 * The lock file is created with O_EXCL and holds the owner's pid and a random
 * token. A lock whose owner is gone, or which is older than `staleMs`, is
 * broken so a killed hook cannot wedge every later invocation.
 */

import { closeSync, mkdirSync, openSync, readFileSync, statSync, unlinkSync, writeSync } from 'fs'
import { dirname } from 'path'
import { setTimeout as sleep } from 'timers/promises'
import { v4 as uuidv4 } from 'uuid'

import { LockTimeoutError } from './errors.js'
import { createLogger } from './logger.js'

const logger = createLogger('lock')

export interface LockOptions {
	/** Give up after this long (default 2000ms) */
	timeoutMs?: number;
	/** Locks older than this are considered abandoned (default 10000ms) */
	staleMs?: number;
	/** Delay between attempts (default 15ms) */
	retryMs?: number;
}

export const DEFAULT_LOCK_OPTIONS: Required<LockOptions> = {
	timeoutMs: 2000,
	staleMs: 10_000,
	retryMs: 15
}

export type ReleaseLock = () => void

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && 'code' in error
}

interface LockOwner {
	pid: number;
	token: string;
}

/**
 * Raw lock file content; null when there is no lock file
 */
function readLockFile(lockPath: string): string | null {
	try {
		return readFileSync(lockPath, 'utf-8')
	} catch (error) {
		if (isErrnoException(error) && error.code === 'ENOENT') {return null}
		throw error
	}
}

function parseOwner(content: string | null): LockOwner | null {
	if (content === null) {return null}
	const [ pid, token ] = content.split('\n')
	const parsed = Number.parseInt(pid, 10)
	if (Number.isNaN(parsed) || !token) {return null}
	return { pid: parsed, token }
}

function removeLockFile(lockPath: string): void {
	try {
		unlinkSync(lockPath)
	} catch (error) {
		if (!isErrnoException(error) || error.code !== 'ENOENT') {throw error}
	}
}

function isProcessAlive(pid: number): boolean {
	try {
		process.kill(pid, 0)
		return true
	} catch (error) {
		// EPERM: the process exists but belongs to someone else
		return isErrnoException(error) && error.code === 'EPERM'
	}
}

/**
 * Remove the lock file if its owner is dead or it has outlived `staleMs`.
 * The file is only removed while it still holds the owner that was judged.
 */
function breakStaleLock(lockPath: string, staleMs: number): boolean {
	const content = readLockFile(lockPath)
	if (content === null) {return true}

	let ageMs: number
	try {
		ageMs = Date.now() - statSync(lockPath).mtimeMs
	} catch (error) {
		if (isErrnoException(error) && error.code === 'ENOENT') {return true}
		throw error
	}

	const owner = parseOwner(content)
	const abandoned = owner !== null && owner.pid !== process.pid && !isProcessAlive(owner.pid)
	if (!abandoned && ageMs < staleMs) {return false}

	// Broken and taken again by another process since it was read
	if (readLockFile(lockPath) !== content) {return false}

	logger.warn({ lockPath, ageMs, owner: owner?.pid }, 'breaking stale lock')
	removeLockFile(lockPath)
	return true
}

/**
 * Acquire the lock, waiting at most `timeoutMs`
 */
export async function acquireLock(lockPath: string, options: LockOptions = {}): Promise<ReleaseLock> {
	const { timeoutMs, staleMs, retryMs } = { ...DEFAULT_LOCK_OPTIONS, ...options }
	const token = uuidv4()
	const deadline = Date.now() + timeoutMs

	mkdirSync(dirname(lockPath), { recursive: true })

	for (;;) {
		let fd: number | null = null
		try {
			fd = openSync(lockPath, 'wx')
		} catch (error) {
			if (!isErrnoException(error) || error.code !== 'EEXIST') {throw error}
		}

		if (fd !== null) {
			try {
				writeSync(fd, `${ process.pid }\n${ token }\n`)
			} catch (error) {
				// No ownerless lock file left behind
				closeSync(fd)
				removeLockFile(lockPath)
				throw error
			}
			closeSync(fd)
			return () => releaseLock(lockPath, token)
		}

		if (breakStaleLock(lockPath, staleMs)) {continue}
		if (Date.now() >= deadline) {
			throw new LockTimeoutError(lockPath, timeoutMs)
		}
		await sleep(retryMs)
	}
}

function releaseLock(lockPath: string, token: string): void {
	const owner = parseOwner(readLockFile(lockPath))
	if (owner?.token !== token) {
		logger.warn({ lockPath }, 'lock was taken over before release')
		return
	}
	unlinkSync(lockPath)
}

/**
 * Run `fn` while holding the lock; the lock is released on every exit path
 */
export async function withFileLock<T>(
	lockPath: string,
	fn: () => T | Promise<T>,
	options: LockOptions = {}
): Promise<T> {
	const release = await acquireLock(lockPath, options)
	try {
		return await fn()
	} finally {
		release()
	}
}
