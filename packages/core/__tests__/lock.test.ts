import { existsSync, mkdtempSync, rmSync, utimesSync, writeFileSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { setTimeout as sleep } from 'timers/promises'
import { afterEach, beforeEach, describe, expect, test } from 'vitest'

import { LockTimeoutError } from '../src/errors.js'
import { acquireLock, withFileLock } from '../src/lock.js'

describe('withFileLock', () => {
	let dir: string
	let lockPath: string

	beforeEach(() => {
		dir = mkdtempSync(join(tmpdir(), 'hookwarden-lock-'))
		lockPath = join(dir, 'state', 'audit.jsonl.lock')
	})

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true })
	})

	test('returns the result and removes the lock file', async () => {
		const result = await withFileLock(lockPath, () => {
			expect(existsSync(lockPath)).toBe(true)
			return 42
		})
		expect(result).toBe(42)
		expect(existsSync(lockPath)).toBe(false)
	})

	test('releases the lock when fn throws', async () => {
		await expect(withFileLock(lockPath, () => {
			throw new Error('boom')
		})).rejects.toThrow('boom')
		expect(existsSync(lockPath)).toBe(false)
	})

	test('runs concurrent holders one at a time', async () => {
		let active = 0
		let maxActive = 0
		let finished = 0

		await Promise.all(Array.from({ length: 8 }, () => withFileLock(lockPath, async () => {
			active++
			maxActive = Math.max(maxActive, active)
			await sleep(5)
			active--
			finished++
		}, { timeoutMs: 5000 })))

		expect(maxActive).toBe(1)
		expect(finished).toBe(8)
	})

	test('gives up after timeoutMs', async () => {
		const release = await acquireLock(lockPath)
		try {
			await expect(acquireLock(lockPath, { timeoutMs: 50 })).rejects.toBeInstanceOf(LockTimeoutError)
		} finally {
			release()
		}
		expect(existsSync(lockPath)).toBe(false)
	})

	test('breaks a lock older than staleMs', async () => {
		const release = await acquireLock(lockPath)
		const past = new Date(Date.now() - 60_000)
		utimesSync(lockPath, past, past)

		const second = await acquireLock(lockPath, { staleMs: 1000, timeoutMs: 500 })
		second()
		expect(existsSync(lockPath)).toBe(false)

		// The first holder no longer owns the file; releasing is a no-op
		release()
	})

	test('breaks a lock left with an unreadable owner once it is stale', async () => {
		await withFileLock(lockPath, () => undefined)
		writeFileSync(lockPath, 'garbage')
		const past = new Date(Date.now() - 60_000)
		utimesSync(lockPath, past, past)

		const result = await withFileLock(lockPath, () => 'ok', { staleMs: 1000, timeoutMs: 500 })
		expect(result).toBe('ok')
	})
})
