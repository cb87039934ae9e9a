/**
 * Single-use override codes, stored in SQLite
 *
 * Codes are issued by an operator outside the agent session and consumed by
 * the hook. Checking and consuming a code is one conditional UPDATE, so of any
 * number of hook processes presenting the same code exactly one succeeds.
 */

import { createLogger, describeError, OverrideError } from '@hookwarden/core'
import Database from 'better-sqlite3'
import { randomInt } from 'crypto'
import { mkdirSync } from 'fs'
import { dirname } from 'path'

const logger = createLogger('override')

// No 0/O, 1/I/L: codes get read aloud and retyped
const ALPHABET = 'ABCDEFGHJKMNPQRSTUVWXYZ23456789'
const MAX_ISSUE_ATTEMPTS = 5

export interface OverrideCode {
	code: string;
	/** Epoch milliseconds */
	issuedAt: number;
	expiresAt: number;
	consumed: boolean;
	consumedAt?: number;
	note?: string;
}

export interface IssueOptions {
	ttlMinutes: number;
	note?: string;
}

/** What the aggregator needs from an override store */
export interface OverrideValidator {
	validateAndConsume(code: string): boolean;
}

export interface OverrideStoreOptions {
	busyTimeoutMs?: number;
	now?: () => number;
}

interface OverrideRow {
	code: string;
	issued_at: number;
	expires_at: number;
	consumed_at: number | null;
	note: string | null;
}

export function normalizeCode(code: string): string {
	return code.trim().toUpperCase()
}

export function generateCode(): string {
	const group = (): string => Array.from({ length: 4 }, () => ALPHABET[randomInt(ALPHABET.length)]).join('')
	return `OVR-${ group() }-${ group() }`
}

function toOverrideCode(row: OverrideRow): OverrideCode {
	return {
		code: row.code,
		issuedAt: row.issued_at,
		expiresAt: row.expires_at,
		consumed: row.consumed_at !== null,
		consumedAt: row.consumed_at ?? undefined,
		note: row.note ?? undefined
	}
}

export class OverrideStore implements OverrideValidator {
	private readonly db: Database.Database
	private readonly now: () => number

	constructor(readonly path: string, options: OverrideStoreOptions = {}) {
		this.now = options.now ?? Date.now
		if (path !== ':memory:') {
			mkdirSync(dirname(path), { recursive: true })
		}

		this.db = new Database(path)
		this.db.pragma(`busy_timeout = ${ options.busyTimeoutMs ?? 2000 }`)
		this.db.pragma('journal_mode = WAL')
		this.migrate()
	}

	private migrate(): void {
		this.db.exec(`
			CREATE TABLE IF NOT EXISTS override_codes (
				code        TEXT PRIMARY KEY,
				issued_at   INTEGER NOT NULL,
				expires_at  INTEGER NOT NULL,
				consumed_at INTEGER,
				note        TEXT
			);

			CREATE INDEX IF NOT EXISTS idx_override_codes_expires
				ON override_codes(expires_at);
		`)
	}

	/**
	 * Create a new code valid for `ttlMinutes`
	 */
	issue({ ttlMinutes, note }: IssueOptions): OverrideCode {
		if (!Number.isFinite(ttlMinutes) || ttlMinutes <= 0) {
			throw new OverrideError(`ttl must be a positive number of minutes, got ${ ttlMinutes }`)
		}

		const insert = this.db.prepare<[string, number, number, string | null]>(`
			INSERT OR IGNORE INTO override_codes (code, issued_at, expires_at, note)
			VALUES (?, ?, ?, ?)
		`)

		for (let attempt = 0; attempt < MAX_ISSUE_ATTEMPTS; attempt++) {
			const code = generateCode()
			const issuedAt = this.now()
			const expiresAt = issuedAt + Math.round(ttlMinutes * 60_000)
			if (insert.run(code, issuedAt, expiresAt, note ?? null).changes === 1) {
				logger.info({ expiresAt: new Date(expiresAt).toISOString() }, 'override code issued')
				return { code, issuedAt, expiresAt, consumed: false, note }
			}
		}
		throw new OverrideError(`could not generate an unused code in ${ MAX_ISSUE_ATTEMPTS } attempts`)
	}

	/**
	 * Consume `code` if it exists, is unexpired and unused. Never throws.
	 */
	validateAndConsume(code: string): boolean {
		const normalized = normalizeCode(code)
		if (!normalized) {return false}

		try {
			const now = this.now()
			const result = this.db.prepare<[number, string, number]>(`
				UPDATE override_codes
				SET consumed_at = ?
				WHERE code = ? AND consumed_at IS NULL AND expires_at > ?
			`).run(now, normalized, now)

			if (result.changes === 1) {
				logger.info({ code: normalized }, 'override code consumed')
				return true
			}

			logger.warn({ code: normalized }, this.rejection(normalized, now).message)
			return false
		} catch (error) {
			logger.error({ err: describeError(error), path: this.path }, 'override store unavailable')
			return false
		}
	}

	private rejection(code: string, now: number): OverrideError {
		const row = this.find(code)
		if (!row) {return new OverrideError('override code not found')}
		if (row.consumed) {return new OverrideError('override code already used')}
		if (row.expiresAt <= now) {return new OverrideError('override code expired')}
		return new OverrideError('override code rejected')
	}

	find(code: string): OverrideCode | undefined {
		const row = this.db.prepare<[string], OverrideRow>(
			'SELECT code, issued_at, expires_at, consumed_at, note FROM override_codes WHERE code = ?'
		).get(normalizeCode(code))
		return row ? toOverrideCode(row) : undefined
	}

	list(): OverrideCode[] {
		return this.db.prepare<[], OverrideRow>(
			'SELECT code, issued_at, expires_at, consumed_at, note FROM override_codes ORDER BY issued_at DESC, code'
		).all().map(toOverrideCode)
	}

	/**
	 * Expire an unused code now. False when it is unknown, used or already expired.
	 */
	revoke(code: string): boolean {
		const now = this.now()
		const result = this.db.prepare<[number, string, number]>(`
			UPDATE override_codes
			SET expires_at = ?
			WHERE code = ? AND consumed_at IS NULL AND expires_at > ?
		`).run(now, normalizeCode(code), now)
		return result.changes === 1
	}

	/**
	 * Delete codes that expired or were used before `beforeMs`
	 */
	purge(beforeMs: number): number {
		return this.db.prepare<[number, number]>(
			'DELETE FROM override_codes WHERE expires_at < ? OR consumed_at < ?'
		).run(beforeMs, beforeMs).changes
	}

	close(): void {
		this.db.close()
	}
}
