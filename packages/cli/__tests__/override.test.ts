import { rmSync } from 'fs'
import { afterEach, beforeEach, describe, expect, test } from 'vitest'

import { runOverride } from '../src/commands/override.js'
import { makeContext, makeProject, NOW } from './helpers.js'

const CODE_FORMAT = /^OVR-[A-HJKMNP-Z2-9]{4}-[A-HJKMNP-Z2-9]{4}$/

describe('hookwarden override', () => {
	let dir: string

	beforeEach(() => {
		dir = makeProject()
	})

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true })
	})

	test('issue prints the code on stdout and the expiry on stderr', async () => {
		const { ctx, out, err } = makeContext(dir)
		expect(await runOverride([ 'issue', '--ttl', '5' ], ctx)).toBe(0)
		expect(out).toHaveLength(1)
		expect(out[0]).toMatch(CODE_FORMAT)
		expect(err).toEqual([ 'expires 2026-01-15T10:05:00.000Z (single use)' ])
	})

	test('issue uses the configured ttl by default', async () => {
		const { ctx, err } = makeContext(dir, { env: { HOOKWARDEN_OVERRIDE_TTL_MINUTES: '30' } })
		await runOverride([ 'issue' ], ctx)
		expect(err).toEqual([ 'expires 2026-01-15T10:30:00.000Z (single use)' ])
	})

	test('issue rejects a bad ttl', async () => {
		const { ctx, err } = makeContext(dir)
		expect(await runOverride([ 'issue', '--ttl', 'abc' ], ctx)).toBe(1)
		expect(err).toEqual([ 'hookwarden override: --ttl must be a positive number, got "abc"' ])
	})

	test('list shows status, expiry and note', async () => {
		const issuer = makeContext(dir)
		await runOverride([ 'issue', '--ttl', '5', '--note', 'fixtures' ], issuer.ctx)
		const code = issuer.out[0]

		const { ctx, out } = makeContext(dir)
		expect(await runOverride([ 'list' ], ctx)).toBe(0)
		expect(out).toEqual([ `${ code }  active   expires 2026-01-15T10:05:00.000Z  fixtures` ])
	})

	test('list says when there are no codes', async () => {
		const { ctx, out } = makeContext(dir)
		await runOverride([ 'list' ], ctx)
		expect(out).toEqual([ 'No override codes' ])
	})

	test('revoke works once', async () => {
		const issuer = makeContext(dir)
		await runOverride([ 'issue' ], issuer.ctx)
		const code = issuer.out[0]

		const first = makeContext(dir)
		expect(await runOverride([ 'revoke', code.toLowerCase() ], first.ctx)).toBe(0)
		expect(first.err).toEqual([ `Revoked ${ code }` ])

		const second = makeContext(dir)
		expect(await runOverride([ 'revoke', code ], second.ctx)).toBe(1)
		expect(second.err).toEqual([ `${ code } is not an active code` ])

		const listed = makeContext(dir)
		await runOverride([ 'list' ], listed.ctx)
		expect(listed.out[0]).toBe(`${ code }  expired  expires 2026-01-15T10:00:00.000Z`)
	})

	test('purge removes codes expired before the cutoff', async () => {
		let clock = NOW.getTime()
		const now = (): Date => new Date(clock)

		await runOverride([ 'issue', '--ttl', '1' ], makeContext(dir, { now }).ctx)
		clock += 2 * 24 * 60 * 60 * 1000

		const { ctx, err } = makeContext(dir, { now })
		expect(await runOverride([ 'purge', '--days', '1' ], ctx)).toBe(0)
		expect(err).toEqual([ 'Removed 1 code' ])
	})

	test('shows help without an action', async () => {
		const { ctx, out } = makeContext(dir)
		expect(await runOverride([], ctx)).toBe(1)
		expect(out[0]).toContain('hookwarden override - manage single-use override codes')
	})

	test('rejects an unknown action', async () => {
		const { ctx, err } = makeContext(dir)
		expect(await runOverride([ 'mint' ], ctx)).toBe(1)
		expect(err).toEqual([ 'Unknown override action: mint' ])
	})
})
