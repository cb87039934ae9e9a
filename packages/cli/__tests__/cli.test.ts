import { rmSync } from 'fs'
import { afterEach, beforeEach, describe, expect, test } from 'vitest'

import { runCli } from '../src/cli.js'
import { bashPayload, makeContext, makeProject } from './helpers.js'

describe('runCli', () => {
	let dir: string

	beforeEach(() => {
		dir = makeProject()
	})

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true })
	})

	test('dispatches to pre', async () => {
		const { ctx } = makeContext(dir, { stdin: bashPayload('git push -f', dir) })
		expect(await runCli([ 'pre' ], ctx)).toBe(2)
	})

	test('prints the package version', async () => {
		const { ctx, out } = makeContext(dir)
		expect(await runCli([ '--version' ], ctx)).toBe(0)
		expect(out).toEqual([ '0.1.0' ])
	})

	test('shows help without a command', async () => {
		const { ctx, out } = makeContext(dir)
		expect(await runCli([], ctx)).toBe(0)
		expect(out[0]).toContain('hookwarden - policy guard for AI coding agent tool calls')
	})

	test('rejects an unknown command', async () => {
		const { ctx, err } = makeContext(dir)
		expect(await runCli([ 'post' ], ctx)).toBe(1)
		expect(err).toEqual([ 'Unknown command: post', 'Run "hookwarden --help" for usage' ])
	})
})
