import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'fs'
import { join } from 'path'
import { afterEach, beforeEach, describe, expect, test } from 'vitest'

import { runInit } from '../src/commands/init.js'
import { makeContext, makeProject } from './helpers.js'

const HOOK_ENTRY = {
	matcher: 'Bash|Write|Edit|MultiEdit|NotebookEdit',
	hooks: [ { type: 'command', command: 'hookwarden pre' } ]
}

describe('hookwarden init', () => {
	let dir: string
	let settingsPath: string

	beforeEach(() => {
		dir = makeProject()
		settingsPath = join(dir, '.claude', 'settings.local.json')
	})

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true })
	})

	test('writes config, hook settings and .gitignore', async () => {
		const { ctx } = makeContext(dir)
		expect(await runInit([], ctx)).toBe(0)

		expect(JSON.parse(readFileSync(join(dir, '.claude', 'hookwarden.json'), 'utf-8'))).toEqual({
			allowedPaths: [],
			installEntryPoint: 'safe_install.sh',
			protectedFiles: [ 'run_tests.sh', '.pre-commit-config.yaml', 'CLAUDE.md' ],
			disabledGuards: [],
			overrideTtlMinutes: 60
		})
		expect(JSON.parse(readFileSync(settingsPath, 'utf-8'))).toEqual({ hooks: { PreToolUse: [ HOOK_ENTRY ] } })
		expect(readFileSync(join(dir, '.gitignore'), 'utf-8')).toBe('.claude/hookwarden/\n')
	})

	test('is idempotent and keeps existing settings', async () => {
		mkdirSync(join(dir, '.claude'))
		writeFileSync(settingsPath, JSON.stringify({ permissions: { allow: [ 'Bash(ls)' ] } }))
		writeFileSync(join(dir, '.gitignore'), 'node_modules')

		await runInit([], makeContext(dir).ctx)
		const second = makeContext(dir)
		expect(await runInit([], second.ctx)).toBe(0)
		expect(second.out).toContain('PreToolUse hook already configured')
		expect(second.out).toContain('.claude/hookwarden.json already exists (use --force to overwrite)')

		expect(JSON.parse(readFileSync(settingsPath, 'utf-8'))).toEqual({
			permissions: { allow: [ 'Bash(ls)' ] },
			hooks: { PreToolUse: [ HOOK_ENTRY ] }
		})
		expect(readFileSync(join(dir, '.gitignore'), 'utf-8')).toBe('node_modules\n.claude/hookwarden/\n')
	})

	test('--force rewrites the config', async () => {
		mkdirSync(join(dir, '.claude'))
		writeFileSync(join(dir, '.claude', 'hookwarden.json'), '{"overrideTtlMinutes": 5}')
		const { ctx, out } = makeContext(dir)
		await runInit([ '--force' ], ctx)
		expect(out).toContain('Created .claude/hookwarden.json')
		expect(readFileSync(join(dir, '.claude', 'hookwarden.json'), 'utf-8')).toContain('"overrideTtlMinutes": 60')
	})

	test('leaves unparseable settings untouched', async () => {
		mkdirSync(join(dir, '.claude'))
		writeFileSync(settingsPath, '{ broken')
		const { ctx, err } = makeContext(dir)
		expect(await runInit([], ctx)).toBe(1)
		expect(err).toEqual([ 'Warning: Could not parse existing settings.local.json; leaving it untouched' ])
		expect(readFileSync(settingsPath, 'utf-8')).toBe('{ broken')
		expect(existsSync(join(dir, '.claude', 'hookwarden.json'))).toBe(true)
	})
})
